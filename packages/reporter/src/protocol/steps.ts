import { HookType, type TestStep } from '../types.ts'

// `<declaring type>.<member>(<args without a colon>)`: a method reference.
const METHOD_CODE_LOCATION = /^(.*)\.(.*)\([^:]*\)$/
// `<declaring type>.<member>(<file>:<line>)`: a lambda or closure reference.
const LAMBDA_CODE_LOCATION = /^(.*)\.(.*)\(.*:.*\)$/

const HOOK_NAMES: Record<HookType, string> = {
	[HookType.After]: 'After',
	[HookType.AfterStep]: 'AfterStep',
	[HookType.Before]: 'Before',
	[HookType.BeforeStep]: 'BeforeStep',
}

function isKnownHookType(hookType: string): hookType is HookType {
	return Object.hasOwn(HOOK_NAMES, hookType)
}

function simpleTypeName(declaringType: string): string {
	const separator = declaringType.lastIndexOf('.')
	return separator === -1 ? declaringType : declaringType.slice(separator + 1)
}

/**
 * Turn a raw glue code location into a navigable `test://` address.
 * The method rule is tried first; unrecognised locations pass through unchanged.
 */
export function resolveCodeLocation(codeLocation: string, scheme = ''): string {
	const method = METHOD_CODE_LOCATION.exec(codeLocation)
	if (method !== null) {
		const [, declaringType = '', member = ''] = method
		return `${scheme}test://${declaringType}/${member}`
	}

	const lambda = LAMBDA_CODE_LOCATION.exec(codeLocation)
	if (lambda !== null) {
		const [, declaringType = ''] = lambda
		return `${scheme}test://${declaringType}/${simpleTypeName(declaringType)}`
	}

	return codeLocation
}

export function stepLocationHint(step: TestStep, scheme = ''): string {
	if (step.kind === 'pickle') return `${step.uri}:${step.line}`
	return resolveCodeLocation(step.codeLocation, scheme)
}

export function hookName(hookType: string): string {
	return isKnownHookType(hookType) ? HOOK_NAMES[hookType] : hookType.toLowerCase()
}

export function stepName(step: TestStep): string {
	switch (step.kind) {
		case 'pickle':
			return step.text
		case 'hook':
			return hookName(step.hookType)
		case 'generic':
			return 'Unknown step'
	}
}
