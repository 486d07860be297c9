import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys stay as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : placeholder
	})
}

/**
 * Render a diagnostic as a single `[CODE] message` line.
 */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
