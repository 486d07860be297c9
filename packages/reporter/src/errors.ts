import { type DiagnosticArgs, type DiagnosticDef, formatDiagnostic } from '@stepline/diagnostics'
import type { FailureDetails } from './types.ts'

/**
 * Raised when the reporter is driven in a way it cannot honour.
 */
export class ReporterError extends Error {
	readonly code: string
	readonly def: DiagnosticDef

	constructor(def: DiagnosticDef, args?: DiagnosticArgs) {
		super(formatDiagnostic(def, args))
		this.name = 'ReporterError'
		this.code = def.code
		this.def = def
	}
}

/**
 * Capture a thrown value as plain failure details.
 */
export function toFailureDetails(error: unknown): FailureDetails {
	if (error instanceof Error) {
		return error.stack !== undefined
			? { message: error.message, stackTrace: error.stack, type: error.name }
			: { message: error.message, type: error.name }
	}
	return { message: String(error) }
}

/**
 * The full description of a failure: the host's trace when it has one,
 * otherwise `<type>: <message>`. Empty when there is no failure.
 */
export function describeFailure(error: FailureDetails | undefined): string {
	if (error === undefined) return ''
	if (error.stackTrace !== undefined) return error.stackTrace
	return error.type !== undefined ? `${error.type}: ${error.message}` : error.message
}
