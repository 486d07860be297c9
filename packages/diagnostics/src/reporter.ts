/**
 * Reporter diagnostic definitions.
 *
 * Error code format: SLREP<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity, DiagnosticSource } from './types.ts'

export const SLREP001: DiagnosticDef = {
	code: 'SLREP001',
	description:
		'The reporter keeps one open suite path per run and handles events strictly one at a time.',
	message: 'event "{event}" received while "{current}" was still being handled',
	severity: DiagnosticSeverity.Error,
	source: DiagnosticSource.Reporter,
	suggestion: 'Deliver events from a single caller, and never from inside a sink write.',
}

export const REPORTER_DIAGNOSTICS = {
	SLREP001,
} as const

export type ReporterDiagnosticCode = keyof typeof REPORTER_DIAGNOSTICS
