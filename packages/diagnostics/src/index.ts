/**
 * @stepline/diagnostics
 *
 * Shared diagnostic types and definitions for stepline packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	SLCLI001,
	SLCLI002,
	SLCLI003,
	SLCLI004,
	SLCLI005,
	SLCLI006,
} from './cli.ts'
export { formatDiagnostic, interpolateMessage } from './interpolate.ts'
export {
	REPORTER_DIAGNOSTICS,
	type ReporterDiagnosticCode,
	SLREP001,
} from './reporter.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	DiagnosticSource,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { REPORTER_DIAGNOSTICS } from './reporter.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...REPORTER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
