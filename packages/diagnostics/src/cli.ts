/**
 * CLI diagnostic definitions.
 *
 * Error code format: SLCLI<NUMBER>
 * - SLCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity, DiagnosticSource } from './types.ts'

// =============================================================================
// CLI ERRORS (SLCLI001-099)
// =============================================================================

export const SLCLI001: DiagnosticDef = {
	code: 'SLCLI001',
	description: "stepline couldn't find an event file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	source: DiagnosticSource.Cli,
	suggestion: 'Double-check the path, or pipe the events through stdin instead.',
}

export const SLCLI002: DiagnosticDef = {
	code: 'SLCLI002',
	description: "The event file exists but stepline can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	source: DiagnosticSource.Cli,
	suggestion: 'Check that you have read permission for this file.',
}

export const SLCLI003: DiagnosticDef = {
	code: 'SLCLI003',
	description: "stepline couldn't write the service messages.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	source: DiagnosticSource.Cli,
	suggestion: 'Check that you have write permission for the output location.',
}

export const SLCLI004: DiagnosticDef = {
	code: 'SLCLI004',
	description: 'Every non-blank input line has to be one JSON document.',
	message: 'line {line}: malformed JSON: {reason}',
	severity: DiagnosticSeverity.Error,
	source: DiagnosticSource.Cli,
	suggestion: 'Emit one event per line (newline-delimited JSON).',
}

export const SLCLI005: DiagnosticDef = {
	code: 'SLCLI005',
	description: "The line is valid JSON but doesn't describe a known event.",
	message: 'line {line}: not a test event: {reason}',
	severity: DiagnosticSeverity.Error,
	source: DiagnosticSource.Cli,
	suggestion: 'Check the event "type" and its required fields.',
}

export const SLCLI006: DiagnosticDef = {
	code: 'SLCLI006',
	description: 'Something unexpected went wrong while formatting events.',
	message: 'formatting failed: {reason}',
	severity: DiagnosticSeverity.Error,
	source: DiagnosticSource.Cli,
	suggestion: 'Check your event stream, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	SLCLI001,
	SLCLI002,
	SLCLI003,
	SLCLI004,
	SLCLI005,
	SLCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
