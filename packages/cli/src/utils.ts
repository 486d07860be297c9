import {
	formatDiagnostic,
	SLCLI001,
	SLCLI002,
	SLCLI003,
	SLCLI006,
} from '@stepline/diagnostics'
import { EventParseError } from './events.ts'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnostic(SLCLI001, { path: filePath })
	}
	return formatDiagnostic(SLCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatDiagnostic(SLCLI003, { reason: getErrorMessage(error) })
}

export function formatFormattingError(error: unknown): string {
	if (error instanceof EventParseError) {
		return error.message
	}
	return formatDiagnostic(SLCLI006, { reason: getErrorMessage(error) })
}

export function formatSummary(events: number, messages: number, outputPath: string): string {
	return `${events} events, ${messages} messages written to ${outputPath}`
}
