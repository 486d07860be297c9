export const DiagnosticSeverity = {
	Error: 0,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/** Package that raises a diagnostic; also the middle of its code (SL<source>NNN). */
export const DiagnosticSource = {
	Cli: 'CLI',
	Reporter: 'REP',
} as const

export type DiagnosticSource = (typeof DiagnosticSource)[keyof typeof DiagnosticSource]

/**
 * Catalog entry. `message` may hold `{key}` placeholders filled from {@link DiagnosticArgs}.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly source: DiagnosticSource
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

export type DiagnosticArgs = Readonly<Record<string, string | number>>
