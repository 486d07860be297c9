/**
 * Newline-delimited JSON decoding of test events.
 *
 * Timestamps may be ISO-8601 strings or epoch milliseconds; embed payloads are base64.
 */

import { type DiagnosticDef, formatDiagnostic, SLCLI004, SLCLI005 } from '@stepline/diagnostics'
import { type ReporterEvent, StepStatus, type StructuralNode } from '@stepline/reporter'
import { z } from 'zod'

export class EventParseError extends Error {
	readonly code: string
	readonly line: number

	constructor(def: DiagnosticDef, line: number, reason: string) {
		super(formatDiagnostic(def, { line, reason }))
		this.name = 'EventParseError'
		this.code = def.code
		this.line = line
	}
}

const timestampSchema = z
	.union([z.string().datetime({ offset: true }), z.number().int().nonnegative()])
	.transform((value) => new Date(value))
	.pipe(z.date())

const locationSchema = z.object({
	column: z.number().int().positive().optional(),
	line: z.number().int().positive(),
})

const structuralNodeSchema: z.ZodType<StructuralNode, z.ZodTypeDef, unknown> = z.lazy(() =>
	z.object({
		children: z.array(structuralNodeSchema).optional(),
		keyword: z.string().optional(),
		location: locationSchema,
		name: z.string().optional(),
	})
)

const failureSchema = z.object({
	message: z.string(),
	stackTrace: z.string().optional(),
	type: z.string().optional(),
})

const testStepSchema = z.discriminatedUnion('kind', [
	z.object({
		kind: z.literal('pickle'),
		line: z.number().int().positive(),
		text: z.string(),
		uri: z.string(),
	}),
	z.object({
		codeLocation: z.string(),
		hookType: z.string(),
		kind: z.literal('hook'),
	}),
	z.object({
		codeLocation: z.string(),
		kind: z.literal('generic'),
	}),
])

const testCaseSchema = z.object({
	location: locationSchema,
	name: z.string().optional(),
	uri: z.string(),
})

export const reporterEventSchema = z.discriminatedUnion('type', [
	z.object({ timestamp: timestampSchema, type: z.literal('testRunStarted') }),
	z.object({
		nodes: z.array(structuralNodeSchema),
		type: z.literal('testSourceParsed'),
		uri: z.string(),
	}),
	z.object({
		testCase: testCaseSchema,
		timestamp: timestampSchema,
		type: z.literal('testCaseStarted'),
	}),
	z.object({
		testStep: testStepSchema,
		timestamp: timestampSchema,
		type: z.literal('testStepStarted'),
	}),
	z.object({
		result: z.object({
			duration: z.number().nonnegative(),
			error: failureSchema.optional(),
			status: z.nativeEnum(StepStatus),
		}),
		testStep: testStepSchema,
		timestamp: timestampSchema,
		type: z.literal('testStepFinished'),
	}),
	z.object({
		testCase: testCaseSchema,
		timestamp: timestampSchema,
		type: z.literal('testCaseFinished'),
	}),
	z.object({
		error: failureSchema.optional(),
		timestamp: timestampSchema,
		type: z.literal('testRunFinished'),
	}),
	z.object({
		suggestion: z.object({ snippets: z.array(z.string()), text: z.string() }),
		testCaseLocation: locationSchema,
		type: z.literal('snippetsSuggested'),
		uri: z.string(),
	}),
	z.object({
		data: z
			.string()
			.base64()
			.transform((value) => new Uint8Array(Buffer.from(value, 'base64'))),
		mediaType: z.string(),
		name: z.string().optional(),
		type: z.literal('embed'),
	}),
	z.object({ text: z.string(), type: z.literal('write') }),
])

function describeIssue(error: z.ZodError): string {
	const [issue] = error.issues
	if (issue === undefined) return 'invalid event'
	const path = issue.path.length > 0 ? issue.path.join('.') : 'event'
	return `${path}: ${issue.message}`
}

function parseJson(text: string, line: number): unknown {
	try {
		return JSON.parse(text)
	} catch (error: unknown) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new EventParseError(SLCLI004, line, reason)
	}
}

/**
 * Decode one input line into an event.
 *
 * @param line - 1-indexed line number, used in error messages
 * @throws {EventParseError} on malformed JSON (SLCLI004) or an unknown event shape (SLCLI005)
 */
export function parseEventLine(text: string, line: number): ReporterEvent {
	const parsed = reporterEventSchema.safeParse(parseJson(text, line))
	if (!parsed.success) {
		throw new EventParseError(SLCLI005, line, describeIssue(parsed.error))
	}
	return parsed.data
}
