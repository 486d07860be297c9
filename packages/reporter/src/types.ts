/**
 * A position in a source document. Lines and columns are 1-indexed.
 */
export interface Location {
	readonly line: number
	readonly column?: number
}

/**
 * One node of a parsed document's structural tree (feature, rule, examples, scenario...).
 * Produced by an external parser and never mutated here.
 */
export interface StructuralNode {
	readonly keyword?: string
	readonly name?: string
	readonly location: Location
	readonly children?: readonly StructuralNode[]
}

/**
 * Root-to-node line of descent through a structural tree, root first.
 */
export type NodePath = readonly StructuralNode[]

export interface TestCaseRef {
	readonly uri: string
	readonly location: Location
	readonly name?: string
}

export const StepStatus = {
	Ambiguous: 'AMBIGUOUS',
	Failed: 'FAILED',
	Passed: 'PASSED',
	Pending: 'PENDING',
	Skipped: 'SKIPPED',
	Undefined: 'UNDEFINED',
} as const

export type StepStatus = (typeof StepStatus)[keyof typeof StepStatus]

/**
 * Well-known hook kinds. Hosts may report others (e.g. `BEFORE_ALL`).
 */
export const HookType = {
	After: 'AFTER',
	AfterStep: 'AFTER_STEP',
	Before: 'BEFORE',
	BeforeStep: 'BEFORE_STEP',
} as const

export type HookType = (typeof HookType)[keyof typeof HookType]

export interface PickleStep {
	readonly kind: 'pickle'
	readonly uri: string
	readonly line: number
	readonly text: string
}

export interface HookStep {
	readonly kind: 'hook'
	readonly hookType: string
	readonly codeLocation: string
}

export interface GenericStep {
	readonly kind: 'generic'
	readonly codeLocation: string
}

export type TestStep = PickleStep | HookStep | GenericStep

export interface FailureDetails {
	readonly message: string
	/** Exception class or error name, e.g. `AssertionError` */
	readonly type?: string
	/** Full trace as printed by the host, including the message line */
	readonly stackTrace?: string
}

export interface StepResult {
	readonly status: StepStatus
	/** Elapsed time in milliseconds */
	readonly duration: number
	readonly error?: FailureDetails
}

export interface Suggestion {
	readonly text: string
	readonly snippets: readonly string[]
}

// =============================================================================
// EVENTS
// =============================================================================

export interface TestRunStartedEvent {
	readonly type: 'testRunStarted'
	readonly timestamp: Date
}

export interface TestSourceParsedEvent {
	readonly type: 'testSourceParsed'
	readonly uri: string
	readonly nodes: readonly StructuralNode[]
}

export interface TestCaseStartedEvent {
	readonly type: 'testCaseStarted'
	readonly timestamp: Date
	readonly testCase: TestCaseRef
}

export interface TestStepStartedEvent {
	readonly type: 'testStepStarted'
	readonly timestamp: Date
	readonly testStep: TestStep
}

export interface TestStepFinishedEvent {
	readonly type: 'testStepFinished'
	readonly timestamp: Date
	readonly testStep: TestStep
	readonly result: StepResult
}

export interface TestCaseFinishedEvent {
	readonly type: 'testCaseFinished'
	readonly timestamp: Date
	readonly testCase: TestCaseRef
}

export interface TestRunFinishedEvent {
	readonly type: 'testRunFinished'
	readonly timestamp: Date
	/** Aggregate failure raised outside any test case (before-all/after-all) */
	readonly error?: FailureDetails
}

export interface SnippetsSuggestedEvent {
	readonly type: 'snippetsSuggested'
	readonly uri: string
	readonly testCaseLocation: Location
	readonly suggestion: Suggestion
}

export interface EmbedEvent {
	readonly type: 'embed'
	readonly name?: string
	readonly mediaType: string
	readonly data: Uint8Array
}

export interface WriteEvent {
	readonly type: 'write'
	readonly text: string
}

export type ReporterEvent =
	| TestRunStartedEvent
	| TestSourceParsedEvent
	| TestCaseStartedEvent
	| TestStepStartedEvent
	| TestStepFinishedEvent
	| TestCaseFinishedEvent
	| TestRunFinishedEvent
	| SnippetsSuggestedEvent
	| EmbedEvent
	| WriteEvent

export type ReporterEventType = ReporterEvent['type']
