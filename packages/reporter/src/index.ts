export { describeFailure, ReporterError, toFailureDetails } from './errors.ts'
export { commonPrefixLength, diffPaths, type PathTransition } from './hierarchy/path-diff.ts'
export { HierarchyReconciler } from './hierarchy/reconciler.ts'
export {
	DEFAULT_PREFIX,
	DEFAULT_RUN_NAME,
	type EncoderOptions,
	FIXTURE_TEST_NAME,
	formatMessage,
	type MessageAttribute,
	ServiceMessageEncoder,
} from './protocol/encoder.ts'
export { escapeValue, type MessageValue, unescapeValue } from './protocol/escape.ts'
export {
	createSnippetMessage,
	type SuggestionRecord,
	SuggestionStore,
} from './protocol/snippets.ts'
export { encodeStepFinished } from './protocol/status.ts'
export { hookName, resolveCodeLocation, stepLocationHint, stepName } from './protocol/steps.ts'
export { formatTimestamp, toMillis } from './protocol/timestamp.ts'
export {
	createServiceMessagePlugin,
	ServiceMessagePlugin,
	type ServiceMessageOptions,
} from './plugin.ts'
export {
	createMemorySink,
	createStreamSink,
	type LineSink,
	MemorySink,
	StreamSink,
} from './sink.ts'
export {
	findPathTo,
	locationsEqual,
	type NodePredicate,
	nodeDisplayName,
	nodesEqual,
	withLocation,
} from './tree/nodes.ts'
export { ParsedSourceRegistry, type PathResolver } from './tree/sources.ts'
export type {
	EmbedEvent,
	FailureDetails,
	GenericStep,
	HookStep,
	Location,
	NodePath,
	PickleStep,
	ReporterEvent,
	ReporterEventType,
	SnippetsSuggestedEvent,
	StepResult,
	StructuralNode,
	Suggestion,
	TestCaseFinishedEvent,
	TestCaseRef,
	TestCaseStartedEvent,
	TestRunFinishedEvent,
	TestRunStartedEvent,
	TestSourceParsedEvent,
	TestStep,
	TestStepFinishedEvent,
	TestStepStartedEvent,
	WriteEvent,
} from './types.ts'
export { HookType, StepStatus } from './types.ts'
