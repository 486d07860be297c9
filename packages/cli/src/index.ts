export { EventParseError, parseEventLine, reporterEventSchema } from './events.ts'
export { type FormatSummary, formatEventStream } from './format.ts'
