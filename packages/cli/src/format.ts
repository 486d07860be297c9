import {
	createServiceMessagePlugin,
	type LineSink,
	type ServiceMessageOptions,
} from '@stepline/reporter'
import { parseEventLine } from './events.ts'

export interface FormatSummary {
	events: number
	messages: number
}

/**
 * Feed every non-blank line of an NDJSON document to a fresh reporter.
 * Stops at the first line that cannot be decoded; lines written before it stay written.
 */
export async function formatEventStream(
	content: string,
	sink: LineSink,
	options: ServiceMessageOptions = {}
): Promise<FormatSummary> {
	const plugin = createServiceMessagePlugin(sink, options)
	let events = 0

	const lines = content.split(/\r?\n/)
	for (const [index, text] of lines.entries()) {
		if (text.trim() === '') continue
		plugin.handle(parseEventLine(text, index + 1))
		events++
		await sink.drain?.()
	}

	return { events, messages: plugin.count() }
}
