import { locationsEqual } from '../tree/nodes.ts'
import type { Location, SnippetsSuggestedEvent, Suggestion } from '../types.ts'

export interface SuggestionRecord {
	readonly uri: string
	readonly testCaseLocation: Location
	readonly suggestion: Suggestion
}

/**
 * Append-only list of snippet suggestions for the current run.
 */
export class SuggestionStore {
	private readonly records: SuggestionRecord[] = []

	add(record: SuggestionRecord): void {
		this.records.push(record)
	}

	addEvent(event: SnippetsSuggestedEvent): void {
		this.add({
			suggestion: event.suggestion,
			testCaseLocation: event.testCaseLocation,
			uri: event.uri,
		})
	}

	count(): number {
		return this.records.length
	}

	suggestionsFor(uri: string, location: Location): Suggestion[] {
		return this.records
			.filter((record) => record.uri === uri && locationsEqual(record.testCaseLocation, location))
			.map((record) => record.suggestion)
	}

	messageFor(uri: string, location: Location): string {
		return createSnippetMessage(this.suggestionsFor(uri, location))
	}
}

/**
 * Details text for an undefined step: one introductory sentence followed by
 * every distinct snippet. Empty when nothing was suggested.
 */
export function createSnippetMessage(suggestions: readonly Suggestion[]): string {
	if (suggestions.length === 0) return ''

	const others =
		suggestions.length > 1 ? ` and ${suggestions.length - 1} other step(s)` : ''
	const snippets = [...new Set(suggestions.flatMap((suggestion) => suggestion.snippets))]

	return `You can implement this step${others} using the snippet(s) below:\n\n${snippets.join('\n')}\n`
}
