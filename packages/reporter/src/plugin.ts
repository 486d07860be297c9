/**
 * Service message plugin: the entry point that turns test events into
 * TeamCity service messages.
 *
 * Not safe for parallel use. One instance serves one run, and events must be
 * delivered one at a time in the order they happened; a nested `handle` call
 * (e.g. from inside a sink) is rejected with SLREP001.
 */

import { SLREP001 } from '@stepline/diagnostics'
import { ReporterError } from './errors.ts'
import { HierarchyReconciler } from './hierarchy/reconciler.ts'
import { encodeEmbed, encodeWrite } from './protocol/attachments.ts'
import { type EncoderOptions, ServiceMessageEncoder } from './protocol/encoder.ts'
import { SuggestionStore } from './protocol/snippets.ts'
import { encodeStepFinished } from './protocol/status.ts'
import { stepLocationHint, stepName } from './protocol/steps.ts'
import type { LineSink } from './sink.ts'
import { ParsedSourceRegistry, type PathResolver } from './tree/sources.ts'
import type { NodePath, ReporterEvent, ReporterEventType } from './types.ts'

export interface ServiceMessageOptions extends EncoderOptions {
	/** Put before `test://` in resolved glue code locations, e.g. `java:` */
	addressScheme?: string
	/** Replaces the lookup in trees received through testSourceParsed events */
	resolvePath?: PathResolver
}

export class ServiceMessagePlugin {
	readonly sources: ParsedSourceRegistry = new ParsedSourceRegistry()

	private readonly encoder: ServiceMessageEncoder
	private readonly reconciler: HierarchyReconciler
	private readonly suggestions: SuggestionStore = new SuggestionStore()
	private readonly addressScheme: string
	private handling: ReporterEventType | undefined
	private messageCount = 0

	constructor(
		private readonly sink: LineSink,
		options: ServiceMessageOptions = {}
	) {
		this.encoder = new ServiceMessageEncoder(options)
		this.reconciler = new HierarchyReconciler(
			this.encoder,
			options.resolvePath ?? this.sources.resolver()
		)
		this.addressScheme = options.addressScheme ?? ''
	}

	/** Suites currently open, outermost first. */
	get openPath(): NodePath {
		return this.reconciler.path
	}

	/** Number of lines written so far. */
	count(): number {
		return this.messageCount
	}

	handle(event: ReporterEvent): void {
		if (this.handling !== undefined) {
			throw new ReporterError(SLREP001, { current: this.handling, event: event.type })
		}

		this.handling = event.type
		try {
			for (const line of this.dispatch(event)) {
				this.sink.writeLine(line)
				this.messageCount++
			}
		} finally {
			this.handling = undefined
		}
	}

	handleAll(events: Iterable<ReporterEvent>): void {
		for (const event of events) {
			this.handle(event)
		}
	}

	private dispatch(event: ReporterEvent): readonly string[] {
		switch (event.type) {
			case 'testSourceParsed':
				this.sources.register(event.uri, event.nodes)
				return []
			case 'testRunStarted':
				return this.reconciler.onRunStarted(event.timestamp)
			case 'testCaseStarted':
				return this.reconciler.onCaseStarted(event.testCase, event.timestamp)
			case 'testStepStarted':
				return [
					this.encoder.testStarted(
						event.timestamp,
						stepLocationHint(event.testStep, this.addressScheme),
						stepName(event.testStep)
					),
				]
			case 'testStepFinished':
				return encodeStepFinished(this.encoder, event, () => this.activeCaseSnippets())
			case 'testCaseFinished':
				return this.reconciler.onCaseFinished(event.timestamp)
			case 'testRunFinished':
				return this.reconciler.onRunFinished(event.error, event.timestamp)
			case 'snippetsSuggested':
				this.suggestions.addEvent(event)
				return []
			case 'embed':
				return [encodeEmbed(this.encoder, event)]
			case 'write':
				return [encodeWrite(this.encoder, event)]
		}
	}

	private activeCaseSnippets(): string {
		const testCase = this.reconciler.activeCase
		if (testCase === undefined) return ''
		return this.suggestions.messageFor(testCase.uri, testCase.location)
	}
}

export function createServiceMessagePlugin(
	sink: LineSink,
	options?: ServiceMessageOptions
): ServiceMessagePlugin {
	return new ServiceMessagePlugin(sink, options)
}
