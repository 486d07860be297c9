import { createWriteStream } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { text } from 'node:stream/consumers'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	createStreamSink,
	DEFAULT_PREFIX,
	DEFAULT_RUN_NAME,
	type LineSink,
	type ServiceMessageOptions,
} from '@stepline/reporter'
import { type FormatSummary, formatEventStream } from '../format.ts'
import {
	formatFormattingError,
	formatReadError,
	formatSummary,
	formatWriteError,
} from '../utils.ts'

export default class FormatCommand extends BaseCommand {
	static override commandName = 'format'
	static override description =
		'Convert newline-delimited JSON test events into TeamCity service messages'
	static override help = [
		'Each non-blank input line is one JSON event with a "type" field:',
		'testRunStarted, testSourceParsed, testCaseStarted, testStepStarted, testStepFinished,',
		'testCaseFinished, testRunFinished, snippetsSuggested, embed or write.',
		'Timestamps are ISO-8601 strings or epoch milliseconds; embed data is base64.',
		'',
		'{{ binaryName }} format events.ndjson',
		'cat events.ndjson | {{ binaryName }} format --run-name=Checkout --output=messages.txt',
	]

	@args.string({ description: 'Event file to read (defaults to stdin)', required: false })
	declare input?: string

	@flags.string({ alias: 'o', description: 'Write messages to a file instead of stdout' })
	declare output?: string

	@flags.string({ default: DEFAULT_PREFIX, description: 'Service message prefix' })
	declare prefix: string

	@flags.string({ default: DEFAULT_RUN_NAME, description: 'Name of the top-level suite' })
	declare runName: string

	@flags.string({
		description: 'Scheme prepended to step definition location hints, e.g. "java:"',
	})
	declare addressScheme?: string

	private async readInput(): Promise<string | null> {
		if (this.input === undefined) {
			return text(process.stdin)
		}
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private reporterOptions(): ServiceMessageOptions {
		return {
			addressScheme: this.addressScheme,
			prefix: this.prefix,
			runName: this.runName,
		}
	}

	/** Protocol lines go to stdout through the command logger, unprefixed. */
	private stdoutSink(): LineSink {
		return { writeLine: (line) => this.logger.log(line) }
	}

	private async formatToStdout(content: string): Promise<void> {
		try {
			await formatEventStream(content, this.stdoutSink(), this.reporterOptions())
		} catch (error: unknown) {
			this.logger.error(formatFormattingError(error))
			this.exitCode = 1
		}
	}

	private async formatToFile(content: string, outputPath: string): Promise<FormatSummary | null> {
		const sink = createStreamSink(createWriteStream(outputPath, 'utf-8'))
		let summary: FormatSummary | null = null
		try {
			summary = await formatEventStream(content, sink, this.reporterOptions())
		} catch (error: unknown) {
			this.logger.error(formatFormattingError(error))
			this.exitCode = 1
		}

		try {
			await sink.close()
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
			return null
		}
		return summary
	}

	override async run(): Promise<void> {
		const content = await this.readInput()
		if (content === null) return

		if (this.output === undefined) {
			await this.formatToStdout(content)
			return
		}

		const summary = await this.formatToFile(content, this.output)
		if (summary) {
			this.logger.info(formatSummary(summary.events, summary.messages, this.output))
		}
	}
}
