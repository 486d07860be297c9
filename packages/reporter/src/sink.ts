import { once } from 'node:events'
import type { Writable } from 'node:stream'
import { finished } from 'node:stream/promises'

/**
 * Ordered, append-only destination for protocol lines.
 */
export interface LineSink {
	writeLine(line: string): void
	/** Wait for buffered lines to flush; sinks without a buffer omit it. */
	drain?(): Promise<void>
}

/**
 * Collects lines in memory.
 */
export class MemorySink implements LineSink {
	private readonly lines: string[] = []

	writeLine(line: string): void {
		this.lines.push(line)
	}

	getLines(): readonly string[] {
		return this.lines
	}

	getOutput(): string {
		return this.lines.map((line) => `${line}\n`).join('')
	}
}

/**
 * Writes each line, newline-terminated, to a Node.js stream.
 *
 * The first stream error is kept and rethrown by the next `writeLine`, `drain` or `close`.
 */
export class StreamSink implements LineSink {
	private failure: Error | undefined

	constructor(private readonly stream: Writable) {
		stream.on('error', (error: Error) => {
			this.failure ??= error
		})
	}

	private rethrow(): void {
		if (this.failure !== undefined) throw this.failure
	}

	writeLine(line: string): void {
		this.rethrow()
		this.stream.write(`${line}\n`, 'utf8')
	}

	/** Resolves once the stream's buffer is below its high-water mark. */
	async drain(): Promise<void> {
		this.rethrow()
		if (this.stream.writableNeedDrain) {
			await once(this.stream, 'drain')
		}
	}

	async close(): Promise<void> {
		this.rethrow()
		this.stream.end()
		await finished(this.stream)
		this.rethrow()
	}
}

export function createMemorySink(): MemorySink {
	return new MemorySink()
}

export function createStreamSink(stream: Writable): StreamSink {
	return new StreamSink(stream)
}
