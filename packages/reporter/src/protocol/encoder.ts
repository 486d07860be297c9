/**
 * Service message encoder.
 *
 * Every method renders exactly one `##<prefix>[<name> key='value' ...]` line.
 * Attribute order is fixed per message; all values pass through escapeValue.
 */

import { escapeValue, type MessageValue } from './escape.ts'
import { formatTimestamp } from './timestamp.ts'

export type MessageAttribute = readonly [key: string, value: MessageValue]

export interface EncoderOptions {
	/** Text between `##` and `[` (default `teamcity`) */
	prefix?: string
	/** Name of the suite wrapping the whole run (default `Cucumber`) */
	runName?: string
}

export const DEFAULT_PREFIX = 'teamcity'
export const DEFAULT_RUN_NAME = 'Cucumber'
export const FIXTURE_TEST_NAME = 'Before All/After All'

export function formatMessage(
	prefix: string,
	name: string,
	attributes: readonly MessageAttribute[]
): string {
	const body = attributes.map(([key, value]) => ` ${key}='${escapeValue(value)}'`).join('')
	return `##${prefix}[${name}${body}]`
}

export class ServiceMessageEncoder {
	readonly prefix: string
	readonly runName: string

	constructor(options: EncoderOptions = {}) {
		this.prefix = options.prefix ?? DEFAULT_PREFIX
		this.runName = options.runName ?? DEFAULT_RUN_NAME
	}

	format(name: string, attributes: readonly MessageAttribute[]): string {
		return formatMessage(this.prefix, name, attributes)
	}

	// ===========================================================================
	// RUN
	// ===========================================================================

	enteredTheMatrix(timestamp: Date): string {
		return this.format('enteredTheMatrix', [['timestamp', formatTimestamp(timestamp)]])
	}

	runStarted(timestamp: Date): string {
		return this.format('testSuiteStarted', [
			['timestamp', formatTimestamp(timestamp)],
			['name', this.runName],
		])
	}

	runFinished(timestamp: Date): string {
		return this.suiteFinished(timestamp, this.runName)
	}

	// ===========================================================================
	// SUITES
	// ===========================================================================

	suiteStarted(timestamp: Date, name: string, locationHint: string): string {
		return this.format('testSuiteStarted', [
			['timestamp', formatTimestamp(timestamp)],
			['locationHint', locationHint],
			['name', name],
		])
	}

	suiteFinished(timestamp: Date, name: string): string {
		return this.format('testSuiteFinished', [
			['timestamp', formatTimestamp(timestamp)],
			['name', name],
		])
	}

	// ===========================================================================
	// TESTS
	// ===========================================================================

	testStarted(timestamp: Date, locationHint: string, name: string): string {
		return this.format('testStarted', [
			['timestamp', formatTimestamp(timestamp)],
			['locationHint', locationHint],
			['captureStandardOutput', 'true'],
			['name', name],
		])
	}

	testFinished(timestamp: Date, duration: number, name: string): string {
		return this.format('testFinished', [
			['timestamp', formatTimestamp(timestamp)],
			['duration', duration],
			['name', name],
		])
	}

	testFailed(
		timestamp: Date,
		duration: number,
		message: string,
		details: string,
		name: string
	): string {
		return this.format('testFailed', [
			['timestamp', formatTimestamp(timestamp)],
			['duration', duration],
			['message', message],
			['details', details],
			['name', name],
		])
	}

	testIgnored(timestamp: Date, duration: number, message: string, name: string): string {
		return this.format('testIgnored', [
			['timestamp', formatTimestamp(timestamp)],
			['duration', duration],
			['message', message],
			['name', name],
		])
	}

	// ===========================================================================
	// FIXTURE FAILURES
	// The protocol has no notion of a failure outside a test, so before-all and
	// after-all failures are reported as one placeholder test.
	// ===========================================================================

	fixtureFailure(timestamp: Date, details: string): string[] {
		const ts = formatTimestamp(timestamp)
		return [
			this.format('testStarted', [
				['timestamp', ts],
				['name', FIXTURE_TEST_NAME],
			]),
			this.format('testFailed', [
				['timestamp', ts],
				['message', `${FIXTURE_TEST_NAME} failed`],
				['details', details],
				['name', FIXTURE_TEST_NAME],
			]),
			this.format('testFinished', [
				['timestamp', ts],
				['name', FIXTURE_TEST_NAME],
			]),
		]
	}

	// ===========================================================================
	// PROGRESS
	// ===========================================================================

	countingStarted(timestamp: Date): string {
		return this.format('customProgressStatus', [
			['testsCategory', 'Scenarios'],
			['count', 0],
			['timestamp', formatTimestamp(timestamp)],
		])
	}

	countingFinished(timestamp: Date): string {
		return this.format('customProgressStatus', [
			['testsCategory', ''],
			['count', 0],
			['timestamp', formatTimestamp(timestamp)],
		])
	}

	caseProgressStarted(timestamp: Date): string {
		return this.format('customProgressStatus', [
			['type', 'testStarted'],
			['timestamp', formatTimestamp(timestamp)],
		])
	}

	caseProgressFinished(timestamp: Date): string {
		return this.format('customProgressStatus', [
			['type', 'testFinished'],
			['timestamp', formatTimestamp(timestamp)],
		])
	}

	// ===========================================================================
	// MESSAGES
	// ===========================================================================

	message(text: string): string {
		return this.format('message', [
			['text', text],
			['status', 'NORMAL'],
		])
	}
}
