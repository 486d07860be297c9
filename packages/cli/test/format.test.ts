import assert from 'node:assert'
import { describe, it } from 'node:test'
import { createMemorySink } from '@stepline/reporter'
import { EventParseError } from '../src/events.ts'
import { formatEventStream } from '../src/format.ts'

const TS = '1970-01-01T12:00:01.000+0000'
const started = '{"type":"testRunStarted","timestamp":1000}'
const finished = '{"type":"testRunFinished","timestamp":1000}'

describe('formatEventStream', () => {
	it('should format an empty run and skip blank lines', async () => {
		const sink = createMemorySink()
		const summary = await formatEventStream(`${started}\n\n${finished}\r\n`, sink)

		assert.deepStrictEqual(summary, { events: 2, messages: 5 })
		assert.deepStrictEqual(sink.getLines(), [
			`##teamcity[enteredTheMatrix timestamp='${TS}']`,
			`##teamcity[testSuiteStarted timestamp='${TS}' name='Cucumber']`,
			`##teamcity[customProgressStatus testsCategory='Scenarios' count='0' timestamp='${TS}']`,
			`##teamcity[customProgressStatus testsCategory='' count='0' timestamp='${TS}']`,
			`##teamcity[testSuiteFinished timestamp='${TS}' name='Cucumber']`,
		])
	})

	it('should apply prefix and run name options', async () => {
		const sink = createMemorySink()
		await formatEventStream(started, sink, { prefix: 'ci', runName: 'Checkout suite' })

		assert.deepStrictEqual(sink.getLines().slice(0, 2), [
			`##ci[enteredTheMatrix timestamp='${TS}']`,
			`##ci[testSuiteStarted timestamp='${TS}' name='Checkout suite']`,
		])
	})

	it('should stop at the first bad line and keep what was written', async () => {
		const sink = createMemorySink()
		await assert.rejects(
			formatEventStream(`${started}\n\nnot json\n${finished}`, sink),
			(error: unknown) => error instanceof EventParseError && error.line === 3
		)
		assert.strictEqual(sink.getLines().length, 3)
	})
})
