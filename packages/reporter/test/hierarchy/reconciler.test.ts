import assert from 'node:assert'
import { describe, it } from 'node:test'
import { HierarchyReconciler } from '../../src/hierarchy/reconciler.ts'
import { ServiceMessageEncoder } from '../../src/protocol/encoder.ts'
import { ParsedSourceRegistry } from '../../src/tree/sources.ts'
import { AT, caseAt, feature, outline, rule, scenarioA, TS, URI } from '../helpers.ts'

function createReconciler(): HierarchyReconciler {
	const registry = new ParsedSourceRegistry()
	registry.register(URI, [feature])
	return new HierarchyReconciler(new ServiceMessageEncoder(), registry.resolver())
}

const suiteStarted = (name: string, line: number): string =>
	`##teamcity[testSuiteStarted timestamp='${TS}' locationHint='${URI}:${line}' name='${name}']`
const suiteFinished = (name: string): string =>
	`##teamcity[testSuiteFinished timestamp='${TS}' name='${name}']`
const caseProgressStarted = `##teamcity[customProgressStatus type='testStarted' timestamp='${TS}']`
const caseProgressFinished = `##teamcity[customProgressStatus type='testFinished' timestamp='${TS}']`

describe('HierarchyReconciler', () => {
	describe('onRunStarted', () => {
		it('should enter the matrix, open the run and start counting', () => {
			const reconciler = createReconciler()
			assert.deepStrictEqual(reconciler.onRunStarted(AT), [
				`##teamcity[enteredTheMatrix timestamp='${TS}']`,
				`##teamcity[testSuiteStarted timestamp='${TS}' name='Cucumber']`,
				`##teamcity[customProgressStatus testsCategory='Scenarios' count='0' timestamp='${TS}']`,
			])
			assert.deepStrictEqual(reconciler.path, [])
		})
	})

	describe('onCaseStarted', () => {
		it('should open every ancestor of the first case, outermost first', () => {
			const reconciler = createReconciler()
			const testCase = caseAt(3)

			assert.deepStrictEqual(reconciler.onCaseStarted(testCase, AT), [
				suiteStarted('Checkout', 1),
				suiteStarted('Pay by card', 3),
				caseProgressStarted,
			])
			assert.deepStrictEqual(reconciler.path, [feature, scenarioA])
			assert.strictEqual(reconciler.activeCase, testCase)
		})

		it('should reuse ancestors that are still open', () => {
			const reconciler = createReconciler()
			reconciler.onCaseStarted(caseAt(3), AT)
			reconciler.onCaseFinished(AT)

			assert.deepStrictEqual(reconciler.onCaseStarted(caseAt(14), AT), [
				suiteStarted('Refunds', 11),
				suiteStarted('Pay in instalments', 12),
				suiteStarted('Example', 14),
				caseProgressStarted,
			])
		})

		it('should close diverging suites before opening new ones', () => {
			const reconciler = createReconciler()
			reconciler.onCaseStarted(caseAt(14), AT)

			assert.deepStrictEqual(reconciler.onCaseStarted(caseAt(8), AT), [
				suiteFinished('Example'),
				suiteFinished('Pay in instalments'),
				suiteFinished('Refunds'),
				suiteStarted('Pay by voucher', 8),
				caseProgressStarted,
			])
		})

		it('should report an unmatched case flat, closing everything open', () => {
			const reconciler = createReconciler()
			reconciler.onCaseStarted(caseAt(3), AT)

			assert.deepStrictEqual(reconciler.onCaseStarted(caseAt(99), AT), [
				suiteFinished('Pay by card'),
				suiteFinished('Checkout'),
				caseProgressStarted,
			])
			assert.deepStrictEqual(reconciler.path, [])
		})

		it('should report a case from an unparsed document flat', () => {
			const reconciler = createReconciler()
			assert.deepStrictEqual(reconciler.onCaseStarted(caseAt(3, 'file:///unknown.feature'), AT), [
				caseProgressStarted,
			])
		})
	})

	describe('onCaseFinished', () => {
		it('should close only the leaf suite', () => {
			const reconciler = createReconciler()
			reconciler.onCaseStarted(caseAt(14), AT)

			assert.deepStrictEqual(reconciler.onCaseFinished(AT), [
				caseProgressFinished,
				suiteFinished('Example'),
			])
			assert.deepStrictEqual(reconciler.path, [feature, rule, outline])
			assert.strictEqual(reconciler.activeCase, undefined)
		})

		it('should close nothing for a flat case', () => {
			const reconciler = createReconciler()
			reconciler.onCaseStarted(caseAt(99), AT)

			assert.deepStrictEqual(reconciler.onCaseFinished(AT), [caseProgressFinished])
		})
	})

	describe('onRunFinished', () => {
		it('should close all remaining suites innermost first', () => {
			const reconciler = createReconciler()
			reconciler.onCaseStarted(caseAt(14), AT)
			reconciler.onCaseFinished(AT)

			assert.deepStrictEqual(reconciler.onRunFinished(undefined, AT), [
				`##teamcity[customProgressStatus testsCategory='' count='0' timestamp='${TS}']`,
				suiteFinished('Pay in instalments'),
				suiteFinished('Refunds'),
				suiteFinished('Checkout'),
				suiteFinished('Cucumber'),
			])
			assert.deepStrictEqual(reconciler.path, [])
		})

		it('should report a run-level failure as one placeholder test', () => {
			const reconciler = createReconciler()
			const lines = reconciler.onRunFinished(
				{ message: 'database unavailable', type: 'IllegalStateException' },
				AT
			)

			assert.deepStrictEqual(lines, [
				`##teamcity[customProgressStatus testsCategory='' count='0' timestamp='${TS}']`,
				`##teamcity[testStarted timestamp='${TS}' name='Before All/After All']`,
				`##teamcity[testFailed timestamp='${TS}' message='Before All/After All failed' details='IllegalStateException: database unavailable' name='Before All/After All']`,
				`##teamcity[testFinished timestamp='${TS}' name='Before All/After All']`,
				suiteFinished('Cucumber'),
			])
		})
	})

	it('should use the resolver it was given', () => {
		const reconciler = new HierarchyReconciler(new ServiceMessageEncoder(), () => [feature])

		assert.deepStrictEqual(reconciler.onCaseStarted(caseAt(3), AT), [
			suiteStarted('Checkout', 1),
			caseProgressStarted,
		])
	})
})
