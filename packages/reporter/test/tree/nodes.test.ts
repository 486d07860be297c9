import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	findPathTo,
	locationsEqual,
	nodeDisplayName,
	nodesEqual,
	withLocation,
} from '../../src/tree/nodes.ts'
import { feature, node, outline, outlineExample, rule, scenarioB } from '../helpers.ts'

describe('tree/nodes', () => {
	describe('locationsEqual', () => {
		it('should compare line and column', () => {
			assert.strictEqual(locationsEqual({ column: 3, line: 2 }, { column: 3, line: 2 }), true)
			assert.strictEqual(locationsEqual({ column: 3, line: 2 }, { column: 4, line: 2 }), false)
			assert.strictEqual(locationsEqual({ column: 3, line: 2 }, { column: 3, line: 5 }), false)
		})

		it('should only match an absent column with an absent column', () => {
			assert.strictEqual(locationsEqual({ line: 2 }, { line: 2 }), true)
			assert.strictEqual(locationsEqual({ line: 2 }, { column: 1, line: 2 }), false)
		})
	})

	describe('nodesEqual', () => {
		it('should treat separately built nodes with the same location and name as equal', () => {
			assert.strictEqual(nodesEqual(node('Scenario', 'A', 3), node('Scenario', 'A', 3)), true)
		})

		it('should distinguish identical content at different locations', () => {
			assert.strictEqual(nodesEqual(node('Scenario', 'A', 3), node('Scenario', 'A', 4)), false)
		})

		it('should distinguish different names at the same location', () => {
			assert.strictEqual(nodesEqual(node('Scenario', 'A', 3), node('Scenario', 'B', 3)), false)
		})

		it('should distinguish different keywords at the same location', () => {
			assert.strictEqual(nodesEqual(node('Scenario', 'A', 3), node('Example', 'A', 3)), false)
		})
	})

	describe('findPathTo', () => {
		it('should return the root-to-node path', () => {
			const path = findPathTo([feature], withLocation({ column: 1, line: 14 }))
			assert.deepStrictEqual(path, [feature, rule, outline, outlineExample])
		})

		it('should match a root itself', () => {
			assert.deepStrictEqual(findPathTo([feature], withLocation({ column: 1, line: 1 })), [feature])
		})

		it('should search every root in order', () => {
			const other = node('Feature', 'Other', 1, [node('Scenario', 'Elsewhere', 30)])
			const path = findPathTo([other, feature], withLocation({ column: 1, line: 8 }))
			assert.deepStrictEqual(path, [feature, scenarioB])
		})

		it('should return undefined without a match', () => {
			assert.strictEqual(findPathTo([feature], withLocation({ column: 1, line: 99 })), undefined)
			assert.strictEqual(findPathTo([], () => true), undefined)
		})
	})

	describe('nodeDisplayName', () => {
		it('should prefer the name', () => {
			assert.strictEqual(nodeDisplayName(feature), 'Checkout')
		})

		it('should fall back to the keyword', () => {
			assert.strictEqual(nodeDisplayName(outlineExample), 'Example')
		})

		it('should fall back to Unknown', () => {
			assert.strictEqual(nodeDisplayName({ location: { line: 1 } }), 'Unknown')
		})
	})
})
