import { nodesEqual } from '../tree/nodes.ts'
import type { NodePath } from '../types.ts'

export interface PathTransition {
	/** Suites to finish, innermost first */
	readonly closing: NodePath
	/** Suites to start, outermost first */
	readonly opening: NodePath
}

/**
 * Length of the prefix shared by both paths, compared node by node from the root.
 */
export function commonPrefixLength(current: NodePath, next: NodePath): number {
	const limit = Math.min(current.length, next.length)
	let index = 0
	while (index < limit) {
		const a = current[index]
		const b = next[index]
		if (a === undefined || b === undefined || !nodesEqual(a, b)) break
		index++
	}
	return index
}

/**
 * Minimal close/open transition from the open path to the next one.
 * Shared ancestors are kept open. When `next` is a prefix of `current`
 * only closes happen.
 */
export function diffPaths(current: NodePath, next: NodePath): PathTransition {
	const shared = commonPrefixLength(current, next)
	return {
		closing: current.slice(shared).reverse(),
		opening: next.slice(shared),
	}
}
