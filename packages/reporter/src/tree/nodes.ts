import type { Location, NodePath, StructuralNode } from '../types.ts'

export type NodePredicate = (node: StructuralNode) => boolean

/**
 * An absent column only equals another absent column.
 */
export function locationsEqual(a: Location, b: Location): boolean {
	return a.line === b.line && a.column === b.column
}

/**
 * Node identity used when comparing paths: same location and same identifying text.
 * Two nodes with equal content at different locations are distinct.
 */
export function nodesEqual(a: StructuralNode, b: StructuralNode): boolean {
	if (a === b) return true
	return locationsEqual(a.location, b.location) && a.keyword === b.keyword && a.name === b.name
}

export function withLocation(location: Location): NodePredicate {
	return (candidate) => locationsEqual(candidate.location, location)
}

function findPathFrom(node: StructuralNode, predicate: NodePredicate): StructuralNode[] | undefined {
	if (predicate(node)) return [node]

	for (const child of node.children ?? []) {
		const tail = findPathFrom(child, predicate)
		if (tail !== undefined) return [node, ...tail]
	}
	return undefined
}

/**
 * Depth-first search over a forest of root nodes, in document order.
 * Returns the root-to-node path of the first node accepted by the predicate.
 */
export function findPathTo(
	roots: readonly StructuralNode[],
	predicate: NodePredicate
): NodePath | undefined {
	for (const root of roots) {
		const path = findPathFrom(root, predicate)
		if (path !== undefined) return path
	}
	return undefined
}

/**
 * Suite label for a node: its name, else its keyword, else `Unknown`.
 */
export function nodeDisplayName(node: StructuralNode): string {
	return node.name ?? node.keyword ?? 'Unknown'
}
