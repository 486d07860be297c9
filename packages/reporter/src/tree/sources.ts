import type { Location, NodePath, StructuralNode } from '../types.ts'
import { findPathTo, withLocation } from './nodes.ts'

/**
 * Resolves the structural path of a test case. `undefined` means "no match".
 */
export type PathResolver = (uri: string, location: Location) => NodePath | undefined

/**
 * Parsed documents keyed by uri. Re-registering a uri replaces its tree.
 */
export class ParsedSourceRegistry {
	private readonly sources: Map<string, readonly StructuralNode[]> = new Map()

	register(uri: string, nodes: readonly StructuralNode[]): void {
		this.sources.set(uri, nodes)
	}

	get(uri: string): readonly StructuralNode[] | undefined {
		return this.sources.get(uri)
	}

	has(uri: string): boolean {
		return this.sources.has(uri)
	}

	count(): number {
		return this.sources.size
	}

	findPath(uri: string, location: Location): NodePath | undefined {
		const roots = this.sources.get(uri)
		if (roots === undefined) return undefined
		return findPathTo(roots, withLocation(location))
	}

	/** A resolver bound to this registry. */
	resolver(): PathResolver {
		return (uri, location) => this.findPath(uri, location)
	}
}
