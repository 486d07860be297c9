/**
 * Hierarchy reconciler.
 *
 * Owns the path of suites that are open right now and turns case and run
 * boundaries into suite start/finish markers. The event stream only says
 * "a case started" or "the run ended"; which ancestors to close and which to
 * open is derived here by diffing the open path against the next case's path.
 *
 * Invariant: `path` always equals the suites started and not yet finished,
 * so the emitted markers nest properly.
 */

import { describeFailure } from '../errors.ts'
import type { ServiceMessageEncoder } from '../protocol/encoder.ts'
import { nodeDisplayName } from '../tree/nodes.ts'
import type { PathResolver } from '../tree/sources.ts'
import type { FailureDetails, NodePath, StructuralNode, TestCaseRef } from '../types.ts'
import { diffPaths } from './path-diff.ts'

export class HierarchyReconciler {
	private currentPath: NodePath = []
	private currentCase: TestCaseRef | undefined

	constructor(
		private readonly encoder: ServiceMessageEncoder,
		private readonly resolvePath: PathResolver
	) {}

	/** Suites currently open, outermost first. */
	get path(): NodePath {
		return this.currentPath
	}

	get activeCase(): TestCaseRef | undefined {
		return this.currentCase
	}

	onRunStarted(timestamp: Date): string[] {
		return [
			this.encoder.enteredTheMatrix(timestamp),
			this.encoder.runStarted(timestamp),
			this.encoder.countingStarted(timestamp),
		]
	}

	onCaseStarted(testCase: TestCaseRef, timestamp: Date): string[] {
		// No structural match: report the case flat rather than guess a nesting.
		const nextPath = this.resolvePath(testCase.uri, testCase.location) ?? []
		const { closing, opening } = diffPaths(this.currentPath, nextPath)

		const lines = [
			...closing.map((node) => this.finishSuite(timestamp, node)),
			...opening.map((node) => this.startSuite(testCase.uri, timestamp, node)),
		]
		this.currentPath = nextPath
		this.currentCase = testCase

		lines.push(this.encoder.caseProgressStarted(timestamp))
		return lines
	}

	/**
	 * Closes only the case's own suite; its ancestors stay open for a sibling.
	 */
	onCaseFinished(timestamp: Date): string[] {
		const lines = [this.encoder.caseProgressFinished(timestamp)]

		const leaf = this.currentPath.at(-1)
		if (leaf !== undefined) {
			lines.push(this.finishSuite(timestamp, leaf))
			this.currentPath = this.currentPath.slice(0, -1)
		}
		this.currentCase = undefined
		return lines
	}

	onRunFinished(error: FailureDetails | undefined, timestamp: Date): string[] {
		const lines = [this.encoder.countingFinished(timestamp)]

		const { closing } = diffPaths(this.currentPath, [])
		lines.push(...closing.map((node) => this.finishSuite(timestamp, node)))
		this.currentPath = []

		if (error !== undefined) {
			lines.push(...this.encoder.fixtureFailure(timestamp, describeFailure(error)))
		}
		lines.push(this.encoder.runFinished(timestamp))
		return lines
	}

	private startSuite(uri: string, timestamp: Date, node: StructuralNode): string {
		return this.encoder.suiteStarted(
			timestamp,
			nodeDisplayName(node),
			`${uri}:${node.location.line}`
		)
	}

	private finishSuite(timestamp: Date, node: StructuralNode): string {
		return this.encoder.suiteFinished(timestamp, nodeDisplayName(node))
	}
}
