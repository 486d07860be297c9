import { describeFailure } from '../errors.ts'
import { StepStatus, type TestStepFinishedEvent } from '../types.ts'
import type { ServiceMessageEncoder } from './encoder.ts'
import { stepName } from './steps.ts'
import { toMillis } from './timestamp.ts'

/**
 * Lines for a finished step: the status marker (none for PASSED) followed by testFinished.
 *
 * @param snippetsFor - details text for an UNDEFINED step; only called for that status
 */
export function encodeStepFinished(
	encoder: ServiceMessageEncoder,
	event: TestStepFinishedEvent,
	snippetsFor: () => string
): string[] {
	const name = stepName(event.testStep)
	const duration = toMillis(event.result.duration)
	const { error } = event.result
	const { timestamp } = event

	const lines: string[] = []
	switch (event.result.status) {
		case StepStatus.Skipped:
			lines.push(
				encoder.testIgnored(timestamp, duration, error?.message ?? 'Step skipped', name)
			)
			break
		case StepStatus.Pending:
			lines.push(
				encoder.testFailed(timestamp, duration, 'Step pending', error?.message ?? '', name)
			)
			break
		case StepStatus.Undefined:
			lines.push(encoder.testFailed(timestamp, duration, 'Step undefined', snippetsFor(), name))
			break
		case StepStatus.Ambiguous:
		case StepStatus.Failed:
			lines.push(
				encoder.testFailed(timestamp, duration, 'Step failed', describeFailure(error), name)
			)
			break
		case StepStatus.Passed:
			break
	}

	lines.push(encoder.testFinished(timestamp, duration, name))
	return lines
}
