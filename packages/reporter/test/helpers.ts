import type { Location, StructuralNode, TestCaseRef } from '../src/types.ts'

export const URI = 'file:///features/checkout.feature'
export const AT = new Date('2024-03-05T14:07:09.045Z')
export const TS = '2024-03-05T02:07:09.045+0000'

export function node(
	keyword: string,
	name: string | undefined,
	line: number,
	children: StructuralNode[] = []
): StructuralNode {
	const location: Location = { column: 1, line }
	return name === undefined ? { children, keyword, location } : { children, keyword, location, name }
}

export const scenarioA = node('Scenario', 'Pay by card', 3)
export const scenarioB = node('Scenario', 'Pay by voucher', 8)
export const outlineExample = node('Example', undefined, 14)
export const outline = node('Scenario Outline', 'Pay in instalments', 12, [outlineExample])
export const rule = node('Rule', 'Refunds', 11, [outline])
export const feature = node('Feature', 'Checkout', 1, [scenarioA, scenarioB, rule])

export function caseAt(line: number, uri = URI): TestCaseRef {
	return { location: { column: 1, line }, uri }
}
