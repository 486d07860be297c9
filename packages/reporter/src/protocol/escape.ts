export type MessageValue = string | number | boolean | null | undefined

/**
 * Escape a value for use inside a single-quoted service message attribute.
 *
 * Replacement order is significant: `|` goes first so the escapes added by
 * later rules are never escaped again.
 */
export function escapeValue(value: MessageValue): string {
	if (value === null || value === undefined) return ''
	return String(value)
		.replace(/\|/g, '||')
		.replace(/'/g, "|'")
		.replace(/\n/g, '|n')
		.replace(/\r/g, '|r')
		.replace(/\[/g, '|[')
		.replace(/\]/g, '|]')
}

/**
 * Inverse of {@link escapeValue}.
 */
export function unescapeValue(escaped: string): string {
	return escaped.replace(/\|(.)/g, (sequence: string, char: string) => {
		if (char === 'n') return '\n'
		if (char === 'r') return '\r'
		if (char === '|' || char === "'" || char === '[' || char === ']') return char
		return sequence
	})
}
