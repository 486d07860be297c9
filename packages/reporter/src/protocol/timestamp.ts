function pad(value: number, width = 2): string {
	return String(value).padStart(width, '0')
}

/** Clock hour of am/pm, 01-12. */
function clockHour(hours: number): number {
	return ((hours + 11) % 12) + 1
}

/**
 * Format an instant as `yyyy-MM-dd'T'hh:mm:ss.SSS+0000`, always in UTC.
 * The hour is on a 12-hour clock with no am/pm marker.
 */
export function formatTimestamp(date: Date): string {
	const day = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
	const time = `${pad(clockHour(date.getUTCHours()))}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
	return `${day}T${time}.${pad(date.getUTCMilliseconds(), 3)}+0000`
}

/**
 * Whole milliseconds, truncated.
 */
export function toMillis(duration: number): number {
	return Math.trunc(duration)
}
