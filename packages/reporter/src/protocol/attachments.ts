import type { EmbedEvent, WriteEvent } from '../types.ts'
import type { ServiceMessageEncoder } from './encoder.ts'

export function encodeEmbed(encoder: ServiceMessageEncoder, event: EmbedEvent): string {
	const label = event.name === undefined ? '' : `${event.name} `
	return encoder.message(
		`Embed event: ${label}[${event.mediaType} ${event.data.byteLength} bytes]\n`
	)
}

export function encodeWrite(encoder: ServiceMessageEncoder, event: WriteEvent): string {
	return encoder.message(`Write event:\n${event.text}\n`)
}
