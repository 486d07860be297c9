#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import FormatCommand from './commands/format.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'stepline')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([FormatCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(`stepline v${version}`)
		console.log('')
		console.log('Usage: stepline format [input] [--output <file>] [--prefix <name>]')
		console.log('                       [--run-name <name>] [--address-scheme <scheme>]')
		console.log('')
		console.log('Reads newline-delimited JSON test events from <input>, or stdin when')
		console.log('omitted, and prints TeamCity service messages.')
		console.log('')
		console.log('Run "stepline format --help" for the event format and every option.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
