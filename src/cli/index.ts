#!/usr/bin/env node
/**
 * threads-export CLI entry point
 */

import 'dotenv/config'

import { createProgram } from './program.js'

async function main(): Promise<void> {
	const program = createProgram()

	try {
		await program.parseAsync(process.argv)
	} catch (error) {
		// Commander handles most errors, but catch any uncaught ones
		if (error instanceof Error) {
			console.error(`Error: ${error.message}`)
			process.exitCode = 1
		} else {
			throw error
		}
	}
}

main().catch((error: unknown) => {
	console.error('Unexpected error:', error)
	process.exitCode = 1
})
