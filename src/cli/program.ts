/**
 * threads-export CLI program
 *
 * Registers all commands and global options.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { Command, type CommanderError } from 'commander'

import { humanError, isJsonOnly, setHumanLoggingEnabled } from '../utils/human.js'
import { setCorrelationId } from '../utils/logger.js'
import {
	registerDoctorCommand,
	registerGenerateKeyCommand,
	registerInitCommand,
	registerRunCommand,
	registerSetupCredentialsCommand,
	registerVerifyCredentialsCommand,
} from './commands/index.js'
import type { GlobalOptions } from './types.js'
import { cliLogger } from './utils.js'

function readVersion(): string {
	// src/cli and dist/cli both sit two levels below the package root
	const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url))
	const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'))
	return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
		? pkg.version
		: '0.0.0'
}

function newCorrelationId(): string {
	return `run-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`
}

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createProgram(): Command {
	const program = new Command()

	program
		.name('threads-export')
		.description(
			'Export Threads posts and insights to Google Sheets, with a local CSV backup and encrypted credentials',
		)
		.version(readVersion())

	// Global options
	program
		.option('-v, --verbose', 'enable verbose logging', false)
		.option('--debug', 'same as --verbose', false)
		.option('-q, --quiet', 'suppress non-error output', false)
		.option('-c, --config <path>', 'path to config file (default: auto-discovered)')
		.option('--json', 'emit structured JSON log events only (machine-readable)', false)

	// Toggle human logging and start a correlation scope before each command
	program.hook('preAction', () => {
		const opts = program.opts<{ json?: boolean }>()
		setHumanLoggingEnabled(!isJsonOnly(opts.json))
		setCorrelationId(newCorrelationId())
	})

	program.configureOutput({
		outputError: (str: string, write: (msg: string) => void) => {
			const errorMsg = str.replace(/^error: /, '❌ Error: ').replace(/^Error: /, '❌ Error: ')
			write(errorMsg)
			cliLogger.error('Commander output error', { raw: str })
		},
	})

	program.exitOverride((err: CommanderError) => {
		if (
			err.code === 'commander.help' ||
			err.code === 'commander.helpDisplayed' ||
			err.code === 'commander.version'
		) {
			process.exit(0)
		}
		if (err.code === 'commander.unknownCommand') {
			humanError(`\nRun 'threads-export --help' to see available commands`)
			process.exit(1)
		}
		if (
			err.code === 'commander.missingArgument' ||
			err.code === 'commander.optionMissingArgument' ||
			err.code === 'commander.unknownOption'
		) {
			humanError(`\nRun 'threads-export ${program.args[0] ?? ''} --help' for usage information`)
			process.exit(1)
		}
		cliLogger.error('CLI exit override error', {
			code: err.code,
			message: err.message,
		})
		process.exit(err.exitCode || 1)
	})

	const getGlobalOptions = (): GlobalOptions => program.opts<GlobalOptions>()

	registerRunCommand(program, getGlobalOptions)
	registerGenerateKeyCommand(program, getGlobalOptions)
	registerSetupCredentialsCommand(program, getGlobalOptions)
	registerVerifyCredentialsCommand(program, getGlobalOptions)
	registerInitCommand(program, getGlobalOptions)
	registerDoctorCommand(program, getGlobalOptions)

	return program
}
