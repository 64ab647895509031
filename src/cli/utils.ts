/**
 * CLI Utility Functions
 *
 * Shared utilities for CLI command handling including logging,
 * error handling, and common operations.
 */

import { createInterface } from 'node:readline/promises'

import { ConfigError, loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import type { Prompter } from '../credentials/setup.js'
import { humanError } from '../utils/human.js'
import { createLogger, getErrorLogPath, setLogLevel } from '../utils/logger.js'
import type { CLILogMeta, ExitCode, GlobalOptions } from './types.js'

/**
 * CLI Logger instance
 */
export const cliLogger = createLogger('cli')

/**
 * Apply log level based on verbose/quiet flags
 */
export function applyLogLevel(verbose: boolean, quiet: boolean): void {
	const level = quiet ? 'error' : verbose ? 'debug' : 'info'
	setLogLevel(level)
}

export function isVerbose(globalOptions: GlobalOptions): boolean {
	return Boolean(globalOptions.verbose || globalOptions.debug)
}

/**
 * Emit structured CLI events for logging; `*-error` events log at error level
 * so they reach the error log file
 */
export function logEvent(event: string, meta: CLILogMeta): void {
	if (event.endsWith('-error')) {
		cliLogger.error(event, meta)
		return
	}
	cliLogger.info(event, meta)
}

/**
 * Format an error for CLI logging
 */
export function formatErrorMeta(error: unknown): CLILogMeta['error'] {
	return {
		type: error instanceof Error ? error.name : 'Unknown',
		message: error instanceof Error ? error.message : String(error),
		...(error instanceof Error && error.stack ? { stack: error.stack } : {}),
	}
}

/**
 * Standard runtime error report: human message, `{command}-error` event
 *
 * @returns Exit code 2
 */
export function reportCommandError(
	commandName: string,
	action: string,
	error: unknown,
	verbose: boolean,
): ExitCode {
	humanError(
		`❌ Failed to ${action}:`,
		error instanceof Error ? error.message : String(error),
	)
	if (verbose && error instanceof Error) {
		humanError(error.stack)
	}
	logEvent(`${commandName}-error`, {
		command: commandName,
		phase: 'error',
		error: formatErrorMeta(error),
		exitCode: 2,
	})
	const logPath = getErrorLogPath()
	if (logPath) {
		humanError(`Details: ${logPath}`)
	}
	return 2
}

/**
 * Load config for a command; config problems are reported and yield null
 */
export async function loadCommandConfig(
	commandName: string,
	globalOptions: GlobalOptions,
): Promise<Config | null> {
	try {
		return await loadConfig({ configPath: globalOptions.config })
	} catch (error) {
		if (!(error instanceof ConfigError)) throw error
		humanError(`❌ ${error.message}`)
		logEvent(`${commandName}-error`, {
			command: commandName,
			phase: 'error',
			error: formatErrorMeta(error),
			exitCode: 1,
		})
		return null
	}
}

/**
 * Prompter over stdin/stdout; close it when done
 */
export function createReadlinePrompter(): Prompter & { close: () => void } {
	const rl = createInterface({ input: process.stdin, output: process.stdout })
	return {
		ask: (question) => rl.question(question),
		print: (line) => console.log(line),
		close: () => rl.close(),
	}
}
