/**
 * Generate Key Command
 *
 * Create the encryption key used for the credentials file.
 */

import type { Command } from 'commander'

import { CryptoError } from '../../crypto/errors.js'
import { generateEncryptionKey } from '../../crypto/key-generator.js'
import { humanError, humanInfo, humanWarn } from '../../utils/human.js'
import type { ExitCode, GenerateKeyOptions, GlobalOptions } from '../types.js'
import {
	applyLogLevel,
	isVerbose,
	loadCommandConfig,
	logEvent,
	reportCommandError,
} from '../utils.js'

/**
 * Execute the generate-key command logic
 */
export async function executeGenerateKey(
	options: GenerateKeyOptions,
	globalOptions: GlobalOptions,
): Promise<ExitCode> {
	const verbose = isVerbose(globalOptions)
	applyLogLevel(verbose, globalOptions.quiet)

	const config = await loadCommandConfig('generate-key', globalOptions)
	if (!config) return 1

	const force = Boolean(options.force)
	try {
		const result = await generateEncryptionKey(config.credentials.keyPath, { force })
		if (result.replaced) {
			humanWarn('⚠️  Replaced the existing key; re-run setup-credentials to re-encrypt your credentials')
		}
		humanInfo('\n✓ Encryption key generated and saved securely')
		humanInfo(`Key location: ${result.keyPath}`)
		humanInfo('\nYou can now run: threads-export setup-credentials')
		logEvent('generate-key-summary', {
			command: 'generate-key',
			phase: 'summary',
			context: { keyPath: result.keyPath, replaced: result.replaced },
			exitCode: 0,
		})
		return 0
	} catch (error) {
		if (error instanceof CryptoError) {
			humanError(`❌ ${error.message}`)
			logEvent('generate-key-error', {
				command: 'generate-key',
				phase: 'error',
				message: error.message,
				exitCode: 1,
			})
			return 1
		}
		return reportCommandError('generate-key', 'generate encryption key', error, verbose)
	}
}

/**
 * Register the generate-key command with Commander
 */
export function registerGenerateKeyCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
): void {
	program
		.command('generate-key')
		.description('Generate the encryption key for stored credentials')
		.option('--force', 'replace an existing key (existing credentials become unreadable)', false)
		.action(async (options: GenerateKeyOptions) => {
			process.exit(await executeGenerateKey(options, getGlobalOptions()))
		})
}
