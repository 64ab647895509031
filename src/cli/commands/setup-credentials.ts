/**
 * Setup Credentials Command
 *
 * Encrypt and store the Threads token, spreadsheet id and Google service
 * account. Missing values are prompted for.
 */

import type { Command } from 'commander'

import { CredentialSetupError, type Prompter, setupCredentials } from '../../credentials/setup.js'
import { CryptoManager } from '../../crypto/crypto-manager.js'
import { CryptoError } from '../../crypto/errors.js'
import { humanError, humanInfo } from '../../utils/human.js'
import type { ExitCode, GlobalOptions, SetupCredentialsCommandOptions } from '../types.js'
import {
	applyLogLevel,
	createReadlinePrompter,
	isVerbose,
	loadCommandConfig,
	logEvent,
	reportCommandError,
} from '../utils.js'

function needsPrompt(options: SetupCredentialsCommandOptions): boolean {
	return (
		!options.threadsToken ||
		!options.spreadsheetId ||
		!options.googleCredentials ||
		!options.yes
	)
}

/**
 * Execute the setup-credentials command logic
 */
export async function executeSetupCredentials(
	options: SetupCredentialsCommandOptions,
	globalOptions: GlobalOptions,
	prompter?: Prompter,
): Promise<ExitCode> {
	const verbose = isVerbose(globalOptions)
	applyLogLevel(verbose, globalOptions.quiet)

	const config = await loadCommandConfig('setup-credentials', globalOptions)
	if (!config) return 1

	let manager: CryptoManager
	try {
		manager = CryptoManager.fromConfig(config)
	} catch (error) {
		if (!(error instanceof CryptoError)) throw error
		humanError(`❌ ${error.message}`)
		humanError('Run: threads-export generate-key')
		logEvent('setup-credentials-error', {
			command: 'setup-credentials',
			phase: 'error',
			message: error.message,
			exitCode: 1,
		})
		return 1
	}

	const readline = !prompter && needsPrompt(options) ? createReadlinePrompter() : undefined
	try {
		humanInfo('\n=== Threads Data Analytics Credential Setup ===\n')
		await setupCredentials({
			manager,
			prompter: prompter ?? readline,
			threadsToken: options.threadsToken,
			spreadsheetId: options.spreadsheetId,
			googleCredentials: options.googleCredentials,
			yes: options.yes,
		})
		humanInfo('\n✓ Credentials encrypted and stored securely')
		humanInfo(`Location: ${manager.credentialsPath}`)
		humanInfo('\nSetup complete! Verify with: threads-export verify-credentials')
		logEvent('setup-credentials-summary', {
			command: 'setup-credentials',
			phase: 'summary',
			context: { credentialsPath: manager.credentialsPath },
			exitCode: 0,
		})
		return 0
	} catch (error) {
		if (error instanceof CredentialSetupError) {
			humanError(`❌ ${error.message}`)
			logEvent('setup-credentials-error', {
				command: 'setup-credentials',
				phase: 'error',
				message: error.message,
				exitCode: 1,
			})
			return 1
		}
		return reportCommandError('setup-credentials', 'set up credentials', error, verbose)
	} finally {
		readline?.close()
	}
}

/**
 * Register the setup-credentials command with Commander
 */
export function registerSetupCredentialsCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
): void {
	program
		.command('setup-credentials')
		.description('Encrypt and store the Threads token, spreadsheet id and Google credentials')
		.option('--threads-token <token>', 'Threads API access token')
		.option('--spreadsheet-id <id>', 'Google Spreadsheet ID')
		.option(
			'--google-credentials <path>',
			'service account JSON file, or a directory to choose one from',
		)
		.option('-y, --yes', 'store without asking for confirmation', false)
		.action(async (options: SetupCredentialsCommandOptions) => {
			process.exit(await executeSetupCredentials(options, getGlobalOptions()))
		})
}
