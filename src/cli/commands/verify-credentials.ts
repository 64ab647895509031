/**
 * Verify Credentials Command
 *
 * Check each stored credential with one API call per service.
 */

import type { Command } from 'commander'

import { CREDENTIAL_NAMES } from '../../credentials/schema.js'
import {
	type VerificationResults,
	type VerifyOptions,
	verifyCredentials,
} from '../../credentials/verify.js'
import { CryptoManager } from '../../crypto/crypto-manager.js'
import { CryptoError } from '../../crypto/errors.js'
import { GoogleSheetsGateway } from '../../sheets/gateway.js'
import { humanError, humanInfo } from '../../utils/human.js'
import type { ExitCode, GlobalOptions } from '../types.js'
import {
	applyLogLevel,
	isVerbose,
	loadCommandConfig,
	logEvent,
	reportCommandError,
} from '../utils.js'

export function printVerificationResults(results: VerificationResults): boolean {
	humanInfo('\nVerification Results:')
	humanInfo('-'.repeat(30))
	let allValid = true
	for (const name of CREDENTIAL_NAMES) {
		const valid = results[name]
		humanInfo(`${name}: ${valid ? '✓ Valid' : '✗ Invalid'}`)
		allValid = allValid && valid
	}
	humanInfo('-'.repeat(30))
	return allValid
}

/**
 * Execute the verify-credentials command logic
 */
export async function executeVerifyCredentials(
	globalOptions: GlobalOptions,
	overrides: Partial<VerifyOptions> = {},
): Promise<ExitCode> {
	const verbose = isVerbose(globalOptions)
	applyLogLevel(verbose, globalOptions.quiet)

	const config = await loadCommandConfig('verify-credentials', globalOptions)
	if (!config) return 1

	try {
		logEvent('verify-credentials-start', { command: 'verify-credentials', phase: 'start' })

		let results: VerificationResults
		try {
			results = await verifyCredentials(CryptoManager.fromConfig(config), {
				baseUrl: config.threads.baseUrl,
				timeoutMs: config.threads.requestTimeoutMs,
				createGateway: (credentials, spreadsheetId) =>
					new GoogleSheetsGateway({ credentials, spreadsheetId, readOnly: true }),
				...overrides,
			})
		} catch (error) {
			if (!(error instanceof CryptoError)) throw error
			humanError(`❌ ${error.message}`)
			results = { threads_token: false, spreadsheet_id: false, google_credentials: false }
		}

		const allValid = printVerificationResults(results)
		if (allValid) {
			humanInfo('\n✓ All credentials are valid and ready to use')
		} else {
			humanError('\n✗ Some credentials are invalid')
			humanError('Run: threads-export setup-credentials')
		}

		const exitCode: ExitCode = allValid ? 0 : 1
		logEvent('verify-credentials-summary', {
			command: 'verify-credentials',
			phase: 'summary',
			metrics: { ...results },
			exitCode,
		})
		return exitCode
	} catch (error) {
		return reportCommandError('verify-credentials', 'verify credentials', error, verbose)
	}
}

/**
 * Register the verify-credentials command with Commander
 */
export function registerVerifyCredentialsCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
): void {
	program
		.command('verify-credentials')
		.description('Check the stored credentials against the Threads and Google APIs')
		.action(async () => {
			process.exit(await executeVerifyCredentials(getGlobalOptions()))
		})
}
