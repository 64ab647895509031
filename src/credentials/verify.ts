/**
 * Credential verification with one API call per service
 */

import type { CryptoManager } from '../crypto/crypto-manager.js'
import type { SheetsGateway } from '../sheets/gateway.js'
import type { FetchLike } from '../threads/client.js'
import { createLogger, errorContext } from '../utils/logger.js'
import type { ServiceAccount, StoredCredentials } from './schema.js'

const logger = createLogger('credentials:verify')

export type VerificationResults = Record<keyof StoredCredentials, boolean>

export type VerifyOptions = {
	baseUrl?: string
	timeoutMs?: number
	fetch?: FetchLike
	/** Read-only gateway for the given account and spreadsheet */
	createGateway: (credentials: ServiceAccount, spreadsheetId: string) => SheetsGateway
}

/**
 * `GET {baseUrl}/me`; valid only on HTTP 200
 */
export async function verifyThreadsToken(
	token: string,
	options: Pick<VerifyOptions, 'baseUrl' | 'timeoutMs' | 'fetch'> = {},
): Promise<boolean> {
	const baseUrl = (options.baseUrl ?? 'https://graph.threads.net/v1.0').replace(/\/+$/, '')
	const fetchImpl = options.fetch ?? fetch
	try {
		const response = await fetchImpl(`${baseUrl}/me`, {
			method: 'GET',
			headers: {
				Authorization: `Bearer ${token}`,
				'Content-Type': 'application/json',
			},
			signal: AbortSignal.timeout(options.timeoutMs ?? 10_000),
		})
		if (response.status === 200) {
			logger.info('Threads token verified')
			return true
		}
		logger.error('Threads API rejected token', { status: response.status })
		return false
	} catch (error) {
		logger.error('Threads token verification failed', errorContext(error))
		return false
	}
}

/**
 * One read-only spreadsheet fetch; the account and the spreadsheet id are
 * valid or invalid together
 */
export async function verifyGoogleCredentials(
	credentials: ServiceAccount,
	spreadsheetId: string,
	createGateway: VerifyOptions['createGateway'],
): Promise<boolean> {
	try {
		await createGateway(credentials, spreadsheetId).getSpreadsheet()
		logger.info('Google credentials verified')
		return true
	} catch (error) {
		logger.error('Google credentials verification failed', errorContext(error))
		return false
	}
}

/**
 * Verify every stored credential. Unreadable credentials report all false.
 */
export async function verifyCredentials(
	manager: Pick<CryptoManager, 'loadCredentials'>,
	options: VerifyOptions,
): Promise<VerificationResults> {
	const results: VerificationResults = {
		threads_token: false,
		spreadsheet_id: false,
		google_credentials: false,
	}

	let credentials: StoredCredentials
	try {
		credentials = await manager.loadCredentials()
	} catch (error) {
		logger.error('Could not load credentials', errorContext(error))
		return results
	}

	results.threads_token = await verifyThreadsToken(credentials.threads_token, options)
	const googleValid = await verifyGoogleCredentials(
		credentials.google_credentials,
		credentials.spreadsheet_id,
		options.createGateway,
	)
	results.google_credentials = googleValid
	results.spreadsheet_id = googleValid
	return results
}
