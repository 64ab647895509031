/**
 * Production wiring for the pipeline: encrypted credentials, the Threads
 * client and the Google Sheets gateway
 */

import type { Config } from '../config/schema.js'
import { CryptoManager } from '../crypto/crypto-manager.js'
import { GoogleSheetsGateway } from '../sheets/gateway.js'
import { ThreadsClient } from '../threads/client.js'
import type { PipelineDeps } from './run.js'

export function createThreadsClient(token: string, config: Pick<Config, 'threads'>): ThreadsClient {
	const { threads } = config
	return new ThreadsClient({
		token,
		baseUrl: threads.baseUrl,
		pageSize: threads.pageSize,
		insightsBatchSize: threads.insightsBatchSize,
		requestDelayMs: threads.requestDelayMs,
		maxRetries: threads.maxRetries,
		insightsCacheTtlMs: threads.insightsCacheTtlMs,
		requestTimeoutMs: threads.requestTimeoutMs,
	})
}

export function defaultPipelineDeps(config: Config, cwd: string = process.cwd()): PipelineDeps {
	return {
		// The key file is read lazily so a missing key surfaces as a run error
		loadCredentials: () => CryptoManager.fromConfig(config, cwd).loadCredentials(),
		createThreadsClient,
		createGateway: (credentials, spreadsheetId) =>
			new GoogleSheetsGateway({ credentials, spreadsheetId }),
		cwd,
	}
}
