/**
 * Export pipeline
 *
 *   Threads API → JSON snapshot → Google Sheets → CSV backup (from the sheet)
 *
 * `threadsOnly` stops after the JSON snapshot and merges into the local CSV
 * backup instead; `sheetsOnly` uploads an existing JSON snapshot.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import path from 'node:path'

import type { Config } from '../config/schema.js'
import type { ServiceAccount, StoredCredentials } from '../credentials/schema.js'
import { type Post, PostSnapshotSchema } from '../schema/post.js'
import { type ExportResult, SheetsExporter } from '../sheets/exporter.js'
import type { SheetsGateway } from '../sheets/gateway.js'
import type { ThreadsClient } from '../threads/client.js'
import {
	type CollectMode,
	type CollectProgress,
	ThreadsCollector,
	isCollectMode,
} from '../threads/collector.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('pipeline')

/** Bad command input; the CLI exits with code 1 */
export class PipelineInputError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'PipelineInputError'
	}
}

export type RunOptions = {
	mode: CollectMode
	limit?: number
	threadsOnly?: boolean
	sheetsOnly?: boolean
	jsonFile?: string
}

export type PipelineDeps = {
	loadCredentials: () => Promise<StoredCredentials>
	createThreadsClient: (
		token: string,
		config: Config,
	) => Pick<ThreadsClient, 'getUserPosts' | 'getPostInsights'>
	createGateway: (credentials: ServiceAccount, spreadsheetId: string) => SheetsGateway
	onCollectProgress?: (progress: CollectProgress) => void
	onUploadBatch?: (batch: number, total: number) => void
	cwd?: string
}

export type RunSummary = {
	mode: CollectMode
	source: 'threads' | 'json'
	/** Posts after the incremental diff, or read from the JSON file */
	posts: number
	fetched: number
	skipped: number
	truncated: boolean
	jsonPath: string | null
	exported: ExportResult | null
	/** Rows in the local CSV backup after a threads-only run */
	csvRows: number | null
}

/**
 * Reject flag combinations that cannot run
 */
export function validateRunOptions(options: RunOptions): void {
	if (!isCollectMode(options.mode)) {
		throw new PipelineInputError(
			`Invalid mode: ${String(options.mode)} (expected test, force or normal)`,
		)
	}
	if (options.threadsOnly && options.sheetsOnly) {
		throw new PipelineInputError('--threads-only and --sheets-only cannot be used together')
	}
	if (options.sheetsOnly && !options.jsonFile) {
		throw new PipelineInputError('--json-file must be specified when using --sheets-only')
	}
	if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 1)) {
		throw new PipelineInputError(`--limit must be a positive integer, got ${options.limit}`)
	}
}

/**
 * Read a JSON snapshot written by a previous run
 */
export async function readPostsFile(filePath: string): Promise<Post[]> {
	if (!existsSync(filePath)) {
		throw new PipelineInputError(`Specified JSON file not found: ${filePath}`)
	}
	let parsed: unknown
	try {
		parsed = JSON.parse(await readFile(filePath, 'utf-8'))
	} catch {
		throw new PipelineInputError(`Invalid JSON file format: ${filePath}`)
	}
	const result = PostSnapshotSchema.safeParse(parsed)
	if (!result.success) {
		const first = result.error.errors[0]
		const where = first ? `${first.path.join('.')}: ${first.message}` : result.error.message
		throw new PipelineInputError(`Invalid post data in ${filePath}: ${where}`)
	}
	return result.data
}

export async function runPipeline(
	config: Config,
	options: RunOptions,
	deps: PipelineDeps,
): Promise<RunSummary> {
	validateRunOptions(options)
	const cwd = deps.cwd ?? process.cwd()

	const exporterFor = (credentials: StoredCredentials): SheetsExporter =>
		new SheetsExporter({
			gateway: deps.createGateway(credentials.google_credentials, credentials.spreadsheet_id),
			config,
			cwd,
			onBatch: deps.onUploadBatch,
		})

	if (options.sheetsOnly && options.jsonFile) {
		const jsonPath = path.resolve(cwd, options.jsonFile)
		logger.info('Importing JSON snapshot to Google Sheets', { jsonPath })
		const posts = await readPostsFile(jsonPath)
		const credentials = await deps.loadCredentials()
		const exported = await exporterFor(credentials).exportPosts(posts)
		return {
			mode: options.mode,
			source: 'json',
			posts: posts.length,
			fetched: 0,
			skipped: 0,
			truncated: false,
			jsonPath,
			exported,
			csvRows: null,
		}
	}

	const credentials = await deps.loadCredentials()
	const collector = new ThreadsCollector({
		client: deps.createThreadsClient(credentials.threads_token, config),
		config,
		cwd,
		onProgress: deps.onCollectProgress,
	})

	logger.info('Starting Threads data collection', { mode: options.mode })
	const collected = await collector.collectPosts(options.mode, options.limit)
	const summary: RunSummary = {
		mode: options.mode,
		source: 'threads',
		posts: collected.posts.length,
		fetched: collected.fetched,
		skipped: collected.skipped,
		truncated: collected.truncated,
		jsonPath: collected.posts.length > 0 ? collected.jsonPath : null,
		exported: null,
		csvRows: null,
	}

	if (collected.posts.length === 0) return summary

	if (options.threadsOnly) {
		logger.info('Skipping Google Sheets export')
		summary.csvRows = await collector.updateCsvBackup(collected.posts)
		return summary
	}

	logger.info('Exporting data to Google Sheets')
	summary.exported = await exporterFor(credentials).exportPosts(collected.posts)
	return summary
}
