/**
 * Mode-driven collection: fetch → diff against the CSV backup → insights →
 * normalize → JSON snapshot
 */

import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'

import type { Config } from '../config/schema.js'
import {
	type Post,
	type PostInsights,
	type ThreadsPost,
	emptyInsights,
	toPostRecord,
} from '../schema/post.js'
import {
	knownPostIds,
	latestPostDate,
	readCsvBackup,
	updateCsvBackup,
} from '../storage/csv-backup.js'
import { formatDateInTimeZone, formatInTimeZone, parseTimestamp } from '../utils/dates.js'
import { createLogger } from '../utils/logger.js'
import type { ThreadsClient } from './client.js'

const logger = createLogger('threads:collector')

export type CollectMode = 'test' | 'force' | 'normal'

export const COLLECT_MODES: ReadonlyArray<CollectMode> = ['test', 'force', 'normal']

export function isCollectMode(value: string): value is CollectMode {
	return COLLECT_MODES.some((mode) => mode === value)
}

export type CollectProgress =
	| { stage: 'fetch'; fetched: number }
	| { stage: 'insights'; done: number; total: number }

export type CollectResult = {
	mode: CollectMode
	posts: Post[]
	/** Posts returned by the API before the incremental diff */
	fetched: number
	/** Posts dropped because the CSV backup already holds them */
	skipped: number
	since?: string
	truncated: boolean
	jsonPath: string
}

type CollectorClient = Pick<ThreadsClient, 'getUserPosts' | 'getPostInsights'>

export type ThreadsCollectorOptions = {
	client: CollectorClient
	config: Pick<Config, 'storage' | 'timezone' | 'testLimit'>
	cwd?: string
	onProgress?: (progress: CollectProgress) => void
}

/**
 * API post + insights → stored post. `postDate` is rendered in `timeZone`.
 */
export function normalizePost(
	raw: ThreadsPost,
	insights: PostInsights | undefined,
	timeZone: string,
): Post {
	const metrics = insights ?? emptyInsights()
	const timestamp = parseTimestamp(raw.timestamp)
	return {
		postId: raw.id,
		shortcode: raw.shortcode ?? '',
		postDate: timestamp ? formatInTimeZone(timestamp, timeZone) : raw.timestamp,
		content: raw.text ?? '',
		isQuote: raw.is_quote_post ?? false,
		mediaType: raw.media_type ?? '',
		permalink: raw.permalink ?? '',
		views: metrics.views,
		likes: metrics.likes,
		replies: metrics.replies,
		reposts: metrics.reposts,
		quotes: metrics.quotes,
		shares: metrics.shares,
	}
}

export class ThreadsCollector {
	private readonly client: CollectorClient
	private readonly config: ThreadsCollectorOptions['config']
	private readonly onProgress?: (progress: CollectProgress) => void
	readonly jsonPath: string
	readonly csvPath: string

	constructor(options: ThreadsCollectorOptions) {
		this.client = options.client
		this.config = options.config
		this.onProgress = options.onProgress
		const dataDir = path.resolve(options.cwd ?? process.cwd(), this.config.storage.dataDir)
		this.jsonPath = path.join(dataDir, this.config.storage.jsonFile)
		this.csvPath = path.join(dataDir, this.config.storage.csvFile)
	}

	/**
	 * Incremental window from the CSV backup: `since` date plus ids to skip
	 */
	async incrementalWindow(): Promise<{ since?: string; known: Set<string> }> {
		const table = await readCsvBackup(this.csvPath)
		if (!table) return { known: new Set() }

		const latest = latestPostDate(table)
		const known = knownPostIds(table)
		if (!latest) return { known }

		const since = formatDateInTimeZone(latest, this.config.timezone)
		logger.info('Incremental fetch from CSV backup', { since, known: known.size })
		return { since, known }
	}

	async collectPosts(mode: CollectMode, limit?: number): Promise<CollectResult> {
		logger.info('Collecting posts', { mode, limit })

		let since: string | undefined
		let known = new Set<string>()
		let fetchOptions: { limit?: number; since?: string } = {}

		if (mode === 'test') {
			fetchOptions = { limit: limit ?? this.config.testLimit }
		} else if (mode === 'normal') {
			const window = await this.incrementalWindow()
			since = window.since
			known = window.known
			fetchOptions = since ? { since } : {}
		}

		const { posts: raw, truncated } = await this.client.getUserPosts(fetchOptions)
		this.onProgress?.({ stage: 'fetch', fetched: raw.length })

		const fresh = known.size > 0 ? raw.filter((post) => !known.has(post.id)) : raw
		const skipped = raw.length - fresh.length
		if (skipped > 0) {
			logger.info('Skipping posts already in CSV backup', { skipped })
		}

		if (fresh.length === 0) {
			logger.info('No posts to process', { mode, fetched: raw.length })
			return {
				mode,
				posts: [],
				fetched: raw.length,
				skipped,
				since,
				truncated,
				jsonPath: this.jsonPath,
			}
		}

		const insights = await this.client.getPostInsights(
			fresh.map((post) => post.id),
			{
				useCache: true,
				onProgress: (done, total) =>
					this.onProgress?.({ stage: 'insights', done, total }),
			},
		)

		const posts = fresh.map((post) =>
			normalizePost(post, insights.get(post.id), this.config.timezone),
		)
		await this.saveJson(posts)

		logger.info('Posts collected', { mode, count: posts.length, skipped, truncated })
		return {
			mode,
			posts,
			fetched: raw.length,
			skipped,
			since,
			truncated,
			jsonPath: this.jsonPath,
		}
	}

	/** Overwrite the JSON snapshot */
	async saveJson(posts: ReadonlyArray<Post>): Promise<void> {
		await mkdir(path.dirname(this.jsonPath), { recursive: true })
		await writeFile(this.jsonPath, `${JSON.stringify(posts.map(toPostRecord), null, 2)}\n`, 'utf-8')
		logger.info('JSON snapshot written', { jsonPath: this.jsonPath, count: posts.length })
	}

	/** Merge posts into the local CSV backup */
	async updateCsvBackup(posts: ReadonlyArray<Post>): Promise<number> {
		return updateCsvBackup(this.csvPath, posts)
	}
}
