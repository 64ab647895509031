/**
 * Threads Graph API client
 *
 * - GET requests with a bearer token, spaced by requestDelayMs
 * - 429/5xx retried per {@link RateLimiter}
 * - Cursor pagination over `me/threads`
 * - Insights fetched in parallel batches, cached in memory with a TTL
 */

import { setTimeout as sleepMs } from 'node:timers/promises'

import type { ZodType, ZodTypeDef } from 'zod'

import {
	INSIGHT_METRICS,
	type InsightMetric,
	type InsightsResponse,
	InsightsResponseSchema,
	POST_FIELDS,
	type PostInsights,
	type ThreadsPost,
	type ThreadsPostPage,
	ThreadsPostPageSchema,
	type ThreadsProfile,
	ThreadsProfileSchema,
	emptyInsights,
} from '../schema/post.js'
import { createLogger, errorContext } from '../utils/logger.js'
import { RateLimiter, isRetryableStatus } from './rate-limiting.js'

const logger = createLogger('threads:client')

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export class ThreadsApiError extends Error {
	constructor(
		message: string,
		readonly status: number | null,
		readonly endpoint: string,
		readonly body?: string,
	) {
		super(message)
		this.name = 'ThreadsApiError'
	}
}

export type ThreadsClientOptions = {
	token: string
	baseUrl?: string
	pageSize?: number
	insightsBatchSize?: number
	requestDelayMs?: number
	maxRetries?: number
	insightsCacheTtlMs?: number
	requestTimeoutMs?: number
	fetch?: FetchLike
	sleep?: (ms: number) => Promise<void>
	now?: () => number
	rateLimiter?: RateLimiter
}

export type GetUserPostsOptions = {
	/** Stop after this many posts (Test Mode) */
	limit?: number
	/** Only posts on or after this date (YYYY-MM-DD) */
	since?: string
}

export type FetchPostsResult = {
	posts: ThreadsPost[]
	pages: number
	/** A page after the first failed; posts holds what came before it */
	truncated: boolean
}

type QueryParams = Record<string, string | number | undefined>

type CacheEntry = { insights: PostInsights; storedAt: number }

const USER_POSTS_ENDPOINT = 'me/threads'

export class ThreadsClient {
	readonly baseUrl: string
	private readonly token: string
	private readonly pageSize: number
	private readonly insightsBatchSize: number
	private readonly cacheTtlMs: number
	private readonly timeoutMs: number
	private readonly fetchImpl: FetchLike
	private readonly sleep: (ms: number) => Promise<void>
	private readonly now: () => number
	private readonly limiter: RateLimiter
	private readonly insightsCache = new Map<string, CacheEntry>()

	constructor(options: ThreadsClientOptions) {
		if (!options.token) {
			throw new Error('Threads access token is required')
		}
		this.token = options.token
		this.baseUrl = (options.baseUrl ?? 'https://graph.threads.net/v1.0').replace(/\/+$/, '')
		this.pageSize = options.pageSize ?? 100
		this.insightsBatchSize = options.insightsBatchSize ?? 10
		this.cacheTtlMs = options.insightsCacheTtlMs ?? 3_600_000
		this.timeoutMs = options.requestTimeoutMs ?? 10_000
		this.fetchImpl = options.fetch ?? fetch
		this.sleep = options.sleep ?? ((ms) => sleepMs(ms))
		this.now = options.now ?? Date.now
		this.limiter =
			options.rateLimiter ??
			new RateLimiter(
				{
					requestDelayMs: options.requestDelayMs ?? 500,
					maxRetries: options.maxRetries ?? 3,
				},
				{ now: this.now },
			)
	}

	/**
	 * Absolute URL for an endpoint (`me/threads`) or a paging URL
	 */
	buildUrl(endpoint: string, params: QueryParams = {}): URL {
		const url = /^https?:\/\//.test(endpoint)
			? new URL(endpoint)
			: new URL(`${this.baseUrl}/${endpoint.replace(/^\/+/, '')}`)
		for (const [key, value] of Object.entries(params)) {
			if (value === undefined) continue
			url.searchParams.set(key, String(value))
		}
		return url
	}

	/**
	 * GET an endpoint and validate the JSON body
	 *
	 * @throws ThreadsApiError on non-2xx after retries or an open circuit
	 */
	async request<T>(
		endpoint: string,
		params: QueryParams,
		schema: ZodType<T, ZodTypeDef, unknown>,
	): Promise<T> {
		const url = this.buildUrl(endpoint, params)
		const label = url.pathname

		for (let attempt = 1; ; attempt++) {
			if (this.limiter.isCircuitOpen()) {
				throw new ThreadsApiError(
					'Too many consecutive failures; circuit breaker is open',
					null,
					label,
				)
			}

			const wait = this.limiter.delayBeforeNextCall()
			if (wait > 0) await this.sleep(wait)

			logger.debug('Sending API request', { endpoint: label, attempt })
			this.limiter.recordCall()

			let response: Response
			try {
				response = await this.fetchImpl(url.toString(), {
					method: 'GET',
					headers: {
						Authorization: `Bearer ${this.token}`,
						'Content-Type': 'application/json',
					},
					signal: AbortSignal.timeout(this.timeoutMs),
				})
			} catch (error) {
				this.limiter.recordFailure()
				throw new ThreadsApiError(
					`Request to ${label} failed: ${error instanceof Error ? error.message : String(error)}`,
					null,
					label,
				)
			}

			if (response.ok) {
				this.limiter.recordSuccess()
				const body: unknown = await response.json()
				const parsed = schema.safeParse(body)
				if (!parsed.success) {
					throw new ThreadsApiError(
						`Unexpected response shape from ${label}: ${parsed.error.message}`,
						response.status,
						label,
					)
				}
				return parsed.data
			}

			if (isRetryableStatus(response.status)) this.limiter.recordFailure()
			const text = await response.text()
			const decision = this.limiter.getRetryStrategy(
				response.status,
				attempt,
				response.headers.get('Retry-After'),
			)
			if (!decision.shouldRetry) {
				logger.error('API request failed', {
					endpoint: label,
					status: response.status,
					body: text.slice(0, 500),
				})
				throw new ThreadsApiError(
					`Threads API returned ${response.status} for ${label}`,
					response.status,
					label,
					text.slice(0, 500),
				)
			}

			logger.warn('Retrying API request', {
				endpoint: label,
				status: response.status,
				attempt,
				delayMs: decision.delayMs,
			})
			await this.sleep(decision.delayMs)
		}
	}

	async getProfile(): Promise<ThreadsProfile> {
		return this.request('me', { fields: 'id,username' }, ThreadsProfileSchema)
	}

	/**
	 * Page through the authorized user's posts, newest first
	 */
	async getUserPosts(options: GetUserPostsOptions = {}): Promise<FetchPostsResult> {
		const { limit, since } = options
		const posts: ThreadsPost[] = []
		let next: string | undefined = USER_POSTS_ENDPOINT
		let pages = 0
		let truncated = false

		logger.info('Fetching posts', { limit, since })

		while (next) {
			if (limit !== undefined && posts.length >= limit) break

			const batch =
				limit === undefined
					? this.pageSize
					: Math.min(limit - posts.length, this.pageSize)

			const params: QueryParams = {
				fields: POST_FIELDS.join(','),
				limit: batch,
				since,
			}

			let page: ThreadsPostPage
			try {
				page = await this.request(next, params, ThreadsPostPageSchema)
			} catch (error) {
				if (pages === 0) throw error
				logger.error('Error while fetching posts; stopping pagination', {
					...errorContext(error),
					pages,
					collected: posts.length,
				})
				truncated = true
				break
			}

			pages++
			posts.push(...page.data)
			logger.debug('Fetched page', { page: pages, count: page.data.length })
			next = page.paging?.next
		}

		const result = limit === undefined ? posts : posts.slice(0, limit)
		logger.info('Posts fetched', { total: result.length, pages, truncated })
		return { posts: result, pages, truncated }
	}

	private cachedInsights(postId: string): PostInsights | undefined {
		const entry = this.insightsCache.get(postId)
		if (!entry) return undefined
		if (this.now() - entry.storedAt > this.cacheTtlMs) {
			this.insightsCache.delete(postId)
			return undefined
		}
		return entry.insights
	}

	private async fetchInsights(postId: string): Promise<PostInsights> {
		try {
			const response = await this.request(
				`${postId}/insights`,
				{ metric: INSIGHT_METRICS.join(',') },
				InsightsResponseSchema,
			)
			return parseInsights(response)
		} catch (error) {
			logger.error('Error fetching post insights', { postId, ...errorContext(error) })
			return emptyInsights()
		}
	}

	/**
	 * Insights per post id. Failed posts get zero metrics.
	 */
	async getPostInsights(
		postIds: string | ReadonlyArray<string>,
		options: { useCache?: boolean; onProgress?: (done: number, total: number) => void } = {},
	): Promise<Map<string, PostInsights>> {
		const { useCache = true, onProgress } = options
		const ids = typeof postIds === 'string' ? [postIds] : [...postIds]
		const result = new Map<string, PostInsights>()
		const pending: string[] = []

		for (const id of ids) {
			const cached = useCache ? this.cachedInsights(id) : undefined
			if (cached) result.set(id, cached)
			else pending.push(id)
		}

		let done = result.size
		onProgress?.(done, ids.length)

		for (let i = 0; i < pending.length; i += this.insightsBatchSize) {
			const batch = pending.slice(i, i + this.insightsBatchSize)
			const batchNumber = Math.floor(i / this.insightsBatchSize) + 1
			logger.debug('Processing insights batch', { batch: batchNumber, size: batch.length })

			const settled = await Promise.all(
				batch.map(async (id) => [id, await this.fetchInsights(id)] as const),
			)
			for (const [id, insights] of settled) {
				result.set(id, insights)
				if (useCache) this.insightsCache.set(id, { insights, storedAt: this.now() })
				done++
			}
			onProgress?.(done, ids.length)
		}

		logger.info('Post insights retrieved', { processed: done, total: ids.length })
		return result
	}
}

/**
 * Metric value: values[0].value, else total_value.value, else 0
 */
export function parseInsights(response: InsightsResponse): PostInsights {
	const insights = emptyInsights()
	for (const metric of response.data ?? []) {
		if (!isInsightMetric(metric.name)) continue
		const first = metric.values?.[0]
		insights[metric.name] = first
			? (first.value ?? 0)
			: (metric.total_value?.value ?? 0)
	}
	return insights
}

const METRIC_NAMES: ReadonlySet<string> = new Set(INSIGHT_METRICS)

function isInsightMetric(name: string): name is InsightMetric {
	return METRIC_NAMES.has(name)
}
