// src/schema/post.ts
import { z } from 'zod'

// ============================================================================
// Threads Graph API payloads
// ============================================================================

export const POST_FIELDS = [
	'id',
	'shortcode',
	'timestamp',
	'text',
	'is_quote_post',
	'media_type',
	'permalink',
] as const

export const INSIGHT_METRICS = [
	'views',
	'likes',
	'replies',
	'reposts',
	'quotes',
	'shares',
] as const

export type InsightMetric = (typeof INSIGHT_METRICS)[number]

export type PostInsights = Record<InsightMetric, number>

export const ThreadsPostSchema = z.object({
	id: z.string().min(1),
	shortcode: z.string().optional(),
	timestamp: z.string().min(1),
	text: z.string().optional(),
	is_quote_post: z.boolean().optional(),
	media_type: z.string().optional(),
	permalink: z.string().optional(),
})

export type ThreadsPost = z.infer<typeof ThreadsPostSchema>

export const ThreadsPostPageSchema = z.object({
	data: z.array(ThreadsPostSchema).default([]),
	paging: z
		.object({
			cursors: z
				.object({ before: z.string().optional(), after: z.string().optional() })
				.optional(),
			next: z.string().optional(),
			previous: z.string().optional(),
		})
		.optional(),
})

export type ThreadsPostPage = z.infer<typeof ThreadsPostPageSchema>

const MetricValueSchema = z.object({ value: z.number().optional() })

export const InsightsResponseSchema = z.object({
	data: z
		.array(
			z.object({
				name: z.string(),
				values: z.array(MetricValueSchema).optional(),
				total_value: MetricValueSchema.optional(),
			}),
		)
		.optional(),
})

export type InsightsResponse = z.infer<typeof InsightsResponseSchema>

export const ThreadsProfileSchema = z
	.object({
		id: z.string(),
		username: z.string().optional(),
	})
	.passthrough()

export type ThreadsProfile = z.infer<typeof ThreadsProfileSchema>

// ============================================================================
// Normalized post (JSON snapshot, CSV backup, sheet rows)
// ============================================================================

export const PostSchema = z.object({
	postId: z.string().min(1),
	shortcode: z.string(),
	postDate: z.string(),
	content: z.string(),
	isQuote: z.boolean(),
	mediaType: z.string(),
	permalink: z.string(),
	views: z.number().default(0),
	likes: z.number().default(0),
	replies: z.number().default(0),
	reposts: z.number().default(0),
	quotes: z.number().default(0),
	shares: z.number().default(0),
})

export type Post = z.infer<typeof PostSchema>

/**
 * A post as stored in the JSON snapshot, keyed like the CSV and sheet columns
 */
export const PostRecordSchema = z.object({
	post_id: z.string().min(1),
	shortcode: z.string(),
	post_date: z.string(),
	content: z.string(),
	is_quote: z.boolean(),
	media_type: z.string(),
	permalink: z.string(),
	views: z.number().default(0),
	likes: z.number().default(0),
	replies: z.number().default(0),
	reposts: z.number().default(0),
	quotes: z.number().default(0),
	shares: z.number().default(0),
})

export type PostRecord = z.infer<typeof PostRecordSchema>

export function toPostRecord(post: Post): PostRecord {
	return {
		post_id: post.postId,
		shortcode: post.shortcode,
		post_date: post.postDate,
		content: post.content,
		is_quote: post.isQuote,
		media_type: post.mediaType,
		permalink: post.permalink,
		views: post.views,
		likes: post.likes,
		replies: post.replies,
		reposts: post.reposts,
		quotes: post.quotes,
		shares: post.shares,
	}
}

export function fromPostRecord(record: PostRecord): Post {
	return {
		postId: record.post_id,
		shortcode: record.shortcode,
		postDate: record.post_date,
		content: record.content,
		isQuote: record.is_quote,
		mediaType: record.media_type,
		permalink: record.permalink,
		views: record.views,
		likes: record.likes,
		replies: record.replies,
		reposts: record.reposts,
		quotes: record.quotes,
		shares: record.shares,
	}
}

/** JSON snapshot contents, parsed into posts */
export const PostSnapshotSchema = z.array(PostRecordSchema.transform(fromPostRecord))

export function emptyInsights(): PostInsights {
	return { views: 0, likes: 0, replies: 0, reposts: 0, quotes: 0, shares: 0 }
}

/**
 * Post columns in file order; headers are the on-disk names
 */
export const POST_COLUMNS = [
	{ header: 'post_id', key: 'postId' },
	{ header: 'shortcode', key: 'shortcode' },
	{ header: 'post_date', key: 'postDate' },
	{ header: 'content', key: 'content' },
	{ header: 'is_quote', key: 'isQuote' },
	{ header: 'media_type', key: 'mediaType' },
	{ header: 'permalink', key: 'permalink' },
	{ header: 'views', key: 'views' },
	{ header: 'likes', key: 'likes' },
	{ header: 'replies', key: 'replies' },
	{ header: 'reposts', key: 'reposts' },
	{ header: 'quotes', key: 'quotes' },
	{ header: 'shares', key: 'shares' },
] as const satisfies ReadonlyArray<{ header: string; key: keyof Post }>

/**
 * Sheet and CSV backup columns: the post columns plus derived engagement figures
 */
export const SHEET_HEADERS = [
	...POST_COLUMNS.map((column) => column.header),
	'engagement',
	'engagement_rate',
] as const

export const SHEET_COLUMN_INDEX = {
	postId: 0,
	shortcode: 1,
	postDate: 2,
	engagement: 13,
	engagementRate: 14,
} as const
