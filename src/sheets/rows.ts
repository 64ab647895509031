/**
 * Post → spreadsheet row conversion, shared by the sheet upload and the
 * local CSV backup so both carry the same columns.
 */

import { POST_COLUMNS, type Post } from '../schema/post.js'

export type CellValue = string | number | boolean

/** likes + replies + reposts + quotes + shares */
export function engagementOf(post: Post): number {
	return post.likes + post.replies + post.reposts + post.quotes + post.shares
}

/** engagement / views rounded to two decimals, 0 without views */
export function engagementRate(engagement: number, views: number): number {
	if (views <= 0) return 0
	return Math.round((engagement / views) * 100) / 100
}

export function toSheetRow(post: Post): CellValue[] {
	const engagement = engagementOf(post)
	return [
		...POST_COLUMNS.map((column) => post[column.key]),
		engagement,
		engagementRate(engagement, post.views),
	]
}

export function toSheetRows(posts: ReadonlyArray<Post>): CellValue[][] {
	return posts.map(toSheetRow)
}

/** Booleans use the spreadsheet spelling so CSV and sheet agree */
export function cellToString(value: CellValue): string {
	if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE'
	return String(value)
}
