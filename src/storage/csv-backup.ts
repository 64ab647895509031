/**
 * Local CSV backup of every exported post
 *
 * The backup is what Normal Mode diffs against: its latest `post_date` is the
 * `since` date for the next fetch and its `post_id`s are the posts already
 * exported.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'

import type { Post } from '../schema/post.js'
import { SHEET_HEADERS } from '../schema/post.js'
import { cellToString, toSheetRows } from '../sheets/rows.js'
import { parseTimestamp } from '../utils/dates.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('storage:csv-backup')

export type CsvTable = {
	headers: string[]
	rows: string[][]
}

function isStringMatrix(value: unknown): value is string[][] {
	return (
		Array.isArray(value) &&
		value.every(
			(row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'),
		)
	)
}

/**
 * Parse CSV text (a leading BOM is ignored)
 */
export function parseCsv(content: string): CsvTable {
	const records: unknown = parse(content, {
		bom: true,
		skip_empty_lines: true,
		relax_column_count: true,
	})
	if (!isStringMatrix(records)) {
		throw new Error('CSV did not parse into rows of strings')
	}
	const [headers = [], ...rows] = records
	return { headers, rows }
}

/**
 * Read a CSV backup
 *
 * @returns The table, or null when the file does not exist
 */
export async function readCsvBackup(filePath: string): Promise<CsvTable | null> {
	if (!existsSync(filePath)) {
		logger.warn('CSV backup does not exist', { filePath })
		return null
	}
	return parseCsv(await readFile(filePath, 'utf-8'))
}

function columnValues(table: CsvTable, header: string): string[] | null {
	const index = table.headers.indexOf(header)
	if (index === -1) return null
	return table.rows.map((row) => row[index] ?? '')
}

/**
 * Latest `post_date` in the table, or null if the table is empty, has no
 * `post_date` column, or holds no parsable dates
 */
export function latestPostDate(table: CsvTable): Date | null {
	if (table.rows.length === 0) {
		logger.warn('CSV backup is empty')
		return null
	}
	const values = columnValues(table, 'post_date')
	if (!values) {
		logger.warn('No post_date column in CSV backup', { headers: table.headers })
		return null
	}

	let latest: Date | null = null
	for (const value of values) {
		const date = parseTimestamp(value)
		if (date && (!latest || date.getTime() > latest.getTime())) latest = date
	}
	return latest
}

export function knownPostIds(table: CsvTable): Set<string> {
	const values = columnValues(table, 'post_id') ?? []
	return new Set(values.filter((id) => id !== ''))
}

/**
 * Write a table as UTF-8 CSV with a BOM (spreadsheet apps then detect UTF-8)
 */
export async function writeCsv(filePath: string, table: CsvTable): Promise<void> {
	await mkdir(path.dirname(filePath), { recursive: true })
	const content = stringify([table.headers, ...table.rows], { bom: true })
	await writeFile(filePath, content, 'utf-8')
}

function dateSortKey(value: string | undefined): number {
	return parseTimestamp(value)?.getTime() ?? Number.NEGATIVE_INFINITY
}

/**
 * Merge posts into existing rows: posts first, first occurrence of a
 * `post_id` wins, newest `post_date` first.
 */
export function mergeBackupRows(
	existing: CsvTable | null,
	posts: ReadonlyArray<Post>,
): CsvTable {
	const headers = [...SHEET_HEADERS]
	const incoming = toSheetRows(posts).map((row) => row.map(cellToString))

	const carried = (existing?.rows ?? []).map((row) =>
		headers.map((header) => {
			const index = existing?.headers.indexOf(header) ?? -1
			return index === -1 ? '' : (row[index] ?? '')
		}),
	)

	const seen = new Set<string>()
	const rows: string[][] = []
	for (const row of [...incoming, ...carried]) {
		const id = row[0] ?? ''
		if (id !== '' && seen.has(id)) continue
		seen.add(id)
		rows.push(row)
	}

	const dateIndex = headers.indexOf('post_date')
	rows.sort((a, b) => dateSortKey(b[dateIndex]) - dateSortKey(a[dateIndex]))
	return { headers, rows }
}

/**
 * Fold posts into the CSV backup file
 *
 * @returns Total rows in the updated backup
 */
export async function updateCsvBackup(
	filePath: string,
	posts: ReadonlyArray<Post>,
): Promise<number> {
	const existing = existsSync(filePath) ? await readCsvBackup(filePath) : null
	const merged = mergeBackupRows(existing, posts)
	await writeCsv(filePath, merged)
	logger.info('CSV backup updated', { filePath, total: merged.rows.length })
	return merged.rows.length
}
