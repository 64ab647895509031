/**
 * Post export: append rows in batches, tidy the sheet, then mirror it to CSV
 */

import path from 'node:path'

import type { Config } from '../config/schema.js'
import { type Post, SHEET_COLUMN_INDEX, SHEET_HEADERS } from '../schema/post.js'
import { writeCsv } from '../storage/csv-backup.js'
import { createLogger } from '../utils/logger.js'
import { BaseSheets, type FormatOperation } from './base-sheets.js'
import type { SheetsGateway } from './gateway.js'
import { toSheetRows } from './rows.js'

const logger = createLogger('sheets:exporter')

export type ExportResult = {
	sheetName: string
	sheetId: number
	appended: number
	batches: number
	/** null when the sheet had no header row to export */
	csvPath: string | null
}

export type SheetsExporterOptions = {
	gateway: SheetsGateway
	config: Pick<Config, 'sheets' | 'storage'>
	cwd?: string
	onBatch?: (batch: number, total: number) => void
}

/**
 * `minBatchSize` up to 100 records, otherwise half the records (at least
 * `minBatchSize`)
 */
export function computeBatchSize(total: number, minBatchSize = 50): number {
	if (total <= 100) return minBatchSize
	return Math.max(minBatchSize, Math.floor(total / 2))
}

/**
 * Runs after every upload. Sorting by engagement first makes the duplicate
 * removal keep the higher-engagement copy of a post.
 */
export const POST_EXPORT_OPERATIONS: ReadonlyArray<FormatOperation> = [
	{ type: 'sort', columnIndex: SHEET_COLUMN_INDEX.engagement, ascending: false },
	{
		type: 'removeDuplicates',
		columns: [
			SHEET_COLUMN_INDEX.postId,
			SHEET_COLUMN_INDEX.shortcode,
			SHEET_COLUMN_INDEX.postDate,
		],
		startColumnIndex: 0,
		endColumnIndex: SHEET_HEADERS.length,
	},
	{ type: 'sort', columnIndex: SHEET_COLUMN_INDEX.postDate, ascending: false },
	{ type: 'autoResize' },
]

export class SheetsExporter extends BaseSheets {
	private readonly config: SheetsExporterOptions['config']
	private readonly dataDir: string
	private readonly onBatch?: (batch: number, total: number) => void

	constructor(options: SheetsExporterOptions) {
		super(options.gateway)
		this.config = options.config
		this.dataDir = path.resolve(options.cwd ?? process.cwd(), options.config.storage.dataDir)
		this.onBatch = options.onBatch
	}

	get sheetName(): string {
		return this.config.sheets.sheetName
	}

	/**
	 * Write the whole sheet to `{dataDir}/{sheetName}.csv`
	 *
	 * @returns The CSV path, or null when the sheet has no headers
	 */
	async exportToCsv(sheetName: string = this.sheetName): Promise<string | null> {
		const { headers, rows } = await this.getSheetData(sheetName)
		if (headers.length === 0) {
			logger.warn('Sheet has no data, skipping CSV export', { sheetName })
			return null
		}
		// Sheets omits trailing empty cells
		const padded = rows.map((row) => headers.map((_, index) => row[index] ?? ''))
		const csvPath = path.join(this.dataDir, `${sheetName}.csv`)
		await writeCsv(csvPath, { headers, rows: padded })
		logger.info('Exported sheet to CSV', { sheetName, csvPath, rows: padded.length })
		return csvPath
	}

	async exportPosts(posts: ReadonlyArray<Post>): Promise<ExportResult | null> {
		if (posts.length === 0) {
			logger.warn('No post data to export')
			return null
		}

		const sheetName = this.sheetName
		const info = await this.connect()
		const sheetId = await this.ensureSheetExists(sheetName, info)

		const existing = await this.getSheetData(sheetName)
		let needsHeaders = existing.headers.length === 0

		const total = posts.length
		const batchSize = computeBatchSize(total, this.config.sheets.minBatchSize)
		const batchCount = Math.ceil(total / batchSize)
		logger.info('Uploading posts', { total, batchSize, batches: batchCount })

		let appended = 0
		for (let start = 0; start < total; start += batchSize) {
			const batch = posts.slice(start, start + batchSize)
			const rows = toSheetRows(batch)
			await this.appendSheetData(sheetName, rows, needsHeaders ? SHEET_HEADERS : undefined)
			needsHeaders = false
			appended += rows.length

			const batchNumber = Math.floor(start / batchSize) + 1
			logger.info('Processed batch', { batch: batchNumber, of: batchCount, rows: rows.length })
			this.onBatch?.(batchNumber, batchCount)
		}

		await this.formatSheet(sheetName, POST_EXPORT_OPERATIONS, sheetId)
		const csvPath = await this.exportToCsv(sheetName)

		logger.info('Post export completed', { sheetName, appended })
		return { sheetName, sheetId, appended, batches: batchCount, csvPath }
	}
}
