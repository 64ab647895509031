/**
 * Sheet-level operations on top of a {@link SheetsGateway}
 */

import { createLogger, errorContext } from '../utils/logger.js'
import type { SheetRequest, SheetsGateway, SpreadsheetInfo } from './gateway.js'
import type { CellValue } from './rows.js'

const logger = createLogger('sheets:base')

export type SheetsStep = 'connect' | 'ensure-sheet' | 'read' | 'append' | 'format'

export class SheetsExportError extends Error {
	constructor(
		message: string,
		readonly step: SheetsStep,
		options?: { cause?: unknown },
	) {
		super(message, options)
		this.name = 'SheetsExportError'
	}
}

export type FormatOperation =
	| {
			type: 'sort'
			columnIndex: number
			ascending?: boolean
			startRowIndex?: number
			startColumnIndex?: number
			endColumnIndex?: number
	  }
	| { type: 'autoResize'; endIndex?: number }
	| {
			type: 'removeDuplicates'
			columns: number[]
			startColumnIndex?: number
			endColumnIndex?: number
	  }
	| { type: 'formatPercent'; columnIndex: number; pattern?: string }

export type SheetData = {
	headers: string[]
	rows: string[][]
}

const DEFAULT_END_COLUMN = 26

/**
 * Format operations → batchUpdate requests. Row 0 (headers) is never touched.
 */
export function buildFormatRequests(
	operations: ReadonlyArray<FormatOperation>,
	sheetId: number,
): SheetRequest[] {
	return operations.map((op): SheetRequest => {
		switch (op.type) {
			case 'sort':
				return {
					sortRange: {
						range: {
							sheetId,
							startRowIndex: op.startRowIndex ?? 1,
							startColumnIndex: op.startColumnIndex ?? 0,
							endColumnIndex: op.endColumnIndex ?? DEFAULT_END_COLUMN,
						},
						sortSpecs: [
							{
								dimensionIndex: op.columnIndex,
								sortOrder: op.ascending ? 'ASCENDING' : 'DESCENDING',
							},
						],
					},
				}
			case 'autoResize':
				return {
					autoResizeDimensions: {
						dimensions: {
							sheetId,
							dimension: 'COLUMNS',
							startIndex: 0,
							endIndex: op.endIndex ?? DEFAULT_END_COLUMN,
						},
					},
				}
			case 'removeDuplicates':
				return {
					deleteDuplicates: {
						range: {
							sheetId,
							startRowIndex: 1,
							startColumnIndex: op.startColumnIndex ?? 0,
							endColumnIndex: op.endColumnIndex ?? DEFAULT_END_COLUMN,
						},
						comparisonColumns: op.columns.map((column) => ({
							sheetId,
							dimension: 'COLUMNS',
							startIndex: column,
							endIndex: column + 1,
						})),
					},
				}
			case 'formatPercent':
				return {
					repeatCell: {
						range: {
							sheetId,
							startRowIndex: 1,
							startColumnIndex: op.columnIndex,
							endColumnIndex: op.columnIndex + 1,
						},
						cell: {
							userEnteredFormat: {
								numberFormat: { type: 'PERCENT', pattern: op.pattern ?? '0.00%' },
							},
						},
						fields: 'userEnteredFormat.numberFormat',
					},
				}
		}
	})
}

/** Sheet names with spaces or quotes need quoting in A1 ranges */
export function sheetRange(sheetName: string, cells: string): string {
	const simple = /^[A-Za-z0-9_]+$/.test(sheetName)
	const name = simple ? sheetName : `'${sheetName.replace(/'/g, "''")}'`
	return `${name}!${cells}`
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export class BaseSheets {
	constructor(protected readonly gateway: SheetsGateway) {}

	async connect(): Promise<SpreadsheetInfo> {
		try {
			const info = await this.gateway.getSpreadsheet()
			logger.info('Connected to spreadsheet', {
				title: info.title,
				sheets: info.sheets.length,
			})
			return info
		} catch (error) {
			logger.error('Error connecting to spreadsheet', errorContext(error))
			throw new SheetsExportError(
				`Unable to connect to the spreadsheet: ${describe(error)}`,
				'connect',
				{ cause: error },
			)
		}
	}

	/**
	 * Id of the named sheet, creating it when absent
	 */
	async ensureSheetExists(sheetName: string, info: SpreadsheetInfo): Promise<number> {
		const existing = info.sheets.find((sheet) => sheet.title === sheetName)
		if (existing) {
			logger.debug('Found existing sheet', { sheetName, sheetId: existing.sheetId })
			return existing.sheetId
		}
		try {
			const sheetId = await this.gateway.addSheet(sheetName)
			logger.info('Created sheet', { sheetName, sheetId })
			return sheetId
		} catch (error) {
			throw new SheetsExportError(
				`Unable to create sheet "${sheetName}": ${describe(error)}`,
				'ensure-sheet',
				{ cause: error },
			)
		}
	}

	async getSheetData(sheetName: string): Promise<SheetData> {
		let values: string[][]
		try {
			values = await this.gateway.getValues(sheetRange(sheetName, 'A:Z'))
		} catch (error) {
			throw new SheetsExportError(
				`Unable to read sheet "${sheetName}": ${describe(error)}`,
				'read',
				{ cause: error },
			)
		}
		const [headers = [], ...rows] = values
		return { headers, rows }
	}

	/**
	 * Append rows, prefixed by a header row when given
	 *
	 * @returns Rows written, header included
	 */
	async appendSheetData(
		sheetName: string,
		rows: CellValue[][],
		headers?: ReadonlyArray<string>,
	): Promise<number> {
		const values = headers ? [[...headers], ...rows] : rows
		try {
			const written = await this.gateway.appendValues(sheetRange(sheetName, 'A1'), values)
			logger.info(headers ? 'Added header row and data' : 'Appended data', {
				sheetName,
				rows: rows.length,
			})
			return written
		} catch (error) {
			throw new SheetsExportError(
				`Unable to append to sheet "${sheetName}": ${describe(error)}`,
				'append',
				{ cause: error },
			)
		}
	}

	async formatSheet(
		sheetName: string,
		operations: ReadonlyArray<FormatOperation>,
		sheetId: number,
	): Promise<void> {
		const requests = buildFormatRequests(operations, sheetId)
		if (requests.length === 0) return
		try {
			await this.gateway.batchUpdate(requests)
			logger.info('Formatted sheet', { sheetName, operations: requests.length })
		} catch (error) {
			throw new SheetsExportError(
				`Unable to format sheet "${sheetName}": ${describe(error)}`,
				'format',
				{ cause: error },
			)
		}
	}
}
