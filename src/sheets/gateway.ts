/**
 * Spreadsheet API surface used by the exporter and verification
 *
 * {@link GoogleSheetsGateway} implements it over googleapis; tests use an
 * in-memory implementation.
 */

import { type sheets_v4, google } from 'googleapis'

import type { ServiceAccount } from '../credentials/schema.js'
import type { CellValue } from './rows.js'

export type SheetRequest = sheets_v4.Schema$Request

export type SheetInfo = { title: string; sheetId: number }

export type SpreadsheetInfo = {
	spreadsheetId: string
	title: string
	sheets: SheetInfo[]
}

export interface SheetsGateway {
	getSpreadsheet(): Promise<SpreadsheetInfo>
	/** Create a sheet and return its id */
	addSheet(title: string): Promise<number>
	/** Formatted cell values of an A1 range, as strings */
	getValues(range: string): Promise<string[][]>
	/** Append rows below the table in range; returns rows written */
	appendValues(range: string, rows: CellValue[][]): Promise<number>
	batchUpdate(requests: SheetRequest[]): Promise<void>
}

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets'
export const SHEETS_READONLY_SCOPE =
	'https://www.googleapis.com/auth/spreadsheets.readonly'

function cellText(value: unknown): string {
	if (value === null || value === undefined) return ''
	if (typeof value === 'string') return value
	if (typeof value === 'number' || typeof value === 'boolean') return String(value)
	return JSON.stringify(value)
}

export type GoogleSheetsGatewayOptions = {
	credentials: ServiceAccount
	spreadsheetId: string
	readOnly?: boolean
}

export class GoogleSheetsGateway implements SheetsGateway {
	private readonly api: sheets_v4.Sheets
	readonly spreadsheetId: string

	constructor(options: GoogleSheetsGatewayOptions) {
		const auth = new google.auth.JWT({
			email: options.credentials.client_email,
			key: options.credentials.private_key,
			scopes: [options.readOnly ? SHEETS_READONLY_SCOPE : SHEETS_SCOPE],
		})
		this.api = google.sheets({ version: 'v4', auth })
		this.spreadsheetId = options.spreadsheetId
	}

	async getSpreadsheet(): Promise<SpreadsheetInfo> {
		const { data } = await this.api.spreadsheets.get({
			spreadsheetId: this.spreadsheetId,
		})
		return {
			spreadsheetId: data.spreadsheetId ?? this.spreadsheetId,
			title: data.properties?.title ?? '',
			sheets: (data.sheets ?? []).map((sheet) => ({
				title: sheet.properties?.title ?? '',
				sheetId: sheet.properties?.sheetId ?? 0,
			})),
		}
	}

	async addSheet(title: string): Promise<number> {
		const { data } = await this.api.spreadsheets.batchUpdate({
			spreadsheetId: this.spreadsheetId,
			requestBody: { requests: [{ addSheet: { properties: { title } } }] },
		})
		const sheetId = data.replies?.[0]?.addSheet?.properties?.sheetId
		if (typeof sheetId !== 'number') {
			throw new Error(`addSheet response for "${title}" carried no sheet id`)
		}
		return sheetId
	}

	async getValues(range: string): Promise<string[][]> {
		const { data } = await this.api.spreadsheets.values.get({
			spreadsheetId: this.spreadsheetId,
			range,
		})
		const values: unknown = data.values
		if (!Array.isArray(values)) return []
		return values.map((row: unknown) => (Array.isArray(row) ? row.map(cellText) : []))
	}

	async appendValues(range: string, rows: CellValue[][]): Promise<number> {
		const { data } = await this.api.spreadsheets.values.append({
			spreadsheetId: this.spreadsheetId,
			range,
			valueInputOption: 'USER_ENTERED',
			insertDataOption: 'INSERT_ROWS',
			requestBody: { values: rows },
		})
		return data.updates?.updatedRows ?? rows.length
	}

	async batchUpdate(requests: SheetRequest[]): Promise<void> {
		await this.api.spreadsheets.batchUpdate({
			spreadsheetId: this.spreadsheetId,
			requestBody: { requests },
		})
	}
}
