import { readFile } from 'node:fs/promises'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { MemorySheetsGateway, makePost, makeTempDir } from '../../../tests/helpers/index.js'
import { SHEET_HEADERS } from '../../schema/post.js'
import { SheetsExportError } from '../base-sheets.js'
import { POST_EXPORT_OPERATIONS, SheetsExporter, computeBatchSize } from '../exporter.js'
import { cellToString, toSheetRow } from '../rows.js'

const config = {
	sheets: { sheetName: 'threads_data', minBatchSize: 2 },
	storage: { dataDir: 'data', jsonFile: 'posts.json', csvFile: 'threads_data.csv' },
}

describe('computeBatchSize', () => {
	it('uses the minimum up to 100 records', () => {
		expect(computeBatchSize(10)).toBe(50)
		expect(computeBatchSize(100)).toBe(50)
		expect(computeBatchSize(100, 20)).toBe(20)
	})

	it('halves larger exports, never below the minimum', () => {
		expect(computeBatchSize(101)).toBe(50)
		expect(computeBatchSize(250)).toBe(125)
		expect(computeBatchSize(301, 200)).toBe(200)
	})
})

describe('SheetsExporter', () => {
	let dir: string
	let cleanup: () => Promise<void>

	beforeEach(async () => {
		;({ dir, cleanup } = await makeTempDir())
	})

	afterEach(async () => {
		await cleanup()
	})

	function setup(gateway = new MemorySheetsGateway()) {
		const batches: Array<[number, number]> = []
		const exporter = new SheetsExporter({
			gateway,
			config,
			cwd: dir,
			onBatch: (batch, total) => batches.push([batch, total]),
		})
		return { gateway, exporter, batches }
	}

	it('does nothing without posts', async () => {
		const { gateway, exporter } = setup()
		expect(await exporter.exportPosts([])).toBeNull()
		expect(gateway.sheets.size).toBe(0)
	})

	it('creates the sheet, writes headers once and uploads in batches', async () => {
		const { gateway, exporter, batches } = setup()
		const posts = [
			makePost({ postId: 'a', postDate: '2024-05-01T10:00:00+0800' }),
			makePost({ postId: 'b', postDate: '2024-05-03T10:00:00+0800' }),
			makePost({ postId: 'c', postDate: '2024-05-02T10:00:00+0800' }),
		]

		const result = await exporter.exportPosts(posts)

		expect(result).toEqual({
			sheetName: 'threads_data',
			sheetId: 100,
			appended: 3,
			batches: 2,
			csvPath: path.join(dir, 'data', 'threads_data.csv'),
		})
		expect(batches).toEqual([
			[1, 2],
			[2, 2],
		])
		const rows = gateway.rows('threads_data')
		expect(rows[0]).toEqual([...SHEET_HEADERS])
		expect(rows.slice(1).map((row) => row[0])).toEqual(['b', 'c', 'a'])
	})

	it('appends below existing data without another header row', async () => {
		const gateway = new MemorySheetsGateway()
		gateway.seed('threads_data', [
			[...SHEET_HEADERS],
			toSheetRow(makePost({ postId: 'old', postDate: '2024-04-01T10:00:00+0800' })).map(cellToString),
		])
		const { exporter } = setup(gateway)

		await exporter.exportPosts([makePost({ postId: 'new' })])

		const rows = gateway.rows('threads_data')
		expect(rows.filter((row) => row[0] === 'post_id')).toHaveLength(1)
		expect(rows.slice(1).map((row) => row[0])).toEqual(['new', 'old'])
	})

	it('keeps the higher-engagement copy of a duplicated post', async () => {
		const gateway = new MemorySheetsGateway()
		gateway.seed('threads_data', [
			[...SHEET_HEADERS],
			toSheetRow(makePost({ postId: 'a', likes: 1 })).map(cellToString),
		])
		const { exporter } = setup(gateway)

		await exporter.exportPosts([makePost({ postId: 'a', likes: 5 })])

		const rows = gateway.rows('threads_data')
		expect(rows).toHaveLength(2)
		expect(rows[1]?.[13]).toBe('5')
	})

	it('sends the post-export formatting', async () => {
		const { gateway, exporter } = setup()
		await exporter.exportPosts([makePost()])

		expect(gateway.requests).toHaveLength(POST_EXPORT_OPERATIONS.length)
		expect(gateway.requests.map((request) => Object.keys(request)[0])).toEqual([
			'sortRange',
			'deleteDuplicates',
			'sortRange',
			'autoResizeDimensions',
		])
	})

	it('mirrors the sheet into CSV', async () => {
		const { exporter } = setup()
		const result = await exporter.exportPosts([makePost({ postId: 'a', content: 'hi, there' })])

		const csv = await readFile(result?.csvPath ?? '', 'utf-8')
		const [header, first] = csv.replace(/^\ufeff/, '').split('\n')
		expect(header).toBe(SHEET_HEADERS.join(','))
		expect(first?.startsWith('a,SC1,2024-05-01T20:00:00+0800,"hi, there",FALSE,')).toBe(true)
	})

	it('pads short rows when exporting to CSV', async () => {
		const gateway = new MemorySheetsGateway()
		gateway.seed('ragged', [['a', 'b', 'c'], ['1']])
		const { exporter } = setup(gateway)

		const csvPath = await exporter.exportToCsv('ragged')

		expect(csvPath).toBe(path.join(dir, 'data', 'ragged.csv'))
		expect(await readFile(csvPath ?? '', 'utf-8')).toBe('\ufeffa,b,c\n1,,\n')
	})

	it('skips CSV export for an empty sheet', async () => {
		const gateway = new MemorySheetsGateway()
		gateway.seed('empty')
		const { exporter } = setup(gateway)
		expect(await exporter.exportToCsv('empty')).toBeNull()
	})

	it('reports the failing step', async () => {
		const gateway = new MemorySheetsGateway()
		gateway.failOn('appendValues')
		const { exporter } = setup(gateway)

		const error = await exporter.exportPosts([makePost()]).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(SheetsExportError)
		expect(error).toMatchObject({ step: 'append' })
	})
})
