import { describe, expect, it } from 'vitest'

import {
	MemorySheetsGateway,
	createFakeFetch,
	jsonResponse,
	makeServiceAccount,
} from '../../../tests/helpers/index.js'
import type { ServiceAccount, StoredCredentials } from '../schema.js'
import { verifyCredentials, verifyGoogleCredentials, verifyThreadsToken } from '../verify.js'

const credentials: StoredCredentials = {
	threads_token: 'test-token',
	spreadsheet_id: 'sheet-1',
	google_credentials: makeServiceAccount(),
}

function loadedManager(value: StoredCredentials = credentials) {
	return { loadCredentials: async () => value }
}

describe('verifyThreadsToken', () => {
	it('is valid on 200 and sends the token', async () => {
		const { fetch, calls } = createFakeFetch(() => jsonResponse({ id: 'user-1' }))

		expect(await verifyThreadsToken('test-token', { fetch })).toBe(true)
		expect(calls[0]?.url.toString()).toBe('https://graph.threads.net/v1.0/me')
		expect(new Headers(calls[0]?.init?.headers).get('Authorization')).toBe('Bearer test-token')
	})

	it('is invalid on any other status', async () => {
		const { fetch } = createFakeFetch(() => jsonResponse({}, 201))
		expect(await verifyThreadsToken('test-token', { fetch })).toBe(false)

		const { fetch: rejected } = createFakeFetch(() => jsonResponse({ error: {} }, 401))
		expect(await verifyThreadsToken('test-token', { fetch: rejected })).toBe(false)
	})

	it('is invalid when the request fails', async () => {
		const { fetch } = createFakeFetch(() => {
			throw new Error('offline')
		})
		expect(await verifyThreadsToken('test-token', { fetch })).toBe(false)
	})

	it('uses the configured base URL', async () => {
		const { fetch, calls } = createFakeFetch(() => jsonResponse({ id: 'user-1' }))
		await verifyThreadsToken('test-token', { fetch, baseUrl: 'https://example.test/v9/' })
		expect(calls[0]?.url.toString()).toBe('https://example.test/v9/me')
	})
})

describe('verifyGoogleCredentials', () => {
	it('passes the account and spreadsheet id to the gateway', async () => {
		const seen: Array<[ServiceAccount, string]> = []
		const valid = await verifyGoogleCredentials(makeServiceAccount(), 'sheet-1', (account, id) => {
			seen.push([account, id])
			return new MemorySheetsGateway()
		})

		expect(valid).toBe(true)
		expect(seen).toEqual([[makeServiceAccount(), 'sheet-1']])
	})

	it('is invalid when the spreadsheet cannot be read', async () => {
		const gateway = new MemorySheetsGateway()
		gateway.failOn('getSpreadsheet', new Error('The caller does not have permission'))
		expect(await verifyGoogleCredentials(makeServiceAccount(), 'sheet-1', () => gateway)).toBe(false)
	})
})

describe('verifyCredentials', () => {
	it('reports every credential', async () => {
		const { fetch } = createFakeFetch(() => jsonResponse({ id: 'user-1' }))
		const results = await verifyCredentials(loadedManager(), {
			fetch,
			createGateway: () => new MemorySheetsGateway(),
		})
		expect(results).toEqual({
			threads_token: true,
			spreadsheet_id: true,
			google_credentials: true,
		})
	})

	it('ties the spreadsheet id to the Google check', async () => {
		const { fetch } = createFakeFetch(() => jsonResponse({ id: 'user-1' }))
		const gateway = new MemorySheetsGateway()
		gateway.failOn('getSpreadsheet')

		const results = await verifyCredentials(loadedManager(), { fetch, createGateway: () => gateway })

		expect(results).toEqual({
			threads_token: true,
			spreadsheet_id: false,
			google_credentials: false,
		})
	})

	it('reports all invalid when credentials cannot be loaded', async () => {
		let gatewayCreated = false
		const results = await verifyCredentials(
			{
				loadCredentials: async () => {
					throw new Error('Credentials file not found')
				},
			},
			{
				createGateway: () => {
					gatewayCreated = true
					return new MemorySheetsGateway()
				},
			},
		)

		expect(results).toEqual({
			threads_token: false,
			spreadsheet_id: false,
			google_credentials: false,
		})
		expect(gatewayCreated).toBe(false)
	})
})
