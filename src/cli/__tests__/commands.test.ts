import { existsSync, readFileSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
	MemorySheetsGateway,
	ScriptedPrompter,
	createFakeFetch,
	fakeThreadsApi,
	jsonResponse,
	makeServiceAccount,
	makeTempDir,
	makeThreadsPost,
} from '../../../tests/helpers/index.js'
import { clearConfigCache } from '../../config/loader.js'
import type { StoredCredentials } from '../../credentials/schema.js'
import { CryptoManager } from '../../crypto/crypto-manager.js'
import { generateEncryptionKey } from '../../crypto/key-generator.js'
import { ThreadsClient } from '../../threads/client.js'
import {
	type LogEntry,
	clearSinks,
	configureErrorLog,
	getErrorLogPath,
	registerSink,
} from '../../utils/logger.js'
import { executeDoctor, runDoctorChecks } from '../commands/doctor.js'
import { executeGenerateKey } from '../commands/generate-key.js'
import { executeInit } from '../commands/init.js'
import { executeRun, parseRunOptions } from '../commands/run.js'
import { executeSetupCredentials } from '../commands/setup-credentials.js'
import { executeVerifyCredentials } from '../commands/verify-credentials.js'
import type { GlobalOptions } from '../types.js'

const credentials: StoredCredentials = {
	threads_token: 'test-token',
	spreadsheet_id: 'sheet-1',
	google_credentials: makeServiceAccount(),
}

describe('CLI commands', () => {
	let dir: string
	let cleanup: () => Promise<void>
	let keyPath: string
	let credentialsPath: string
	let global: GlobalOptions
	let entries: LogEntry[]

	beforeEach(async () => {
		;({ dir, cleanup } = await makeTempDir())
		keyPath = path.join(dir, 'secure', 'keys', 'crypto.key')
		credentialsPath = path.join(dir, 'secure', 'credentials.enc')
		const configPath = path.join(dir, 'threads-export.config.json')
		await writeFile(
			configPath,
			JSON.stringify({
				timezone: 'UTC',
				storage: { dataDir: path.join(dir, 'data') },
				credentials: { keyPath, credentialsPath },
			}),
		)
		global = { verbose: false, quiet: false, config: configPath }

		clearConfigCache()
		entries = []
		registerSink((entry) => entries.push(entry))
		vi.spyOn(console, 'info').mockImplementation(() => {})
		vi.spyOn(console, 'error').mockImplementation(() => {})
		vi.spyOn(console, 'warn').mockImplementation(() => {})
	})

	afterEach(async () => {
		vi.restoreAllMocks()
		clearSinks()
		await cleanup()
	})

	const event = (name: string) => entries.find((entry) => entry.msg === name)

	async function storeCredentials(): Promise<void> {
		await generateEncryptionKey(keyPath)
		await new CryptoManager(keyPath, credentialsPath).encryptCredentials(credentials)
	}

	describe('generate-key', () => {
		it('creates the key once', async () => {
			expect(await executeGenerateKey({}, global)).toBe(0)
			expect(existsSync(keyPath)).toBe(true)
			expect(event('generate-key-summary')?.context).toMatchObject({ keyPath, replaced: false })

			expect(await executeGenerateKey({}, global)).toBe(1)
			expect(console.error).toHaveBeenCalledWith(
				`❌ Encryption key already exists: ${keyPath} (use --force to replace it)`,
			)
		})

		it('replaces the key with force', async () => {
			await executeGenerateKey({}, global)
			expect(await executeGenerateKey({ force: true }, global)).toBe(0)
		})

		it('reports a broken config file', async () => {
			const broken = path.join(dir, 'broken.json')
			await writeFile(broken, '{')
			expect(await executeGenerateKey({}, { ...global, config: broken })).toBe(1)
			expect(event('generate-key-error')?.context).toMatchObject({ exitCode: 1 })
		})
	})

	describe('setup-credentials', () => {
		it('needs the key first', async () => {
			expect(await executeSetupCredentials({}, global, new ScriptedPrompter([]))).toBe(1)
			expect(console.error).toHaveBeenCalledWith('Run: threads-export generate-key')
		})

		it('encrypts credentials given as options', async () => {
			await generateEncryptionKey(keyPath)
			const accountPath = path.join(dir, 'account.json')
			await writeFile(accountPath, JSON.stringify(makeServiceAccount()))

			const code = await executeSetupCredentials(
				{
					threadsToken: 'test-token',
					spreadsheetId: 'sheet-1',
					googleCredentials: accountPath,
					yes: true,
				},
				global,
				new ScriptedPrompter([]),
			)

			expect(code).toBe(0)
			expect(await new CryptoManager(keyPath, credentialsPath).loadCredentials()).toEqual(credentials)
			expect(console.info).toHaveBeenCalledWith(`Location: ${credentialsPath}`)
		})

		it('exits 1 when the confirmation is declined', async () => {
			await generateEncryptionKey(keyPath)
			const accountPath = path.join(dir, 'account.json')
			await writeFile(accountPath, JSON.stringify(makeServiceAccount()))

			const code = await executeSetupCredentials(
				{ threadsToken: 'test-token', spreadsheetId: 'sheet-1', googleCredentials: accountPath },
				global,
				new ScriptedPrompter(['n']),
			)

			expect(code).toBe(1)
			expect(console.error).toHaveBeenCalledWith('❌ Setup cancelled')
			expect(existsSync(credentialsPath)).toBe(false)
		})
	})

	describe('verify-credentials', () => {
		it('exits 0 when everything checks out', async () => {
			await storeCredentials()
			const { fetch } = createFakeFetch(() => jsonResponse({ id: 'user-1' }))

			const code = await executeVerifyCredentials(global, {
				fetch,
				createGateway: () => new MemorySheetsGateway(),
			})

			expect(code).toBe(0)
			expect(console.info).toHaveBeenCalledWith('threads_token: ✓ Valid')
			expect(console.info).toHaveBeenCalledWith('spreadsheet_id: ✓ Valid')
			expect(event('verify-credentials-summary')?.context).toMatchObject({
				metrics: { threads_token: true, spreadsheet_id: true, google_credentials: true },
				exitCode: 0,
			})
		})

		it('exits 1 when a check fails', async () => {
			await storeCredentials()
			const { fetch } = createFakeFetch(() => jsonResponse({ error: {} }, 401))

			const code = await executeVerifyCredentials(global, {
				fetch,
				createGateway: () => new MemorySheetsGateway(),
			})

			expect(code).toBe(1)
			expect(console.info).toHaveBeenCalledWith('threads_token: ✗ Invalid')
			expect(console.error).toHaveBeenCalledWith('Run: threads-export setup-credentials')
		})

		it('exits 1 without a key', async () => {
			expect(await executeVerifyCredentials(global)).toBe(1)
			expect(console.error).toHaveBeenCalledWith(`❌ Encryption key file not found: ${keyPath}`)
		})
	})

	describe('run', () => {
		it('parses command-line strings', () => {
			expect(parseRunOptions({ mode: 'full' })).toBe(
				'Invalid mode: full (expected test, force or normal)',
			)
			expect(parseRunOptions({ mode: 'test', limit: 'abc' })).toBe(
				'--limit must be a positive integer, got abc',
			)
			expect(parseRunOptions({ mode: 'test', limit: '5', threadsOnly: true })).toEqual({
				mode: 'test',
				limit: 5,
				threadsOnly: true,
				sheetsOnly: false,
				jsonFile: undefined,
			})
		})

		function pipelineOverrides() {
			const { fetch } = createFakeFetch(
				fakeThreadsApi({
					pages: [
						[
							makeThreadsPost('p1', '2024-05-02T12:00:00+0000'),
							makeThreadsPost('p2', '2024-05-01T12:00:00+0000'),
						],
					],
				}),
			)
			return {
				loadCredentials: async () => credentials,
				createThreadsClient: (token: string) =>
					new ThreadsClient({ token, requestDelayMs: 0, fetch, sleep: async () => {} }),
				createGateway: () => new MemorySheetsGateway(),
				cwd: dir,
			}
		}

		it('exports and logs a summary', async () => {
			const code = await executeRun({ mode: 'normal' }, global, pipelineOverrides())

			expect(code).toBe(0)
			expect(console.info).toHaveBeenCalledWith('\n✓ Successfully collected 2 posts')
			expect(event('run-start')?.context).toMatchObject({ options: { mode: 'normal' } })
			expect(event('run-summary')?.context).toMatchObject({
				metrics: {
					posts: 2,
					fetched: 2,
					skipped: 0,
					truncated: false,
					appended: 2,
					csvRows: null,
				},
				exitCode: 0,
			})
		})

		it('exits 1 for bad input', async () => {
			expect(await executeRun({ mode: 'full' }, global, pipelineOverrides())).toBe(1)
			expect(
				await executeRun({ mode: 'normal', sheetsOnly: true }, global, pipelineOverrides()),
			).toBe(1)
			expect(console.error).toHaveBeenCalledWith(
				'❌ --json-file must be specified when using --sheets-only',
			)
		})

		it('exits 2 for runtime failures', async () => {
			const code = await executeRun({ mode: 'normal' }, global, {
				...pipelineOverrides(),
				loadCredentials: async () => {
					throw new Error('Credentials file not found')
				},
			})

			expect(code).toBe(2)
			expect(console.error).toHaveBeenCalledWith('❌ Failed to export posts:', 'Credentials file not found')
			expect(event('run-error')?.context).toMatchObject({
				error: { type: 'Error', message: 'Credentials file not found' },
				exitCode: 2,
			})
		})

		it('has the error event on disk when it returns its exit code', async () => {
			const logsDir = path.join(dir, 'logs')
			configureErrorLog({ enabled: true, dir: logsDir })
			try {
				const code = await executeRun({ mode: 'normal' }, global, {
					...pipelineOverrides(),
					loadCredentials: async () => {
						throw new Error('Credentials file not found')
					},
				})

				expect(code).toBe(2)
				expect(console.error).toHaveBeenCalledWith(`Details: ${getErrorLogPath() ?? ''}`)
				const lines = readFileSync(getErrorLogPath() ?? '', 'utf-8').trim().split('\n')
				expect(lines).toHaveLength(1)
				expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
					level: 'error',
					msg: 'run-error',
					context: { exitCode: 2 },
				})
			} finally {
				configureErrorLog({ enabled: false })
			}
		})
	})

	describe('init', () => {
		it('rejects an unknown format', async () => {
			expect(await executeInit({ format: 'toml', force: false }, global)).toBe(1)
			expect(console.error).toHaveBeenCalledWith('❌ Invalid format: toml')
		})

		it('writes a config file and refuses to overwrite it', async () => {
			const output = path.join(dir, 'generated.yaml')

			expect(await executeInit({ format: 'yaml', force: false, output }, global)).toBe(0)
			expect(existsSync(output)).toBe(true)

			expect(await executeInit({ format: 'yaml', force: false, output }, global)).toBe(1)
			expect(console.error).toHaveBeenCalledWith(`❌ Config file already exists: ${output}`)

			expect(await executeInit({ format: 'yaml', force: true, output }, global)).toBe(0)
		})
	})

	describe('doctor', () => {
		it('flags the missing key and credentials', async () => {
			const checks = await runDoctorChecks(dir, global.config)
			const byName = new Map(checks.map((check) => [check.name, check]))

			expect(byName.get('Config file')?.message).toBe('Found: threads-export.config.json')
			expect(byName.get('Config valid')?.pass).toBe(true)
			expect(byName.get('Encryption key')).toMatchObject({
				pass: false,
				message: `Not found: ${keyPath}`,
			})
			expect(byName.get('Credentials')?.pass).toBe(false)
			expect(byName.get('CSV backup')).toMatchObject({
				pass: true,
				message: 'None yet (first normal run fetches everything)',
			})

			expect(await executeDoctor(global, dir)).toBe(1)
			expect(console.info).toHaveBeenCalledWith('   • Run: threads-export generate-key')
		})

		it('passes once the key and credentials are in place', async () => {
			await storeCredentials()

			const checks = await runDoctorChecks(dir, global.config)

			expect(checks.find((check) => check.name === 'Credentials')).toMatchObject({
				pass: true,
				message: 'Decrypted successfully',
			})
			expect(checks.find((check) => check.name === 'Data directory')?.pass).toBe(true)
		})
	})
})
