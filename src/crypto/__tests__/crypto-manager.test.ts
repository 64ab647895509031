import { existsSync, statSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { makeServiceAccount, makeTempDir } from '../../../tests/helpers/index.js'
import type { StoredCredentials } from '../../credentials/schema.js'
import { CryptoManager } from '../crypto-manager.js'
import { CryptoError } from '../errors.js'
import { encrypt, generateKey } from '../fernet.js'
import { generateEncryptionKey } from '../key-generator.js'

const isWindows = process.platform === 'win32'

function credentials(): StoredCredentials {
	return {
		threads_token: 'test-threads-token',
		spreadsheet_id: 'test-spreadsheet-id',
		google_credentials: makeServiceAccount(),
	}
}

describe('CryptoManager', () => {
	let dir: string
	let cleanup: () => Promise<void>
	let keyPath: string
	let credentialsPath: string

	beforeEach(async () => {
		;({ dir, cleanup } = await makeTempDir())
		keyPath = path.join(dir, 'secure', 'keys', 'crypto.key')
		credentialsPath = path.join(dir, 'secure', 'credentials.enc')
	})

	afterEach(async () => {
		await cleanup()
	})

	it('requires an existing key file', () => {
		expect(() => new CryptoManager(keyPath, credentialsPath)).toThrow(CryptoError)
		expect(() => new CryptoManager(keyPath, credentialsPath)).toThrow(
			`Encryption key file not found: ${keyPath}`,
		)
	})

	it('rejects a key file without a valid key', async () => {
		await generateEncryptionKey(keyPath)
		await writeFile(keyPath, 'not-a-key')
		expect(() => new CryptoManager(keyPath, credentialsPath)).toThrow(
			`Encryption key file is not a valid key: ${keyPath}`,
		)
	})

	it('stores credentials encrypted and loads them back', async () => {
		await generateEncryptionKey(keyPath)
		const manager = new CryptoManager(keyPath, credentialsPath)

		await manager.encryptCredentials(credentials())

		const onDisk = await readFile(credentialsPath, 'utf-8')
		expect(onDisk.startsWith('gAAAAA')).toBe(true)
		expect(onDisk).not.toContain('test-threads-token')
		expect(await manager.loadCredentials()).toEqual(credentials())
	})

	it.skipIf(isWindows)('restricts file and directory permissions', async () => {
		await generateEncryptionKey(keyPath)
		const manager = new CryptoManager(keyPath, credentialsPath)
		await manager.encryptCredentials(credentials())

		expect(statSync(credentialsPath).mode & 0o777).toBe(0o600)
		expect(statSync(path.dirname(credentialsPath)).mode & 0o777).toBe(0o700)
	})

	it('returns a single credential by name', async () => {
		await generateEncryptionKey(keyPath)
		const manager = new CryptoManager(keyPath, credentialsPath)
		await manager.encryptCredentials(credentials())

		expect(await manager.getSingleCredential('spreadsheet_id')).toBe('test-spreadsheet-id')
		const account = await manager.getSingleCredential('google_credentials')
		expect(account.client_email).toBe('exporter@test-project.iam.gserviceaccount.com')
	})

	it('reports a missing credentials file', async () => {
		await generateEncryptionKey(keyPath)
		const manager = new CryptoManager(keyPath, credentialsPath)
		await expect(manager.loadCredentials()).rejects.toThrow('Credentials file not found')
	})

	it('reports credentials encrypted with another key', async () => {
		await generateEncryptionKey(keyPath)
		const other = new CryptoManager(keyPath, credentialsPath)
		await other.encryptCredentials(credentials())

		await generateEncryptionKey(keyPath, { force: true })
		const manager = new CryptoManager(keyPath, credentialsPath)
		await expect(manager.loadCredentials()).rejects.toThrow(
			'Invalid encryption key or corrupted data',
		)
	})

	it('reports decrypted content that is not a credentials object', async () => {
		await generateEncryptionKey(keyPath)
		const key = (await readFile(keyPath, 'utf-8')).trim()
		const manager = new CryptoManager(keyPath, credentialsPath)
		await manager.encryptCredentials(credentials())
		await writeFile(credentialsPath, encrypt(JSON.stringify({ threads_token: '' }), key))

		await expect(manager.loadCredentials()).rejects.toThrow(
			/^Decrypted credentials are malformed: threads_token: Threads API token cannot be empty/,
		)
	})

	it('resolves config paths against the working directory', async () => {
		await generateEncryptionKey(keyPath)
		const manager = CryptoManager.fromConfig(
			{
				credentials: {
					keyPath: 'secure/keys/crypto.key',
					credentialsPath: 'secure/credentials.enc',
				},
			},
			dir,
		)
		expect(manager.credentialsPath).toBe(credentialsPath)
		expect(existsSync(keyPath)).toBe(true)
	})

	it('ignores a trailing newline in the key file', async () => {
		await generateEncryptionKey(keyPath)
		await writeFile(keyPath, `${generateKey()}\n`)
		expect(() => new CryptoManager(keyPath, credentialsPath)).not.toThrow()
	})
})
