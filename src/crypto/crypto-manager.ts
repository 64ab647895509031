/**
 * Encrypted credential storage
 *
 * The key file holds a Fernet key; the credentials file holds one Fernet
 * token whose plaintext is the JSON of {@link StoredCredentials}.
 */

import { existsSync, readFileSync } from 'node:fs'
import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { ZodError } from 'zod'

import type { Config } from '../config/schema.js'
import {
	type CredentialName,
	type StoredCredentials,
	StoredCredentialsSchema,
} from '../credentials/schema.js'
import { createLogger } from '../utils/logger.js'
import { CryptoError, InvalidTokenError } from './errors.js'
import { decrypt, encrypt, isValidKey } from './fernet.js'

const logger = createLogger('crypto:manager')

const isWindows = process.platform === 'win32'

export class CryptoManager {
	private readonly key: string
	readonly credentialsPath: string

	constructor(keyPath: string, credentialsPath: string) {
		if (!existsSync(keyPath)) {
			throw new CryptoError(`Encryption key file not found: ${keyPath}`)
		}
		const key = readFileSync(keyPath, 'utf-8').trim()
		if (!isValidKey(key)) {
			throw new CryptoError(`Encryption key file is not a valid key: ${keyPath}`)
		}
		this.key = key
		this.credentialsPath = credentialsPath
		logger.debug('CryptoManager initialized', { keyPath, credentialsPath })
	}

	/**
	 * Build from config; relative paths resolve against the working directory
	 */
	static fromConfig(
		config: Pick<Config, 'credentials'>,
		cwd: string = process.cwd(),
	): CryptoManager {
		const { keyPath, credentialsPath } = config.credentials
		return new CryptoManager(
			path.resolve(cwd, keyPath),
			path.resolve(cwd, credentialsPath),
		)
	}

	async encryptCredentials(credentials: StoredCredentials): Promise<void> {
		const token = encrypt(JSON.stringify(credentials), this.key)
		const dir = path.dirname(this.credentialsPath)

		try {
			await mkdir(dir, { recursive: true })
			if (!isWindows) await chmod(dir, 0o700)
			await writeFile(this.credentialsPath, token, { encoding: 'utf-8', mode: 0o600 })
			if (!isWindows) await chmod(this.credentialsPath, 0o600)
		} catch (error) {
			throw new CryptoError(
				`Encryption failed: ${error instanceof Error ? error.message : String(error)}`,
				{ cause: error },
			)
		}
		logger.info('Credentials encrypted and saved', {
			credentialsPath: this.credentialsPath,
		})
	}

	async loadCredentials(): Promise<StoredCredentials> {
		if (!existsSync(this.credentialsPath)) {
			throw new CryptoError('Credentials file not found')
		}

		const token = await readFile(this.credentialsPath, 'utf-8')
		let plaintext: string
		try {
			plaintext = decrypt(token.trim(), this.key).toString('utf-8')
		} catch (error) {
			if (error instanceof InvalidTokenError) {
				throw new CryptoError('Invalid encryption key or corrupted data', {
					cause: error,
				})
			}
			throw error
		}

		try {
			return StoredCredentialsSchema.parse(JSON.parse(plaintext))
		} catch (error) {
			const detail =
				error instanceof ZodError
					? error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
					: error instanceof Error
						? error.message
						: String(error)
			throw new CryptoError(`Decrypted credentials are malformed: ${detail}`, {
				cause: error,
			})
		}
	}

	async getSingleCredential<K extends CredentialName>(
		name: K,
	): Promise<StoredCredentials[K]> {
		const credentials = await this.loadCredentials()
		return credentials[name]
	}
}
