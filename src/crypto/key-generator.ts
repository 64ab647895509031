/**
 * One-time creation of the encryption key file
 */

import { existsSync } from 'node:fs'
import { chmod, mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { createLogger } from '../utils/logger.js'
import { CryptoError } from './errors.js'
import { generateKey } from './fernet.js'

const logger = createLogger('crypto:key-generator')

export type GenerateKeyResult = {
	keyPath: string
	replaced: boolean
}

/**
 * Write a fresh key to keyPath (file 0600, directory 0700).
 *
 * An existing key is only replaced with `force`: credentials encrypted with
 * the old key can no longer be read afterwards.
 */
export async function generateEncryptionKey(
	keyPath: string,
	options: { force?: boolean } = {},
): Promise<GenerateKeyResult> {
	const resolved = path.resolve(keyPath)
	const exists = existsSync(resolved)
	if (exists && !options.force) {
		throw new CryptoError(
			`Encryption key already exists: ${resolved} (use --force to replace it)`,
		)
	}

	const dir = path.dirname(resolved)
	await mkdir(dir, { recursive: true })
	await writeFile(resolved, generateKey(), { encoding: 'utf-8', mode: 0o600 })
	if (process.platform !== 'win32') {
		await chmod(resolved, 0o600)
		await chmod(dir, 0o700)
	}

	logger.info('Encryption key generated', { keyPath: resolved, replaced: exists })
	return { keyPath: resolved, replaced: exists }
}
