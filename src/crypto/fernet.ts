/**
 * Fernet-compatible authenticated encryption
 *
 * Token layout (URL-safe base64):
 *   0x80 | timestamp (u64 BE, seconds) | IV (16) | AES-128-CBC ciphertext | HMAC-SHA256 (32)
 *
 * The 32-byte key splits into a signing half (first 16 bytes) and an
 * encryption half (last 16 bytes). Keys and tokens written by other Fernet
 * implementations decrypt here, and the reverse.
 */

import {
	createCipheriv,
	createDecipheriv,
	createHmac,
	randomBytes,
	timingSafeEqual,
} from 'node:crypto'

import { InvalidTokenError } from './errors.js'

const VERSION = 0x80
const HEADER_LENGTH = 1 + 8
const IV_LENGTH = 16
const HMAC_LENGTH = 32
const BLOCK_SIZE = 16
const MAX_CLOCK_SKEW_SECONDS = 60
const URLSAFE_BASE64 = /^[A-Za-z0-9_-]+={0,2}$/

type SplitKey = { signingKey: Buffer; encryptionKey: Buffer }

function toUrlSafeBase64(buf: Buffer): string {
	return buf.toString('base64').replace(/\+/g, '-').replace(/\//g, '_')
}

function fromUrlSafeBase64(value: string): Buffer | null {
	const trimmed = value.trim()
	if (!URLSAFE_BASE64.test(trimmed)) return null
	return Buffer.from(trimmed, 'base64url')
}

function splitKey(key: string): SplitKey {
	const raw = fromUrlSafeBase64(key)
	if (!raw || raw.length !== 32) {
		throw new InvalidTokenError(
			'Fernet key must be 32 url-safe base64-encoded bytes',
		)
	}
	return {
		signingKey: raw.subarray(0, 16),
		encryptionKey: raw.subarray(16),
	}
}

function nowSeconds(): number {
	return Math.floor(Date.now() / 1000)
}

/** Generate a new random key */
export function generateKey(): string {
	return toUrlSafeBase64(randomBytes(32))
}

export function isValidKey(key: string): boolean {
	try {
		splitKey(key)
		return true
	} catch {
		return false
	}
}

export type EncryptOptions = {
	/** Token timestamp in seconds; defaults to now */
	now?: number
	/** Fixed IV, for reproducible tokens */
	iv?: Buffer
}

export function encrypt(
	plaintext: string | Buffer,
	key: string,
	options: EncryptOptions = {},
): string {
	const { signingKey, encryptionKey } = splitKey(key)
	const iv = options.iv ?? randomBytes(IV_LENGTH)
	if (iv.length !== IV_LENGTH) {
		throw new InvalidTokenError('IV must be 16 bytes')
	}

	const data =
		typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf-8') : plaintext
	const cipher = createCipheriv('aes-128-cbc', encryptionKey, iv)
	const ciphertext = Buffer.concat([cipher.update(data), cipher.final()])

	const header = Buffer.alloc(HEADER_LENGTH)
	header.writeUInt8(VERSION, 0)
	header.writeBigUInt64BE(BigInt(options.now ?? nowSeconds()), 1)

	const body = Buffer.concat([header, iv, ciphertext])
	const hmac = createHmac('sha256', signingKey).update(body).digest()
	return toUrlSafeBase64(Buffer.concat([body, hmac]))
}

export type DecryptOptions = {
	/** Reject tokens older than this many seconds */
	ttlSeconds?: number
	/** Current time in seconds; defaults to now */
	now?: number
}

/** Timestamp (seconds) embedded in a token, without verifying it */
export function extractTimestamp(token: string): number {
	const data = fromUrlSafeBase64(token)
	if (!data || data.length < HEADER_LENGTH || data[0] !== VERSION) {
		throw new InvalidTokenError()
	}
	return Number(data.readBigUInt64BE(1))
}

export function decrypt(
	token: string | Buffer,
	key: string,
	options: DecryptOptions = {},
): Buffer {
	const { signingKey, encryptionKey } = splitKey(key)
	const data = fromUrlSafeBase64(
		typeof token === 'string' ? token : token.toString('ascii'),
	)
	const minLength = HEADER_LENGTH + IV_LENGTH + BLOCK_SIZE + HMAC_LENGTH
	if (!data || data.length < minLength || data[0] !== VERSION) {
		throw new InvalidTokenError()
	}
	if ((data.length - HEADER_LENGTH - IV_LENGTH - HMAC_LENGTH) % BLOCK_SIZE !== 0) {
		throw new InvalidTokenError()
	}

	const timestamp = Number(data.readBigUInt64BE(1))
	const current = options.now ?? nowSeconds()
	if (options.ttlSeconds !== undefined && timestamp + options.ttlSeconds < current) {
		throw new InvalidTokenError('Token has expired')
	}
	if (current + MAX_CLOCK_SKEW_SECONDS < timestamp) {
		throw new InvalidTokenError('Token timestamp is in the future')
	}

	const body = data.subarray(0, data.length - HMAC_LENGTH)
	const signature = data.subarray(data.length - HMAC_LENGTH)
	const expected = createHmac('sha256', signingKey).update(body).digest()
	if (!timingSafeEqual(signature, expected)) {
		throw new InvalidTokenError()
	}

	const iv = body.subarray(HEADER_LENGTH, HEADER_LENGTH + IV_LENGTH)
	const ciphertext = body.subarray(HEADER_LENGTH + IV_LENGTH)
	try {
		const decipher = createDecipheriv('aes-128-cbc', encryptionKey, iv)
		return Buffer.concat([decipher.update(ciphertext), decipher.final()])
	} catch {
		throw new InvalidTokenError()
	}
}
