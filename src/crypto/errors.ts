/**
 * Errors raised while handling the encryption key and credential file
 */
export class CryptoError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'CryptoError'
	}
}

/**
 * The token failed authentication, is malformed, expired, or the key is invalid
 */
export class InvalidTokenError extends Error {
	constructor(message = 'Invalid token') {
		super(message)
		this.name = 'InvalidTokenError'
	}
}
