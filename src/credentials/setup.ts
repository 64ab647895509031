/**
 * Credential bootstrap: collect the Threads token, spreadsheet id and Google
 * service account file, then encrypt them with the stored key.
 *
 * Values given up front are used as-is; anything missing is asked for
 * through a {@link Prompter}.
 */

import { existsSync, statSync } from 'node:fs'
import { readFile, readdir } from 'node:fs/promises'
import path from 'node:path'

import type { CryptoManager } from '../crypto/crypto-manager.js'
import { createLogger } from '../utils/logger.js'
import {
	type ServiceAccount,
	ServiceAccountSchema,
	type StoredCredentials,
	StoredCredentialsSchema,
	missingServiceAccountFields,
} from './schema.js'

const logger = createLogger('credentials:setup')

export class CredentialSetupError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'CredentialSetupError'
	}
}

export interface Prompter {
	ask(question: string): Promise<string>
	print(line: string): void
}

/** Trim and drop surrounding quotes (pasted paths often carry them) */
export function cleanInput(value: string): string {
	return value.trim().replace(/^["']+|["']+$/g, '')
}

/**
 * `*.json` files directly inside a directory, sorted by name
 */
export async function listJsonFiles(directory: string): Promise<string[]> {
	const entries = await readdir(directory, { withFileTypes: true })
	return entries
		.filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.json'))
		.map((entry) => path.join(directory, entry.name))
		.sort()
}

export function isDirectory(target: string): boolean {
	return existsSync(target) && statSync(target).isDirectory()
}

/**
 * Read and validate a Google service account key file
 *
 * @throws CredentialSetupError naming what is wrong with the file
 */
export async function readServiceAccountFile(filePath: string): Promise<ServiceAccount> {
	if (!existsSync(filePath) || !statSync(filePath).isFile()) {
		throw new CredentialSetupError(`File not found: ${filePath}`)
	}
	if (path.extname(filePath).toLowerCase() !== '.json') {
		throw new CredentialSetupError(`Not a JSON file: ${filePath}`)
	}

	let content: string
	try {
		content = await readFile(filePath, 'utf-8')
	} catch (error) {
		throw new CredentialSetupError(`Cannot read file: ${filePath}`, { cause: error })
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(content)
	} catch (error) {
		throw new CredentialSetupError(`Invalid JSON format: ${filePath}`, { cause: error })
	}

	const missing = missingServiceAccountFields(parsed)
	if (missing.length > 0) {
		throw new CredentialSetupError(
			`Invalid Google credentials format. Missing fields: ${missing.join(', ')}`,
		)
	}

	const result = ServiceAccountSchema.safeParse(parsed)
	if (!result.success) {
		const fields = result.error.errors.map((e) => e.path.join('.')).join(', ')
		throw new CredentialSetupError(
			`Invalid Google credentials format. Empty or invalid fields: ${fields}`,
		)
	}
	return result.data
}

/**
 * Validate the three credentials together
 */
export function buildCredentials(input: {
	threadsToken: string
	spreadsheetId: string
	googleCredentials: ServiceAccount
}): StoredCredentials {
	const result = StoredCredentialsSchema.safeParse({
		threads_token: input.threadsToken.trim(),
		spreadsheet_id: input.spreadsheetId.trim(),
		google_credentials: input.googleCredentials,
	})
	if (!result.success) {
		throw new CredentialSetupError(
			result.error.errors.map((e) => e.message).join('; '),
		)
	}
	return result.data
}

async function askRequired(prompter: Prompter, question: string, label: string): Promise<string> {
	const answer = (await prompter.ask(question)).trim()
	if (!answer) throw new CredentialSetupError(`${label} cannot be empty`)
	return answer
}

async function chooseFromDirectory(
	directory: string,
	prompter: Prompter | undefined,
): Promise<string> {
	const files = await listJsonFiles(directory)
	if (files.length === 0) {
		throw new CredentialSetupError(`No JSON files found in '${directory}'`)
	}
	const [only] = files
	if (only !== undefined && files.length === 1) return only
	if (!prompter) {
		throw new CredentialSetupError(
			`Several JSON files in '${directory}'; pass the file path instead`,
		)
	}

	prompter.print('\nFound JSON files:')
	files.forEach((file, index) => prompter.print(`${index + 1}. ${path.basename(file)}`))

	for (;;) {
		const answer = (await prompter.ask('\nSelect file number: ')).trim()
		const choice = Number.parseInt(answer, 10)
		const selected = Number.isNaN(choice) ? undefined : files[choice - 1]
		if (choice >= 1 && selected !== undefined) return selected
		prompter.print(
			Number.isNaN(choice) ? 'Please enter a valid number' : 'Invalid selection, please try again',
		)
	}
}

/**
 * Resolve a path-or-directory to a service account file path
 */
export async function resolveServiceAccountPath(
	target: string,
	prompter?: Prompter,
): Promise<string> {
	const cleaned = path.resolve(cleanInput(target))
	return isDirectory(cleaned) ? chooseFromDirectory(cleaned, prompter) : cleaned
}

/**
 * Interactive file selection; repeats until a valid file is confirmed
 */
async function promptServiceAccount(prompter: Prompter): Promise<ServiceAccount> {
	for (;;) {
		prompter.print('\nSelect Google Credentials JSON file:')
		prompter.print('1. Enter full file path')
		prompter.print('2. Browse directory for JSON files')
		const choice = (await prompter.ask('\nSelect option (1/2): ')).trim()

		let target: string
		if (choice === '1') {
			target = cleanInput(await prompter.ask('\nEnter full JSON file path: '))
		} else if (choice === '2') {
			const directory = cleanInput(await prompter.ask('\nEnter directory path to search: '))
			if (!isDirectory(directory)) {
				prompter.print(`Error: '${directory}' is not a valid directory`)
				continue
			}
			target = directory
		} else {
			prompter.print('Invalid choice, enter 1 or 2')
			continue
		}

		try {
			const filePath = await resolveServiceAccountPath(target, prompter)
			const account = await readServiceAccountFile(filePath)
			prompter.print(`\nSelected: ${filePath}`)
			const confirm = (await prompter.ask('\nUse this file? (y/n): ')).trim().toLowerCase()
			if (confirm !== 'y') continue
			return account
		} catch (error) {
			if (!(error instanceof CredentialSetupError)) throw error
			logger.warn('Rejected Google credentials file', { reason: error.message })
			prompter.print(`Error: ${error.message}`)
		}
	}
}

export type SetupCredentialsOptions = {
	manager: Pick<CryptoManager, 'encryptCredentials'>
	prompter?: Prompter
	threadsToken?: string
	spreadsheetId?: string
	/** Service account file, or a directory to pick one from */
	googleCredentials?: string
	/** Skip the final confirmation */
	yes?: boolean
}

/**
 * Collect, validate, encrypt and store the credentials
 *
 * @throws CredentialSetupError when a value is missing or invalid, or the
 *   confirmation is declined
 */
export async function setupCredentials(
	options: SetupCredentialsOptions,
): Promise<StoredCredentials> {
	const { manager, prompter } = options
	logger.info('Starting credential setup')

	const need = (what: string): Prompter => {
		if (!prompter) throw new CredentialSetupError(`${what} is required`)
		return prompter
	}

	const threadsToken =
		options.threadsToken ??
		(await askRequired(need('Threads API Token'), 'Threads API Token: ', 'Threads API Token'))
	const spreadsheetId =
		options.spreadsheetId ??
		(await askRequired(
			need('Google Spreadsheet ID'),
			'Google Spreadsheet ID: ',
			'Google Spreadsheet ID',
		))
	logger.info('Basic credentials collected')

	const googleCredentials = options.googleCredentials
		? await readServiceAccountFile(
				await resolveServiceAccountPath(options.googleCredentials, prompter),
			)
		: await promptServiceAccount(need('Google credentials file'))
	logger.info('Google credentials loaded')

	const credentials = buildCredentials({ threadsToken, spreadsheetId, googleCredentials })

	if (!options.yes && prompter && options.googleCredentials) {
		const confirm = (await prompter.ask('\nEncrypt and store these credentials? (y/n): '))
			.trim()
			.toLowerCase()
		if (confirm !== 'y') throw new CredentialSetupError('Setup cancelled')
	}

	await manager.encryptCredentials(credentials)
	logger.info('Credentials encrypted and saved')
	return credentials
}
