/**
 * Configuration Loader for threads-export
 *
 * Loads config from YAML/JSON files with env var substitution and precedence
 */

import { constants } from 'node:fs'
import { access, readFile } from 'node:fs/promises'
import path from 'node:path'

import yaml from 'js-yaml'
import { ZodError } from 'zod'

import {
	CONFIG_FILE_NAMES,
	type Config,
	type ConfigInput,
	detectConfigFormat,
	validateConfig,
} from './schema.js'

export class ConfigError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ConfigError'
	}
}

let configCache: Config | null = null
let configCacheKey: string | null = null

/**
 * Find the first readable config file in a directory
 *
 * @returns Path to the config file, or null if none exists
 */
export async function discoverConfigFile(
	baseDir: string = process.cwd(),
): Promise<string | null> {
	for (const fileName of CONFIG_FILE_NAMES) {
		const filePath = path.join(baseDir, fileName)
		try {
			await access(filePath, constants.R_OK)
			return filePath
		} catch {
			// not there or not readable, try the next name
		}
	}

	return null
}

/**
 * Read and parse a config file (unvalidated)
 */
export async function loadConfigFile(filePath: string): Promise<unknown> {
	const content = await readFile(filePath, 'utf-8')
	const format = detectConfigFormat(filePath)

	try {
		if (format === 'json') {
			return JSON.parse(content)
		}
		// js-yaml v4 is safe by default; JSON_SCHEMA keeps scalars plain
		return yaml.load(content, { schema: yaml.JSON_SCHEMA }) ?? {}
	} catch (error) {
		throw new ConfigError(
			`Failed to parse ${format.toUpperCase()} config file ${filePath}: ${
				error instanceof Error ? error.message : String(error)
			}`,
		)
	}
}

/**
 * Replace ${VAR_NAME} patterns in string values with environment variables
 *
 * @example
 * ```typescript
 * // With process.env.SHEET = 'metrics'
 * substituteEnvVars({ sheetName: '${SHEET}' })
 * // => { sheetName: 'metrics' }
 * ```
 */
export function substituteEnvVars(obj: unknown): unknown {
	if (typeof obj === 'string') {
		return obj.replace(/\$\{(\w+)\}/g, (_match, envVar: string) => {
			const value = process.env[envVar]
			if (value === undefined) {
				throw new ConfigError(
					`Environment variable ${envVar} is not set but referenced in config`,
				)
			}
			return value
		})
	}

	if (Array.isArray(obj)) {
		return obj.map(substituteEnvVars)
	}

	if (typeof obj === 'object' && obj !== null) {
		return Object.fromEntries(
			Object.entries(obj).map(([key, value]) => [
				key,
				substituteEnvVars(value),
			]),
		)
	}

	return obj
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Deep merge of plain objects; later sources win, undefined never overrides
 */
export function mergeConfig(
	...sources: Array<Record<string, unknown> | ConfigInput>
): Record<string, unknown> {
	const merged: Record<string, unknown> = {}
	for (const source of sources) {
		for (const [key, value] of Object.entries(source)) {
			if (value === undefined) continue
			const existing = merged[key]
			merged[key] =
				isRecord(existing) && isRecord(value)
					? mergeConfig(existing, value)
					: value
		}
	}
	return merged
}

/**
 * Overrides taken from the process environment
 */
export function envOverrides(
	env: NodeJS.ProcessEnv = process.env,
): ConfigInput {
	return {
		timezone: env.THREADS_TIMEZONE,
		storage: { dataDir: env.THREADS_DATA_DIR },
		credentials: {
			keyPath: env.CRYPTO_KEY_PATH,
			credentialsPath: env.CREDENTIALS_PATH,
		},
	}
}

/**
 * Load configuration.
 *
 * Precedence (highest to lowest):
 * 1. CLI options
 * 2. Environment (CRYPTO_KEY_PATH, CREDENTIALS_PATH, THREADS_DATA_DIR, THREADS_TIMEZONE)
 * 3. Config file
 * 4. Schema defaults
 *
 * @example
 * ```typescript
 * const config = await loadConfig({ configPath: './threads-export.config.yaml' })
 * ```
 */
export async function loadConfig(
	options: {
		configPath?: string
		cliOptions?: ConfigInput
		skipCache?: boolean
	} = {},
): Promise<Config> {
	const { configPath, cliOptions = {}, skipCache = false } = options
	const cacheKey = `${configPath ?? ''}|${JSON.stringify(cliOptions)}`

	if (!skipCache && configCache && configCacheKey === cacheKey) {
		return configCache
	}

	const filePath = configPath || (await discoverConfigFile())

	let fileConfig: Record<string, unknown> = {}
	if (filePath) {
		try {
			const raw = substituteEnvVars(await loadConfigFile(filePath))
			if (!isRecord(raw)) {
				throw new ConfigError('Config root must be an object')
			}
			fileConfig = raw
		} catch (error) {
			throw new ConfigError(
				`Failed to load config from ${filePath}: ${
					error instanceof Error ? error.message : String(error)
				}`,
			)
		}
	}

	const merged = mergeConfig(fileConfig, envOverrides(), cliOptions)

	try {
		const validated = validateConfig(merged)
		configCache = validated
		configCacheKey = cacheKey
		return validated
	} catch (error) {
		if (error instanceof ZodError) {
			const details = error.errors
				.map((err) => `${err.path.join('.')}: ${err.message}`)
				.join('; ')
			throw new ConfigError(`Config validation failed: ${details}`)
		}
		throw error
	}
}

export function clearConfigCache(): void {
	configCache = null
	configCacheKey = null
}

export function isConfigCached(): boolean {
	return configCache !== null
}
