/**
 * Configuration Schema for threads-export
 *
 * Supports JSON and YAML config files, validated with Zod
 */

import { z } from 'zod'

/**
 * Threads Graph API client settings
 */
const ThreadsConfigSchema = z.object({
	baseUrl: z.string().url().default('https://graph.threads.net/v1.0'),
	pageSize: z.number().int().min(1).max(100).default(100),
	insightsBatchSize: z.number().int().min(1).max(50).default(10),
	requestDelayMs: z.number().min(0).default(500),
	maxRetries: z.number().int().min(0).max(10).default(3),
	insightsCacheTtlMs: z.number().min(0).default(3_600_000),
	requestTimeoutMs: z.number().int().min(1).default(10_000),
})

const SheetsConfigSchema = z.object({
	sheetName: z.string().min(1, 'Sheet name cannot be empty').default('threads_data'),
	minBatchSize: z.number().int().min(1).default(50),
})

/**
 * Local output files (JSON snapshot and CSV backup)
 */
const StorageConfigSchema = z.object({
	dataDir: z.string().min(1).default('./data'),
	jsonFile: z.string().min(1).default('posts.json'),
	csvFile: z.string().min(1).default('threads_data.csv'),
})

const CredentialsConfigSchema = z.object({
	keyPath: z.string().min(1).default('./secure/keys/crypto.key'),
	credentialsPath: z.string().min(1).default('./secure/credentials.enc'),
})

function isValidTimeZone(zone: string): boolean {
	try {
		new Intl.DateTimeFormat('en-US', { timeZone: zone })
		return true
	} catch {
		return false
	}
}

/**
 * Full configuration type
 * Explicitly defined for declaration output
 */
export type Config = {
	version: string
	timezone: string
	testLimit: number
	threads: {
		baseUrl: string
		pageSize: number
		insightsBatchSize: number
		requestDelayMs: number
		maxRetries: number
		insightsCacheTtlMs: number
		requestTimeoutMs: number
	}
	sheets: {
		sheetName: string
		minBatchSize: number
	}
	storage: {
		dataDir: string
		jsonFile: string
		csvFile: string
	}
	credentials: {
		keyPath: string
		credentialsPath: string
	}
}

/**
 * Input shape accepted before defaults are applied
 */
export type ConfigInput = {
	version?: string
	timezone?: string
	testLimit?: number
	threads?: Partial<Config['threads']>
	sheets?: Partial<Config['sheets']>
	storage?: Partial<Config['storage']>
	credentials?: Partial<Config['credentials']>
}

export const ConfigSchema: z.ZodType<Config, z.ZodTypeDef, unknown> = z.object({
	version: z.string().default('1.0'),
	timezone: z
		.string()
		.refine(isValidTimeZone, { message: 'Unknown IANA time zone' })
		.default('Asia/Taipei'),
	testLimit: z.number().int().min(1).default(50),
	threads: ThreadsConfigSchema.default({}),
	sheets: SheetsConfigSchema.default({}),
	storage: StorageConfigSchema.default({}),
	credentials: CredentialsConfigSchema.default({}),
})

/**
 * Validate config, applying defaults
 *
 * @throws ZodError with field paths
 */
export function validateConfig(config: unknown): Config {
	return ConfigSchema.parse(config)
}

export function validateConfigSafe(config: unknown): {
	success: boolean
	data?: Config
	errors?: Array<{ path: string; message: string }>
} {
	const result = ConfigSchema.safeParse(config)

	if (result.success) {
		return { success: true, data: result.data }
	}

	return {
		success: false,
		errors: result.error.errors.map((err) => ({
			path: err.path.join('.'),
			message: err.message,
		})),
	}
}

/**
 * Config file names, checked in order
 */
export const CONFIG_FILE_NAMES = [
	'threads-export.config.yaml',
	'threads-export.config.yml',
	'threads-export.config.json',
] as const

export type ConfigFormat = 'json' | 'yaml'

export function detectConfigFormat(filePath: string): ConfigFormat {
	if (filePath.endsWith('.json')) {
		return 'json'
	}
	if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) {
		return 'yaml'
	}

	throw new Error(
		`Unsupported config file format: ${filePath}. Supported formats: .json, .yaml, .yml`,
	)
}
