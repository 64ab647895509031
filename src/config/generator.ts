/**
 * Starter config file generator (used by `threads-export init`)
 */

import { access, writeFile } from 'node:fs/promises'

import yaml from 'js-yaml'

import {
	CONFIG_FILE_NAMES,
	type Config,
	type ConfigFormat,
	validateConfig,
} from './schema.js'

const YAML_HEADER = `# threads-export configuration
#
# Values may reference environment variables with \${VAR_NAME}.
# CRYPTO_KEY_PATH, CREDENTIALS_PATH, THREADS_DATA_DIR and THREADS_TIMEZONE
# override the matching settings below.
`

/**
 * Defaults as a fully populated config object
 */
export function defaultConfig(): Config {
	return validateConfig({})
}

export function generateConfigContent(format: ConfigFormat): string {
	const config = defaultConfig()
	if (format === 'json') {
		return `${JSON.stringify(config, null, 2)}\n`
	}
	return `${YAML_HEADER}\n${yaml.dump(config, { lineWidth: 100 })}`
}

export function getDefaultConfigPath(format: ConfigFormat): string {
	return format === 'json'
		? `./${CONFIG_FILE_NAMES[2]}`
		: `./${CONFIG_FILE_NAMES[0]}`
}

export async function configFileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath)
		return true
	} catch {
		return false
	}
}

export type GenerateConfigResult = {
	success: boolean
	filePath: string
	message: string
}

export async function generateConfigFile(options: {
	filePath: string
	format: ConfigFormat
	force?: boolean
}): Promise<GenerateConfigResult> {
	const { filePath, format, force = false } = options

	if (!force && (await configFileExists(filePath))) {
		return {
			success: false,
			filePath,
			message: `Config file already exists: ${filePath}`,
		}
	}

	await writeFile(filePath, generateConfigContent(format), 'utf-8')
	return {
		success: true,
		filePath,
		message: `✓ Created ${format.toUpperCase()} config: ${filePath}`,
	}
}
