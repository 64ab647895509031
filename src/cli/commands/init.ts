/**
 * Init Command
 *
 * Generate starter configuration file.
 */

import type { Command } from 'commander'

import {
	configFileExists,
	generateConfigFile,
	getDefaultConfigPath,
} from '../../config/generator.js'
import { humanError, humanInfo } from '../../utils/human.js'
import type { ExitCode, GlobalOptions, InitOptions } from '../types.js'
import { applyLogLevel, isVerbose, logEvent, reportCommandError } from '../utils.js'

/**
 * Execute the init command logic
 */
export async function executeInit(
	options: InitOptions,
	globalOptions: GlobalOptions,
): Promise<ExitCode> {
	const { format, force, output } = options
	const verbose = isVerbose(globalOptions)

	applyLogLevel(verbose, globalOptions.quiet)

	if (format !== 'json' && format !== 'yaml') {
		humanError(`❌ Invalid format: ${format}`)
		humanError('Supported formats: json, yaml')
		return 1
	}

	const filePath = output || getDefaultConfigPath(format)

	try {
		if ((await configFileExists(filePath)) && !force) {
			humanError(`❌ Config file already exists: ${filePath}`)
			humanError('\nOptions:')
			humanError('  • Use --force to overwrite')
			humanError('  • Use --output to specify different path')
			humanError('  • Manually remove the existing file')
			return 1
		}

		const result = await generateConfigFile({ filePath, format, force })

		if (!result.success) {
			humanError(`❌ ${result.message}`)
			logEvent('init-error', {
				command: 'init',
				phase: 'error',
				options: { format, filePath, force },
				message: result.message,
				exitCode: 1,
			})
			return 1
		}

		humanInfo(result.message)
		humanInfo('\n📝 Next steps:')
		humanInfo('  1. threads-export generate-key')
		humanInfo('  2. threads-export setup-credentials')
		humanInfo('  3. threads-export run --mode test')
		humanInfo('\n💡 See inline comments in the config file for details')
		logEvent('init-summary', {
			command: 'init',
			phase: 'summary',
			options: { format, filePath, force },
			message: result.message,
			exitCode: 0,
		})
		return 0
	} catch (error) {
		return reportCommandError('init', 'generate config', error, verbose)
	}
}

/**
 * Register the init command with Commander
 */
export function registerInitCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
): void {
	program
		.command('init')
		.description('Generate starter configuration file')
		.option('-f, --format <type>', 'config file format (json|yaml)', 'yaml')
		.option('--force', 'overwrite existing config file without prompting', false)
		.option('-o, --output <path>', 'output file path (default: auto-detected from format)')
		.action(async (options: InitOptions) => {
			process.exit(await executeInit(options, getGlobalOptions()))
		})
}
