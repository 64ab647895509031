/**
 * Run Command
 *
 * Collect posts from Threads and export them to Google Sheets.
 */

import type { Command } from 'commander'

import { defaultPipelineDeps } from '../../pipeline/deps.js'
import {
	type PipelineDeps,
	PipelineInputError,
	type RunOptions,
	type RunSummary,
	runPipeline,
} from '../../pipeline/run.js'
import {
	collectProgressHandler,
	createProgressManager,
	uploadProgressHandler,
} from '../../progress/progress-manager.js'
import { COLLECT_MODES, isCollectMode } from '../../threads/collector.js'
import { humanError, humanInfo, humanWarn, isHumanLoggingEnabled } from '../../utils/human.js'
import type { ExitCode, GlobalOptions, RunCommandOptions } from '../types.js'
import {
	applyLogLevel,
	isVerbose,
	loadCommandConfig,
	logEvent,
	reportCommandError,
} from '../utils.js'

function inputError(message: string, options: RunCommandOptions): ExitCode {
	humanError(`❌ ${message}`)
	logEvent('run-error', {
		command: 'run',
		phase: 'error',
		message,
		options: { ...options },
		exitCode: 1,
	})
	return 1
}

/**
 * Commander strings → pipeline options
 */
export function parseRunOptions(options: RunCommandOptions): RunOptions | string {
	if (!isCollectMode(options.mode)) {
		return `Invalid mode: ${options.mode} (expected test, force or normal)`
	}
	let limit: number | undefined
	if (options.limit !== undefined) {
		limit = Number(options.limit)
		if (!Number.isInteger(limit) || limit < 1) {
			return `--limit must be a positive integer, got ${options.limit}`
		}
	}
	return {
		mode: options.mode,
		limit,
		threadsOnly: Boolean(options.threadsOnly),
		sheetsOnly: Boolean(options.sheetsOnly),
		jsonFile: options.jsonFile,
	}
}

function printSummary(summary: RunSummary, threadsOnly: boolean): void {
	if (summary.source === 'threads') {
		humanInfo(`\n✓ Successfully collected ${summary.posts} posts`)
		if (summary.skipped > 0) {
			humanInfo(`  Skipped ${summary.skipped} posts already in the CSV backup`)
		}
		if (summary.truncated) {
			humanWarn('⚠️  Pagination stopped early after an API error; the post list is partial')
		}
		if (summary.posts === 0) {
			humanInfo('No posts to process')
			return
		}
		if (summary.jsonPath) humanInfo(`  JSON snapshot: ${summary.jsonPath}`)
	}

	if (threadsOnly) {
		humanInfo('Skipped Google Sheets export step')
		if (summary.csvRows !== null) humanInfo(`  CSV backup now holds ${summary.csvRows} posts`)
		return
	}

	if (summary.exported) {
		humanInfo(
			`✓ Data export completed: ${summary.exported.appended} rows to "${summary.exported.sheetName}" in ${summary.exported.batches} batch(es)`,
		)
		if (summary.exported.csvPath) humanInfo(`  CSV backup: ${summary.exported.csvPath}`)
	}
}

/**
 * Execute the run command logic
 */
export async function executeRun(
	options: RunCommandOptions,
	globalOptions: GlobalOptions,
	overrides: Partial<PipelineDeps> = {},
): Promise<ExitCode> {
	const verbose = isVerbose(globalOptions)
	applyLogLevel(verbose, globalOptions.quiet)

	const parsed = parseRunOptions(options)
	if (typeof parsed === 'string') return inputError(parsed, options)

	const config = await loadCommandConfig('run', globalOptions)
	if (!config) return 1

	logEvent('run-start', {
		command: 'run',
		phase: 'start',
		options: { ...parsed },
	})
	humanInfo(
		parsed.sheetsOnly
			? `📥 Importing ${parsed.jsonFile} to Google Sheets...`
			: `🧵 Starting to collect Threads post data (${parsed.mode} mode)...`,
	)

	const progress = createProgressManager(globalOptions.quiet || !isHumanLoggingEnabled())
	const deps: PipelineDeps = {
		...defaultPipelineDeps(config),
		onCollectProgress: collectProgressHandler(progress),
		onUploadBatch: uploadProgressHandler(progress),
		...overrides,
	}

	try {
		const summary = await runPipeline(config, parsed, deps)
		progress.stopAll()
		printSummary(summary, Boolean(parsed.threadsOnly))
		logEvent('run-summary', {
			command: 'run',
			phase: 'summary',
			metrics: {
				posts: summary.posts,
				fetched: summary.fetched,
				skipped: summary.skipped,
				truncated: summary.truncated,
				appended: summary.exported?.appended ?? 0,
				csvRows: summary.csvRows,
			},
			context: {
				source: summary.source,
				jsonPath: summary.jsonPath,
				csvPath: summary.exported?.csvPath ?? null,
			},
			exitCode: 0,
		})
		return 0
	} catch (error) {
		progress.stopAll()
		if (error instanceof PipelineInputError) {
			return inputError(error.message, options)
		}
		return reportCommandError('run', 'export posts', error, verbose)
	}
}

/**
 * Register the run command with Commander (default command)
 */
export function registerRunCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
): void {
	program
		.command('run', { isDefault: true })
		.description('Collect Threads posts and export them to Google Sheets')
		.option('-m, --mode <mode>', `run mode: ${COLLECT_MODES.join(' | ')}`, 'normal')
		.option('-l, --limit <n>', 'post limit in test mode')
		.option('--threads-only', 'collect from Threads only, skip the Google Sheets export', false)
		.option('--sheets-only', 'upload an existing JSON snapshot only, skip Threads', false)
		.option('--json-file <path>', 'JSON snapshot to upload with --sheets-only')
		.action(async (options: RunCommandOptions) => {
			process.exit(await executeRun(options, getGlobalOptions()))
		})
}
