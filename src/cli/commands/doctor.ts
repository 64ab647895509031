/**
 * Doctor Command
 *
 * Diagnose common setup issues: config, key, credentials, data directory.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import type { Command } from 'commander'

import { discoverConfigFile, loadConfig } from '../../config/loader.js'
import type { Config } from '../../config/schema.js'
import { CryptoManager } from '../../crypto/crypto-manager.js'
import { isValidKey } from '../../crypto/fernet.js'
import { readCsvBackup } from '../../storage/csv-backup.js'
import { humanInfo } from '../../utils/human.js'
import type { ExitCode, GlobalOptions } from '../types.js'
import { applyLogLevel, isVerbose, logEvent, reportCommandError } from '../utils.js'

export type DoctorCheck = {
	name: string
	pass: boolean
	message: string
	/** Shown under Recommendations when the check fails */
	fix?: string
}

function canWrite(dir: string): boolean {
	try {
		fs.mkdirSync(dir, { recursive: true })
		const testFile = path.join(dir, '.test-write')
		fs.writeFileSync(testFile, 'test')
		fs.unlinkSync(testFile)
		return true
	} catch {
		return false
	}
}

/**
 * Run every check against a working directory
 */
export async function runDoctorChecks(
	cwd: string,
	configPath?: string,
): Promise<DoctorCheck[]> {
	const checks: DoctorCheck[] = []

	const nodeMajor = Number.parseInt(process.version.slice(1).split('.')[0] ?? '0', 10)
	const nodeOk = nodeMajor >= 20
	checks.push({
		name: 'Node.js version',
		pass: nodeOk,
		message: `${process.version} ${nodeOk ? '✓' : '(requires ≥20)'}`,
	})

	const foundConfig = configPath
		? path.resolve(cwd, configPath)
		: await discoverConfigFile(cwd)
	checks.push({
		name: 'Config file',
		pass: Boolean(foundConfig),
		message: foundConfig
			? `Found: ${path.relative(cwd, foundConfig) || foundConfig}`
			: 'Not found, using defaults',
		fix: 'Run: threads-export init',
	})

	let config: Config | null = null
	try {
		config = await loadConfig({ configPath: foundConfig ?? undefined, skipCache: true })
		checks.push({ name: 'Config valid', pass: true, message: 'OK' })
	} catch (error) {
		checks.push({
			name: 'Config valid',
			pass: false,
			message: error instanceof Error ? error.message : String(error),
			fix: 'Fix the config file or re-create it with: threads-export init --force',
		})
	}
	if (!config) return checks

	const keyPath = path.resolve(cwd, config.credentials.keyPath)
	const keyExists = fs.existsSync(keyPath)
	const keyValid = keyExists && isValidKey(fs.readFileSync(keyPath, 'utf-8').trim())
	checks.push({
		name: 'Encryption key',
		pass: keyValid,
		message: keyValid
			? `Found: ${keyPath}`
			: keyExists
				? `Not a valid key: ${keyPath}`
				: `Not found: ${keyPath}`,
		fix: 'Run: threads-export generate-key',
	})

	const credentialsPath = path.resolve(cwd, config.credentials.credentialsPath)
	if (!fs.existsSync(credentialsPath)) {
		checks.push({
			name: 'Credentials',
			pass: false,
			message: `Not found: ${credentialsPath}`,
			fix: 'Run: threads-export setup-credentials',
		})
	} else if (keyValid) {
		try {
			await CryptoManager.fromConfig(config, cwd).loadCredentials()
			checks.push({ name: 'Credentials', pass: true, message: 'Decrypted successfully' })
		} catch (error) {
			checks.push({
				name: 'Credentials',
				pass: false,
				message: error instanceof Error ? error.message : String(error),
				fix: 'Run: threads-export setup-credentials',
			})
		}
	} else {
		checks.push({
			name: 'Credentials',
			pass: false,
			message: 'Cannot decrypt without a valid key',
			fix: 'Run: threads-export generate-key, then setup-credentials',
		})
	}

	const dataDir = path.resolve(cwd, config.storage.dataDir)
	const writable = canWrite(dataDir)
	checks.push({
		name: 'Data directory',
		pass: writable,
		message: writable ? `Can write to ${dataDir}` : `Cannot write to ${dataDir} (check permissions)`,
	})

	const csvPath = path.join(dataDir, config.storage.csvFile)
	const backup = fs.existsSync(csvPath) ? await readCsvBackup(csvPath) : null
	checks.push({
		name: 'CSV backup',
		pass: true,
		message: backup
			? `${backup.rows.length} posts in ${config.storage.csvFile} (normal mode is incremental)`
			: 'None yet (first normal run fetches everything)',
	})

	return checks
}

/**
 * Execute the doctor command logic
 */
export async function executeDoctor(
	globalOptions: GlobalOptions,
	cwd: string = process.cwd(),
): Promise<ExitCode> {
	const verbose = isVerbose(globalOptions)
	applyLogLevel(verbose, globalOptions.quiet)

	try {
		humanInfo('🔍 threads-export Diagnostics\n')
		logEvent('doctor-start', { command: 'doctor', phase: 'start' })

		const checks = await runDoctorChecks(cwd, globalOptions.config)

		let passCount = 0
		for (const check of checks) {
			const icon = check.pass ? '✅' : '⚠️ '
			humanInfo(`${icon} ${check.name.padEnd(20)} ${check.message}`)
			if (check.pass) passCount++
			logEvent('doctor-check', {
				command: 'doctor',
				phase: 'progress',
				context: { name: check.name },
				metrics: { pass: check.pass },
				message: check.message,
			})
		}

		humanInfo(`\n📊 Summary: ${passCount}/${checks.length} checks passed`)

		const failures = checks.filter((check) => !check.pass)
		const fixes = failures.flatMap((check) => (check.fix ? [check.fix] : []))
		if (fixes.length > 0) {
			humanInfo('\n💡 Recommendations:')
			for (const fix of new Set(fixes)) humanInfo(`   • ${fix}`)
		}

		if (verbose) {
			humanInfo('\n📝 Environment:')
			humanInfo(`   Platform: ${os.platform()}`)
			humanInfo(`   Arch: ${os.arch()}`)
			humanInfo(`   CWD: ${cwd}`)
		}

		const exitCode: ExitCode = failures.length > 0 ? 1 : 0
		logEvent('doctor-summary', {
			command: 'doctor',
			phase: 'summary',
			metrics: { passed: passCount, total: checks.length, failures: failures.length },
			exitCode,
		})
		return exitCode
	} catch (error) {
		return reportCommandError('doctor', 'run diagnostics', error, verbose)
	}
}

/**
 * Register the doctor command with Commander
 */
export function registerDoctorCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
): void {
	program
		.command('doctor')
		.description('Diagnose common setup issues')
		.action(async () => {
			process.exit(await executeDoctor(getGlobalOptions()))
		})
}
