/**
 * CLI Option Types
 *
 * Shared type definitions for all CLI command options.
 */

export type RunCommandOptions = {
	mode: string
	limit?: string
	threadsOnly?: boolean
	sheetsOnly?: boolean
	jsonFile?: string
}

export type GenerateKeyOptions = {
	force?: boolean
}

export type SetupCredentialsCommandOptions = {
	threadsToken?: string
	spreadsheetId?: string
	googleCredentials?: string
	yes?: boolean
}

export type VerifyCredentialsOptions = Record<string, never>

export type InitOptions = {
	format: string
	force: boolean
	output?: string
}

/**
 * CLI Log Event Metadata
 */
export type CLILogMeta = {
	command: string
	phase: 'start' | 'progress' | 'summary' | 'warning' | 'error'
	message?: string
	options?: Record<string, unknown>
	metrics?: Record<string, unknown>
	error?: { type?: string; message: string; stack?: string }
	context?: Record<string, unknown>
	exitCode?: number
}

/**
 * Global CLI options from Commander program
 */
export type GlobalOptions = {
	verbose: boolean
	debug?: boolean
	quiet: boolean
	config?: string
	json?: boolean
}

/** Exit status an execute function reports back to its command wrapper */
export type ExitCode = 0 | 1 | 2
