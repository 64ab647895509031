/**
 * Human Output Helper
 *
 * Console output meant for a person at a terminal. It can be switched off
 * globally (--json, THREADS_EXPORT_JSON=1) so only structured events remain.
 */

let humanEnabled = true

export function setHumanLoggingEnabled(enabled: boolean): void {
	humanEnabled = enabled
}

export function isHumanLoggingEnabled(): boolean {
	return humanEnabled
}

type ConsoleKind = 'info' | 'warn' | 'error' | 'log'

function write(kind: ConsoleKind, args: Array<unknown>): void {
	if (!humanEnabled) return
	console[kind](...args)
}

export function humanInfo(...args: Array<unknown>): void {
	write('info', args)
}

export function humanWarn(...args: Array<unknown>): void {
	write('warn', args)
}

export function humanError(...args: Array<unknown>): void {
	write('error', args)
}

/** Decide JSON-only mode from the --json flag and THREADS_EXPORT_JSON */
export function isJsonOnly(flag: boolean | undefined): boolean {
	const env = String(process.env.THREADS_EXPORT_JSON || '').toLowerCase()
	return (
		Boolean(flag) ||
		['1', 'true', 'yes', 'y', 'json', 'json-only'].includes(env)
	)
}
