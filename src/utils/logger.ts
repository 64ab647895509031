/**
 * Structured JSON Logger (Pino)
 *
 * - Pino writes JSON to stdout (pretty-printed when LOG_FORMAT=pretty)
 * - Error entries are appended to ./logs/threads_data_YYYYMMDD.log, opened
 *   on the first error so clean runs leave no file behind
 * - Stable keys: ts, level, component, msg, context, pid, ver, seq, correlationId
 *
 * Environment variables:
 *  LOG_LEVEL=debug|info|warn|error  minimum level (default info)
 *  LOG_FORMAT=json|pretty           pretty prints to stdout when set to pretty
 *  LOG_TO_FILE=true|false           error log file (default true except during tests)
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import pino from 'pino'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogEntry = {
  ts: string
  level: LogLevel
  component: string
  msg: string
  context?: Record<string, unknown>
  pid: number
  ver?: string
  seq: number
  correlationId?: string
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER
}

let sequenceCounter = 0
let cachedVersion: string | undefined
let currentCorrelationId: string | undefined
const correlationStore = new AsyncLocalStorage<string>()

function loadVersion(): string {
  if (cachedVersion) return cachedVersion
  try {
    // src/utils and dist/utils both sit two levels below the package root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url))
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
    cachedVersion =
      typeof pkg === 'object' &&
      pkg !== null &&
      'version' in pkg &&
      typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0'
  } catch {
    cachedVersion = '0.0.0'
  }
  return cachedVersion
}

const isTestEnv =
  process.env.VITEST === 'true' || process.env.NODE_ENV === 'test'
const shouldWriteFile =
  (process.env.LOG_TO_FILE ?? (isTestEnv ? 'false' : 'true')) === 'true'

const envLevel = process.env.LOG_LEVEL
let effectiveLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

const pinoTransport =
  process.env.LOG_FORMAT === 'pretty'
    ? pino.transport({
        target: 'pino-pretty',
        options: { colorize: true, singleLine: true },
      })
    : undefined
const pinoStdout = pino({ level: effectiveLevel, base: null }, pinoTransport)

// Error file sink, opened on first error; writes are synchronous so the
// entry is on disk before a command calls process.exit
type ErrorDestination = ReturnType<typeof pino.destination>

let errorFileEnabled = shouldWriteFile
let errorLogDir: string | undefined
let errorDestination: ErrorDestination | undefined
let errorFilePath: string | undefined

function compactDate(date: Date): string {
  const y = date.getFullYear()
  const m = String(date.getMonth() + 1).padStart(2, '0')
  const d = String(date.getDate()).padStart(2, '0')
  return `${y}${m}${d}`
}

function ensureErrorDestination(): ErrorDestination | undefined {
  if (errorDestination) return errorDestination
  const logsDir = errorLogDir ?? path.resolve(process.cwd(), 'logs')
  const filePath = path.join(logsDir, `threads_data_${compactDate(new Date())}.log`)
  try {
    errorDestination = pino.destination({ dest: filePath, sync: true, mkdir: true })
    errorFilePath = filePath
    pinoStdout.info(
      { component: 'logger', file: filePath },
      'Error detected, log file created',
    )
  } catch (error) {
    // stdout still carries the entry
    pinoStdout.warn(
      { component: 'logger', error: String(error) },
      'Could not open error log file',
    )
    errorDestination = undefined
  }
  return errorDestination
}

/**
 * Turn the error log file on or off, optionally in another directory
 * (default ./logs). Closes any file already open.
 */
export function configureErrorLog(options: { enabled: boolean; dir?: string }): void {
  errorDestination?.end()
  errorDestination = undefined
  errorFilePath = undefined
  errorFileEnabled = options.enabled
  errorLogDir = options.dir
}

/** Path of the error log file, once one has been opened */
export function getErrorLogPath(): string | undefined {
  return errorFilePath
}

export type LogSink = (entry: LogEntry) => void
let sinks: LogSink[] = []

export function registerSink(sink: LogSink): void {
  sinks.push(sink)
}

export function clearSinks(): void {
  sinks = []
}

export function log(
  component: string,
  level: LogLevel,
  msg: string,
  context?: Record<string, unknown>,
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[effectiveLevel]) return

  const correlationId = correlationStore.getStore() ?? currentCorrelationId
  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    pid: process.pid,
    ver: loadVersion(),
    seq: ++sequenceCounter,
    ...(correlationId ? { correlationId } : {}),
    ...(context ? { context } : {}),
  }

  const bindings: Record<string, unknown> = {
    component,
    ver: entry.ver,
    seq: entry.seq,
  }
  if (entry.correlationId) bindings.correlationId = entry.correlationId
  pinoStdout.child(bindings)[level](context ?? {}, msg)

  if (level === 'error' && errorFileEnabled) {
    ensureErrorDestination()?.write(`${JSON.stringify(entry)}\n`)
  }

  for (const sink of sinks) {
    try {
      sink(entry)
    } catch (error) {
      pinoStdout.warn({ component: 'logger', error: String(error) }, 'Log sink failed')
    }
  }
}

export type ComponentLogger = {
  debug: (msg: string, context?: Record<string, unknown>) => void
  info: (msg: string, context?: Record<string, unknown>) => void
  warn: (msg: string, context?: Record<string, unknown>) => void
  error: (msg: string, context?: Record<string, unknown>) => void
}

export function createLogger(component: string): ComponentLogger {
  return {
    debug: (msg, context) => log(component, 'debug', msg, context),
    info: (msg, context) => log(component, 'info', msg, context),
    warn: (msg, context) => log(component, 'warn', msg, context),
    error: (msg, context) => log(component, 'error', msg, context),
  }
}

export function setCorrelationId(id: string | undefined): void {
  currentCorrelationId = id
}

export function getCorrelationId(): string | undefined {
  return correlationStore.getStore() ?? currentCorrelationId
}

export async function withCorrelationId<T>(
  id: string,
  fn: () => Promise<T> | T,
): Promise<T> {
  return await correlationStore.run(id, async () => await fn())
}

export function setLogLevel(level: LogLevel): void {
  effectiveLevel = level
  pinoStdout.level = level
}

export function getLogLevel(): LogLevel {
  return effectiveLevel
}

/**
 * Serialize an unknown thrown value for a log context
 */
export function errorContext(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: { type: error.name, message: error.message } }
  }
  return { error: { message: String(error) } }
}
