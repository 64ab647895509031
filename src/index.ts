/**
 * Public API for the threads-export library
 *
 * This package can be used both as:
 * 1. CLI tool: `npx threads-export --help`
 * 2. Library: `import { ThreadsClient, SheetsExporter } from 'threads-export'`
 *
 * @packageDocumentation
 * @module threads-export
 */

// ===== Config Management =====
export {
	configFileExists,
	defaultConfig,
	generateConfigContent,
	generateConfigFile,
	getDefaultConfigPath,
} from './config/generator.js'
export {
	ConfigError,
	clearConfigCache,
	discoverConfigFile,
	envOverrides,
	isConfigCached,
	loadConfig,
	loadConfigFile,
	mergeConfig,
	substituteEnvVars,
} from './config/loader.js'
export type { Config, ConfigFormat, ConfigInput } from './config/schema.js'
export {
	CONFIG_FILE_NAMES,
	ConfigSchema,
	detectConfigFormat,
	validateConfig,
	validateConfigSafe,
} from './config/schema.js'
// ===== Crypto & Credentials =====
export { CryptoManager } from './crypto/crypto-manager.js'
export { CryptoError, InvalidTokenError } from './crypto/errors.js'
export { decrypt, encrypt, extractTimestamp, generateKey, isValidKey } from './crypto/fernet.js'
export { generateEncryptionKey } from './crypto/key-generator.js'
export type {
	CredentialName,
	ServiceAccount,
	StoredCredentials,
} from './credentials/schema.js'
export {
	CREDENTIAL_NAMES,
	ServiceAccountSchema,
	StoredCredentialsSchema,
} from './credentials/schema.js'
export type { Prompter, SetupCredentialsOptions } from './credentials/setup.js'
export {
	CredentialSetupError,
	buildCredentials,
	listJsonFiles,
	readServiceAccountFile,
	setupCredentials,
} from './credentials/setup.js'
export type { VerificationResults } from './credentials/verify.js'
export {
	verifyCredentials,
	verifyGoogleCredentials,
	verifyThreadsToken,
} from './credentials/verify.js'
// ===== Pipeline =====
export { createThreadsClient, defaultPipelineDeps } from './pipeline/deps.js'
export type { PipelineDeps, RunOptions, RunSummary } from './pipeline/run.js'
export { PipelineInputError, readPostsFile, runPipeline } from './pipeline/run.js'
// ===== Core Types & Schemas =====
export type { Post, PostInsights, PostRecord, ThreadsPost } from './schema/post.js'
export {
	PostSchema,
	PostSnapshotSchema,
	SHEET_HEADERS,
	fromPostRecord,
	toPostRecord,
} from './schema/post.js'
// ===== Google Sheets =====
export type { FormatOperation, SheetData } from './sheets/base-sheets.js'
export { BaseSheets, SheetsExportError, buildFormatRequests } from './sheets/base-sheets.js'
export type { ExportResult } from './sheets/exporter.js'
export { SheetsExporter, computeBatchSize } from './sheets/exporter.js'
export type { SheetsGateway, SpreadsheetInfo } from './sheets/gateway.js'
export { GoogleSheetsGateway } from './sheets/gateway.js'
export { engagementRate, toSheetRow } from './sheets/rows.js'
// ===== Storage =====
export {
	latestPostDate,
	mergeBackupRows,
	readCsvBackup,
	updateCsvBackup,
} from './storage/csv-backup.js'
// ===== Threads API =====
export type { FetchPostsResult, ThreadsClientOptions } from './threads/client.js'
export { ThreadsApiError, ThreadsClient, parseInsights } from './threads/client.js'
export type { CollectMode, CollectResult } from './threads/collector.js'
export { ThreadsCollector, normalizePost } from './threads/collector.js'
export type { RateLimitConfig, RateLimitState } from './threads/rate-limiting.js'
export { RateLimiter, isRetryableStatus } from './threads/rate-limiting.js'
// ===== Utilities =====
export { formatInTimeZone, parseTimestamp } from './utils/dates.js'
export { configureErrorLog, createLogger, getErrorLogPath } from './utils/logger.js'
