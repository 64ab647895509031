/**
 * CLI Commands Index
 *
 * Barrel export for all CLI command modules.
 */

export { executeDoctor, registerDoctorCommand } from './doctor.js'
export { executeGenerateKey, registerGenerateKeyCommand } from './generate-key.js'
export { executeInit, registerInitCommand } from './init.js'
export { executeRun, registerRunCommand } from './run.js'
export {
	executeSetupCredentials,
	registerSetupCredentialsCommand,
} from './setup-credentials.js'
export {
	executeVerifyCredentials,
	registerVerifyCredentialsCommand,
} from './verify-credentials.js'
