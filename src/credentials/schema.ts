/**
 * Shapes of the secrets kept in the encrypted credentials file
 */

import { z } from 'zod'

export const REQUIRED_SERVICE_ACCOUNT_FIELDS = [
	'type',
	'project_id',
	'private_key_id',
	'private_key',
	'client_email',
] as const

/**
 * Google service account key file (other fields are kept as-is)
 */
export const ServiceAccountSchema = z
	.object({
		type: z.string().min(1),
		project_id: z.string().min(1),
		private_key_id: z.string().min(1),
		private_key: z.string().min(1),
		client_email: z.string().min(1),
	})
	.passthrough()

export type ServiceAccount = z.infer<typeof ServiceAccountSchema>

/**
 * Decrypted content of the credentials file. Key names are the on-disk format.
 */
export const StoredCredentialsSchema = z.object({
	threads_token: z.string().min(1, 'Threads API token cannot be empty'),
	spreadsheet_id: z.string().min(1, 'Spreadsheet ID cannot be empty'),
	google_credentials: ServiceAccountSchema,
})

export type StoredCredentials = z.infer<typeof StoredCredentialsSchema>

export type CredentialName = keyof StoredCredentials

export const CREDENTIAL_NAMES: ReadonlyArray<CredentialName> = [
	'threads_token',
	'spreadsheet_id',
	'google_credentials',
]

/**
 * Required service account fields absent from a parsed key file
 */
export function missingServiceAccountFields(value: unknown): string[] {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		return [...REQUIRED_SERVICE_ACCOUNT_FIELDS]
	}
	return REQUIRED_SERVICE_ACCOUNT_FIELDS.filter((field) => !(field in value))
}
