/**
 * Config schema: defaults, bounds, field-path errors
 */

import { describe, expect, it } from 'vitest'

import {
  ConfigSchema,
  detectConfigFormat,
  validateConfig,
  validateConfigSafe,
} from '../schema.js'

describe('Config Schema', () => {
  describe('defaults', () => {
    it('fills every field from an empty object', () => {
      const config = validateConfig({})

      expect(config).toEqual({
        version: '1.0',
        timezone: 'Asia/Taipei',
        testLimit: 50,
        threads: {
          baseUrl: 'https://graph.threads.net/v1.0',
          pageSize: 100,
          insightsBatchSize: 10,
          requestDelayMs: 500,
          maxRetries: 3,
          insightsCacheTtlMs: 3_600_000,
          requestTimeoutMs: 10_000,
        },
        sheets: { sheetName: 'threads_data', minBatchSize: 50 },
        storage: {
          dataDir: './data',
          jsonFile: 'posts.json',
          csvFile: 'threads_data.csv',
        },
        credentials: {
          keyPath: './secure/keys/crypto.key',
          credentialsPath: './secure/credentials.enc',
        },
      })
    })

    it('keeps defaults for fields a partial section leaves out', () => {
      const config = validateConfig({ threads: { pageSize: 25 } })
      expect(config.threads.pageSize).toBe(25)
      expect(config.threads.maxRetries).toBe(3)
    })
  })

  describe('validation', () => {
    it('rejects a page size above the API maximum', () => {
      const result = ConfigSchema.safeParse({ threads: { pageSize: 101 } })
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.errors[0]?.path).toEqual(['threads', 'pageSize'])
      }
    })

    it('rejects an unknown time zone', () => {
      const result = validateConfigSafe({ timezone: 'Mars/Olympus_Mons' })
      expect(result.success).toBe(false)
      expect(result.errors).toEqual([
        { path: 'timezone', message: 'Unknown IANA time zone' },
      ])
    })

    it('accepts any IANA zone', () => {
      expect(validateConfig({ timezone: 'Europe/Berlin' }).timezone).toBe(
        'Europe/Berlin',
      )
    })

    it('rejects an empty sheet name with its message', () => {
      const result = validateConfigSafe({ sheets: { sheetName: '' } })
      expect(result.errors).toEqual([
        { path: 'sheets.sheetName', message: 'Sheet name cannot be empty' },
      ])
    })

    it('rejects a non-URL base URL', () => {
      const result = validateConfigSafe({ threads: { baseUrl: 'graph.threads' } })
      expect(result.success).toBe(false)
      expect(result.errors?.[0]?.path).toBe('threads.baseUrl')
    })

    it('returns data on success', () => {
      const result = validateConfigSafe({ testLimit: 5 })
      expect(result.success).toBe(true)
      expect(result.data?.testLimit).toBe(5)
    })
  })

  describe('detectConfigFormat', () => {
    it('detects by extension', () => {
      expect(detectConfigFormat('threads-export.config.json')).toBe('json')
      expect(detectConfigFormat('threads-export.config.yaml')).toBe('yaml')
      expect(detectConfigFormat('threads-export.config.yml')).toBe('yaml')
    })
  })
})
