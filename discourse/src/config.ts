// Run configuration. Inputs come from CLI flags first, then from the
// environment (INPUT_* variables as set by a CI action runner, plus the plain
// DISCOURSE_API_* names). Everything is validated once at startup.

import {
  ConfigValidationError,
  DEFAULT_CATEGORY_ID,
  DEFAULT_CONCURRENCY,
  MAX_CONCURRENCY,
  type SyncConfig,
} from './docs-sync/types.js'

export type SyncInputs = {
  discourseHost?: string
  discourseApiUsername?: string
  discourseApiKey?: string
  discourseCategoryId?: string | number
  deleteTopics?: string | boolean
  dryRun?: string | boolean
  concurrency?: string | number
}

type Env = Record<string, string | undefined>

const ENV_FALLBACKS: Record<keyof SyncInputs, string[]> = {
  discourseHost: ['INPUT_DISCOURSE_HOST'],
  discourseApiUsername: ['INPUT_DISCOURSE_API_USERNAME', 'DISCOURSE_API_USERNAME'],
  discourseApiKey: ['INPUT_DISCOURSE_API_KEY', 'DISCOURSE_API_KEY'],
  discourseCategoryId: ['INPUT_DISCOURSE_CATEGORY_ID'],
  deleteTopics: ['INPUT_DELETE_TOPICS'],
  dryRun: ['INPUT_DRY_RUN'],
  concurrency: ['INPUT_CONCURRENCY'],
}

const TRUE_VALUES = new Set(['true', '1', 'yes'])
const FALSE_VALUES = new Set(['false', '0', 'no'])

function pick({
  inputs,
  env,
  key,
}: {
  inputs: SyncInputs
  env: Env
  key: keyof SyncInputs
}): string | number | boolean | undefined {
  const direct = inputs[key]
  if (direct !== undefined && direct !== '') return direct
  for (const name of ENV_FALLBACKS[key]) {
    const value = env[name]
    if (value !== undefined && value !== '') return value
  }
  return undefined
}

function requireString({
  value,
  input,
}: {
  value: string | number | boolean | undefined
  input: string
}): string | ConfigValidationError {
  const text = value === undefined ? '' : String(value).trim()
  if (!text) {
    return new ConfigValidationError({ input, reason: 'a non-empty value is required' })
  }
  return text
}

function parseBoolean({
  value,
  input,
  fallback,
}: {
  value: string | number | boolean | undefined
  input: string
  fallback: boolean
}): boolean | ConfigValidationError {
  if (value === undefined) return fallback
  if (typeof value === 'boolean') return value
  const normalized = String(value).trim().toLowerCase()
  if (TRUE_VALUES.has(normalized)) return true
  if (FALSE_VALUES.has(normalized)) return false
  return new ConfigValidationError({
    input,
    reason: `expected true, false, 1, 0, yes or no, got ${String(value)}`,
  })
}

function parseInteger({
  value,
  input,
  fallback,
  min,
  max,
}: {
  value: string | number | boolean | undefined
  input: string
  fallback: number
  min: number
  max?: number
}): number | ConfigValidationError {
  if (value === undefined) return fallback
  const text = String(value).trim()
  if (!/^\d+$/.test(text)) {
    return new ConfigValidationError({ input, reason: `expected an integer, got ${text}` })
  }
  const parsed = Number.parseInt(text, 10)
  if (parsed < min || (max !== undefined && parsed > max)) {
    const range = max === undefined ? `at least ${min}` : `between ${min} and ${max}`
    return new ConfigValidationError({ input, reason: `must be ${range}, got ${parsed}` })
  }
  return parsed
}

export function loadSyncConfig({
  inputs = {},
  env = process.env,
}: {
  inputs?: SyncInputs
  env?: Env
} = {}): SyncConfig | ConfigValidationError {
  const host = requireString({
    value: pick({ inputs, env, key: 'discourseHost' }),
    input: 'discourse_host',
  })
  if (host instanceof Error) return host
  if (/^https?:\/\//i.test(host)) {
    return new ConfigValidationError({
      input: 'discourse_host',
      reason: 'should not include the protocol, e.g. discourse.example.com',
    })
  }
  const hostname = host.replace(/\/+$/, '').toLowerCase()

  const apiUsername = requireString({
    value: pick({ inputs, env, key: 'discourseApiUsername' }),
    input: 'discourse_api_username',
  })
  if (apiUsername instanceof Error) return apiUsername

  const apiKey = requireString({
    value: pick({ inputs, env, key: 'discourseApiKey' }),
    input: 'discourse_api_key',
  })
  if (apiKey instanceof Error) return apiKey

  const categoryId = parseInteger({
    value: pick({ inputs, env, key: 'discourseCategoryId' }),
    input: 'discourse_category_id',
    fallback: DEFAULT_CATEGORY_ID,
    min: 0,
  })
  if (categoryId instanceof Error) return categoryId

  const deleteTopics = parseBoolean({
    value: pick({ inputs, env, key: 'deleteTopics' }),
    input: 'delete_topics',
    fallback: true,
  })
  if (deleteTopics instanceof Error) return deleteTopics

  const dryRun = parseBoolean({
    value: pick({ inputs, env, key: 'dryRun' }),
    input: 'dry_run',
    fallback: false,
  })
  if (dryRun instanceof Error) return dryRun

  const concurrency = parseInteger({
    value: pick({ inputs, env, key: 'concurrency' }),
    input: 'concurrency',
    fallback: DEFAULT_CONCURRENCY,
    min: 1,
    max: MAX_CONCURRENCY,
  })
  if (concurrency instanceof Error) return concurrency

  return {
    hostname,
    basePath: `https://${hostname}`,
    apiUsername,
    apiKey,
    categoryId,
    deleteTopics,
    dryRun,
    concurrency,
  }
}
