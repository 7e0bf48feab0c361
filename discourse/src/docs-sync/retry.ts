// Retry state machine for Discourse HTTP calls.
// Each call moves pending -> (retrying ->)* succeeded | failed. Responses are
// classified as success, transient (rate limit, 5xx, network, timeout) or
// terminal; only transient failures consume the retry budget. A request that
// is not idempotent is retried only on statuses that mean it was not processed.

import * as errore from 'errore'
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  delay,
} from './types.js'

export type RetryState = 'pending' | 'retrying' | 'succeeded' | 'failed'

export type RetryPolicy = {
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
  timeoutMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: DEFAULT_MAX_RETRIES,
  baseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
  maxDelayMs: DEFAULT_RETRY_MAX_DELAY_MS,
  timeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
}

export type ResponseClass = 'success' | 'transient' | 'terminal'

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504])
// Rate limited or unavailable: the server rejected the request before acting on it
const NOT_PROCESSED_STATUSES = new Set([429, 503])

export function classifyStatus({ status }: { status: number }): ResponseClass {
  if (status >= 200 && status < 300) return 'success'
  if (TRANSIENT_STATUSES.has(status)) return 'transient'
  return 'terminal'
}

/** Retry-After is either delta seconds or an HTTP date. */
export function parseRetryAfterMs({
  value,
  now = Date.now(),
}: {
  value: string | null
  now?: number
}): number | null {
  if (!value) return null
  const trimmed = value.trim()
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number.parseFloat(trimmed) * 1000)
  }
  const date = Date.parse(trimmed)
  if (!Number.isFinite(date)) return null
  return Math.max(0, date - now)
}

export function computeBackoffMs({
  retry,
  policy,
  retryAfterMs,
}: {
  /** 1 for the first retry */
  retry: number
  policy: RetryPolicy
  retryAfterMs: number | null
}): number {
  const exponential = policy.baseDelayMs * 2 ** (retry - 1)
  return Math.min(policy.maxDelayMs, Math.max(exponential, retryAfterMs ?? 0))
}

export type RetryOutcome =
  | { state: 'succeeded'; response: Response; attempts: number }
  | { state: 'failed'; response: Response; attempts: number; exhausted: boolean }
  | { state: 'failed'; response: null; cause: unknown; attempts: number; exhausted: true }

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type RetryTransition = {
  state: RetryState
  attempt: number
  reason?: string
  delayMs?: number
}

export async function fetchWithRetry({
  url,
  init,
  fetchFn,
  policy = DEFAULT_RETRY_POLICY,
  sleep = (ms: number) => delay({ ms }),
  idempotent = true,
  onTransition,
}: {
  url: string
  init: RequestInit
  fetchFn: FetchLike
  policy?: RetryPolicy
  sleep?: (ms: number) => Promise<void>
  /** False for creates: a dropped connection or timeout may have committed the request. */
  idempotent?: boolean
  onTransition?: (transition: RetryTransition) => void
}): Promise<RetryOutcome> {
  onTransition?.({ state: 'pending', attempt: 1 })

  for (let attempt = 1; ; attempt++) {
    const response = await errore.tryAsync({
      try: () => fetchFn(url, { ...init, signal: AbortSignal.timeout(policy.timeoutMs) }),
      catch: (cause) => new Error(`request to ${url} failed`, { cause }),
    })

    let reason: string
    let retryAfterMs: number | null = null
    let retryable = true
    if (response instanceof Error) {
      reason = response.cause instanceof Error ? response.cause.message : response.message
      retryable = idempotent
    } else {
      const responseClass = classifyStatus({ status: response.status })
      if (responseClass === 'success') {
        onTransition?.({ state: 'succeeded', attempt })
        return { state: 'succeeded', response, attempts: attempt }
      }
      if (responseClass === 'terminal') {
        onTransition?.({ state: 'failed', attempt, reason: `HTTP ${response.status}` })
        return { state: 'failed', response, attempts: attempt, exhausted: false }
      }
      reason = `HTTP ${response.status}`
      retryAfterMs = parseRetryAfterMs({ value: response.headers.get('retry-after') })
      retryable = idempotent || NOT_PROCESSED_STATUSES.has(response.status)
    }

    if (!retryable || attempt > policy.maxRetries) {
      onTransition?.({ state: 'failed', attempt, reason })
      if (response instanceof Error) {
        return {
          state: 'failed',
          response: null,
          cause: response.cause,
          attempts: attempt,
          exhausted: true,
        }
      }
      return { state: 'failed', response, attempts: attempt, exhausted: retryable }
    }

    // Release the body of a discarded response before the next attempt
    if (!(response instanceof Error)) {
      await response.body?.cancel().catch(() => undefined)
    }

    const delayMs = computeBackoffMs({ retry: attempt, policy, retryAfterMs })
    onTransition?.({ state: 'retrying', attempt, reason, delayMs })
    await sleep(delayMs)
  }
}
