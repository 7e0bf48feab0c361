// Sentry error tracking initialization and notifyError helper.
// Only active when DOCS_SYNC_SENTRY_DSN is set; a pipeline run without a DSN
// reports nothing.

import * as Sentry from '@sentry/node'
import { sanitizeUnknownValue } from './privacy-sanitizer.js'

let initialized = false

/**
 * Initialize Sentry. Call once at process startup.
 * No-op if no DSN is configured or DOCS_SYNC_SENTRY_DISABLED=1.
 */
export function initSentry({ dsn }: { dsn?: string } = {}): void {
  if (process.env.DOCS_SYNC_SENTRY_DISABLED === '1') {
    return
  }

  const resolvedDsn = dsn || process.env.DOCS_SYNC_SENTRY_DSN
  if (!resolvedDsn || initialized) {
    return
  }

  Sentry.init({
    dsn: resolvedDsn,
    integrations: [],
    tracesSampleRate: 0,
    sendDefaultPii: false,
  })

  initialized = true
}

/**
 * Report an unexpected error to Sentry.
 * Safe to call even if Sentry is not initialized and never throws.
 * Use at terminal error handlers, where the error would otherwise only be
 * visible in the pipeline log.
 */
export async function notifyError(error: unknown, msg?: string): Promise<void> {
  if (!initialized) {
    return
  }
  try {
    Sentry.captureException(error, {
      extra: { msg, detail: sanitizeUnknownValue(error) },
    })
    await Sentry.flush(2000)
  } catch {
    return
  }
}
