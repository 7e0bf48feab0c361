// Sensitive data redaction helpers for logs and error reports.
// Redacts Discourse API credentials, bearer tokens and generic secrets.

const SENSITIVE_REPLACEMENTS: Array<{
  pattern: RegExp
  replacement: string
}> = [
  {
    pattern: /\bBearer\s+[A-Za-z0-9._-]{10,}\b/gi,
    replacement: 'Bearer [REDACTED]',
  },
  {
    pattern: /\bgh[pousr]_[A-Za-z0-9]{20,}\b/g,
    replacement: '[REDACTED_GITHUB_TOKEN]',
  },
  {
    pattern:
      /([?&](?:token|api[_-]?key|key|secret|password|authorization)=)[^&\s]+/gi,
    replacement: '$1[REDACTED]',
  },
  {
    pattern:
      /(\b(?:token|api[_-]?key|apiKey|secret|password|authorization)\b"?\s*[:=]\s*")([^"]+)(")/gi,
    replacement: '$1[REDACTED]$3',
  },
  {
    pattern:
      /(\b(?:token|api[_-]?key|apiKey|secret|password|authorization)\b\s*[:=]\s*)([^\s,;"&]+)/gi,
    replacement: '$1[REDACTED]',
  },
]

// Object keys whose values are always replaced, whatever they contain.
const SENSITIVE_KEY_RE = /^(?:api[_-]?key|apikey|token|secret|password|authorization)$/i

export function sanitizeSensitiveText(value: string): string {
  return SENSITIVE_REPLACEMENTS.reduce((current, entry) => {
    return current.replace(entry.pattern, entry.replacement)
  }, value)
}

export function sanitizeUnknownValue(
  value: unknown,
  {
    depth = 0,
    seen = new WeakSet<object>(),
  }: {
    depth?: number
    seen?: WeakSet<object>
  } = {},
): unknown {
  if (depth > 8) {
    return '[REDACTED_DEPTH_LIMIT]'
  }

  if (typeof value === 'string') {
    return sanitizeSensitiveText(value)
  }

  if (
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value === null ||
    value === undefined
  ) {
    return value
  }

  if (value instanceof Date) {
    return value.toISOString()
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: sanitizeSensitiveText(value.message),
      stack: value.stack ? sanitizeSensitiveText(value.stack) : undefined,
      cause: sanitizeUnknownValue(value.cause, { depth: depth + 1, seen }),
    }
  }

  if (Array.isArray(value)) {
    return value.map((item) => {
      return sanitizeUnknownValue(item, { depth: depth + 1, seen })
    })
  }

  if (typeof value === 'object') {
    if (seen.has(value)) {
      return '[REDACTED_CIRCULAR]'
    }
    seen.add(value)

    const sanitizedEntries = Object.entries(value).map(([key, entryValue]) => {
      if (SENSITIVE_KEY_RE.test(key)) {
        return [key, '[REDACTED]']
      }
      return [key, sanitizeUnknownValue(entryValue, { depth: depth + 1, seen })]
    })
    return Object.fromEntries(sanitizedEntries)
  }

  return sanitizeSensitiveText(String(value))
}
