// Prefixed logging utility using @clack/prompts for consistent visual style.
// Every log line goes through the privacy sanitizer so API keys passed around
// in config objects or error causes never reach the terminal or the log file.

import { log as clackLog } from '@clack/prompts'
import fs from 'node:fs'
import path from 'node:path'
import util from 'node:util'
import pc from 'picocolors'
import { sanitizeSensitiveText, sanitizeUnknownValue } from './privacy-sanitizer.js'

// All known log prefixes - add new ones here to keep alignment consistent
export const LogPrefix = {
  CLI: 'CLI',
  DISCOURSE: 'DISCOURSE',
  INDEX: 'INDEX',
  SCAN: 'SCAN',
  SYNC: 'SYNC',
} as const

export type LogPrefixType = (typeof LogPrefix)[keyof typeof LogPrefix]

const MAX_PREFIX_LENGTH = Math.max(
  ...Object.values(LogPrefix).map((p) => p.length),
)

// Set by initLogFile(). Before that, file logging is skipped.
let logFilePath: string | null = null

/**
 * Initialize file logging. The file is truncated so it only contains the
 * current run, which is what a pipeline uploads as an artifact.
 */
export function initLogFile(filePath: string): void {
  logFilePath = path.resolve(filePath)
  const logDir = path.dirname(logFilePath)
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true })
  }
  fs.writeFileSync(
    logFilePath,
    `--- docs sync log started at ${new Date().toISOString()} ---\n`,
  )
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') {
    return sanitizeSensitiveText(arg)
  }
  const safeArg = sanitizeUnknownValue(arg)
  return util.inspect(safeArg, { colors: true, depth: 4 })
}

export function formatErrorWithStack(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeSensitiveText(error.stack ?? `${error.name}: ${error.message}`)
  }
  if (typeof error === 'string') {
    return sanitizeSensitiveText(error)
  }

  // Keep this stable and safe for unknown values (handles circular structures).
  const safeError = sanitizeUnknownValue(error)
  return sanitizeSensitiveText(util.inspect(safeError, { colors: false, depth: 4 }))
}

function writeToFile(level: string, prefix: string, args: unknown[]) {
  if (!logFilePath) {
    return
  }
  const timestamp = new Date().toISOString()
  const message = `[${timestamp}] [${level}] [${prefix}] ${args.map(formatArg).join(' ')}\n`
  fs.appendFileSync(logFilePath, message)
}

function getTimestamp(): string {
  const now = new Date()
  return `${String(now.getHours()).padStart(2, '0')}:${String(now.getMinutes()).padStart(2, '0')}`
}

function padPrefix(prefix: string): string {
  return prefix.padEnd(MAX_PREFIX_LENGTH)
}

function formatMessage(
  timestamp: string,
  prefix: string,
  args: unknown[],
): string {
  return [pc.dim(timestamp), prefix, ...args.map(formatArg)].join(' ')
}

// Suppress clack terminal output during vitest runs. File logging still works.
const isVitest = !!process.env['DOCS_SYNC_VITEST']

export type Logger = ReturnType<typeof createLogger>

export function createLogger(prefix: LogPrefixType | string) {
  const paddedPrefix = padPrefix(prefix)
  const log = (...args: unknown[]) => {
    writeToFile('LOG', prefix, args)
    if (isVitest) {
      return
    }
    clackLog.message(formatMessage(getTimestamp(), pc.cyan(paddedPrefix), args))
  }
  return {
    log,
    error: (...args: unknown[]) => {
      writeToFile('ERROR', prefix, args)
      if (isVitest) {
        return
      }
      clackLog.error(formatMessage(getTimestamp(), pc.red(paddedPrefix), args))
    },
    warn: (...args: unknown[]) => {
      writeToFile('WARN', prefix, args)
      if (isVitest) {
        return
      }
      clackLog.warn(formatMessage(getTimestamp(), pc.yellow(paddedPrefix), args))
    },
    info: (...args: unknown[]) => {
      writeToFile('INFO', prefix, args)
      if (isVitest) {
        return
      }
      clackLog.info(formatMessage(getTimestamp(), pc.blue(paddedPrefix), args))
    },
    debug: log,
  }
}
