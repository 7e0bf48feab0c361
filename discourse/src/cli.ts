#!/usr/bin/env node
// Command line entry point for discourse-docs-sync.
// Resolves the run configuration from flags and INPUT_* variables, runs one
// sync, prints a summary and writes the pipeline outputs to $GITHUB_OUTPUT.

import fs from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import { Command } from 'commander'
import { loadSyncConfig } from './config.js'
import { runDocsSync } from './docs-sync/run.js'
import { formatReportSummary, hasFailures, reportOutputs } from './docs-sync/reporter.js'
import type { FetchLike, RetryPolicy } from './docs-sync/retry.js'
import { createLogger, formatErrorWithStack, initLogFile, LogPrefix } from './logger.js'
import { initSentry, notifyError } from './sentry.js'

const cliLogger = createLogger(LogPrefix.CLI)

export type SyncCommandFlags = {
  baseDir?: string
  host?: string
  apiUsername?: string
  apiKey?: string
  categoryId?: string
  indexUrl?: string
  dryRun?: boolean
  deleteTopics?: boolean
  concurrency?: string
  logFile?: string
}

export type SyncCommandDeps = {
  env?: Record<string, string | undefined>
  fetch?: FetchLike
  retryPolicy?: Partial<RetryPolicy>
  signal?: AbortSignal
}

export async function writeGithubOutputs({
  filePath,
  outputs,
}: {
  filePath: string
  outputs: Record<string, string>
}): Promise<void> {
  const lines = Object.entries(outputs).map(([name, value]) => `${name}=${value}\n`)
  await fs.promises.appendFile(filePath, lines.join(''))
}

/** Runs one sync and returns the process exit code. */
export async function runSyncCommand(
  flags: SyncCommandFlags,
  { env = process.env, fetch, retryPolicy, signal }: SyncCommandDeps = {},
): Promise<number> {
  if (flags.logFile) {
    initLogFile(flags.logFile)
  }

  const config = loadSyncConfig({
    inputs: {
      discourseHost: flags.host,
      discourseApiUsername: flags.apiUsername,
      discourseApiKey: flags.apiKey,
      discourseCategoryId: flags.categoryId,
      deleteTopics: flags.deleteTopics,
      dryRun: flags.dryRun,
      concurrency: flags.concurrency,
    },
    env,
  })
  if (config instanceof Error) {
    cliLogger.error(config.message)
    return 1
  }

  const baseDir = path.resolve(flags.baseDir ?? env.GITHUB_WORKSPACE ?? '.')
  cliLogger.log(
    `Syncing ${baseDir} to ${config.basePath} (category ${config.categoryId}${config.dryRun ? ', dry run' : ''})`,
  )

  const report = await runDocsSync({
    config,
    baseDir,
    indexUrl: flags.indexUrl,
    fetch,
    retryPolicy,
    signal,
  })
  if (report instanceof Error) {
    cliLogger.error(`Sync aborted: ${formatErrorWithStack(report)}`)
    await notifyError(report, 'docs sync failed before applying changes')
    return 1
  }

  cliLogger.info(formatReportSummary({ report }))
  if (report.fatalError) {
    await notifyError(report.fatalError, 'docs sync stopped by a fatal error')
  }

  const outputFile = env.GITHUB_OUTPUT
  if (outputFile) {
    const written = await writeGithubOutputs({
      filePath: outputFile,
      outputs: reportOutputs({ report }),
    }).catch((cause: unknown) => {
      return new Error(`failed to write outputs to ${outputFile}`, { cause })
    })
    if (written instanceof Error) {
      cliLogger.error(formatErrorWithStack(written))
      return 1
    }
  }

  return hasFailures({ report }) ? 1 : 0
}

export function createProgram(deps: SyncCommandDeps = {}): Command {
  const program = new Command()

  program
    .name('discourse-docs-sync')
    .description('Publish a docs directory as topics in a Discourse category')
    .version('0.1.0')

  program
    .command('sync')
    .description('Create, update and delete topics so the forum mirrors the docs directory')
    .option('--base-dir <dir>', 'Repository root containing metadata.yaml and docs/')
    .option('--host <host>', 'Discourse host without protocol, e.g. discourse.example.com')
    .option('--api-username <username>', 'Discourse API username')
    .option('--api-key <key>', 'Discourse API key')
    .option('--category-id <id>', 'Category the topics are created in')
    .option('--index-url <url>', 'Index topic URL, overrides the docs key of metadata.yaml')
    .option('--dry-run', 'Plan and report without changing the forum')
    .option('--delete-topics', 'Delete topics whose document was removed')
    .option('--no-delete-topics', 'Keep topics whose document was removed, only unlink them')
    .option('--concurrency <n>', 'Topic requests in flight at once')
    .option('--log-file <path>', 'Also write the log to this file')
    .action(async (flags: SyncCommandFlags) => {
      process.exitCode = await runSyncCommand(flags, deps)
    })

  return program
}

async function main() {
  initSentry()
  const controller = new AbortController()
  const abort = () => {
    cliLogger.warn('Interrupted, finishing the current phase and skipping the rest')
    controller.abort()
  }
  process.once('SIGINT', abort)
  process.once('SIGTERM', abort)

  const program = createProgram({ signal: controller.signal })
  await program.parseAsync(process.argv).finally(() => {
    process.off('SIGINT', abort)
    process.off('SIGTERM', abort)
  })
}

const entryPath = process.argv[1]
if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
  main().catch(async (error: unknown) => {
    cliLogger.error(`Unhandled error: ${formatErrorWithStack(error)}`)
    await notifyError(error, 'unhandled docs sync error')
    process.exit(1)
  })
}
