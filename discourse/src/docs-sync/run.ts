// One docs sync run: metadata -> scan -> credentials -> index topic ->
// prior topics -> plan -> apply -> report. Errors before the apply phase are
// returned as values and leave the forum untouched.

import path from 'node:path'
import { createLogger, LogPrefix } from '../logger.js'
import { mapWithConcurrency } from './concurrency.js'
import { createDiscourseClient, type DiscourseClient } from './discourse-client.js'
import { indexTopicTitle } from './markdown.js'
import { readDocsMetadata } from './metadata.js'
import { parseIndexBody } from './navigation-table.js'
import { planReconciliation, summarizePlan } from './plan.js'
import { applyReconciliation } from './reconcile.js'
import { createResultReporter } from './reporter.js'
import type { FetchLike, RetryPolicy } from './retry.js'
import { flattenDocTree, scanDocs } from './scanner.js'
import {
  DOCUMENTATION_FOLDER_NAME,
  IndexTopicError,
  isFatalSyncError,
  TopicNotFoundError,
  type FatalSyncError,
  type NavigationEntry,
  type RemoteLookup,
  type RemoteTopic,
  type SyncConfig,
  type SyncReport,
} from './types.js'

const syncLogger = createLogger(LogPrefix.SYNC)
const indexLogger = createLogger(LogPrefix.INDEX)

export type RunDocsSyncOptions = {
  config: SyncConfig
  /** Repository root holding metadata.yaml and the docs directory. */
  baseDir: string
  /** Index topic URL; overrides the `docs` key of metadata.yaml. */
  indexUrl?: string
  editReason?: string
  signal?: AbortSignal
  client?: DiscourseClient
  fetch?: FetchLike
  retryPolicy?: Partial<RetryPolicy>
}

async function loadIndexTopic({
  client,
  indexUrl,
}: {
  client: DiscourseClient
  indexUrl: string
}): Promise<{ topic: RemoteTopic; entries: NavigationEntry[] } | FatalSyncError> {
  const url = client.resolveTopicUrl(indexUrl)
  const topic = await client.fetchTopic({ url })
  if (topic instanceof Error) {
    if (isFatalSyncError(topic)) return topic
    return new IndexTopicError({ url, reason: topic.message, cause: topic })
  }

  const parsed = parseIndexBody({ body: topic.raw })
  if (parsed.error) {
    indexLogger.warn(
      `Ignoring the navigation table of ${topic.url}, every document will be created again: ${parsed.error.message}`,
    )
  }
  indexLogger.log(`Index topic ${topic.url} lists ${parsed.entries.length} entries`)
  return { topic, entries: parsed.entries }
}

async function lookupPriorTopics({
  client,
  entries,
  localPaths,
  concurrency,
}: {
  client: DiscourseClient
  entries: NavigationEntry[]
  localPaths: Set<string>
  concurrency: number
}): Promise<Map<string, RemoteLookup> | FatalSyncError> {
  // Removed entries are deleted by URL and need no lookup
  const linked = entries.filter((entry) => entry.link && localPaths.has(entry.path))
  const lookups = await mapWithConcurrency({
    items: linked,
    concurrency,
    fn: async (entry): Promise<[string, RemoteLookup]> => {
      const topic = await client.fetchTopic({
        url: client.resolveTopicUrl(entry.link ?? ''),
      })
      if (!(topic instanceof Error)) {
        return [entry.path, { status: 'found', topic }]
      }
      if (topic instanceof TopicNotFoundError) {
        return [entry.path, { status: 'missing' }]
      }
      return [entry.path, { status: 'error', error: topic }]
    },
  })

  for (const [, lookup] of lookups) {
    if (lookup.status === 'error' && isFatalSyncError(lookup.error)) {
      return lookup.error
    }
  }
  return new Map(lookups)
}

export async function runDocsSync({
  config,
  baseDir,
  indexUrl,
  editReason,
  signal,
  client: providedClient,
  fetch,
  retryPolicy,
}: RunDocsSyncOptions): Promise<SyncReport | FatalSyncError> {
  const metadata = await readDocsMetadata({ baseDir })
  if (metadata instanceof Error) return metadata

  const tree = await scanDocs({ docsDir: path.join(baseDir, DOCUMENTATION_FOLDER_NAME) })
  if (tree instanceof Error) return tree

  const client =
    providedClient ??
    createDiscourseClient({
      basePath: config.basePath,
      apiUsername: config.apiUsername,
      apiKey: config.apiKey,
      categoryId: config.categoryId,
      fetch,
      retryPolicy,
    })

  const credentials = await client.validateCredentials()
  if (credentials instanceof Error) return credentials

  const knownIndexUrl = indexUrl ?? metadata.indexUrl
  let indexTopic: RemoteTopic | null = null
  let priorEntries: NavigationEntry[] = []
  if (knownIndexUrl) {
    const loaded = await loadIndexTopic({ client, indexUrl: knownIndexUrl })
    if (loaded instanceof Error) return loaded
    indexTopic = loaded.topic
    priorEntries = loaded.entries
  } else {
    indexLogger.log('No index topic known yet, it will be created')
  }

  const localPaths = new Set(flattenDocTree({ tree }).map((node) => node.path))
  const remoteLookups = await lookupPriorTopics({
    client,
    entries: priorEntries,
    localPaths,
    concurrency: config.concurrency,
  })
  if (remoteLookups instanceof Error) return remoteLookups

  const plan = planReconciliation({
    tree,
    priorEntries,
    remoteLookups,
    deleteTopics: config.deleteTopics,
  })
  const summary = summarizePlan({ plan })
  syncLogger.info(
    `Plan: ${summary.create} create, ${summary.update} update, ${summary.delete} delete, ${summary.unlink} unlink, ${summary.skip} skip${config.dryRun ? ' (dry run)' : ''}`,
  )

  const result = await applyReconciliation({
    plan,
    client,
    index: {
      topic: indexTopic,
      title: indexTopicTitle({ name: metadata.name }),
      indexContent: tree.indexContent,
    },
    dryRun: config.dryRun,
    concurrency: config.concurrency,
    editReason,
    signal,
  })

  const reporter = createResultReporter({ config })
  reporter.add(...result.records)
  return reporter.build({
    indexUrl: result.indexUrl,
    fatalError: result.fatalError,
    aborted: result.aborted,
  })
}
