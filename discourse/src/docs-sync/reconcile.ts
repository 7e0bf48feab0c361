// Applies a reconciliation plan against Discourse.
// Phases run in order CREATE -> UPDATE -> DELETE, each through a bounded
// worker pool, and the index topic is written last, once. A per-topic failure
// becomes a failed record and keeps the prior table row; a fatal error stops
// every action that has not started yet and leaves the index untouched.

import { createLogger, LogPrefix } from '../logger.js'
import { mapWithConcurrency } from './concurrency.js'
import type { DiscourseClient } from './discourse-client.js'
import { fingerprintContent } from './markdown.js'
import { buildIndexBody, navigationEntry } from './navigation-table.js'
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_EDIT_REASON,
  DRY_RUN_URL_PLACEHOLDER,
  isFatalSyncError,
  TopicNotFoundError,
  type ActionKind,
  type ActionRecord,
  type FatalSyncError,
  type NavigationEntry,
  type PlannedAction,
  type RemoteTopic,
} from './types.js'

const syncLogger = createLogger(LogPrefix.SYNC)
const indexLogger = createLogger(LogPrefix.INDEX)

export type IndexTarget = {
  /** Existing index topic, or null when it has to be created. */
  topic: RemoteTopic | null
  title: string
  indexContent: string
}

export type ApplyReconciliationOptions = {
  plan: PlannedAction[]
  client: DiscourseClient
  index: IndexTarget
  dryRun: boolean
  concurrency?: number
  editReason?: string
  signal?: AbortSignal
}

export type ReconcileResult = {
  /** Plan order, then the index record. */
  records: ActionRecord[]
  /** Rows of the navigation table written (or that would be written) to the index. */
  entries: NavigationEntry[]
  indexUrl: string | null
  fatalError: FatalSyncError | null
  aborted: boolean
}

type ActionResult = {
  record: ActionRecord | null
  /** Link for the table row; undefined leaves the row out of the table. */
  link: string | null | undefined
}

type PlannedOf<K extends PlannedAction['action']> = Extract<PlannedAction, { action: K }>

function isAction<K extends PlannedAction['action']>(
  action: PlannedAction,
  kind: K,
): action is PlannedOf<K> {
  return action.action === kind
}

function recordKind(action: PlannedAction): ActionKind {
  return action.action === 'unlink' ? 'skip' : action.action
}

function logRecord({ record, dryRun }: { record: ActionRecord; dryRun: boolean }) {
  const target = record.path ?? '(index)'
  const message = `${record.action} ${target} -> ${record.url ?? '(no url)'} dry-run=${dryRun} outcome=${record.outcome}${record.reason ? ` (${record.reason})` : ''}`
  if (record.outcome === 'failure') {
    syncLogger.error(message)
    return
  }
  syncLogger.log(message)
}

export async function applyReconciliation({
  plan,
  client,
  index,
  dryRun,
  concurrency = DEFAULT_CONCURRENCY,
  editReason = DEFAULT_EDIT_REASON,
  signal,
}: ApplyReconciliationOptions): Promise<ReconcileResult> {
  const results: Array<ActionResult | undefined> = new Array(plan.length)
  const state: { fatal: FatalSyncError | null } = { fatal: null }

  const priorUrl = (prior: NavigationEntry | null) => {
    return prior?.link ? client.resolveTopicUrl(prior.link) : null
  }

  const pathOf = (action: PlannedAction) => {
    return 'node' in action ? action.node.path : action.prior.path
  }

  // Link a row keeps when its action did not go through
  const keptLink = (action: PlannedAction) => {
    if (action.action === 'unlink') return undefined
    return action.prior ? action.prior.link : undefined
  }

  const noteFatal = (error: Error) => {
    if (!state.fatal && isFatalSyncError(error)) {
      state.fatal = error
      syncLogger.error(`Fatal error, stopping remaining actions: ${error.message}`)
    }
  }

  const failed = ({ action, url, reason }: {
    action: PlannedAction
    url: string | null
    reason: string
  }): ActionResult => {
    return {
      record: { path: pathOf(action), url, action: recordKind(action), outcome: 'failure', reason },
      link: keptLink(action),
    }
  }

  // ─── Actions that need no remote call ──────────────────────────────────

  plan.forEach((action, position) => {
    if (action.action === 'skip') {
      if (action.error) {
        results[position] = failed({
          action,
          url: priorUrl(action.prior),
          reason: action.error.message,
        })
        return
      }
      if (action.node.content === null && !action.prior?.link) {
        results[position] = { record: null, link: null }
        return
      }
      results[position] = {
        record: {
          path: action.node.path,
          url: action.topic?.url ?? priorUrl(action.prior),
          action: 'skip',
          outcome: 'success',
          reason: 'unchanged',
        },
        link: action.prior?.link ?? null,
      }
      return
    }

    if (action.action === 'update' && action.topic === null) {
      results[position] = {
        record: {
          path: action.node.path,
          url: priorUrl(action.prior),
          action: 'update',
          outcome: dryRun ? 'skip' : 'success',
          reason: dryRun ? 'dry-run' : 'unlinked',
        },
        link: null,
      }
      return
    }

    if (action.action === 'unlink') {
      results[position] = {
        record: {
          path: action.prior.path,
          url: priorUrl(action.prior),
          action: 'skip',
          outcome: 'skip',
          reason: 'delete-topics disabled',
        },
        link: undefined,
      }
    }
  })

  // ─── Remote phases ─────────────────────────────────────────────────────

  const runPhase = async <K extends 'create' | 'update' | 'delete'>(
    kind: K,
    run: (action: PlannedOf<K>) => Promise<ActionResult>,
  ) => {
    const pending: Array<{ position: number; action: PlannedOf<K> }> = []
    plan.forEach((action, position) => {
      if (results[position] === undefined && isAction(action, kind)) {
        pending.push({ position, action })
      }
    })
    if (pending.length === 0) return

    syncLogger.info(`${kind} phase: ${pending.length} action(s)`)
    await mapWithConcurrency({
      items: pending,
      concurrency,
      fn: async ({ position, action }) => {
        const planned: PlannedAction = action
        if (signal?.aborted) {
          results[position] = {
            record: {
              path: pathOf(planned),
              url: priorUrl(planned.prior),
              action: recordKind(planned),
              outcome: 'skip',
              reason: 'aborted',
            },
            link: keptLink(planned),
          }
          return
        }
        if (state.fatal) {
          results[position] = failed({
            action: planned,
            url: priorUrl(planned.prior),
            reason: state.fatal.message,
          })
          return
        }
        results[position] = await run(action)
      },
    })
  }

  await runPhase('create', async (action) => {
    if (dryRun) {
      return {
        record: {
          path: action.node.path,
          url: DRY_RUN_URL_PLACEHOLDER,
          action: 'create',
          outcome: 'skip',
          reason: 'dry-run',
        },
        // The row a real run would add; the table is only compared, never written
        link: DRY_RUN_URL_PLACEHOLDER,
      }
    }
    const created = await client.createTopic({
      title: action.node.title,
      raw: action.node.content ?? '',
    })
    if (created instanceof Error) {
      noteFatal(created)
      return failed({ action, url: priorUrl(action.prior), reason: created.message })
    }
    return {
      record: { path: action.node.path, url: created.url, action: 'create', outcome: 'success' },
      link: client.toTableLink(created.url),
    }
  })

  await runPhase('update', async (action) => {
    const { topic } = action
    if (!topic) {
      return failed({ action, url: priorUrl(action.prior), reason: 'no remote topic to update' })
    }
    if (!topic.canEdit) {
      return failed({ action, url: topic.url, reason: 'missing permission to edit the topic' })
    }
    if (dryRun) {
      return {
        record: {
          path: action.node.path,
          url: topic.url,
          action: 'update',
          outcome: 'skip',
          reason: 'dry-run',
        },
        link: action.prior.link,
      }
    }
    const updated = await client.updateTopic({
      topic,
      raw: action.node.content ?? '',
      editReason,
    })
    if (updated instanceof Error) {
      noteFatal(updated)
      return failed({ action, url: topic.url, reason: updated.message })
    }
    return {
      record: { path: action.node.path, url: updated.url, action: 'update', outcome: 'success' },
      link: action.prior.link,
    }
  })

  await runPhase('delete', async (action) => {
    const url = client.resolveTopicUrl(action.prior.link ?? '')
    if (dryRun) {
      return {
        record: { path: action.prior.path, url, action: 'delete', outcome: 'skip', reason: 'dry-run' },
        link: undefined,
      }
    }
    const deleted = await client.deleteTopic({ url })
    if (deleted instanceof Error && !(deleted instanceof TopicNotFoundError)) {
      noteFatal(deleted)
      return failed({ action, url, reason: deleted.message })
    }
    return {
      record: {
        path: action.prior.path,
        url,
        action: 'delete',
        outcome: 'success',
        ...(deleted instanceof Error ? { reason: 'already deleted' } : {}),
      },
      link: undefined,
    }
  })

  // ─── Navigation table ──────────────────────────────────────────────────

  const entries: NavigationEntry[] = []
  const keptRemovedEntries: NavigationEntry[] = []
  const records: ActionRecord[] = []
  plan.forEach((action, position) => {
    const result = results[position]
    if (!result) return
    if (result.record) {
      records.push(result.record)
      logRecord({ record: result.record, dryRun })
    }
    if (result.link === undefined) return
    if ('node' in action) {
      entries.push(
        navigationEntry({
          level: action.node.level,
          path: action.node.path,
          title: action.node.title,
          link: result.link,
        }),
      )
      return
    }
    // A removed entry whose delete failed stays so the next run retries it
    keptRemovedEntries.push(navigationEntry({ ...action.prior, link: result.link }))
  })
  const tableEntries = [...entries, ...keptRemovedEntries]

  // ─── Index topic ───────────────────────────────────────────────────────

  const aborted = signal?.aborted ?? false
  const indexKind: ActionKind = index.topic ? 'update' : 'create'
  const existingIndexUrl = index.topic?.url ?? null

  if (state.fatal || aborted) {
    const indexRecord: ActionRecord = {
      path: null,
      url: existingIndexUrl,
      action: indexKind,
      outcome: state.fatal ? 'failure' : 'skip',
      reason: state.fatal ? state.fatal.message : 'aborted',
    }
    records.push(indexRecord)
    logRecord({ record: indexRecord, dryRun })
    return {
      records,
      entries: tableEntries,
      indexUrl: existingIndexUrl,
      fatalError: state.fatal,
      aborted,
    }
  }

  const written = await writeIndexTopic({
    client,
    index,
    body: buildIndexBody({ indexContent: index.indexContent, entries: tableEntries }),
    dryRun,
    editReason,
  })
  if (written.error) {
    noteFatal(written.error)
  }
  records.push(written.record)
  logRecord({ record: written.record, dryRun })

  return {
    records,
    entries: tableEntries,
    indexUrl: written.url,
    fatalError: state.fatal,
    aborted: false,
  }
}

async function writeIndexTopic({
  client,
  index,
  body,
  dryRun,
  editReason,
}: {
  client: DiscourseClient
  index: IndexTarget
  body: string
  dryRun: boolean
  editReason: string
}): Promise<{ record: ActionRecord; url: string | null; error: Error | null }> {
  const { topic } = index

  if (!topic) {
    if (dryRun) {
      return {
        record: {
          path: null,
          url: DRY_RUN_URL_PLACEHOLDER,
          action: 'create',
          outcome: 'skip',
          reason: 'dry-run',
        },
        url: null,
        error: null,
      }
    }
    const created = await client.createTopic({ title: index.title, raw: body })
    if (created instanceof Error) {
      indexLogger.error(`Failed to create the index topic: ${created.message}`)
      return {
        record: { path: null, url: null, action: 'create', outcome: 'failure', reason: created.message },
        url: null,
        error: created,
      }
    }
    indexLogger.log(`Created index topic ${created.url}`)
    return {
      record: { path: null, url: created.url, action: 'create', outcome: 'success' },
      url: created.url,
      error: null,
    }
  }

  if (fingerprintContent({ content: body }) === topic.fingerprint) {
    return {
      record: { path: null, url: topic.url, action: 'skip', outcome: 'success', reason: 'unchanged' },
      url: topic.url,
      error: null,
    }
  }
  if (dryRun) {
    return {
      record: { path: null, url: topic.url, action: 'update', outcome: 'skip', reason: 'dry-run' },
      url: topic.url,
      error: null,
    }
  }
  if (!topic.canEdit) {
    return {
      record: {
        path: null,
        url: topic.url,
        action: 'update',
        outcome: 'failure',
        reason: 'missing permission to edit the index topic',
      },
      url: topic.url,
      error: null,
    }
  }

  const updated = await client.updateTopic({ topic, raw: body, editReason })
  if (updated instanceof Error) {
    indexLogger.error(`Failed to update the index topic: ${updated.message}`)
    return {
      record: { path: null, url: topic.url, action: 'update', outcome: 'failure', reason: updated.message },
      url: topic.url,
      error: updated,
    }
  }
  indexLogger.log(`Updated index topic ${updated.url}`)
  return {
    record: { path: null, url: updated.url, action: 'update', outcome: 'success' },
    url: updated.url,
    error: null,
  }
}
