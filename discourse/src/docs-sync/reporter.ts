// Result reporter. Collects action records in plan order and turns them into
// the run report and the key/value outputs handed to the calling pipeline.

import {
  DRY_RUN_URL_PLACEHOLDER,
  type ActionOutcome,
  type ActionRecord,
  type DiscourseConfigDescriptor,
  type FatalSyncError,
  type SyncConfig,
  type SyncReport,
} from './types.js'

export function describeDiscourseConfig({
  config,
}: {
  config: SyncConfig
}): DiscourseConfigDescriptor {
  return {
    hostname: config.hostname,
    category_id: config.categoryId,
    api_username: config.apiUsername,
    api_key: config.apiKey,
  }
}

export function createResultReporter({ config }: { config: SyncConfig }) {
  const records: ActionRecord[] = []

  return {
    add(...added: ActionRecord[]) {
      records.push(...added)
    },
    build({
      indexUrl,
      fatalError = null,
      aborted = false,
    }: {
      indexUrl: string | null
      fatalError?: FatalSyncError | null
      aborted?: boolean
    }): SyncReport {
      const urlsWithActions: Record<string, ActionOutcome> = {}
      for (const record of records) {
        if (!record.url || record.url === DRY_RUN_URL_PLACEHOLDER) continue
        urlsWithActions[record.url] = record.outcome
      }
      return {
        records: [...records],
        urlsWithActions,
        indexUrl,
        discourseConfig: describeDiscourseConfig({ config }),
        fatalError,
        aborted,
      }
    },
  }
}

export type ResultReporter = ReturnType<typeof createResultReporter>

export function hasFailures({ report }: { report: SyncReport }): boolean {
  return report.fatalError !== null || report.records.some((record) => record.outcome === 'failure')
}

/** `name=value` pairs for the pipeline's output file. */
export function reportOutputs({ report }: { report: SyncReport }): Record<string, string> {
  return {
    urls_with_actions: JSON.stringify(report.urlsWithActions),
    index_url: report.indexUrl ?? '',
    discourse_config: JSON.stringify(report.discourseConfig),
  }
}

export function formatReportSummary({ report }: { report: SyncReport }): string {
  const counts = new Map<string, number>()
  for (const record of report.records) {
    const key = `${record.action}/${record.outcome}`
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }
  const parts = [...counts.entries()].map(([key, count]) => `${key}=${count}`)
  const lines = [
    `${report.records.length} record(s)${parts.length > 0 ? `: ${parts.join(', ')}` : ''}`,
    `index: ${report.indexUrl ?? '(none)'}`,
  ]
  for (const record of report.records) {
    if (record.outcome !== 'failure') continue
    lines.push(`failed ${record.action} ${record.path ?? '(index)'}: ${record.reason ?? 'unknown error'}`)
  }
  if (report.fatalError) {
    lines.push(`fatal: ${report.fatalError.message}`)
  }
  if (report.aborted) {
    lines.push('aborted before completion')
  }
  return lines.join('\n')
}
