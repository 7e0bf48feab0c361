// End-to-end sync runs against DigitalDiscourse: a temporary repository with
// metadata.yaml and docs/, synced through the real client and engine.

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { DigitalDiscourse } from 'discourse-digital-twin'
import { runDocsSync } from './run.js'
import {
  AuthenticationError,
  DRY_RUN_URL_PLACEHOLDER,
  HostUnreachableError,
  IndexTopicError,
  type SyncConfig,
  type SyncReport,
} from './types.js'

const TABLE_HEADER = '# Navigation\n\n| Level | Path | Navlink |\n| -- | -- | -- |'
const INDEX_URL = 'https://discourse.test/t/my-charm-documentation-overview'

function writeFile(root: string, relativePath: string, content: string) {
  const filePath = path.join(root, relativePath)
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, content)
}

function configFor(discourse: DigitalDiscourse, overrides: Partial<SyncConfig> = {}): SyncConfig {
  return {
    hostname: discourse.hostname,
    basePath: discourse.basePath,
    apiUsername: discourse.apiUsername,
    apiKey: discourse.apiKey,
    categoryId: 41,
    deleteTopics: true,
    dryRun: false,
    concurrency: 1,
    ...overrides,
  }
}

function expectReport(result: SyncReport | Error): SyncReport {
  if (result instanceof Error) {
    throw result
  }
  return result
}

describe('runDocsSync', () => {
  let baseDir: string
  let discourse: DigitalDiscourse

  const sync = async ({
    config = {},
    indexUrl,
    signal,
  }: {
    config?: Partial<SyncConfig>
    indexUrl?: string
    signal?: AbortSignal
  } = {}) => {
    return await runDocsSync({
      config: configFor(discourse, config),
      baseDir,
      indexUrl,
      signal,
      fetch: discourse.fetch,
      retryPolicy: { maxRetries: 2, baseDelayMs: 0, maxDelayMs: 0 },
    })
  }

  const outcomes = (report: SyncReport) => {
    return report.records.map((record) => `${record.action}/${record.outcome} ${record.path ?? '(index)'}`)
  }

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docs-sync-e2e-'))
    discourse = new DigitalDiscourse()
    writeFile(baseDir, 'metadata.yaml', 'name: my-charm\n')
  })

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true })
  })

  test('creates topics and the index on an empty forum', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    writeFile(baseDir, 'docs/nested-dir/doc.md', '# Nested Doc\n\nNested content')

    const report = expectReport(await sync())

    expect(outcomes(report)).toEqual([
      'create/success doc',
      'create/success nested-dir/doc',
      'create/success (index)',
    ])
    expect(report.urlsWithActions).toEqual({
      'https://discourse.test/t/doc/10': 'success',
      'https://discourse.test/t/nested-doc/11': 'success',
      [`${INDEX_URL}/12`]: 'success',
    })
    expect(report.indexUrl).toBe(`${INDEX_URL}/12`)
    expect(report.fatalError).toBeNull()
    expect(report.discourseConfig).toEqual({
      hostname: 'discourse.test',
      category_id: 41,
      api_username: 'docs-bot',
      api_key: 'test-api-key',
    })

    const index = discourse.getTopic({ topicId: 12 })
    expect(index?.title).toBe('My Charm Documentation Overview')
    expect(index?.raw).toBe(
      [
        TABLE_HEADER,
        '| 1 | doc | [Doc](/t/doc/10) |',
        '| 1 | nested-dir | [Nested Dir]() |',
        '| 2 | nested-dir/doc | [Nested Doc](/t/nested-doc/11) |',
      ].join('\n'),
    )
  })

  test('a second run without changes mutates nothing', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    writeFile(baseDir, 'docs/nested-dir/doc.md', '# Nested Doc\n\nNested content')
    const first = expectReport(await sync())
    discourse.resetRequests()

    const second = expectReport(await sync({ indexUrl: first.indexUrl ?? undefined }))

    expect(discourse.mutatingRequests()).toEqual([])
    expect(outcomes(second)).toEqual([
      'skip/success doc',
      'skip/success nested-dir/doc',
      'skip/success (index)',
    ])
    expect(second.indexUrl).toBe(first.indexUrl)
  })

  test('reads the index URL from metadata.yaml', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    const first = expectReport(await sync())
    writeFile(baseDir, 'metadata.yaml', `name: my-charm\ndocs: ${first.indexUrl ?? ''}\n`)

    const second = expectReport(await sync())
    expect(outcomes(second)).toEqual(['skip/success doc', 'skip/success (index)'])
    expect(discourse.liveTopics()).toHaveLength(2)
  })

  test('dry run plans everything and writes nothing', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    writeFile(baseDir, 'docs/other.md', '# Other\n\nMore')

    const report = expectReport(await sync({ config: { dryRun: true } }))

    expect(discourse.mutatingRequests()).toEqual([])
    expect(discourse.liveTopics()).toEqual([])
    expect(report.urlsWithActions).toEqual({})
    expect(report.indexUrl).toBeNull()
    expect(report.records).toEqual([
      { path: 'doc', url: DRY_RUN_URL_PLACEHOLDER, action: 'create', outcome: 'skip', reason: 'dry-run' },
      { path: 'other', url: DRY_RUN_URL_PLACEHOLDER, action: 'create', outcome: 'skip', reason: 'dry-run' },
      { path: null, url: DRY_RUN_URL_PLACEHOLDER, action: 'create', outcome: 'skip', reason: 'dry-run' },
    ])
  })

  test('dry run against a synced forum reports updates and deletes as skipped', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    writeFile(baseDir, 'docs/other.md', '# Other\n\nMore')
    const first = expectReport(await sync())
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nChanged content')
    fs.rmSync(path.join(baseDir, 'docs/other.md'))
    discourse.resetRequests()

    const report = expectReport(
      await sync({ config: { dryRun: true }, indexUrl: first.indexUrl ?? undefined }),
    )

    expect(discourse.mutatingRequests()).toEqual([])
    expect(outcomes(report)).toEqual([
      'update/skip doc',
      'delete/skip other',
      'update/skip (index)',
    ])
    expect(discourse.getTopic({ topicId: 10 })?.raw).toBe('# Doc\n\nContent')
  })

  test('dry run reports the index update a new document would cause', async () => {
    writeFile(baseDir, 'docs/a.md', '# A\n\ntext a')
    const first = expectReport(await sync())
    writeFile(baseDir, 'docs/b.md', '# B\n\ntext b')
    discourse.resetRequests()

    const report = expectReport(
      await sync({ config: { dryRun: true }, indexUrl: first.indexUrl ?? undefined }),
    )

    expect(discourse.mutatingRequests()).toEqual([])
    expect(report.records).toEqual([
      { path: 'a', url: 'https://discourse.test/t/a/10', action: 'skip', outcome: 'success', reason: 'unchanged' },
      { path: 'b', url: DRY_RUN_URL_PLACEHOLDER, action: 'create', outcome: 'skip', reason: 'dry-run' },
      { path: null, url: `${INDEX_URL}/11`, action: 'update', outcome: 'skip', reason: 'dry-run' },
    ])
  })

  test('an update that keeps failing does not hold back other changes', async () => {
    writeFile(baseDir, 'docs/a.md', '# A\n\ntext a')
    writeFile(baseDir, 'docs/b.md', '# B\n\ntext b')
    writeFile(baseDir, 'docs/gone.md', '# Gone\n\ntext gone')
    const first = expectReport(await sync())
    writeFile(baseDir, 'docs/a.md', '# A\n\nnew text a')
    writeFile(baseDir, 'docs/b.md', '# B\n\nnew text b')
    writeFile(baseDir, 'docs/c.md', '# C\n\ntext c')
    fs.rmSync(path.join(baseDir, 'docs/gone.md'))
    // Post 100 is the first post of topic a
    discourse.failNext({ method: 'PUT', path: '/posts/100.json', status: 503, times: 10 })

    const report = expectReport(await sync({ indexUrl: first.indexUrl ?? undefined }))

    expect(report.fatalError).toBeNull()
    expect(outcomes(report)).toEqual([
      'update/failure a',
      'update/success b',
      'create/success c',
      'delete/success gone',
      'update/success (index)',
    ])
    expect(report.records[0]?.reason).toBe(
      'Topic update failed for https://discourse.test/t/a/10: HTTP 503: injected fault',
    )
    expect(discourse.getTopic({ topicId: 10 })?.raw).toBe('# A\n\ntext a')
    expect(discourse.getTopic({ topicId: 11 })?.raw).toBe('# B\n\nnew text b')
    expect(discourse.getTopic({ topicId: 12 })?.deleted).toBe(true)
    expect(discourse.getTopic({ topicId: 13 })?.raw).toBe(
      [
        TABLE_HEADER,
        '| 1 | a | [A](/t/a/10) |',
        '| 1 | b | [B](/t/b/11) |',
        '| 1 | c | [C](/t/c/14) |',
      ].join('\n'),
    )
  })

  test('keeps removed topics when deletes are disabled', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    writeFile(baseDir, 'docs/other.md', '# Other\n\nMore')
    const first = expectReport(await sync())
    fs.rmSync(path.join(baseDir, 'docs/other.md'))

    const report = expectReport(
      await sync({ config: { deleteTopics: false }, indexUrl: first.indexUrl ?? undefined }),
    )

    expect(outcomes(report)).toEqual([
      'skip/success doc',
      'skip/skip other',
      'update/success (index)',
    ])
    expect(report.urlsWithActions).toEqual({
      'https://discourse.test/t/doc/10': 'success',
      'https://discourse.test/t/other/11': 'skip',
      [`${INDEX_URL}/12`]: 'success',
    })
    expect(discourse.getTopic({ topicId: 11 })?.deleted).toBe(false)
    expect(discourse.getTopic({ topicId: 12 })?.raw).toBe(
      `${TABLE_HEADER}\n| 1 | doc | [Doc](/t/doc/10) |`,
    )
  })

  test('deletes removed topics when deletes are enabled', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    writeFile(baseDir, 'docs/other.md', '# Other\n\nMore')
    const first = expectReport(await sync())
    fs.rmSync(path.join(baseDir, 'docs/other.md'))

    const report = expectReport(await sync({ indexUrl: first.indexUrl ?? undefined }))

    expect(outcomes(report)).toEqual([
      'skip/success doc',
      'delete/success other',
      'update/success (index)',
    ])
    expect(discourse.getTopic({ topicId: 11 })?.deleted).toBe(true)
    expect(discourse.getTopic({ topicId: 12 })?.raw).toBe(
      `${TABLE_HEADER}\n| 1 | doc | [Doc](/t/doc/10) |`,
    )
  })

  test('updates changed documents with the edit reason', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    const first = expectReport(await sync())
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nBetter content')

    const report = expectReport(await sync({ indexUrl: first.indexUrl ?? undefined }))

    expect(outcomes(report)).toEqual(['update/success doc', 'skip/success (index)'])
    expect(discourse.getTopic({ topicId: 10 })).toMatchObject({
      raw: '# Doc\n\nBetter content',
      editReasons: ['Documentation updated'],
    })
  })

  test('overwrites edits made on the forum', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    const first = expectReport(await sync())
    discourse.editTopicRaw({ topicId: 10, raw: 'Edited on the forum' })

    const report = expectReport(await sync({ indexUrl: first.indexUrl ?? undefined }))

    expect(outcomes(report)).toEqual(['update/success doc', 'skip/success (index)'])
    expect(discourse.getTopic({ topicId: 10 })?.raw).toBe('# Doc\n\nContent')
  })

  test('recreates a topic that was deleted on the forum', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    const first = expectReport(await sync())
    discourse.deleteTopicDirectly({ topicId: 10 })

    const report = expectReport(await sync({ indexUrl: first.indexUrl ?? undefined }))

    expect(outcomes(report)).toEqual(['create/success doc', 'update/success (index)'])
    expect(discourse.getTopic({ topicId: 11 })?.raw).toBe(
      `${TABLE_HEADER}\n| 1 | doc | [Doc](/t/doc/12) |`,
    )
  })

  test('one failed create does not stop the others', async () => {
    writeFile(baseDir, 'docs/a.md', '# A\n\ntext a')
    writeFile(baseDir, 'docs/b.md', '# B\n\ntext b')
    discourse.failNext({ method: 'POST', path: '/posts.json', status: 422 })

    const report = expectReport(await sync())

    expect(report.records[0]).toEqual({
      path: 'a',
      url: null,
      action: 'create',
      outcome: 'failure',
      reason: 'Topic create failed for https://discourse.test/posts.json: HTTP 422: injected fault',
    })
    expect(outcomes(report)).toEqual([
      'create/failure a',
      'create/success b',
      'create/success (index)',
    ])
    expect(discourse.getTopic({ topicId: 11 })?.raw).toBe(
      `${TABLE_HEADER}\n| 1 | b | [B](/t/b/10) |`,
    )
  })

  test('rejected credentials abort before any change', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    const result = await sync({ config: { apiKey: 'wrong-key' } })
    expect(result).toBeInstanceOf(AuthenticationError)
    expect(discourse.mutatingRequests()).toEqual([])
  })

  test('an unreachable host mid-run stops the remaining actions and skips the index', async () => {
    writeFile(baseDir, 'docs/a.md', '# A\n\ntext a')
    writeFile(baseDir, 'docs/b.md', '# B\n\ntext b')
    discourse.failNext({ method: 'POST', networkError: true })

    const report = expectReport(await sync())

    expect(report.fatalError).toBeInstanceOf(HostUnreachableError)
    expect(outcomes(report)).toEqual([
      'create/failure a',
      'create/failure b',
      'create/failure (index)',
    ])
    // A create is not repeated after a dropped connection
    expect(report.records[1]?.reason).toBe(
      'Discourse host unreachable for https://discourse.test/posts.json after 1 attempts',
    )
    expect(discourse.mutatingRequests()).toHaveLength(1)
    expect(discourse.liveTopics()).toEqual([])
  })

  test('a malformed navigation table is ignored and every document is created', async () => {
    const index = discourse.seedTopic({
      title: 'My Charm Documentation Overview',
      raw: `Intro\n\n${TABLE_HEADER}\n| x | doc | [Doc](/t/doc/1) |`,
    })
    writeFile(baseDir, 'docs/index.md', 'Intro')
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')

    const report = expectReport(await sync({ indexUrl: index.url }))

    expect(outcomes(report)).toEqual(['create/success doc', 'update/success (index)'])
    expect(discourse.getTopic({ topicId: index.id })?.raw).toBe(
      `Intro\n\n${TABLE_HEADER}\n| 1 | doc | [Doc](/t/doc/11) |`,
    )
  })

  test('an index topic that cannot be read is fatal', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    const result = await sync({ indexUrl: 'https://discourse.test/t/missing/99' })
    expect(result).toBeInstanceOf(IndexTopicError)
    expect(discourse.mutatingRequests()).toEqual([])
  })

  test('an index topic the user cannot edit fails only the index record', async () => {
    const index = discourse.seedTopic({
      title: 'My Charm Documentation Overview',
      raw: 'Old index',
      canEdit: false,
    })
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')

    const report = expectReport(await sync({ indexUrl: index.url }))

    expect(report.records.at(-1)).toEqual({
      path: null,
      url: index.url,
      action: 'update',
      outcome: 'failure',
      reason: 'missing permission to edit the index topic',
    })
    expect(outcomes(report)[0]).toBe('create/success doc')
  })

  test('an aborted run records the remaining actions as skipped', async () => {
    writeFile(baseDir, 'docs/doc.md', '# Doc\n\nContent')
    const controller = new AbortController()
    controller.abort()

    const report = expectReport(await sync({ signal: controller.signal }))

    expect(report.aborted).toBe(true)
    expect(report.records).toEqual([
      { path: 'doc', url: null, action: 'create', outcome: 'skip', reason: 'aborted' },
      { path: null, url: null, action: 'create', outcome: 'skip', reason: 'aborted' },
    ])
    expect(discourse.mutatingRequests()).toEqual([])
  })

  test('runs topic requests concurrently without losing any', async () => {
    for (const name of ['a', 'b', 'c', 'd', 'e', 'f']) {
      writeFile(baseDir, `docs/${name}.md`, `# ${name.toUpperCase()}\n\ntext ${name}`)
    }

    const report = expectReport(await sync({ config: { concurrency: 4 } }))

    expect(report.records.map((record) => record.outcome)).toEqual(Array(7).fill('success'))
    expect(discourse.liveTopics().map((topic) => topic.title).sort()).toEqual([
      'A',
      'B',
      'C',
      'D',
      'E',
      'F',
      'My Charm Documentation Overview',
    ])
  })
})
