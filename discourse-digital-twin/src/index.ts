// DigitalDiscourse - in-memory Discourse forum for tests.
// Exposes a fetch-compatible handler backed by a Spiceflow app, so the docs
// sync client can be pointed at it without opening a socket. Every request is
// recorded, and faults (HTTP statuses or network errors) can be injected for
// the next N matching requests.

import { createApp, type DiscourseApp } from './server.js'
import { DiscourseStore, type StoredPost, type StoredTopic } from './store.js'

export interface DigitalDiscourseOptions {
  hostname?: string
  apiUsername?: string
  apiKey?: string
  categoryId?: number
  firstTopicId?: number
}

export type RecordedRequest = {
  method: string
  path: string
  body: string | null
}

export type FaultRule = {
  method?: string
  path?: string | RegExp
  /** HTTP status to answer with. Ignored when networkError is set. */
  status?: number
  networkError?: boolean
  retryAfter?: string
  times?: number
}

export type TopicSnapshot = {
  id: number
  slug: string
  title: string
  url: string
  categoryId: number
  tags: string[]
  raw: string
  canEdit: boolean
  editReasons: string[]
  deleted: boolean
}

export class DigitalDiscourse {
  store: DiscourseStore
  hostname: string
  apiUsername: string
  apiKey: string
  categoryId: number
  requests: RecordedRequest[] = []

  private app: DiscourseApp
  private faults: Array<FaultRule & { remaining: number }> = []

  constructor(options: DigitalDiscourseOptions = {}) {
    this.hostname = options.hostname ?? 'discourse.test'
    this.apiUsername = options.apiUsername ?? 'docs-bot'
    this.apiKey = options.apiKey ?? 'test-api-key'
    this.categoryId = options.categoryId ?? 41
    this.store = new DiscourseStore({ firstTopicId: options.firstTopicId })
    this.app = createApp({ store: this.store, apiUsername: this.apiUsername })
  }

  get basePath(): string {
    return `https://${this.hostname}`
  }

  fetch = async (input: string, init?: RequestInit): Promise<Response> => {
    const request = new Request(input, init)
    const { pathname } = new URL(request.url)
    const body = request.body ? await request.clone().text() : null
    this.requests.push({ method: request.method, path: pathname, body })

    const fault = this.takeFault({ method: request.method, path: pathname })
    if (fault) {
      if (fault.networkError) {
        throw new TypeError('fetch failed')
      }
      return new Response(
        JSON.stringify({ errors: ['injected fault'], error_type: 'injected' }),
        {
          status: fault.status ?? 500,
          headers: {
            'Content-Type': 'application/json',
            ...(fault.retryAfter ? { 'Retry-After': fault.retryAfter } : {}),
          },
        },
      )
    }

    if (
      request.headers.get('Api-Key') !== this.apiKey ||
      request.headers.get('Api-Username') !== this.apiUsername
    ) {
      return new Response(
        JSON.stringify({
          errors: ['You are not permitted to view the requested resource. The API username or key is invalid.'],
          error_type: 'invalid_access',
        }),
        { status: 403, headers: { 'Content-Type': 'application/json' } },
      )
    }

    return await this.app.handle(request)
  }

  // --- Fault injection ---

  failNext(rule: FaultRule): void {
    this.faults.push({ ...rule, remaining: rule.times ?? 1 })
  }

  // --- Seeding ---

  seedTopic({ title, raw, canEdit = true, categoryId = this.categoryId, tags = ['docs'] }: {
    title: string
    raw: string
    canEdit?: boolean
    categoryId?: number
    tags?: string[]
  }): TopicSnapshot {
    const { topic, post } = this.store.createTopic({ title, raw, categoryId, tags, canEdit })
    return this.snapshot(topic, post)
  }

  /** Change a topic's first post without going through the API. */
  editTopicRaw({ topicId, raw }: { topicId: number; raw: string }): void {
    const topic = this.store.topics.get(topicId)
    const post = topic ? this.store.firstPost(topic) : undefined
    if (!post) {
      throw new Error(`Unknown topic ${topicId}`)
    }
    post.raw = raw
  }

  deleteTopicDirectly({ topicId }: { topicId: number }): void {
    const topic = this.store.topics.get(topicId)
    if (!topic) {
      throw new Error(`Unknown topic ${topicId}`)
    }
    topic.deletedAt = new Date().toISOString()
  }

  // --- State queries for test assertions ---

  topicUrl({ slug, id }: { slug: string; id: number }): string {
    return `${this.basePath}/t/${slug}/${id}`
  }

  getTopic({ topicId }: { topicId: number }): TopicSnapshot | null {
    const topic = this.store.topics.get(topicId)
    const post = topic ? this.store.firstPost(topic) : undefined
    if (!topic || !post) {
      return null
    }
    return this.snapshot(topic, post)
  }

  liveTopics(): TopicSnapshot[] {
    return this.store.liveTopics().flatMap((topic) => {
      const post = this.store.firstPost(topic)
      return post ? [this.snapshot(topic, post)] : []
    })
  }

  mutatingRequests(): RecordedRequest[] {
    return this.requests.filter((request) => request.method !== 'GET')
  }

  resetRequests(): void {
    this.requests = []
  }

  // --- Internal ---

  private takeFault({ method, path }: { method: string; path: string }) {
    const fault = this.faults.find((candidate) => {
      if (candidate.remaining <= 0) return false
      if (candidate.method && candidate.method !== method) return false
      if (candidate.path instanceof RegExp) return candidate.path.test(path)
      if (typeof candidate.path === 'string') return candidate.path === path
      return true
    })
    if (!fault) {
      return null
    }
    fault.remaining -= 1
    this.faults = this.faults.filter((candidate) => candidate.remaining > 0)
    return fault
  }

  private snapshot(topic: StoredTopic, post: StoredPost): TopicSnapshot {
    return {
      id: topic.id,
      slug: topic.slug,
      title: topic.title,
      url: this.topicUrl(topic),
      categoryId: topic.categoryId,
      tags: [...topic.tags],
      raw: post.raw,
      canEdit: post.canEdit,
      editReasons: [...post.editReasons],
      deleted: topic.deletedAt !== null,
    }
  }
}

export { DiscourseStore, slugify } from './store.js'
export type { StoredPost, StoredTopic } from './store.js'
export type { APIPost, APITopic } from './serializers.js'
