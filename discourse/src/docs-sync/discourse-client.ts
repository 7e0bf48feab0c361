// Discourse API operations for docs sync.
// Validates credentials, fetches a topic's first post, and creates, updates
// and deletes topics. Every call goes through the retry state machine and
// comes back as a value or a tagged error; nothing here throws.

import * as errore from 'errore'
import { createLogger, LogPrefix } from '../logger.js'
import { fingerprintContent } from './markdown.js'
import {
  DEFAULT_RETRY_POLICY,
  fetchWithRetry,
  type FetchLike,
  type RetryOutcome,
  type RetryPolicy,
} from './retry.js'
import {
  AuthenticationError,
  DEFAULT_EDIT_REASON,
  HostUnreachableError,
  TOPIC_TAGS,
  TopicNotFoundError,
  TopicOperationError,
  type RemoteTopic,
  type TopicError,
} from './types.js'

const discourseLogger = createLogger(LogPrefix.DISCOURSE)

export type TopicUrlValidation =
  | { valid: true; slug: string; id: number }
  | { valid: false; message: string }

export interface DiscourseClient {
  readonly basePath: string
  readonly categoryId: number
  validateCredentials(): Promise<void | AuthenticationError | HostUnreachableError>
  topicUrlValid(url: string): TopicUrlValidation
  /** Absolute URL for a navigation table link. */
  resolveTopicUrl(link: string): string
  /** Relative link written into the navigation table. */
  toTableLink(url: string): string
  fetchTopic(args: { url: string }): Promise<RemoteTopic | TopicError>
  createTopic(args: { title: string; raw: string }): Promise<RemoteTopic | TopicError>
  updateTopic(args: {
    topic: RemoteTopic
    raw: string
    editReason?: string
  }): Promise<RemoteTopic | TopicError>
  deleteTopic(args: { url: string }): Promise<void | TopicError>
}

export type CreateDiscourseClientOptions = {
  basePath: string
  apiUsername: string
  apiKey: string
  categoryId: number
  fetch?: FetchLike
  retryPolicy?: Partial<RetryPolicy>
  sleep?: (ms: number) => Promise<void>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function getNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key]
  return typeof value === 'number' && Number.isInteger(value) ? value : null
}

function getString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key]
  return typeof value === 'string' ? value : null
}

/** Pull Discourse's `errors` array or `error_type` out of a failed response. */
async function describeFailure(response: Response): Promise<string> {
  const text = await response.text().catch(() => '')
  const parsed = errore.try({
    try: () => {
      const json: unknown = JSON.parse(text)
      return { json }
    },
    catch: (cause) => new Error('response is not JSON', { cause }),
  })
  if (parsed instanceof Error || !isRecord(parsed.json)) {
    return `HTTP ${response.status}`
  }
  const json = parsed.json
  const errors = json.errors
  if (Array.isArray(errors)) {
    const messages = errors.filter((item): item is string => typeof item === 'string')
    if (messages.length > 0) return `HTTP ${response.status}: ${messages.join(', ')}`
  }
  const errorType = getString(json, 'error_type')
  return errorType ? `HTTP ${response.status}: ${errorType}` : `HTTP ${response.status}`
}

async function readJsonRecord({
  response,
  operation,
  url,
}: {
  response: Response
  operation: string
  url: string
}): Promise<Record<string, unknown> | TopicOperationError> {
  const parsed = await errore.tryAsync({
    try: async () => {
      const body: unknown = await response.json()
      return { body }
    },
    catch: (cause) => new TopicOperationError({ operation, url, reason: 'invalid JSON', cause }),
  })
  if (parsed instanceof Error) return parsed
  if (!isRecord(parsed.body)) {
    return new TopicOperationError({ operation, url, reason: 'unexpected response shape' })
  }
  return parsed.body
}

export function createDiscourseClient({
  basePath,
  apiUsername,
  apiKey,
  categoryId,
  fetch: fetchFn = (input, init) => globalThis.fetch(input, init),
  retryPolicy,
  sleep,
}: CreateDiscourseClientOptions): DiscourseClient {
  const normalizedBasePath = basePath.replace(/\/+$/, '')
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...retryPolicy }

  const request = async ({
    method,
    path,
    body,
  }: {
    method: 'GET' | 'POST' | 'PUT' | 'DELETE'
    path: string
    body?: unknown
  }): Promise<RetryOutcome> => {
    const url = `${normalizedBasePath}${path}`
    const headers: Record<string, string> = {
      'Api-Key': apiKey,
      'Api-Username': apiUsername,
      Accept: 'application/json',
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }
    return await fetchWithRetry({
      url,
      init: {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      },
      fetchFn,
      policy,
      sleep,
      // PUT and DELETE can be repeated safely; a repeated POST creates a second topic
      idempotent: method !== 'POST',
      onTransition: (transition) => {
        if (transition.state === 'retrying') {
          discourseLogger.warn(
            `${method} ${path} attempt ${transition.attempt} failed (${transition.reason}), retrying in ${transition.delayMs}ms`,
          )
        }
      },
    })
  }

  const toTopicError = async ({
    outcome,
    operation,
    url,
  }: {
    outcome: Exclude<RetryOutcome, { state: 'succeeded' }>
    operation: string
    url: string
  }): Promise<TopicError> => {
    if (outcome.response === null) {
      return new HostUnreachableError({
        url,
        attempts: String(outcome.attempts),
        cause: outcome.cause,
      })
    }
    if (outcome.response.status === 401) {
      return new AuthenticationError({ url })
    }
    if (outcome.response.status === 404) {
      return new TopicNotFoundError({ url })
    }
    return new TopicOperationError({
      operation,
      url,
      reason: await describeFailure(outcome.response),
    })
  }

  const topicUrl = ({ slug, id }: { slug: string; id: number }) => {
    return `${normalizedBasePath}/t/${slug}/${id}`
  }

  const topicUrlValid = (url: string): TopicUrlValidation => {
    if (!url.startsWith(normalizedBasePath)) {
      return {
        valid: false,
        message: `The base path is different to the expected base path, expected: ${normalizedBasePath}, url: ${url}`,
      }
    }

    const parsed = errore.try({
      try: () => new URL(url),
      catch: (cause) => new Error(`invalid URL ${url}`, { cause }),
    })
    if (parsed instanceof Error) {
      return { valid: false, message: parsed.message }
    }

    const components = parsed.pathname.replace(/\/+$/, '').split('/').slice(1)
    if (components.length !== 3) {
      return {
        valid: false,
        message: `Unexpected number of path components, expected: 3, got: ${components.length}, url: ${url}`,
      }
    }
    const [prefix = '', slug = '', rawId = ''] = components
    if (prefix !== 't') {
      return {
        valid: false,
        message: `Unexpected first path component, expected: 't', got: '${prefix}', url: ${url}`,
      }
    }
    if (!slug) {
      return { valid: false, message: `Empty topic slug, url: ${url}` }
    }
    if (!/^\d+$/.test(rawId)) {
      return {
        valid: false,
        message: `Unexpected topic id, expected an integer, got: '${rawId}', url: ${url}`,
      }
    }
    return { valid: true, slug, id: Number.parseInt(rawId, 10) }
  }

  const fetchTopic = async ({ url }: { url: string }): Promise<RemoteTopic | TopicError> => {
    const validation = topicUrlValid(url)
    if (!validation.valid) {
      return new TopicOperationError({ operation: 'fetch', url, reason: validation.message })
    }

    const topicOutcome = await request({
      method: 'GET',
      path: `/t/${validation.slug}/${validation.id}.json`,
    })
    if (topicOutcome.state === 'failed') {
      return await toTopicError({ outcome: topicOutcome, operation: 'fetch', url })
    }
    const topicBody = await readJsonRecord({
      response: topicOutcome.response,
      operation: 'fetch',
      url,
    })
    if (topicBody instanceof Error) return topicBody

    if (topicBody.deleted_at !== null && topicBody.deleted_at !== undefined) {
      return new TopicNotFoundError({ url })
    }

    const postStream = topicBody.post_stream
    const posts = isRecord(postStream) && Array.isArray(postStream.posts) ? postStream.posts : []
    const firstPost = posts.find((post): post is Record<string, unknown> => {
      return isRecord(post) && post.post_number === 1
    })
    if (!firstPost) {
      return new TopicOperationError({ operation: 'fetch', url, reason: 'topic has no first post' })
    }
    if (firstPost.user_deleted === true) {
      return new TopicNotFoundError({ url })
    }
    const postId = getNumber(firstPost, 'id')
    if (postId === null) {
      return new TopicOperationError({ operation: 'fetch', url, reason: 'first post has no id' })
    }

    const postOutcome = await request({ method: 'GET', path: `/posts/${postId}.json` })
    if (postOutcome.state === 'failed') {
      return await toTopicError({ outcome: postOutcome, operation: 'fetch', url })
    }
    const postBody = await readJsonRecord({
      response: postOutcome.response,
      operation: 'fetch',
      url,
    })
    if (postBody instanceof Error) return postBody

    const raw = getString(postBody, 'raw')
    if (raw === null) {
      return new TopicOperationError({ operation: 'fetch', url, reason: 'post has no raw content' })
    }

    return {
      id: validation.id,
      slug: getString(topicBody, 'slug') ?? validation.slug,
      url: topicUrl({ slug: getString(topicBody, 'slug') ?? validation.slug, id: validation.id }),
      categoryId: getNumber(topicBody, 'category_id'),
      postId,
      raw,
      fingerprint: fingerprintContent({ content: raw }),
      canEdit: postBody.can_edit === true,
    }
  }

  const createTopic = async ({
    title,
    raw,
  }: {
    title: string
    raw: string
  }): Promise<RemoteTopic | TopicError> => {
    const target = `${normalizedBasePath}/posts.json`
    const outcome = await request({
      method: 'POST',
      path: '/posts.json',
      body: { title, raw, category: categoryId, tags: [...TOPIC_TAGS] },
    })
    if (outcome.state === 'failed') {
      return await toTopicError({ outcome, operation: 'create', url: target })
    }
    const body = await readJsonRecord({ response: outcome.response, operation: 'create', url: target })
    if (body instanceof Error) return body

    const topicId = getNumber(body, 'topic_id')
    const topicSlug = getString(body, 'topic_slug')
    const postId = getNumber(body, 'id')
    if (topicId === null || !topicSlug || postId === null) {
      return new TopicOperationError({
        operation: 'create',
        url: target,
        reason: 'response is missing topic_id, topic_slug or id',
      })
    }

    return {
      id: topicId,
      slug: topicSlug,
      url: topicUrl({ slug: topicSlug, id: topicId }),
      categoryId,
      postId,
      raw,
      fingerprint: fingerprintContent({ content: raw }),
      canEdit: true,
    }
  }

  const updateTopic = async ({
    topic,
    raw,
    editReason = DEFAULT_EDIT_REASON,
  }: {
    topic: RemoteTopic
    raw: string
    editReason?: string
  }): Promise<RemoteTopic | TopicError> => {
    const outcome = await request({
      method: 'PUT',
      path: `/posts/${topic.postId}.json`,
      body: { post: { raw, edit_reason: editReason } },
    })
    if (outcome.state === 'failed') {
      return await toTopicError({ outcome, operation: 'update', url: topic.url })
    }
    await outcome.response.body?.cancel().catch(() => undefined)
    return { ...topic, raw, fingerprint: fingerprintContent({ content: raw }) }
  }

  const deleteTopic = async ({ url }: { url: string }): Promise<void | TopicError> => {
    const validation = topicUrlValid(url)
    if (!validation.valid) {
      return new TopicOperationError({ operation: 'delete', url, reason: validation.message })
    }
    const outcome = await request({ method: 'DELETE', path: `/t/${validation.id}.json` })
    if (outcome.state === 'failed') {
      return await toTopicError({ outcome, operation: 'delete', url })
    }
    await outcome.response.body?.cancel().catch(() => undefined)
  }

  const validateCredentials = async (): Promise<
    void | AuthenticationError | HostUnreachableError
  > => {
    const url = `${normalizedBasePath}/session/current.json`
    const outcome = await request({ method: 'GET', path: '/session/current.json' })
    if (outcome.state === 'failed') {
      if (outcome.response === null) {
        return new HostUnreachableError({
          url,
          attempts: String(outcome.attempts),
          cause: outcome.cause,
        })
      }
      // Discourse answers 403 for an unknown API key and 404 when the key
      // does not resolve to a user
      if ([401, 403, 404].includes(outcome.response.status)) {
        return new AuthenticationError({ url })
      }
      return new HostUnreachableError({
        url,
        attempts: String(outcome.attempts),
        cause: new Error(await describeFailure(outcome.response)),
      })
    }
    const body = await readJsonRecord({ response: outcome.response, operation: 'session', url })
    if (body instanceof Error || !isRecord(body.current_user)) {
      return new AuthenticationError({ url })
    }
    discourseLogger.log(
      `Authenticated as ${getString(body.current_user, 'username') ?? apiUsername} on ${normalizedBasePath}`,
    )
  }

  return {
    basePath: normalizedBasePath,
    categoryId,
    validateCredentials,
    topicUrlValid,
    resolveTopicUrl: (link) => (link.startsWith('/') ? `${normalizedBasePath}${link}` : link),
    toTableLink: (url) => {
      return url.startsWith(normalizedBasePath) ? url.slice(normalizedBasePath.length) : url
    },
    fetchTopic,
    createTopic,
    updateTopic,
    deleteTopic,
  }
}
