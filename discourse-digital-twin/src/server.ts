// Spiceflow app implementing the slice of the Discourse REST API that the
// docs sync uses. Routes are matched without the `.json` suffix in the path
// pattern, so ids arrive as `12.json` and are parsed with parseId().

import { Spiceflow } from 'spiceflow'
import type { DiscourseStore } from './store.js'
import {
  postToAPI,
  topicToAPI,
  type APICurrentUser,
  type APIPost,
  type APITopic,
} from './serializers.js'

function jsonError({ status, errors, errorType }: {
  status: number
  errors: string[]
  errorType: string
}): Response {
  return new Response(JSON.stringify({ errors, error_type: errorType }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

function notFound(): Response {
  return jsonError({
    status: 404,
    errors: ['The requested URL or resource could not be found.'],
    errorType: 'not_found',
  })
}

function parseId(value: string): number {
  const match = /^(\d+)(?:\.json)?$/.exec(value)
  if (!match?.[1]) {
    throw notFound()
  }
  return Number.parseInt(match[1], 10)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

async function readBody(request: Request): Promise<Record<string, unknown>> {
  const body: unknown = await request.json().catch(() => null)
  if (!isRecord(body)) {
    throw jsonError({ status: 400, errors: ['invalid JSON body'], errorType: 'invalid_parameters' })
  }
  return body
}

export function createApp({ store, apiUsername }: {
  store: DiscourseStore
  apiUsername: string
}) {
  const findLiveTopic = (topicId: number) => {
    const topic = store.topics.get(topicId)
    if (!topic || topic.deletedAt !== null) {
      throw notFound()
    }
    return topic
  }

  const app = new Spiceflow()

    // --- Session ---

    .route({
      method: 'GET',
      path: '/session/current.json',
      handler(): APICurrentUser {
        return { current_user: { id: 1, username: apiUsername, admin: true } }
      },
    })

    // --- Topics ---

    .route({
      method: 'GET',
      path: '/t/:slug/:topic_id',
      handler({ params }): APITopic {
        const topic = findLiveTopic(parseId(params.topic_id))
        const posts = [...store.posts.values()]
          .filter((post) => post.topicId === topic.id)
          .sort((a, b) => a.postNumber - b.postNumber)
        return topicToAPI({ topic, posts, username: apiUsername })
      },
    })
    .route({
      method: 'DELETE',
      path: '/t/:topic_id',
      handler({ params }): Response {
        const topic = findLiveTopic(parseId(params.topic_id))
        topic.deletedAt = new Date().toISOString()
        return new Response(null, { status: 200 })
      },
    })

    // --- Posts ---

    .route({
      method: 'GET',
      path: '/posts/:post_id',
      handler({ params }): APIPost {
        const post = store.posts.get(parseId(params.post_id))
        if (!post) {
          throw notFound()
        }
        const topic = findLiveTopic(post.topicId)
        return postToAPI({ post, topic, username: apiUsername })
      },
    })
    .route({
      method: 'POST',
      path: '/posts.json',
      async handler({ request }): Promise<APIPost> {
        const body = await readBody(request)
        const title = typeof body.title === 'string' ? body.title.trim() : ''
        const raw = typeof body.raw === 'string' ? body.raw : ''
        const errors: string[] = []
        if (!title) errors.push("Title can't be blank")
        if (!raw.trim()) errors.push("Body can't be blank")
        if (errors.length > 0) {
          throw jsonError({ status: 422, errors, errorType: 'invalid_parameters' })
        }

        const tags = Array.isArray(body.tags)
          ? body.tags.filter((tag): tag is string => typeof tag === 'string')
          : []
        const { topic, post } = store.createTopic({
          title,
          raw,
          categoryId: typeof body.category === 'number' ? body.category : 0,
          tags,
        })
        return postToAPI({ post, topic, username: apiUsername })
      },
    })
    .route({
      method: 'PUT',
      path: '/posts/:post_id',
      async handler({ params, request }): Promise<{ post: APIPost }> {
        const post = store.posts.get(parseId(params.post_id))
        if (!post) {
          throw notFound()
        }
        const topic = findLiveTopic(post.topicId)
        if (!post.canEdit) {
          throw jsonError({
            status: 403,
            errors: ['You are not permitted to view the requested resource.'],
            errorType: 'invalid_access',
          })
        }

        const body = await readBody(request)
        const update = isRecord(body.post) ? body.post : {}
        if (typeof update.raw !== 'string' || !update.raw.trim()) {
          throw jsonError({ status: 422, errors: ["Body can't be blank"], errorType: 'invalid_parameters' })
        }
        post.raw = update.raw
        post.version += 1
        if (typeof update.edit_reason === 'string') {
          post.editReasons.push(update.edit_reason)
        }
        return { post: postToAPI({ post, topic, username: apiUsername }) }
      },
    })

  return app
}

export type DiscourseApp = ReturnType<typeof createApp>
