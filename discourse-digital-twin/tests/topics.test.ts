// Topic lifecycle through the fetch handler: create, read, edit, delete,
// plus auth rejection and injected faults.

import { describe, test, expect, beforeEach } from 'vitest'
import { DigitalDiscourse } from '../src/index.js'

function headers(discourse: DigitalDiscourse): Record<string, string> {
  return {
    'Api-Key': discourse.apiKey,
    'Api-Username': discourse.apiUsername,
    Accept: 'application/json',
    'Content-Type': 'application/json',
  }
}

describe('topics', () => {
  let discourse: DigitalDiscourse

  beforeEach(() => {
    discourse = new DigitalDiscourse()
  })

  test('reports the api user on /session/current.json', async () => {
    const response = await discourse.fetch(`${discourse.basePath}/session/current.json`, {
      headers: headers(discourse),
    })
    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      current_user: { id: 1, username: 'docs-bot', admin: true },
    })
  })

  test('rejects a wrong api key with 403', async () => {
    const response = await discourse.fetch(`${discourse.basePath}/session/current.json`, {
      headers: { ...headers(discourse), 'Api-Key': 'wrong-key' },
    })
    expect(response.status).toBe(403)
  })

  test('creates a topic and serves its first post', async () => {
    const created = await discourse.fetch(`${discourse.basePath}/posts.json`, {
      method: 'POST',
      headers: headers(discourse),
      body: JSON.stringify({ title: 'Getting Started', raw: 'Hello docs', category: 41, tags: ['docs'] }),
    })
    expect(created.status).toBe(200)
    const post: unknown = await created.json()
    expect(post).toMatchObject({ id: 100, topic_id: 10, topic_slug: 'getting-started', raw: 'Hello docs' })

    const topic = await discourse.fetch(`${discourse.basePath}/t/getting-started/10.json`, {
      headers: headers(discourse),
    })
    expect(topic.status).toBe(200)
    expect(await topic.json()).toMatchObject({
      id: 10,
      slug: 'getting-started',
      category_id: 41,
      tags: ['docs'],
      post_stream: { stream: [100] },
    })

    expect(discourse.liveTopics().map((snapshot) => snapshot.url)).toEqual([
      'https://discourse.test/t/getting-started/10',
    ])
  })

  test('rejects a create with a blank title', async () => {
    const response = await discourse.fetch(`${discourse.basePath}/posts.json`, {
      method: 'POST',
      headers: headers(discourse),
      body: JSON.stringify({ title: '  ', raw: 'body' }),
    })
    expect(response.status).toBe(422)
    expect(await response.json()).toEqual({
      errors: ["Title can't be blank"],
      error_type: 'invalid_parameters',
    })
  })

  test('edits a post and keeps the edit reason', async () => {
    const seeded = discourse.seedTopic({ title: 'Guide', raw: 'old' })
    const response = await discourse.fetch(`${discourse.basePath}/posts/100.json`, {
      method: 'PUT',
      headers: headers(discourse),
      body: JSON.stringify({ post: { raw: 'new', edit_reason: 'Documentation updated' } }),
    })
    expect(response.status).toBe(200)
    expect(discourse.getTopic({ topicId: seeded.id })).toMatchObject({
      raw: 'new',
      editReasons: ['Documentation updated'],
    })
  })

  test('refuses to edit a post the user cannot edit', async () => {
    discourse.seedTopic({ title: 'Locked', raw: 'old', canEdit: false })
    const response = await discourse.fetch(`${discourse.basePath}/posts/100.json`, {
      method: 'PUT',
      headers: headers(discourse),
      body: JSON.stringify({ post: { raw: 'new' } }),
    })
    expect(response.status).toBe(403)
    expect(discourse.getTopic({ topicId: 10 })?.raw).toBe('old')
  })

  test('deleted topics answer 404', async () => {
    const seeded = discourse.seedTopic({ title: 'Old Page', raw: 'gone soon' })
    const deleted = await discourse.fetch(`${discourse.basePath}/t/${seeded.id}.json`, {
      method: 'DELETE',
      headers: headers(discourse),
    })
    expect(deleted.status).toBe(200)

    const fetched = await discourse.fetch(`${discourse.basePath}/t/old-page/${seeded.id}.json`, {
      headers: headers(discourse),
    })
    expect(fetched.status).toBe(404)
    expect(discourse.liveTopics()).toEqual([])

    const again = await discourse.fetch(`${discourse.basePath}/t/${seeded.id}.json`, {
      method: 'DELETE',
      headers: headers(discourse),
    })
    expect(again.status).toBe(404)
  })

  test('injected faults apply to the next matching requests only', async () => {
    discourse.failNext({ method: 'GET', path: '/session/current.json', status: 503, retryAfter: '1', times: 2 })
    const url = `${discourse.basePath}/session/current.json`

    const first = await discourse.fetch(url, { headers: headers(discourse) })
    const second = await discourse.fetch(url, { headers: headers(discourse) })
    const third = await discourse.fetch(url, { headers: headers(discourse) })

    expect(first.status).toBe(503)
    expect(first.headers.get('Retry-After')).toBe('1')
    expect(second.status).toBe(503)
    expect(third.status).toBe(200)
  })

  test('network faults reject the fetch', async () => {
    discourse.failNext({ networkError: true })
    await expect(
      discourse.fetch(`${discourse.basePath}/session/current.json`, { headers: headers(discourse) }),
    ).rejects.toThrow('fetch failed')
  })

  test('records every request with its body', async () => {
    discourse.seedTopic({ title: 'Guide', raw: 'old' })
    await discourse.fetch(`${discourse.basePath}/posts/100.json`, { headers: headers(discourse) })
    await discourse.fetch(`${discourse.basePath}/t/10.json`, { method: 'DELETE', headers: headers(discourse) })

    expect(discourse.requests).toEqual([
      { method: 'GET', path: '/posts/100.json', body: null },
      { method: 'DELETE', path: '/t/10.json', body: null },
    ])
    expect(discourse.mutatingRequests()).toEqual([
      { method: 'DELETE', path: '/t/10.json', body: null },
    ])
  })
})
