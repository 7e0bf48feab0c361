// Converters from stored rows to the JSON shapes the Discourse API returns.
// Only the fields the docs sync reads plus a few neighbours are modelled;
// return type annotations keep each shape checked by the compiler.

import type { StoredPost, StoredTopic } from './store.js'

export type APIPost = {
  id: number
  topic_id: number
  topic_slug: string
  post_number: number
  username: string
  cooked: string
  raw: string
  version: number
  can_edit: boolean
  user_deleted: boolean
}

export type APIPostStreamPost = Omit<APIPost, 'raw'>

export type APITopic = {
  id: number
  title: string
  fancy_title: string
  slug: string
  category_id: number
  tags: string[]
  deleted_at: string | null
  post_stream: {
    posts: APIPostStreamPost[]
    stream: number[]
  }
}

export type APICurrentUser = {
  current_user: {
    id: number
    username: string
    admin: boolean
  }
}

// Discourse renders markdown server side. A paragraph wrapper is enough here.
function cook(raw: string): string {
  return `<p>${raw.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')}</p>`
}

export function postToAPI({ post, topic, username }: {
  post: StoredPost
  topic: StoredTopic
  username: string
}): APIPost {
  return {
    id: post.id,
    topic_id: topic.id,
    topic_slug: topic.slug,
    post_number: post.postNumber,
    username,
    cooked: cook(post.raw),
    raw: post.raw,
    version: post.version,
    can_edit: post.canEdit,
    user_deleted: post.userDeleted,
  }
}

export function topicToAPI({ topic, posts, username }: {
  topic: StoredTopic
  posts: StoredPost[]
  username: string
}): APITopic {
  return {
    id: topic.id,
    title: topic.title,
    fancy_title: topic.title,
    slug: topic.slug,
    category_id: topic.categoryId,
    tags: topic.tags,
    deleted_at: topic.deletedAt,
    post_stream: {
      posts: posts.map((post) => {
        const { raw: _raw, ...rest } = postToAPI({ post, topic, username })
        return rest
      }),
      stream: posts.map((post) => post.id),
    },
  }
}
