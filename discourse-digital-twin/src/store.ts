// In-memory Discourse state. Each DigitalDiscourse instance owns one store,
// so concurrent tests never share topics or id counters.

export type StoredPost = {
  id: number
  topicId: number
  postNumber: number
  raw: string
  canEdit: boolean
  userDeleted: boolean
  editReasons: string[]
  version: number
}

export type StoredTopic = {
  id: number
  slug: string
  title: string
  categoryId: number
  tags: string[]
  deletedAt: string | null
  firstPostId: number
}

export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return slug || 'topic'
}

export class DiscourseStore {
  topics = new Map<number, StoredTopic>()
  posts = new Map<number, StoredPost>()

  private nextTopicId: number
  private nextPostId: number

  constructor({ firstTopicId = 10, firstPostId = 100 }: {
    firstTopicId?: number
    firstPostId?: number
  } = {}) {
    this.nextTopicId = firstTopicId
    this.nextPostId = firstPostId
  }

  createTopic({ title, raw, categoryId, tags = [], canEdit = true }: {
    title: string
    raw: string
    categoryId: number
    tags?: string[]
    canEdit?: boolean
  }): { topic: StoredTopic; post: StoredPost } {
    const topicId = this.nextTopicId++
    const postId = this.nextPostId++
    const post: StoredPost = {
      id: postId,
      topicId,
      postNumber: 1,
      raw,
      canEdit,
      userDeleted: false,
      editReasons: [],
      version: 1,
    }
    const topic: StoredTopic = {
      id: topicId,
      slug: slugify(title),
      title,
      categoryId,
      tags,
      deletedAt: null,
      firstPostId: postId,
    }
    this.topics.set(topicId, topic)
    this.posts.set(postId, post)
    return { topic, post }
  }

  /** Topics that have not been deleted, in creation order. */
  liveTopics(): StoredTopic[] {
    return [...this.topics.values()].filter((topic) => topic.deletedAt === null)
  }

  firstPost(topic: StoredTopic): StoredPost | undefined {
    return this.posts.get(topic.firstPostId)
  }
}
