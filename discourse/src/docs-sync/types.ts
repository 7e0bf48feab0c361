// Type definitions, tagged errors, and constants for docs sync.
// All shared types and error classes live here to avoid circular dependencies
// between the sync modules.

import * as errore from 'errore'

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const DOCUMENTATION_FOLDER_NAME = 'docs'
export const INDEX_FILE_NAME = 'index.md'
export const DOCUMENT_EXTENSION = '.md'
export const DEFAULT_CATEGORY_ID = 41
export const DEFAULT_CONCURRENCY = 4
export const MAX_CONCURRENCY = 16
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000
export const DEFAULT_MAX_RETRIES = 3
export const DEFAULT_RETRY_BASE_DELAY_MS = 500
export const DEFAULT_RETRY_MAX_DELAY_MS = 10_000
export const DEFAULT_EDIT_REASON = 'Documentation updated'
export const TOPIC_TAGS = ['docs'] as const

// Planned URL recorded for creates under dry-run. Never written to the index.
export const DRY_RUN_URL_PLACEHOLDER = '<not created due to dry run>'

// ═══════════════════════════════════════════════════════════════════════════
// TAGGED ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export class ScanError extends errore.createTaggedError({
  name: 'ScanError',
  message: 'Cannot scan documentation at $path: $reason',
}) {}

export class MetadataError extends errore.createTaggedError({
  name: 'MetadataError',
  message: 'Invalid metadata.yaml at $path: $reason',
}) {}

export class ConfigValidationError extends errore.createTaggedError({
  name: 'ConfigValidationError',
  message: 'Invalid $input input: $reason',
}) {}

export class AuthenticationError extends errore.createTaggedError({
  name: 'AuthenticationError',
  message: 'Discourse rejected the credentials for $url',
}) {}

export class HostUnreachableError extends errore.createTaggedError({
  name: 'HostUnreachableError',
  message: 'Discourse host unreachable for $url after $attempts attempts',
}) {}

export class IndexTopicError extends errore.createTaggedError({
  name: 'IndexTopicError',
  message: 'Cannot use index topic $url: $reason',
}) {}

export class TopicNotFoundError extends errore.createTaggedError({
  name: 'TopicNotFoundError',
  message: 'Topic not found: $url',
}) {}

export class TopicOperationError extends errore.createTaggedError({
  name: 'TopicOperationError',
  message: 'Topic $operation failed for $url: $reason',
}) {}

export class NavigationTableParseError extends errore.createTaggedError({
  name: 'NavigationTableParseError',
  message: 'Malformed navigation table at line $line: $reason',
}) {}

export type FatalSyncError =
  | ScanError
  | MetadataError
  | ConfigValidationError
  | AuthenticationError
  | HostUnreachableError
  | IndexTopicError

export type TopicError =
  | TopicNotFoundError
  | TopicOperationError
  | AuthenticationError
  | HostUnreachableError

/** Errors that abort the whole run instead of failing a single topic. */
export function isFatalSyncError(error: Error): error is FatalSyncError {
  return (
    error instanceof ScanError ||
    error instanceof MetadataError ||
    error instanceof ConfigValidationError ||
    error instanceof AuthenticationError ||
    error instanceof HostUnreachableError ||
    error instanceof IndexTopicError
  )
}

// ═══════════════════════════════════════════════════════════════════════════
// DATA TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type DocNodeKind = 'document' | 'folder'

export type DocNode = {
  /** Identity key: relative path with `/` separators, no `.md` extension. */
  path: string
  title: string
  kind: DocNodeKind
  level: number
  /** Raw file text; null for a folder without its own index.md. */
  content: string | null
  fingerprint: string | null
  children: DocNode[]
}

export type DocTree = {
  docsDir: string
  indexContent: string
  children: DocNode[]
}

export type NavigationEntry = {
  level: number
  path: string
  title: string
  /** Topic link as written in the table; null (never empty) for folder rows. */
  link: string | null
}

export type RemoteTopic = {
  id: number
  slug: string
  url: string
  categoryId: number | null
  postId: number
  raw: string
  fingerprint: string
  canEdit: boolean
}

export type RemoteLookup =
  | { status: 'found'; topic: RemoteTopic }
  | { status: 'missing' }
  | { status: 'error'; error: TopicError }

export type ActionKind = 'create' | 'update' | 'delete' | 'skip'

export type ActionOutcome = 'success' | 'skip' | 'failure'

export type ActionRecord = {
  /** Local path, or null for the index topic. */
  path: string | null
  /** Topic URL; null when a create failed or was aborted before a topic existed. */
  url: string | null
  action: ActionKind
  outcome: ActionOutcome
  reason?: string
}

export type PlannedAction =
  | {
      action: 'create'
      node: DocNode
      prior: NavigationEntry | null
    }
  | {
      action: 'update'
      node: DocNode
      prior: NavigationEntry
      topic: RemoteTopic | null
    }
  | {
      action: 'skip'
      node: DocNode
      /** Null only for a new folder without content, which has no topic. */
      prior: NavigationEntry | null
      topic: RemoteTopic | null
      error?: TopicError
    }
  | {
      action: 'delete'
      prior: NavigationEntry
    }
  | {
      action: 'unlink'
      prior: NavigationEntry
    }

export type SyncConfig = {
  hostname: string
  basePath: string
  apiUsername: string
  apiKey: string
  categoryId: number
  deleteTopics: boolean
  dryRun: boolean
  concurrency: number
}

export type DocsMetadata = {
  name: string
  indexUrl: string | null
}

export type DiscourseConfigDescriptor = {
  hostname: string
  category_id: number
  api_username: string
  api_key: string
}

export type SyncReport = {
  records: ActionRecord[]
  urlsWithActions: Record<string, ActionOutcome>
  indexUrl: string | null
  discourseConfig: DiscourseConfigDescriptor
  fatalError: FatalSyncError | null
  aborted: boolean
}

// ═══════════════════════════════════════════════════════════════════════════
// SHARED UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function delay({ ms }: { ms: number }) {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms)
  })
}
