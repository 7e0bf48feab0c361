// Reads metadata.yaml from the repository root. `name` titles the index
// topic; `docs`, when present, is the URL of an existing index topic.

import fs from 'node:fs'
import path from 'node:path'
import * as errore from 'errore'
import yaml from 'js-yaml'
import { MetadataError, type DocsMetadata } from './types.js'

export const METADATA_FILENAME = 'metadata.yaml'
export const METADATA_NAME_KEY = 'name'
export const METADATA_DOCS_KEY = 'docs'

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readStringKey({
  metadata,
  key,
  filePath,
}: {
  metadata: Record<string, unknown>
  key: string
  filePath: string
}): string | null | MetadataError {
  const value = metadata[key]
  if (value === undefined || value === null) return null
  if (typeof value !== 'string') {
    return new MetadataError({ path: filePath, reason: `'${key}' is not a string` })
  }
  if (!value.trim()) {
    return new MetadataError({ path: filePath, reason: `'${key}' is empty` })
  }
  return value.trim()
}

export async function readDocsMetadata({
  baseDir,
}: {
  baseDir: string
}): Promise<DocsMetadata | MetadataError> {
  const filePath = path.join(baseDir, METADATA_FILENAME)
  const raw = await fs.promises.readFile(filePath, 'utf8').catch((cause) => {
    return new MetadataError({ path: filePath, reason: 'file could not be read', cause })
  })
  if (raw instanceof Error) return raw
  if (!raw.trim()) {
    return new MetadataError({ path: filePath, reason: 'file is empty' })
  }

  const parsed = errore.try({
    try: () => ({ document: yaml.load(raw) }),
    catch: (cause) => new MetadataError({ path: filePath, reason: 'malformed YAML', cause }),
  })
  if (parsed instanceof Error) return parsed
  const metadata = parsed.document
  if (!isMapping(metadata)) {
    return new MetadataError({ path: filePath, reason: 'expected a mapping' })
  }

  const name = readStringKey({ metadata, key: METADATA_NAME_KEY, filePath })
  if (name instanceof Error) return name
  if (name === null) {
    return new MetadataError({ path: filePath, reason: `'${METADATA_NAME_KEY}' is not defined` })
  }

  const indexUrl = readStringKey({ metadata, key: METADATA_DOCS_KEY, filePath })
  if (indexUrl instanceof Error) return indexUrl

  return { name, indexUrl }
}
