// Content scanner: walks the documentation directory and builds the DocTree.
// Entries are ordered by name within each directory so the navigation order
// is deterministic. Any read failure fails the whole scan.

import fs from 'node:fs'
import path from 'node:path'
import { createLogger, LogPrefix } from '../logger.js'
import { extractTitle, fingerprintContent, humanizeName } from './markdown.js'
import {
  DOCUMENT_EXTENSION,
  INDEX_FILE_NAME,
  ScanError,
  type DocNode,
  type DocTree,
} from './types.js'

const scanLogger = createLogger(LogPrefix.SCAN)

function compareNames(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1
  if (a.name > b.name) return 1
  return 0
}

async function readDirectory({
  dir,
  docsDir,
}: {
  dir: string
  docsDir: string
}): Promise<fs.Dirent[] | ScanError> {
  const entries = await fs.promises
    .readdir(dir, { withFileTypes: true })
    .catch((cause) => {
      return new ScanError({ path: docsDir, reason: `failed to list ${dir}`, cause })
    })
  if (entries instanceof Error) return entries
  return entries.filter((entry) => !entry.name.startsWith('.')).sort(compareNames)
}

async function readDocument({
  filePath,
  docsDir,
}: {
  filePath: string
  docsDir: string
}): Promise<string | ScanError> {
  return await fs.promises.readFile(filePath, 'utf8').catch((cause) => {
    return new ScanError({ path: docsDir, reason: `failed to read ${filePath}`, cause })
  })
}

async function readOptionalIndex({
  dir,
  entries,
  docsDir,
}: {
  dir: string
  entries: fs.Dirent[]
  docsDir: string
}): Promise<string | null | ScanError> {
  const indexEntry = entries.find((entry) => entry.isFile() && entry.name === INDEX_FILE_NAME)
  if (!indexEntry) return null
  return await readDocument({ filePath: path.join(dir, INDEX_FILE_NAME), docsDir })
}

async function buildNode({
  entry,
  dir,
  parentPath,
  level,
  docsDir,
}: {
  entry: fs.Dirent
  dir: string
  parentPath: string
  level: number
  docsDir: string
}): Promise<DocNode | null | ScanError> {
  const entryPath = path.join(dir, entry.name)

  if (entry.isDirectory()) {
    const nodePath = parentPath ? `${parentPath}/${entry.name}` : entry.name
    const entries = await readDirectory({ dir: entryPath, docsDir })
    if (entries instanceof Error) return entries

    const content = await readOptionalIndex({ dir: entryPath, entries, docsDir })
    if (content instanceof Error) return content

    const children = await buildChildren({
      dir: entryPath,
      entries: entries.filter((child) => !(child.isFile() && child.name === INDEX_FILE_NAME)),
      parentPath: nodePath,
      level: level + 1,
      docsDir,
    })
    if (children instanceof Error) return children

    return {
      path: nodePath,
      title:
        content !== null
          ? extractTitle({ content, fallbackName: entry.name })
          : humanizeName({ name: entry.name }),
      kind: 'folder',
      level,
      content,
      fingerprint: content !== null ? fingerprintContent({ content }) : null,
      children,
    }
  }

  if (!entry.isFile() || !entry.name.endsWith(DOCUMENT_EXTENSION)) {
    return null
  }

  const baseName = entry.name.slice(0, -DOCUMENT_EXTENSION.length)
  const content = await readDocument({ filePath: entryPath, docsDir })
  if (content instanceof Error) return content

  return {
    path: parentPath ? `${parentPath}/${baseName}` : baseName,
    title: extractTitle({ content, fallbackName: baseName }),
    kind: 'document',
    level,
    content,
    fingerprint: fingerprintContent({ content }),
    children: [],
  }
}

async function buildChildren({
  dir,
  entries,
  parentPath,
  level,
  docsDir,
}: {
  dir: string
  entries: fs.Dirent[]
  parentPath: string
  level: number
  docsDir: string
}): Promise<DocNode[] | ScanError> {
  const nodes = await Promise.all(
    entries.map((entry) => {
      return buildNode({ entry, dir, parentPath, level, docsDir })
    }),
  )

  const children: DocNode[] = []
  const seenPaths = new Set<string>()
  for (const node of nodes) {
    if (node instanceof Error) return node
    if (!node) continue
    // `guide.md` next to a `guide/` folder would share the `guide` key
    if (seenPaths.has(node.path)) {
      return new ScanError({
        path: docsDir,
        reason: `both a document and a folder map to ${node.path}`,
      })
    }
    seenPaths.add(node.path)
    children.push(node)
  }
  return children
}

export function flattenDocTree({ tree }: { tree: DocTree }): DocNode[] {
  const flat: DocNode[] = []
  const visit = (nodes: DocNode[]) => {
    for (const node of nodes) {
      flat.push(node)
      visit(node.children)
    }
  }
  visit(tree.children)
  return flat
}

export async function scanDocs({
  docsDir,
}: {
  docsDir: string
}): Promise<DocTree | ScanError> {
  const stat = await fs.promises.stat(docsDir).catch((cause) => {
    return new ScanError({ path: docsDir, reason: 'directory does not exist', cause })
  })
  if (stat instanceof Error) return stat
  if (!stat.isDirectory()) {
    return new ScanError({ path: docsDir, reason: 'not a directory' })
  }

  const entries = await readDirectory({ dir: docsDir, docsDir })
  if (entries instanceof Error) return entries

  const indexContent = await readOptionalIndex({ dir: docsDir, entries, docsDir })
  if (indexContent instanceof Error) return indexContent

  const children = await buildChildren({
    dir: docsDir,
    entries: entries.filter((entry) => !(entry.isFile() && entry.name === INDEX_FILE_NAME)),
    parentPath: '',
    level: 1,
    docsDir,
  })
  if (children instanceof Error) return children

  const tree: DocTree = {
    docsDir,
    indexContent: indexContent ?? '',
    children,
  }
  scanLogger.log(
    `Scanned ${flattenDocTree({ tree }).length} nodes in ${docsDir}`,
    indexContent === null ? '(no index.md)' : '',
  )
  return tree
}
