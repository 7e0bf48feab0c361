// Navigation table codec. The index topic body is the index page content
// followed by a markdown table mapping local paths to topic links:
//
//   # Navigation
//
//   | Level | Path | Navlink |
//   | -- | -- | -- |
//   | 1 | nested-dir | [Nested Dir]() |
//   | 2 | nested-dir/doc | [Nested Doc](/t/nested-doc/13) |
//
// The table is the only record of which topic belongs to which path, so
// serialize and parse must round-trip exactly.

import { normalizeContent } from './markdown.js'
import { NavigationTableParseError, type NavigationEntry } from './types.js'

export const NAVIGATION_HEADING = '# Navigation'
export const NAVIGATION_HEADER_ROW = '| Level | Path | Navlink |'
export const NAVIGATION_SEPARATOR_ROW = '| -- | -- | -- |'

const HEADER_CELLS = ['level', 'path', 'navlink']

// ═══════════════════════════════════════════════════════════════════════════
// ESCAPING
// ═══════════════════════════════════════════════════════════════════════════

function escapeChars(value: string, chars: string): string {
  let escaped = ''
  for (const char of value) {
    escaped += char === '\\' || chars.includes(char) ? `\\${char}` : char
  }
  return escaped
}

function unescapeChars(value: string): string {
  return value.replace(/\\(.)/g, '$1')
}

function formatNavlink({ title, link }: { title: string; link: string | null }) {
  return `[${escapeChars(title, '|[]')}](${escapeChars(link ?? '', '|()')})`
}

// ═══════════════════════════════════════════════════════════════════════════
// SERIALIZE
// ═══════════════════════════════════════════════════════════════════════════

/** An empty link reads back as null, so entries store it as null. */
export function navigationEntry({ level, path, title, link }: NavigationEntry): NavigationEntry {
  return { level, path, title, link: link ? link : null }
}

export function serializeNavigationRow({ entry }: { entry: NavigationEntry }) {
  return `| ${entry.level} | ${escapeChars(entry.path, '|')} | ${formatNavlink(entry)} |`
}

export function serializeNavigationTable({
  entries,
}: {
  entries: NavigationEntry[]
}): string {
  return [
    NAVIGATION_HEADING,
    '',
    NAVIGATION_HEADER_ROW,
    NAVIGATION_SEPARATOR_ROW,
    ...entries.map((entry) => serializeNavigationRow({ entry })),
  ].join('\n')
}

export function buildIndexBody({
  indexContent,
  entries,
}: {
  indexContent: string
  entries: NavigationEntry[]
}): string {
  const table = serializeNavigationTable({ entries })
  const content = normalizeContent({ content: indexContent })
  return content ? `${content}\n\n${table}` : table
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSE
// ═══════════════════════════════════════════════════════════════════════════

/** Split a table row on unescaped pipes. Escapes are kept in the cells. */
function splitRow(line: string): string[] | null {
  const trimmed = line.trim()
  if (!trimmed.startsWith('|') || !trimmed.endsWith('|') || trimmed.length < 2) {
    return null
  }

  const cells: string[] = []
  let current = ''
  for (let i = 1; i < trimmed.length; i++) {
    const char = trimmed[i]
    if (char === '\\' && i + 1 < trimmed.length) {
      current += char + trimmed[i + 1]
      i++
      continue
    }
    if (char === '|') {
      cells.push(current.trim())
      current = ''
      continue
    }
    current += char
  }
  // A row ending in an escaped pipe never closed its last cell
  if (current.length > 0) return null
  return cells
}

/** Read up to an unescaped `close` character, returning the raw text and the index after it. */
function readUntil(text: string, start: number, close: string) {
  let i = start
  while (i < text.length) {
    const char = text[i]
    if (char === '\\') {
      i += 2
      continue
    }
    if (char === close) {
      return { raw: text.slice(start, i), next: i + 1 }
    }
    i++
  }
  return null
}

function parseNavlink(cell: string): { title: string; link: string } | null {
  if (!cell.startsWith('[')) return null
  const title = readUntil(cell, 1, ']')
  if (!title || cell[title.next] !== '(') return null
  const link = readUntil(cell, title.next + 1, ')')
  if (!link || link.next !== cell.length) return null
  return {
    title: unescapeChars(title.raw),
    link: unescapeChars(link.raw),
  }
}

/**
 * Parse a navigation table starting at its `# Navigation` heading. A heading
 * with no table after it is an empty table. Rows end at the first line that
 * is not a table row.
 */
export function parseNavigationTable({
  text,
  lineOffset = 0,
}: {
  text: string
  lineOffset?: number
}): NavigationEntry[] | NavigationTableParseError {
  const lines = text.replace(/\r\n?/g, '\n').split('\n')
  const fail = (index: number, reason: string) => {
    return new NavigationTableParseError({ line: String(lineOffset + index + 1), reason })
  }

  let index = 0
  while (index < lines.length && lines[index]?.trim() === '') index++
  if (lines[index]?.trim() !== NAVIGATION_HEADING) {
    return fail(index, `expected ${NAVIGATION_HEADING}`)
  }
  index++
  while (index < lines.length && lines[index]?.trim() === '') index++
  if (index >= lines.length) return []

  const header = splitRow(lines[index] ?? '')
  if (
    !header ||
    header.length !== HEADER_CELLS.length ||
    header.some((cell, position) => cell.toLowerCase() !== HEADER_CELLS[position])
  ) {
    return fail(index, 'expected the | Level | Path | Navlink | header')
  }
  index++

  const separator = splitRow(lines[index] ?? '')
  if (
    !separator ||
    separator.length !== HEADER_CELLS.length ||
    !separator.every((cell) => /^:?-+:?$/.test(cell))
  ) {
    return fail(index, 'expected the header separator row')
  }
  index++

  const entries: NavigationEntry[] = []
  const seenPaths = new Set<string>()
  for (; index < lines.length; index++) {
    const line = lines[index] ?? ''
    if (!line.trim().startsWith('|')) break

    const cells = splitRow(line)
    if (!cells || cells.length !== HEADER_CELLS.length) {
      return fail(index, `expected ${HEADER_CELLS.length} cells`)
    }
    const [levelCell = '', pathCell = '', navlinkCell = ''] = cells

    if (!/^\d+$/.test(levelCell)) {
      return fail(index, `level must be a non-negative integer, got ${levelCell}`)
    }
    const level = Number.parseInt(levelCell, 10)
    const path = unescapeChars(pathCell)
    if (!path) {
      return fail(index, 'path is empty')
    }
    if (seenPaths.has(path)) {
      return fail(index, `duplicate path ${path}`)
    }
    const navlink = parseNavlink(navlinkCell)
    if (!navlink) {
      return fail(index, `navlink must look like [title](link), got ${navlinkCell}`)
    }

    seenPaths.add(path)
    entries.push(navigationEntry({ level, path, title: navlink.title, link: navlink.link }))
  }

  return entries
}

export type ParsedIndexBody = {
  indexContent: string
  entries: NavigationEntry[]
  error: NavigationTableParseError | null
}

/**
 * Split an index topic body into the page content and the navigation table.
 * The table starts at the last `# Navigation` line, so the index page may use
 * that heading itself. A malformed table yields no entries plus the error.
 */
export function parseIndexBody({ body }: { body: string }): ParsedIndexBody {
  const lines = body.replace(/\r\n?/g, '\n').split('\n')
  let headingIndex = -1
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i]?.trim() === NAVIGATION_HEADING) {
      headingIndex = i
      break
    }
  }

  if (headingIndex === -1) {
    return { indexContent: normalizeContent({ content: body }), entries: [], error: null }
  }

  const indexContent = normalizeContent({ content: lines.slice(0, headingIndex).join('\n') })
  const parsed = parseNavigationTable({
    text: lines.slice(headingIndex).join('\n'),
    lineOffset: headingIndex,
  })
  if (parsed instanceof Error) {
    return { indexContent, entries: [], error: parsed }
  }
  return { indexContent, entries: parsed, error: null }
}
