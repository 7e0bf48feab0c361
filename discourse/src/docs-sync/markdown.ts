// Markdown helpers for docs sync: title extraction, content normalization
// and fingerprints, and the naming rules shared by the scanner and the index.

import crypto from 'node:crypto'
import { Lexer } from 'marked'

/**
 * Normalize content before hashing. Line endings become LF, trailing
 * whitespace is stripped from every line and leading/trailing blank lines are
 * dropped. Whitespace inside a line is kept as-is.
 */
export function normalizeContent({ content }: { content: string }): string {
  const lines = content
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v]+$/, ''))

  let start = 0
  while (start < lines.length && lines[start] === '') start++
  let end = lines.length
  while (end > start && lines[end - 1] === '') end--

  return lines.slice(start, end).join('\n')
}

export function fingerprintContent({ content }: { content: string }): string {
  return crypto
    .createHash('sha256')
    .update(normalizeContent({ content }), 'utf8')
    .digest('hex')
}

/** `nested-dir` -> `Nested Dir`, `getting_started` -> `Getting Started` */
export function humanizeName({ name }: { name: string }): string {
  return name
    .split(/[-_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

/**
 * Title of a document: the first heading anywhere in the markdown, else the
 * first non-empty line, else the humanized file name.
 */
export function extractTitle({
  content,
  fallbackName,
}: {
  content: string
  fallbackName: string
}): string {
  const tokens = new Lexer().lex(content)
  for (const token of tokens) {
    if (token.type === 'heading' && typeof token.text === 'string') {
      const heading = collapseWhitespace(token.text)
      if (heading) return heading
    }
  }

  const firstLine = content
    .split(/\r?\n/)
    .map((line) => collapseWhitespace(line))
    .find((line) => line.length > 0)
  if (firstLine) return firstLine

  return humanizeName({ name: fallbackName })
}

export function indexTopicTitle({ name }: { name: string }): string {
  return `${humanizeName({ name })} Documentation Overview`
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}
