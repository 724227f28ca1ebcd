import { FLAT_ROW_HEADER, type CommentNode, type FlatRow, type Forest } from '@reply-crawler/comment-domain'

// ---------------- Tree-shaped export ----------------

export interface SerializedComment {
  author: string
  text: string
  likes: number
  published: string
  replies: SerializedComment[]
}

// Pins key order and drops anything a caller may have attached to the nodes
function toSerialized(node: CommentNode): SerializedComment {
  return {
    author: node.author,
    text: node.text,
    likes: node.likes,
    published: node.published,
    replies: node.replies.map(toSerialized),
  }
}

export function serializeForest(forest: Forest): string {
  return JSON.stringify(forest.map(toSerialized), null, 2)
}

// ---------------- Tabular export ----------------

const CSV_LINE_END = '\r\n'

export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value
  return `"${value.replace(/"/g, '""')}"`
}

export function flatRowToCells(row: FlatRow): string[] {
  return [
    row.commentType,
    row.author,
    row.text,
    String(row.likes),
    row.published,
    row.parentAuthor,
    row.parentText,
  ]
}

export function toCsv(rows: readonly FlatRow[]): string {
  const lines = [FLAT_ROW_HEADER.join(',')]
  for (const row of rows) lines.push(flatRowToCells(row).map(escapeCsvField).join(','))
  return lines.join(CSV_LINE_END) + CSV_LINE_END
}
