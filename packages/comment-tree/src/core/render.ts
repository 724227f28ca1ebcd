import type { CommentNode } from '@reply-crawler/comment-domain'
import { walkForest } from './flatten'

const INDENT = '   '

/**
 * Printable lines for one thread, produced lazily:
 *
 *   author: text
 *   Likes: 3 | Published: 2024-01-01T00:00:00Z
 *      └─ replier: reply text
 *         Likes: 0 | Published: ...
 */
export function* renderCommentTree(root: CommentNode): Generator<string> {
  for (const { node, depth } of walkForest([root])) {
    const stats = `Likes: ${node.likes} | Published: ${node.published}`
    if (depth === 0) {
      yield `${node.author}: ${node.text}`
      yield stats
      continue
    }
    const prefix = INDENT.repeat(depth)
    yield `${prefix}└─ ${node.author}: ${node.text}`
    yield `${prefix}${INDENT}${stats}`
  }
}
