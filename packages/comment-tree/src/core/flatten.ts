import type { CommentNode, CommentType, FlatRow, Forest } from '@reply-crawler/comment-domain'

export interface WalkEntry {
  node: CommentNode
  /** 0 for roots, 1 for their direct replies, and so on. */
  depth: number
  parent?: CommentNode
}

export function commentTypeForDepth(depth: number): CommentType {
  return depth === 0 ? 'main' : `reply_level_${depth}`
}

/**
 * Lazy pre-order walk: each node is yielded before its subtree, children in stored order.
 * Uses an explicit stack so arbitrarily deep threads never hit the call stack limit.
 */
export function* walkForest(forest: Forest): Generator<WalkEntry> {
  const stack: WalkEntry[] = []
  for (let i = forest.length - 1; i >= 0; i--) stack.push({ node: forest[i], depth: 0 })

  let entry = stack.pop()
  while (entry) {
    yield entry
    const { node, depth } = entry
    for (let i = node.replies.length - 1; i >= 0; i--) {
      stack.push({ node: node.replies[i], depth: depth + 1, parent: node })
    }
    entry = stack.pop()
  }
}

export function toFlatRow({ node, depth, parent }: WalkEntry): FlatRow {
  return {
    commentType: commentTypeForDepth(depth),
    author: node.author,
    text: node.text,
    likes: node.likes,
    published: node.published,
    parentAuthor: parent?.author ?? '',
    parentText: parent?.text ?? '',
  }
}

export function flattenForest(forest: Forest): FlatRow[] {
  const rows: FlatRow[] = []
  for (const entry of walkForest(forest)) rows.push(toFlatRow(entry))
  return rows
}

/** Roots plus every descendant. */
export function countNodes(forest: Forest): number {
  let count = 0
  for (const _ of walkForest(forest)) count++
  return count
}
