import type { CommentNode } from '@reply-crawler/comment-domain'

export function node(
  author: string,
  text: string,
  replies: CommentNode[] = [],
  likes = 0,
  published = '2024-01-01T00:00:00Z',
): CommentNode {
  return { author, text, likes, published, replies }
}

/**
 * alice (root a)
 *   bob (b1)
 *     carol (c1)
 *       dave (d1)
 *   erin (e1)
 * frank (root f)
 */
export function sampleForest(): CommentNode[] {
  return [
    node('alice', 'root a', [
      node('bob', 'b1', [node('carol', 'c1', [node('dave', 'd1')])]),
      node('erin', 'e1'),
    ]),
    node('frank', 'root f'),
  ]
}
