import {
  MAX_PAGE_SIZE,
  type CommentNode,
  type CrawlError,
  type CrawlWarning,
} from '@reply-crawler/comment-domain'
import { buildNode, fetchStep, nextPageToken, reportWarning, requireId } from './step'
import type { ReplyTreeOptions, ReplyTreeResult } from './types'

/**
 * Resolve every direct and transitive reply of `parentId`, in API order.
 *
 * Each page's records become nodes right away and their own replies are resolved before
 * the next record is handled. A failed page or a broken record ends pagination at this
 * level only: nodes already collected stay, and the failure comes back as a warning.
 */
export async function buildReplyTree(parentId: string, options: ReplyTreeOptions): Promise<ReplyTreeResult> {
  const pageSize = Math.min(MAX_PAGE_SIZE, Math.max(1, options.pageSize ?? MAX_PAGE_SIZE))
  const replies: CommentNode[] = []
  const warnings: CrawlWarning[] = []

  let page = 0
  const fail = (error: CrawlError) => {
    const warning: CrawlWarning = { scope: 'replies', parentId, page, error }
    warnings.push(warning)
    reportWarning(options.logger, warning)
  }

  const seenTokens = new Set<string>()
  let pageToken: string | undefined
  let done = false
  while (!done) {
    page++
    const step = await fetchStep(options.fetcher, { kind: 'replies', parentId, pageSize, pageToken })
    if (!step.ok) {
      fail(step.error)
      break
    }

    for (const record of step.value.items) {
      const built = buildNode(record)
      if (!built.ok) {
        fail(built.error)
        done = true
        break
      }
      replies.push(built.value)

      const id = requireId(record)
      if (!id.ok) {
        fail(id.error)
        done = true
        break
      }
      const child = await buildReplyTree(id.value, options)
      built.value.replies = child.replies
      warnings.push(...child.warnings)
    }
    if (done) break

    pageToken = nextPageToken(seenTokens, step.value, fail)
    done = pageToken === undefined
  }

  return { replies, warnings }
}
