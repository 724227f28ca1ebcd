import {
  MAX_PAGE_SIZE,
  MalformedInputError,
  type CrawlError,
  type CrawlWarning,
  type Forest,
} from '@reply-crawler/comment-domain'
import { countNodes } from '@reply-crawler/comment-tree'
import { buildReplyTree } from './replies'
import { buildNode, fetchStep, nextPageToken, reportWarning, requireId } from './step'
import type { CollectOptions, CollectProgressEvent, CollectProgressReporter, CollectResult } from './types'

const safeReport = (progress: CollectProgressReporter | undefined, payload: CollectProgressEvent) => {
  if (typeof progress !== 'function') return
  try {
    progress(payload)
  } catch {
    // a broken listener must not end the crawl
  }
}

/**
 * Collect up to `maxResults` top-level comments of a video, each with its full reply tree.
 *
 * Never throws once fetching has started: a failed page ends the loop and whatever was
 * collected is returned with `stats.partial` set.
 */
export async function collectComments(videoId: string, options: CollectOptions): Promise<CollectResult> {
  const { fetcher, maxResults, logger, onProgress } = options
  if (!videoId) throw new MalformedInputError('A video id is required')
  if (!Number.isInteger(maxResults) || maxResults < 1) {
    throw new MalformedInputError(`maxResults must be a positive integer, got ${maxResults}`)
  }

  const comments: Forest = []
  const warnings: CrawlWarning[] = []
  let replyCount = 0

  let page = 0
  const fail = (error: CrawlError) => {
    const warning: CrawlWarning = { scope: 'threads', parentId: videoId, page, error }
    warnings.push(warning)
    reportWarning(logger, warning)
  }

  const seenTokens = new Set<string>()
  let pageToken: string | undefined
  let done = false
  while (!done && comments.length < maxResults) {
    page++
    const remaining = maxResults - comments.length
    const step = await fetchStep(fetcher, {
      kind: 'threads',
      parentId: videoId,
      pageSize: Math.min(MAX_PAGE_SIZE, remaining),
      pageToken,
    })
    if (!step.ok) {
      fail(step.error)
      break
    }
    logger?.debug?.(`[comment-core] threads page ${page}: ${step.value.items.length} item(s)`)

    for (const record of step.value.items.slice(0, remaining)) {
      const built = buildNode(record)
      if (!built.ok) {
        fail(built.error)
        done = true
        break
      }

      comments.push(built.value)
      if (!record.hasReplies) continue

      const id = requireId(record)
      if (!id.ok) {
        fail(id.error)
        done = true
        break
      }
      const child = await buildReplyTree(id.value, { fetcher, logger })
      built.value.replies = child.replies
      warnings.push(...child.warnings)
      replyCount += countNodes(child.replies)
    }

    safeReport(onProgress, { stage: 'threads', page, roots: comments.length, total: comments.length + replyCount })
    if (done) break

    pageToken = nextPageToken(seenTokens, step.value, fail)
    done = pageToken === undefined
  }

  const stats = {
    roots: comments.length,
    replies: replyCount,
    total: comments.length + replyCount,
    requested: maxResults,
    partial: warnings.length > 0,
  }
  logger?.info?.(
    `[comment-core] collected ${stats.roots} thread(s), ${stats.total} comment(s) in total for ${videoId}${stats.partial ? ` (partial, ${warnings.length} warning(s))` : ''}`,
  )
  safeReport(onProgress, { stage: 'completed', page, roots: stats.roots, total: stats.total })

  return { comments, warnings, stats }
}
