import {
  FetchError,
  MissingFieldError,
  describeCrawlError,
  toCrawlError,
  type CommentNode,
  type CrawlError,
  type CrawlWarning,
  type LoggerLike,
  type PageFetcher,
  type PageRequest,
  type RawCommentRecord,
  type RawPage,
} from '@reply-crawler/comment-domain'
import { sanitizeCommentText } from '@reply-crawler/comment-tree'

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: CrawlError }

/** One page request; a failure comes back as a value so each level decides what to keep. */
export async function fetchStep(fetcher: PageFetcher, request: PageRequest): Promise<StepResult<RawPage>> {
  try {
    return { ok: true, value: await fetcher.fetchPage(request) }
  } catch (error) {
    return { ok: false, error: toCrawlError(error) }
  }
}

export function buildNode(record: RawCommentRecord): StepResult<CommentNode> {
  const { id, author, text, likes, published } = record
  if (author === undefined) return { ok: false, error: new MissingFieldError('author', id) }
  if (text === undefined) return { ok: false, error: new MissingFieldError('text', id) }
  if (likes === undefined) return { ok: false, error: new MissingFieldError('likes', id) }
  if (published === undefined) return { ok: false, error: new MissingFieldError('published', id) }
  return {
    ok: true,
    value: { author, text: sanitizeCommentText(text), likes, published, replies: [] },
  }
}

export function requireId(record: RawCommentRecord): StepResult<string> {
  return record.id ? { ok: true, value: record.id } : { ok: false, error: new MissingFieldError('id') }
}

/**
 * Returns the token for the next request, or undefined when the listing is done or loops back
 * to a token it already followed. `seen` belongs to one listing and is updated here.
 */
export function nextPageToken(
  seen: Set<string>,
  page: RawPage,
  fail: (error: CrawlError) => void,
): string | undefined {
  const next = page.nextPageToken
  if (!next) return undefined
  if (seen.has(next)) {
    fail(new FetchError('malformed', `API repeated continuation token ${next}`))
    return undefined
  }
  seen.add(next)
  return next
}

export function reportWarning(logger: LoggerLike | undefined, warning: CrawlWarning) {
  logger?.warn?.(
    `[comment-core] ${warning.scope} page ${warning.page} of ${warning.parentId} failed, keeping partial results: ${describeCrawlError(warning.error)}`,
  )
}
