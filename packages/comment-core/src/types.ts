import type {
  CommentNode,
  CrawlStats,
  CrawlWarning,
  Forest,
  LoggerLike,
  PageFetcher,
} from '@reply-crawler/comment-domain'

export interface ReplyTreeOptions {
  fetcher: PageFetcher
  logger?: LoggerLike
  /** Capped at MAX_PAGE_SIZE. */
  pageSize?: number
}

export interface ReplyTreeResult {
  replies: CommentNode[]
  warnings: CrawlWarning[]
}

export interface CollectProgressEvent {
  stage: 'threads' | 'completed'
  page: number
  roots: number
  total: number
}

export type CollectProgressReporter = (event: CollectProgressEvent) => void

export interface CollectOptions {
  fetcher: PageFetcher
  /** Upper bound on root comments; replies are not counted against it. */
  maxResults: number
  logger?: LoggerLike
  onProgress?: CollectProgressReporter
}

export interface CollectResult {
  comments: Forest
  warnings: CrawlWarning[]
  stats: CrawlStats
}
