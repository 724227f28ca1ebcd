// Shared comment tree shapes and the page fetcher contract.
// Keep this file dependency-free so it can be used by the crawler, exporters and CLI alike.

import type { CrawlError } from './errors'

export interface CommentNode {
	author: string
	text: string
	likes: number
	// ISO 8601, passed through untouched
	published: string
	replies: CommentNode[]
}

export type Forest = CommentNode[]

export type CommentType = 'main' | `reply_level_${number}`

export interface FlatRow {
	commentType: CommentType
	author: string
	text: string
	likes: number
	published: string
	parentAuthor: string
	parentText: string
}

export const FLAT_ROW_HEADER = [
	'comment_type',
	'author',
	'text',
	'likes',
	'published',
	'parent_author',
	'parent_text',
] as const

// ---------------- Page fetcher contract ----------------

export const MAX_PAGE_SIZE = 100

export type ParentKind = 'threads' | 'replies'

export interface PageRequest {
	kind: ParentKind
	/** Video id for `threads`, comment id for `replies`. */
	parentId: string
	pageSize: number
	pageToken?: string
}

/**
 * A record as handed over by a fetcher, before normalization.
 * Fields are optional on purpose: the crawler checks them when it builds nodes.
 */
export interface RawCommentRecord {
	id?: string
	author?: string
	text?: string
	likes?: number
	published?: string
	hasReplies?: boolean
}

export interface RawPage {
	items: RawCommentRecord[]
	nextPageToken?: string
}

export interface PageFetcher {
	fetchPage(request: PageRequest): Promise<RawPage>
}

// ---------------- Crawl outcome ----------------

export interface CrawlWarning {
	scope: ParentKind
	parentId: string
	/** 1-based page index within the failing listing. */
	page: number
	error: CrawlError
}

export interface CrawlStats {
	roots: number
	replies: number
	total: number
	requested: number
	partial: boolean
}

export type LoggerLike = {
	debug?: (message: string) => void
	info?: (message: string) => void
	warn?: (message: string) => void
}
