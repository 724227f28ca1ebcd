import { ProxyAgent, fetch as undiciFetch, type Dispatcher } from 'undici'
import { z } from 'zod'
import {
	FetchError,
	MAX_PAGE_SIZE,
	MalformedInputError,
	type LoggerLike,
	type PageFetcher,
	type PageRequest,
	type RawCommentRecord,
	type RawPage,
} from '@reply-crawler/comment-domain'

export const DEFAULT_YOUTUBE_API_BASE_URL = 'https://www.googleapis.com/youtube/v3'
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000

const QUOTA_REASONS = new Set([
	'quotaExceeded',
	'rateLimitExceeded',
	'userRateLimitExceeded',
	'dailyLimitExceeded',
])

// ---------------- Response schemas ----------------

const commentSchema = z.object({
	id: z.string().optional(),
	snippet: z
		.object({
			authorDisplayName: z.string().optional(),
			textDisplay: z.string().optional(),
			likeCount: z.number().int().nonnegative().optional(),
			publishedAt: z.string().optional(),
		})
		.optional(),
})

const commentThreadSchema = z.object({
	id: z.string().optional(),
	snippet: z
		.object({
			topLevelComment: commentSchema.optional(),
			totalReplyCount: z.number().optional(),
		})
		.optional(),
	replies: z.object({ comments: z.array(commentSchema).optional() }).optional(),
})

const commentListSchema = z.object({
	items: z.array(commentSchema).default([]),
	nextPageToken: z.string().optional(),
})

const commentThreadListSchema = z.object({
	items: z.array(commentThreadSchema).default([]),
	nextPageToken: z.string().optional(),
})

const apiErrorSchema = z.object({
	error: z.object({
		code: z.number().optional(),
		message: z.string().optional(),
		errors: z.array(z.object({ reason: z.string().optional() })).optional(),
	}),
})

type YouTubeComment = z.infer<typeof commentSchema>
type YouTubeCommentThread = z.infer<typeof commentThreadSchema>

// ---------------- Transport ----------------

export interface FetchResponseLike {
	ok: boolean
	status: number
	text(): Promise<string>
}

export type FetchLike = (
	url: string,
	init: { headers: Record<string, string>; signal: AbortSignal; dispatcher?: Dispatcher },
) => Promise<FetchResponseLike>

export interface YouTubeDataApiOptions {
	apiKey: string
	baseUrl?: string
	proxyUrl?: string
	timeoutMs?: number
	fetchImpl?: FetchLike
	logger?: LoggerLike
}

export interface YouTubeDataApiFetcher extends PageFetcher {
	/** Releases the proxy agent, if one was created. */
	close(): Promise<void>
}

export function buildPageUrl(baseUrl: string, request: PageRequest, apiKey: string): URL {
	const isThreads = request.kind === 'threads'
	const url = new URL(`${baseUrl.replace(/\/+$/, '')}/${isThreads ? 'commentThreads' : 'comments'}`)
	url.searchParams.set('part', isThreads ? 'snippet,replies' : 'snippet')
	url.searchParams.set(isThreads ? 'videoId' : 'parentId', request.parentId)
	url.searchParams.set('maxResults', String(Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(request.pageSize)))))
	url.searchParams.set('textFormat', 'html')
	if (request.pageToken) url.searchParams.set('pageToken', request.pageToken)
	url.searchParams.set('key', apiKey)
	return url
}

export function classifyHttpError(status: number, body: unknown): FetchError {
	const parsed = apiErrorSchema.safeParse(body)
	const reason = parsed.success ? parsed.data.error.errors?.[0]?.reason : undefined
	const message = (parsed.success && parsed.data.error.message) || `YouTube API responded with HTTP ${status}`
	const details = { status, reason }

	if (status === 429 || (status === 403 && reason && QUOTA_REASONS.has(reason))) {
		return new FetchError('quota', message, details)
	}
	if (status === 401 || (status === 400 && reason === 'keyInvalid')) {
		return new FetchError('auth', message, details)
	}
	if (status === 403) {
		// comments turned off on the video is a 403 too, but not a credentials problem
		return new FetchError(reason === 'commentsDisabled' ? 'http' : 'auth', message, details)
	}
	if (status === 404) return new FetchError('not_found', message, details)
	return new FetchError('http', message, details)
}

// ---------------- Record mapping ----------------

function toRawRecord(comment: YouTubeComment | undefined): RawCommentRecord {
	const snippet = comment?.snippet
	return {
		id: comment?.id,
		author: snippet?.authorDisplayName,
		text: snippet?.textDisplay,
		likes: snippet?.likeCount,
		published: snippet?.publishedAt,
	}
}

function threadToRawRecord(thread: YouTubeCommentThread): RawCommentRecord {
	const inlineReplies = thread.replies?.comments?.length ?? 0
	return {
		...toRawRecord(thread.snippet?.topLevelComment),
		hasReplies: (thread.snippet?.totalReplyCount ?? 0) > 0 || inlineReplies > 0,
	}
}

export function parsePage(kind: PageRequest['kind'], body: unknown): RawPage {
	if (kind === 'threads') {
		const parsed = commentThreadListSchema.safeParse(body)
		if (!parsed.success) {
			throw new FetchError('malformed', `Unexpected commentThreads response: ${parsed.error.message}`)
		}
		return { items: parsed.data.items.map(threadToRawRecord), nextPageToken: parsed.data.nextPageToken }
	}
	const parsed = commentListSchema.safeParse(body)
	if (!parsed.success) {
		throw new FetchError('malformed', `Unexpected comments response: ${parsed.error.message}`)
	}
	return { items: parsed.data.items.map(toRawRecord), nextPageToken: parsed.data.nextPageToken }
}

function isTimeout(error: unknown) {
	return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
}

/**
 * Page fetcher backed by the YouTube Data API v3 (`commentThreads.list` for top-level threads,
 * `comments.list?parentId=` for replies). Every failure surfaces as a typed `FetchError`.
 */
export function createYouTubeDataApiFetcher(options: YouTubeDataApiOptions): YouTubeDataApiFetcher {
	const apiKey = options.apiKey.trim()
	if (!apiKey) throw new MalformedInputError('A YouTube Data API key is required')

	const baseUrl = options.baseUrl || DEFAULT_YOUTUBE_API_BASE_URL
	const timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_REQUEST_TIMEOUT_MS
	const agent = options.proxyUrl ? new ProxyAgent(options.proxyUrl) : undefined
	const fetchImpl: FetchLike = options.fetchImpl ?? undiciFetch
	const { logger } = options

	async function fetchPage(request: PageRequest): Promise<RawPage> {
		const url = buildPageUrl(baseUrl, request, apiKey)
		logger?.debug?.(
			`[comment-providers] ${url.pathname} parent=${request.parentId} size=${url.searchParams.get('maxResults')} token=${request.pageToken ?? '-'}`,
		)

		let response: FetchResponseLike
		let body: string
		try {
			response = await fetchImpl(url.toString(), {
				headers: { Accept: 'application/json' },
				signal: AbortSignal.timeout(timeoutMs),
				dispatcher: agent,
			})
			body = await response.text()
		} catch (error) {
			if (isTimeout(error)) {
				throw new FetchError('timeout', `Request timed out after ${timeoutMs}ms`, { cause: error })
			}
			const message = error instanceof Error ? error.message : String(error)
			throw new FetchError('network', message, { cause: error })
		}

		let json: unknown
		try {
			json = body ? JSON.parse(body) : {}
		} catch (error) {
			if (!response.ok) throw classifyHttpError(response.status, undefined)
			throw new FetchError('malformed', 'YouTube API returned a non-JSON body', {
				status: response.status,
				cause: error,
			})
		}

		if (!response.ok) throw classifyHttpError(response.status, json)
		return parsePage(request.kind, json)
	}

	return {
		fetchPage,
		async close() {
			await agent?.close()
		},
	}
}
