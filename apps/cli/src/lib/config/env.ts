// Environment-backed defaults for the CLI. Command line flags take precedence.

import { DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_YOUTUBE_API_BASE_URL } from '@reply-crawler/comment-providers'
import { LOG_LEVELS, type LogLevel } from '~/lib/logger/types'

export const NODE_ENV = process.env.NODE_ENV || 'development'

export const YOUTUBE_API_KEY = process.env.YOUTUBE_API_KEY || undefined

export const YOUTUBE_API_BASE_URL = process.env.YOUTUBE_API_BASE_URL || DEFAULT_YOUTUBE_API_BASE_URL

// Forward proxy for API requests (http/https), e.g. http://127.0.0.1:7890
export const COMMENTS_PROXY_URL = process.env.COMMENTS_PROXY_URL || undefined

export const REQUEST_TIMEOUT_MS = Number(process.env.REQUEST_TIMEOUT_MS || '') || DEFAULT_REQUEST_TIMEOUT_MS

export const DEFAULT_MAX_RESULTS = Number(process.env.DEFAULT_MAX_RESULTS || '') || 100

function readLogLevel(value: string | undefined): LogLevel {
	const normalized = value?.trim().toLowerCase()
	return LOG_LEVELS.find((level) => level === normalized) ?? 'info'
}

export const LOG_LEVEL: LogLevel = readLogLevel(process.env.LOG_LEVEL)

export interface CliDefaults {
	apiKey?: string
	baseUrl: string
	proxyUrl?: string
	timeoutMs: number
	maxResults: number
}

export const CLI_DEFAULTS: CliDefaults = {
	apiKey: YOUTUBE_API_KEY,
	baseUrl: YOUTUBE_API_BASE_URL,
	proxyUrl: COMMENTS_PROXY_URL,
	timeoutMs: REQUEST_TIMEOUT_MS,
	maxResults: DEFAULT_MAX_RESULTS,
}
