export const MALFORMED_INPUT_CODE = 'MALFORMED_INPUT' as const
export const FETCH_FAILED_CODE = 'FETCH_FAILED' as const
export const MISSING_FIELD_CODE = 'MISSING_FIELD' as const

export type CrawlErrorCode =
	| typeof MALFORMED_INPUT_CODE
	| typeof FETCH_FAILED_CODE
	| typeof MISSING_FIELD_CODE

export type FetchErrorKind =
	| 'network'
	| 'timeout'
	| 'quota'
	| 'auth'
	| 'not_found'
	| 'http'
	| 'malformed'

export abstract class CrawlError extends Error {
	abstract readonly code: CrawlErrorCode

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

/**
 * Bad identifier, URL or option. Raised before any network activity and fatal to the run.
 */
export class MalformedInputError extends CrawlError {
	readonly code = MALFORMED_INPUT_CODE

	constructor(
		message: string,
		readonly input?: string,
	) {
		super(message)
	}
}

/**
 * A page request failed. The crawler downgrades these to warnings and keeps what it has.
 */
export class FetchError extends CrawlError {
	readonly code = FETCH_FAILED_CODE
	readonly kind: FetchErrorKind
	readonly status?: number
	readonly reason?: string

	constructor(
		kind: FetchErrorKind,
		message: string,
		details: { status?: number; reason?: string; cause?: unknown } = {},
	) {
		super(message, { cause: details.cause })
		this.kind = kind
		this.status = details.status
		this.reason = details.reason
	}
}

export class MissingFieldError extends CrawlError {
	readonly code = MISSING_FIELD_CODE

	constructor(
		readonly field: string,
		readonly recordId?: string,
	) {
		super(
			recordId
				? `Record ${recordId} is missing field "${field}"`
				: `Record is missing field "${field}"`,
		)
	}
}

export function isCrawlError(error: unknown): error is CrawlError {
	return error instanceof CrawlError
}

/** Anything thrown mid-crawl that is not already typed is treated as a network failure. */
export function toCrawlError(error: unknown): CrawlError {
	if (isCrawlError(error)) return error
	const message = error instanceof Error ? error.message : String(error)
	return new FetchError('network', message, { cause: error })
}

export function describeCrawlError(error: CrawlError): string {
	if (error instanceof FetchError) {
		const status = error.status ? ` ${error.status}` : ''
		const reason = error.reason ? ` (${error.reason})` : ''
		return `${error.kind}${status}${reason}: ${error.message}`
	}
	return `${error.code}: ${error.message}`
}
