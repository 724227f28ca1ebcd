export {
	type CommentNode,
	type Forest,
	type CommentType,
	type FlatRow,
	type ParentKind,
	type PageRequest,
	type RawCommentRecord,
	type RawPage,
	type PageFetcher,
	type CrawlWarning,
	type CrawlStats,
	type LoggerLike,
	FLAT_ROW_HEADER,
	MAX_PAGE_SIZE,
} from './comment-types'

export {
	type CrawlErrorCode,
	type FetchErrorKind,
	MALFORMED_INPUT_CODE,
	FETCH_FAILED_CODE,
	MISSING_FIELD_CODE,
	CrawlError,
	MalformedInputError,
	FetchError,
	MissingFieldError,
	isCrawlError,
	toCrawlError,
	describeCrawlError,
} from './errors'
