import { resolveVideoId, SHORT_LINK_HOST, LONG_LINK_HOST } from './core/shared'
import {
	createYouTubeDataApiFetcher,
	buildPageUrl,
	classifyHttpError,
	parsePage,
	DEFAULT_YOUTUBE_API_BASE_URL,
	DEFAULT_REQUEST_TIMEOUT_MS,
} from './youtube-data-api'

export type {
	FetchLike,
	FetchResponseLike,
	YouTubeDataApiOptions,
	YouTubeDataApiFetcher,
} from './youtube-data-api'

export {
	resolveVideoId,
	SHORT_LINK_HOST,
	LONG_LINK_HOST,
	createYouTubeDataApiFetcher,
	buildPageUrl,
	classifyHttpError,
	parsePage,
	DEFAULT_YOUTUBE_API_BASE_URL,
	DEFAULT_REQUEST_TIMEOUT_MS,
}

export default {
	resolveVideoId,
	createYouTubeDataApiFetcher,
}
