import { MalformedInputError } from '@reply-crawler/comment-domain'

export const SHORT_LINK_HOST = 'youtu.be'
export const LONG_LINK_HOST = 'youtube.com'

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i

function readWatchParam(input: string): string {
	let url: URL
	try {
		url = new URL(SCHEME_PATTERN.test(input) ? input : `https://${input}`)
	} catch {
		throw new MalformedInputError(`Cannot parse video URL: ${input}`, input)
	}
	const v = url.searchParams.get('v')
	if (!v) throw new MalformedInputError(`Video URL has no "v" parameter: ${input}`, input)
	return v
}

/**
 * Resolve a watch URL, short link or bare id to the canonical video id.
 *
 * - `https://youtu.be/abc123?t=5` -> `abc123`
 * - `https://www.youtube.com/watch?v=abc123&t=5` -> `abc123`
 * - `abc123&feature=share` -> `abc123`
 */
export function resolveVideoId(input: string): string {
	const value = input.trim()
	if (!value) throw new MalformedInputError('Video URL or id is empty', input)

	let id: string
	if (value.includes(SHORT_LINK_HOST)) {
		const lastSegment = value.slice(value.lastIndexOf('/') + 1)
		id = lastSegment.split('?')[0]
	} else if (value.includes(LONG_LINK_HOST)) {
		id = readWatchParam(value)
	} else {
		id = value.split('&')[0]
	}

	if (!id) throw new MalformedInputError(`No video id found in: ${input}`, input)
	return id
}
