import { collectComments, type CollectResult } from '@reply-crawler/comment-core'
import { MalformedInputError } from '@reply-crawler/comment-domain'
import {
	createYouTubeDataApiFetcher,
	resolveVideoId,
	type YouTubeDataApiFetcher,
	type YouTubeDataApiOptions,
} from '@reply-crawler/comment-providers'
import { CLI_DEFAULTS, type CliDefaults } from '~/lib/config/env'
import { exportComments, writeTextFile, type FileWriter } from '~/lib/export/write'
import { logger as defaultLogger, type Logger } from '~/lib/logger'
import { renderForest, summaryLines } from '~/lib/render/console'
import { USAGE, UsageError, parseCliArgs, type ParsedCommand } from './args'

export const EXIT_OK = 0
export const EXIT_USAGE = 2

export interface CliDeps {
	defaults: CliDefaults
	createFetcher: (options: YouTubeDataApiOptions) => YouTubeDataApiFetcher
	writeFile: FileWriter
	/** User-facing output (stdout). Diagnostics go through the logger. */
	print: (line: string) => void
	logger: Logger
}

export function defaultCliDeps(): CliDeps {
	return {
		defaults: CLI_DEFAULTS,
		createFetcher: createYouTubeDataApiFetcher,
		writeFile: writeTextFile,
		print: (line) => console.log(line),
		logger: defaultLogger,
	}
}

export async function runCli(argv: string[], deps: CliDeps = defaultCliDeps()): Promise<number> {
	const { print, logger } = deps

	let command: ParsedCommand
	try {
		command = parseCliArgs(argv, deps.defaults)
	} catch (error) {
		if (!(error instanceof UsageError)) throw error
		logger.error('cli', error.message)
		print(USAGE)
		return EXIT_USAGE
	}
	if (command.kind === 'help') {
		print(USAGE)
		return EXIT_OK
	}

	const { options } = command
	if (options.verbose) logger.setLevel('debug')

	let videoId: string
	try {
		videoId = resolveVideoId(options.input)
	} catch (error) {
		if (!(error instanceof MalformedInputError)) throw error
		logger.error('cli', error.message)
		return EXIT_USAGE
	}

	print(`Fetching up to ${options.maxResults} comments for video ${videoId}...`)
	const fetcher = deps.createFetcher({
		apiKey: options.apiKey,
		baseUrl: options.baseUrl,
		proxyUrl: options.proxyUrl,
		timeoutMs: options.timeoutMs,
		logger: logger.scoped('api'),
	})

	let result: CollectResult
	try {
		result = await collectComments(videoId, {
			fetcher,
			maxResults: options.maxResults,
			logger: logger.scoped('crawl'),
			onProgress: (event) => {
				if (event.stage === 'threads') {
					logger.debug('crawl', `page ${event.page}: ${event.roots} thread(s), ${event.total} comment(s) so far`)
				}
			},
		})
	} finally {
		await fetcher.close()
	}

	const { comments, stats, warnings } = result
	if (options.output) {
		const format = await exportComments(comments, options.output, deps.writeFile)
		logger.debug('export', `wrote ${format} export to ${options.output}`)
		print(`Saved ${stats.total} comments (including replies) to ${options.output}`)
	} else {
		for (const line of renderForest(comments)) print(line)
	}

	for (const line of summaryLines(stats, warnings.length)) print(line)
	return EXIT_OK
}
