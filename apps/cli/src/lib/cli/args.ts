import { parseArgs } from 'node:util'
import type { CliDefaults } from '~/lib/config/env'

export const USAGE = `Usage: reply-crawler <video-url-or-id> [options]

Fetch a video's comments together with every nested reply.

Options:
  -k, --api-key <key>   YouTube Data API key (default: $YOUTUBE_API_KEY)
  -m, --max <n>         Maximum number of top-level comments (default: 100)
  -o, --output <path>   Write to a file: .csv for a flat table, anything else for JSON
      --proxy <url>     Route API requests through an HTTP proxy (default: $COMMENTS_PROXY_URL)
  -v, --verbose         Log every API request
  -h, --help            Show this help`

export class UsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'UsageError'
	}
}

export interface CliOptions {
	input: string
	apiKey: string
	maxResults: number
	output?: string
	proxyUrl?: string
	baseUrl: string
	timeoutMs: number
	verbose: boolean
}

export type ParsedCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions }

function readMax(raw: string | undefined, fallback: number): number {
	if (raw === undefined) return fallback
	const value = Number(raw)
	if (!/^\d+$/.test(raw.trim()) || value < 1) {
		throw new UsageError(`--max must be a positive integer, got "${raw}"`)
	}
	return value
}

function readArgv(argv: string[]) {
	try {
		return parseArgs({
			args: argv,
			allowPositionals: true,
			strict: true,
			options: {
				'api-key': { type: 'string', short: 'k' },
				max: { type: 'string', short: 'm' },
				output: { type: 'string', short: 'o' },
				proxy: { type: 'string' },
				verbose: { type: 'boolean', short: 'v' },
				help: { type: 'boolean', short: 'h' },
			},
		})
	} catch (error) {
		throw new UsageError(error instanceof Error ? error.message : String(error))
	}
}

export function parseCliArgs(argv: string[], defaults: CliDefaults): ParsedCommand {
	const { values, positionals } = readArgv(argv)
	if (values.help) return { kind: 'help' }

	if (positionals.length === 0) throw new UsageError('Missing video URL or id')
	if (positionals.length > 1) throw new UsageError(`Expected one video URL or id, got ${positionals.length}`)

	const apiKey = (values['api-key'] ?? defaults.apiKey ?? '').trim()
	if (!apiKey) throw new UsageError('Missing API key: pass --api-key or set YOUTUBE_API_KEY')

	return {
		kind: 'run',
		options: {
			input: positionals[0],
			apiKey,
			maxResults: readMax(values.max, defaults.maxResults),
			output: values.output || undefined,
			proxyUrl: values.proxy || defaults.proxyUrl,
			baseUrl: defaults.baseUrl,
			timeoutMs: defaults.timeoutMs,
			verbose: values.verbose ?? false,
		},
	}
}
