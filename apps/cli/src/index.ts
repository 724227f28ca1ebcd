#!/usr/bin/env -S npx tsx
import { runCli } from '~/lib/cli/run'
import { logger } from '~/lib/logger'

runCli(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code
	})
	.catch((error: unknown) => {
		logger.error('cli', error instanceof Error ? (error.stack ?? error.message) : String(error))
		process.exitCode = 1
	})
