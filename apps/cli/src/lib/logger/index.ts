import { LOG_LEVEL, NODE_ENV } from '~/lib/config/env'
import { formatConsole, formatSimple } from './formatters'
import { LOG_LEVELS, type LogCategory, type LogEntry, type LogLevel } from './types'

export interface ScopedLogger {
	debug(message: string): void
	info(message: string): void
	warn(message: string): void
	error(message: string): void
}

export class Logger {
	constructor(
		private logLevel: LogLevel = LOG_LEVEL,
		private readonly production = NODE_ENV === 'production',
	) {}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel)
	}

	private createLogEntry(level: LogLevel, category: LogCategory, message: string): LogEntry {
		return {
			timestamp: new Date().toISOString(),
			level,
			category,
			message,
		}
	}

	private log(level: LogLevel, category: LogCategory, message: string): void {
		if (!this.shouldLog(level)) return

		const entry = this.createLogEntry(level, category, message)
		const formattedMessage = this.production ? formatSimple(entry) : formatConsole(entry)

		switch (level) {
			case 'debug':
				console.debug(formattedMessage)
				break
			case 'info':
				console.info(formattedMessage)
				break
			case 'warn':
				console.warn(formattedMessage)
				break
			case 'error':
				console.error(formattedMessage)
				break
		}
	}

	debug(category: LogCategory, message: string): void {
		this.log('debug', category, message)
	}

	info(category: LogCategory, message: string): void {
		this.log('info', category, message)
	}

	warn(category: LogCategory, message: string): void {
		this.log('warn', category, message)
	}

	error(category: LogCategory, message: string): void {
		this.log('error', category, message)
	}

	setLevel(level: LogLevel): void {
		this.logLevel = level
	}

	/** Category-bound view, handed to the packages as their `LoggerLike`. */
	scoped(category: LogCategory): ScopedLogger {
		return {
			debug: (message) => this.debug(category, message),
			info: (message) => this.info(category, message),
			warn: (message) => this.warn(category, message),
			error: (message) => this.error(category, message),
		}
	}
}

export const logger = new Logger()
export type { LogCategory, LogEntry, LogLevel } from './types'
