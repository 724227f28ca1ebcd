export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export type LogCategory = 'crawl' | 'api' | 'export' | 'cli'

export interface LogEntry {
	timestamp: string
	level: LogLevel
	category: LogCategory
	message: string
}
