/**
 * Logger
 *
 * Pino-based structured logger shared by the splitter and the CLI.
 */

import { pino, type Logger } from 'pino'
import { loadEnvConfig } from './config'

export const logger = pino({
	level: loadEnvConfig().LOG_LEVEL,
	formatters: {
		level: (label: string) => ({ level: label }),
	},
	timestamp: pino.stdTimeFunctions.isoTime,
	base: {
		service: 'dsdsplit',
	},
})

export type { Logger }

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
	return logger.child(context)
}
