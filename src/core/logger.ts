import pino, { type Logger, type LoggerOptions } from 'pino'

const options: LoggerOptions = {
	level: process.env.LOG_LEVEL || 'info',
	base: { service: 'market-feed' },
	timestamp: pino.stdTimeFunctions.isoTime,
	formatters: {
		level: (label) => ({ level: label }),
	},
	redact: {
		paths: ['credential', '*.credential', 'apikey', '*.apikey', 'token', '*.token'],
		censor: '[REDACTED]',
	},
}

export const logger: Logger = pino(options)

export function createComponentLogger(component: string): Logger {
	return logger.child({ component })
}
