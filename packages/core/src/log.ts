export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
	debug(message: string): void
	info(message: string): void
	warn(message: string): void
	error(message: string): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

/**
 * Console logger; lines are prefixed with `[name]`
 */
export function createLogger(name: string, level: LogLevel = 'warn'): Logger {
	const threshold = LEVEL_ORDER[level]
	const enabled = (l: LogLevel): boolean => LEVEL_ORDER[l] >= threshold

	return {
		debug(message) {
			if (enabled('debug')) console.debug(`[${name}] ${message}`)
		},
		info(message) {
			if (enabled('info')) console.log(`[${name}] ${message}`)
		},
		warn(message) {
			if (enabled('warn')) console.warn(`[${name}] ${message}`)
		},
		error(message) {
			if (enabled('error')) console.error(`[${name}] ${message}`)
		},
	}
}

export const silentLogger: Logger = createLogger('', 'silent')

/**
 * Narrow a user-supplied string (e.g. a CLI flag value) to a LogLevel
 */
export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value)
}
