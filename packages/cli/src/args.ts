import { isLogLevel, type LogLevel } from '@scanline/core'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CliOptions {
	// Output
	width?: number

	// Flags
	verbose?: boolean
	quiet?: boolean
	logLevel?: LogLevel

	// Commands
	info?: boolean
	help?: boolean
	version?: boolean
}

/**
 * Bad command line; main prints the message and exits 1
 */
export class UsageError extends Error {
	override readonly name = 'UsageError'
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parsing
// ─────────────────────────────────────────────────────────────────────────────

function parseColumns(value: string | undefined, flag: string): number {
	if (value === undefined) {
		throw new UsageError(`${flag} requires a column count`)
	}
	const columns = Number(value)
	if (!Number.isInteger(columns) || columns < 1) {
		throw new UsageError(`${flag} expects a positive integer, got "${value}"`)
	}
	return columns
}

function parseLogLevel(value: string | undefined, flag: string): LogLevel {
	if (value === undefined || !isLogLevel(value)) {
		throw new UsageError(`${flag} expects one of debug, info, warn, error, silent; got "${value ?? ''}"`)
	}
	return value
}

export function parseArgs(args: readonly string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (arg === '--log-level') {
			options.logLevel = parseLogLevel(args[++i], arg)
		} else if (arg.startsWith('--log-level=')) {
			options.logLevel = parseLogLevel(arg.slice('--log-level='.length), '--log-level')
		} else if (arg === '--width' || arg === '-w') {
			options.width = parseColumns(args[++i], arg)
		} else if (arg.startsWith('--width=')) {
			options.width = parseColumns(arg.slice('--width='.length), '--width')
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new UsageError(`Unknown option: ${arg}`)
		}

		i++
	}

	if (options.verbose && options.quiet) {
		throw new UsageError('--verbose and --quiet cannot be combined')
	}
	if (options.logLevel && (options.verbose || options.quiet)) {
		throw new UsageError('--log-level cannot be combined with --verbose or --quiet')
	}

	return { inputs, options }
}
