#!/usr/bin/env tsx
/**
 * scanline CLI - print a PNG to a truecolor terminal
 */

import { existsSync, readFileSync } from 'node:fs'
import { createLogger, type LogLevel } from '@scanline/core'
import { decodePng, isDecodeError, readPngInfo } from '@scanline/codecs'
import { type CliOptions, parseArgs, UsageError } from './args'
import { downsample, formatError, formatInfo, renderAnsi } from './render'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

const HELP = `
scanline - PNG decoder that prints images to a truecolor terminal

USAGE:
  scanline <file.png>                 Print the image
  scanline --info <file.png>          Show header facts

OPTIONS:
  -i, --info            Show image info instead of pixels
  -w, --width <cols>    Downsample to at most <cols> columns
  -v, --verbose         Log decoder details
  -q, --quiet           Suppress warnings
      --log-level <lvl> debug, info, warn (default), error or silent
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  scanline icon.png
  scanline photo.png -w 80
  scanline --info photo.png
`

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function logLevel(options: CliOptions): LogLevel {
	if (options.logLevel) return options.logLevel
	if (options.verbose) return 'debug'
	if (options.quiet) return 'silent'
	return 'warn'
}

function showInfo(input: string, options: CliOptions): void {
	const data = readFileSync(input)
	const info = readPngInfo(data, { logger: createLogger('png', logLevel(options)) })
	console.log(formatInfo(input, data.length, info).join('\n'))
}

function showImage(input: string, options: CliOptions): void {
	const data = readFileSync(input)
	const grid = decodePng(data, { format: 'rgb', logger: createLogger('png', logLevel(options)) })
	const scaled = options.width === undefined ? grid : downsample(grid, options.width)
	process.stdout.write(renderAnsi(scaled))
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

function main(): void {
	const { inputs, options } = parseArgs(process.argv.slice(2))

	if (options.help || (inputs.length === 0 && !options.version)) {
		console.log(HELP)
		return
	}

	if (options.version) {
		console.log(`scanline v${VERSION}`)
		return
	}

	for (const input of inputs) {
		if (!existsSync(input)) {
			throw new UsageError(`File not found: ${input}`)
		}
		if (options.info) {
			showInfo(input, options)
		} else {
			showImage(input, options)
		}
	}
}

try {
	main()
} catch (error) {
	if (isDecodeError(error)) {
		console.error(formatError(error))
	} else if (error instanceof UsageError) {
		console.error(`Error: ${error.message}`)
	} else {
		console.error('Fatal error:', error)
	}
	process.exit(1)
}
