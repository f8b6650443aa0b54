import { createLogger, err, ok, type PixelGrid, type Result } from '@scanline/core'
import { concatImageData, parseChunks } from './chunks'
import { type DecodeError, isDecodeError } from './errors'
import {
	checkImageLimits,
	colorTypeName,
	getScanlineLayout,
	parseImageHeader,
	parsePalette,
	parseTransparency,
} from './header'
import { inflate } from './inflate'
import { PixelAssembler } from './pixels'
import {
	ChunkType,
	type DecodeOptions,
	type ImageHeader,
	type Palette,
	type PngChunk,
	type PngInfo,
	type ResolvedDecodeOptions,
	type ScanlineLayout,
	type Transparency,
} from './types'
import { unfilterScanlines } from './unfilter'

export const DEFAULT_DECODE_OPTIONS: Readonly<ResolvedDecodeOptions> = Object.freeze({
	format: 'rgba',
	transparency: true,
	verifyChecksum: true,
	maxPixels: 2 ** 28,
	maxDimension: 65536,
	logger: createLogger('png'),
})

function resolveOptions(options: DecodeOptions): ResolvedDecodeOptions {
	const defaults = DEFAULT_DECODE_OPTIONS
	return {
		format: options.format ?? defaults.format,
		transparency: options.transparency ?? defaults.transparency,
		verifyChecksum: options.verifyChecksum ?? defaults.verifyChecksum,
		maxPixels: options.maxPixels ?? defaults.maxPixels,
		maxDimension: options.maxDimension ?? defaults.maxDimension,
		logger: options.logger ?? defaults.logger,
	}
}

interface PngStructure {
	chunks: PngChunk[]
	header: ImageHeader
	layout: ScanlineLayout
	palette: Palette | undefined
	transparency: Transparency | undefined
}

/**
 * Everything up to (not including) the image data
 */
function readStructure(data: Uint8Array, options: ResolvedDecodeOptions): PngStructure {
	const { logger } = options
	const chunks = parseChunks(data, logger)

	// parseChunks guarantees IHDR comes first
	const header = parseImageHeader(chunks[0]!)
	checkImageLimits(header, options)
	const layout = getScanlineLayout(header)

	let palette: Palette | undefined
	let transparency: Transparency | undefined
	for (const chunk of chunks) {
		if (chunk.type === ChunkType.PLTE) {
			palette = parsePalette(chunk, header, logger)
		} else if (chunk.type === ChunkType.tRNS && options.transparency) {
			;({ palette, transparency } = parseTransparency(chunk, header, palette, logger))
		}
	}

	return { chunks, header, layout, palette, transparency }
}

/**
 * Decode PNG to a PixelGrid
 *
 * @throws DecodeError naming the stage that failed
 */
export function decodePng(data: Uint8Array, options: DecodeOptions = {}): PixelGrid {
	const resolved = resolveOptions(options)
	const { header, layout, palette, transparency, chunks } = readStructure(data, resolved)

	// Fails on a missing palette before anything is inflated
	const assembler = new PixelAssembler(header, layout, { format: resolved.format, palette, transparency })

	const compressed = concatImageData(chunks)
	const raw = inflate(compressed, {
		expectedLength: layout.rawLength,
		verifyChecksum: resolved.verifyChecksum,
	})

	unfilterScanlines(raw, layout, header.height, (row, y) => assembler.writeRow(row, y))

	resolved.logger.debug(
		`decoded ${header.width}x${header.height} ${colorTypeName(header.colorType)} ${header.bitDepth}-bit image ` +
			`(${compressed.length} compressed bytes, ${raw.length} raw)`
	)
	return assembler.grid
}

/**
 * Decode PNG, returning decode failures as a value
 */
export function tryDecodePng(data: Uint8Array, options: DecodeOptions = {}): Result<PixelGrid, DecodeError> {
	try {
		return ok(decodePng(data, options))
	} catch (error) {
		if (isDecodeError(error)) return err(error)
		throw error
	}
}

/**
 * Read header facts without inflating the image data
 */
export function readPngInfo(data: Uint8Array, options: DecodeOptions = {}): PngInfo {
	const resolved = resolveOptions(options)
	const { chunks, header, layout, palette, transparency } = readStructure(data, resolved)
	const imageData = chunks.filter((chunk) => chunk.type === ChunkType.IDAT)

	return {
		header,
		layout,
		paletteSize: palette?.size ?? 0,
		hasTransparency: transparency !== undefined || (palette?.alpha.some((alpha) => alpha < 255) ?? false),
		imageDataChunks: imageData.length,
		compressedSize: imageData.reduce((sum, chunk) => sum + chunk.length, 0),
	}
}
