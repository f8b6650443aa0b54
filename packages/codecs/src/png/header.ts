import { type Logger, silentLogger } from '@scanline/core'
import { DecodeError } from './errors'
import { ByteReader } from './reader'
import {
	type BitDepth,
	ColorType,
	type ImageHeader,
	type Palette,
	type PngChunk,
	type ScanlineLayout,
	type Transparency,
} from './types'

const IHDR_LENGTH = 13
const MAX_DIMENSION = 0x7fffffff

interface ColorTypeInfo {
	readonly name: string
	readonly channels: number
	readonly bitDepths: readonly BitDepth[]
}

/**
 * Legal (color type, bit depth) combinations
 */
const COLOR_TYPES: ReadonlyMap<number, ColorTypeInfo> = new Map<number, ColorTypeInfo>([
	[ColorType.Grayscale, { name: 'Grayscale', channels: 1, bitDepths: [1, 2, 4, 8, 16] }],
	[ColorType.Truecolor, { name: 'Truecolor', channels: 3, bitDepths: [8, 16] }],
	[ColorType.Indexed, { name: 'Indexed', channels: 1, bitDepths: [1, 2, 4, 8] }],
	[ColorType.GrayscaleAlpha, { name: 'GrayscaleAlpha', channels: 2, bitDepths: [8, 16] }],
	[ColorType.TruecolorAlpha, { name: 'TruecolorAlpha', channels: 4, bitDepths: [8, 16] }],
])

export function colorTypeName(colorType: ColorType): string {
	return COLOR_TYPES.get(colorType)?.name ?? `ColorType(${colorType})`
}

/**
 * Samples per pixel
 */
export function channelCount(colorType: ColorType): number {
	const info = COLOR_TYPES.get(colorType)
	if (!info) {
		throw new DecodeError('UnsupportedColorTypeBitDepthCombination', `unknown color type ${colorType}`)
	}
	return info.channels
}

export function isLegalCombination(colorType: number, bitDepth: number): boolean {
	const info = COLOR_TYPES.get(colorType)
	return info !== undefined && info.bitDepths.some((depth) => depth === bitDepth)
}

function isColorType(value: number): value is ColorType {
	return COLOR_TYPES.has(value)
}

function isBitDepth(value: number): value is BitDepth {
	return value === 1 || value === 2 || value === 4 || value === 8 || value === 16
}

/**
 * Parse IHDR chunk
 */
export function parseImageHeader(chunk: PngChunk): ImageHeader {
	const at = chunk.offset
	if (chunk.length !== IHDR_LENGTH) {
		throw new DecodeError('InvalidImageHeader', `IHDR is ${chunk.length} bytes, expected ${IHDR_LENGTH}`, at)
	}

	const reader = new ByteReader(chunk.data, 'InvalidImageHeader')
	const width = reader.readU32BE()
	const height = reader.readU32BE()
	const bitDepth = reader.readU8()
	const colorType = reader.readU8()
	const compressionMethod = reader.readU8()
	const filterMethod = reader.readU8()
	const interlaceMethod = reader.readU8()

	if (width === 0 || height === 0 || width > MAX_DIMENSION || height > MAX_DIMENSION) {
		throw new DecodeError('InvalidImageHeader', `invalid dimensions ${width}x${height}`, at)
	}
	if (!isColorType(colorType) || !isBitDepth(bitDepth) || !isLegalCombination(colorType, bitDepth)) {
		throw new DecodeError(
			'UnsupportedColorTypeBitDepthCombination',
			`color type ${colorType} with bit depth ${bitDepth}`,
			at
		)
	}
	if (compressionMethod !== 0) {
		throw new DecodeError('InvalidImageHeader', `unknown compression method ${compressionMethod}`, at)
	}
	if (filterMethod !== 0) {
		throw new DecodeError('InvalidImageHeader', `unknown filter method ${filterMethod}`, at)
	}
	if (interlaceMethod === 1) {
		throw new DecodeError('UnsupportedInterlacing', 'Adam7 interlacing is not supported', at)
	}
	if (interlaceMethod !== 0) {
		throw new DecodeError('InvalidImageHeader', `unknown interlace method ${interlaceMethod}`, at)
	}

	return { width, height, bitDepth, colorType, compressionMethod, filterMethod, interlaceMethod }
}

/**
 * Row geometry for a validated header
 */
export function getScanlineLayout(header: ImageHeader): ScanlineLayout {
	const channels = channelCount(header.colorType)
	const bitsPerPixel = channels * header.bitDepth
	const filterStep = Math.max(1, Math.ceil(bitsPerPixel / 8))
	const stride = Math.ceil((header.width * bitsPerPixel) / 8)
	return {
		channels,
		bitsPerPixel,
		filterStep,
		stride,
		rawLength: header.height * (stride + 1),
	}
}

/**
 * Reject images over the configured limits before anything is allocated
 */
export function checkImageLimits(
	header: ImageHeader,
	limits: { maxPixels: number; maxDimension: number }
): void {
	const { width, height } = header
	if (width > limits.maxDimension || height > limits.maxDimension) {
		throw new DecodeError(
			'ImageTooLarge',
			`${width}x${height} exceeds the ${limits.maxDimension} pixel dimension limit`
		)
	}
	if (width * height > limits.maxPixels) {
		throw new DecodeError('ImageTooLarge', `${width * height} pixels exceeds the ${limits.maxPixels} pixel limit`)
	}
}

/**
 * Parse PLTE chunk.
 * Returns undefined for truecolor images, where the palette is only a quantization hint.
 */
export function parsePalette(
	chunk: PngChunk,
	header: ImageHeader,
	logger: Logger = silentLogger
): Palette | undefined {
	const at = chunk.offset
	const { colorType, bitDepth } = header

	if (colorType === ColorType.Grayscale || colorType === ColorType.GrayscaleAlpha) {
		throw new DecodeError('InvalidPalette', `PLTE is not allowed in ${colorTypeName(colorType)} images`, at)
	}
	if (chunk.length === 0 || chunk.length % 3 !== 0) {
		throw new DecodeError('InvalidPalette', `PLTE length ${chunk.length} is not a positive multiple of 3`, at)
	}

	const size = chunk.length / 3
	const maxEntries = colorType === ColorType.Indexed ? Math.min(256, 1 << bitDepth) : 256
	if (size > maxEntries) {
		throw new DecodeError('InvalidPalette', `${size} palette entries, at most ${maxEntries} allowed`, at)
	}

	if (colorType !== ColorType.Indexed) {
		logger.debug(`ignoring ${size}-entry suggested palette in ${colorTypeName(colorType)} image`)
		return undefined
	}

	return {
		size,
		colors: chunk.data.slice(),
		alpha: new Uint8Array(size).fill(255),
	}
}

/**
 * Parse tRNS chunk.
 *
 * For indexed images the per-entry alpha values are merged into a new
 * palette; otherwise the transparent key sample is returned. Malformed
 * tRNS is dropped with a warning.
 */
export function parseTransparency(
	chunk: PngChunk,
	header: ImageHeader,
	palette: Palette | undefined,
	logger: Logger = silentLogger
): { palette: Palette | undefined; transparency: Transparency | undefined } {
	const { data, length } = chunk
	const ignore = (reason: string) => {
		logger.warn(`ignoring tRNS chunk: ${reason}`)
		return { palette, transparency: undefined }
	}

	switch (header.colorType) {
		case ColorType.Indexed: {
			if (!palette) return ignore('no palette precedes it')
			if (length > palette.size) return ignore(`${length} alpha values for ${palette.size} palette entries`)
			const alpha = palette.alpha.slice()
			alpha.set(data)
			return { palette: { ...palette, alpha }, transparency: undefined }
		}
		case ColorType.Grayscale: {
			if (length !== 2) return ignore(`expected 2 bytes, found ${length}`)
			const reader = new ByteReader(data, 'InvalidImageHeader')
			return { palette, transparency: { kind: 'gray', gray: reader.readU16BE() } }
		}
		case ColorType.Truecolor: {
			if (length !== 6) return ignore(`expected 6 bytes, found ${length}`)
			const reader = new ByteReader(data, 'InvalidImageHeader')
			return {
				palette,
				transparency: {
					kind: 'rgb',
					red: reader.readU16BE(),
					green: reader.readU16BE(),
					blue: reader.readU16BE(),
				},
			}
		}
		default:
			return ignore(`not allowed for ${colorTypeName(header.colorType)} images, which carry alpha`)
	}
}
