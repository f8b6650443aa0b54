import type { Logger, PixelFormat } from '@scanline/core'

/**
 * PNG color types
 */
export const ColorType = {
	Grayscale: 0,
	Truecolor: 2,
	Indexed: 3,
	GrayscaleAlpha: 4,
	TruecolorAlpha: 6,
} as const

export type ColorType = (typeof ColorType)[keyof typeof ColorType]

/**
 * PNG filter types
 */
export const FilterType = {
	None: 0,
	Sub: 1,
	Up: 2,
	Average: 3,
	Paeth: 4,
} as const

export type FilterType = (typeof FilterType)[keyof typeof FilterType]

export type BitDepth = 1 | 2 | 4 | 8 | 16

/**
 * Chunk types interpreted by the decoder, as big-endian u32 tags
 */
export const ChunkType = {
	IHDR: 0x49484452,
	PLTE: 0x504c5445,
	IDAT: 0x49444154,
	IEND: 0x49454e44,
	tRNS: 0x74524e53,
} as const

export type ChunkType = (typeof ChunkType)[keyof typeof ChunkType]

/**
 * PNG signature bytes
 */
export const PNG_SIGNATURE: readonly number[] = [137, 80, 78, 71, 13, 10, 26, 10]

/**
 * IHDR chunk data
 */
export interface ImageHeader {
	readonly width: number
	readonly height: number
	readonly bitDepth: BitDepth
	readonly colorType: ColorType
	readonly compressionMethod: number
	readonly filterMethod: number
	readonly interlaceMethod: number
}

/**
 * Row geometry derived from the header
 */
export interface ScanlineLayout {
	/** samples per pixel */
	readonly channels: number
	readonly bitsPerPixel: number
	/** bytes between a byte and its left neighbour when unfiltering */
	readonly filterStep: number
	/** filtered bytes per row, excluding the filter-type byte */
	readonly stride: number
	/** inflated length: height * (1 + stride) */
	readonly rawLength: number
}

/**
 * PLTE chunk data, with tRNS alpha merged in
 */
export interface Palette {
	readonly size: number
	readonly colors: Uint8Array // RGB triples
	readonly alpha: Uint8Array // one per entry
}

/**
 * tRNS for non-indexed images: a single transparent sample value
 */
export type Transparency =
	| { readonly kind: 'gray'; readonly gray: number }
	| { readonly kind: 'rgb'; readonly red: number; readonly green: number; readonly blue: number }

/**
 * PNG chunk
 */
export interface PngChunk {
	readonly type: number
	readonly name: string
	/** offset of the length field in the container */
	readonly offset: number
	readonly length: number
	readonly data: Uint8Array
	readonly crc: number
}

/**
 * Decoder options
 */
export interface DecodeOptions {
	/** output layout; 'rgb' discards alpha */
	format?: PixelFormat
	/** apply tRNS when producing rgba */
	transparency?: boolean
	/** verify the zlib Adler-32 trailer */
	verifyChecksum?: boolean
	maxPixels?: number
	maxDimension?: number
	logger?: Logger
}

export type ResolvedDecodeOptions = Required<DecodeOptions>

/**
 * Facts available without inflating the image data
 */
export interface PngInfo {
	readonly header: ImageHeader
	readonly layout: ScanlineLayout
	readonly paletteSize: number
	readonly hasTransparency: boolean
	readonly imageDataChunks: number
	readonly compressedSize: number
}
