/**
 * Output pixel layout
 * - rgb: 3 bytes per pixel, alpha discarded
 * - rgba: 4 bytes per pixel
 */
export type PixelFormat = 'rgb' | 'rgba'

/**
 * Decoded pixels, row-major
 */
export interface PixelGrid {
	readonly width: number
	readonly height: number
	readonly format: PixelFormat
	readonly data: Uint8Array // length = width * height * channels(format)
}

/**
 * Supported image formats
 */
export type ImageFormat = 'png'

/**
 * Decoder interface
 */
export interface ImageDecoder<Options = unknown> {
	readonly format: ImageFormat
	decode(data: Uint8Array, options?: Options): PixelGrid
}

/**
 * Bytes per pixel for an output format
 */
export function channelsOf(format: PixelFormat): 3 | 4 {
	return format === 'rgba' ? 4 : 3
}
