import type { ImageDecoder, PixelGrid } from '@scanline/core'
import { decodePng } from './decoder'
import type { DecodeOptions } from './types'

/**
 * PNG codec implementation
 */
export const PngCodec: ImageDecoder<DecodeOptions> = {
	format: 'png',

	decode(data: Uint8Array, options?: DecodeOptions): PixelGrid {
		return decodePng(data, options)
	},
}
