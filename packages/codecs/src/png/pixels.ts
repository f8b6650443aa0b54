import { channelsOf, type PixelFormat, type PixelGrid } from '@scanline/core'
import { DecodeError } from './errors'
import { ColorType, type ImageHeader, type Palette, type ScanlineLayout, type Transparency } from './types'

export interface AssemblerOptions {
	format: PixelFormat
	/** PLTE entries with tRNS alpha merged in; required for indexed images */
	palette?: Palette
	/** tRNS key for grayscale and truecolor images */
	transparency?: Transparency
}

/**
 * Multipliers that stretch a sub-byte grayscale sample to 0..255
 */
const GRAY_SCALE: Readonly<Record<number, number>> = { 1: 255, 2: 85, 4: 17, 8: 1 }

/**
 * Converts unfiltered scanlines into an rgb or rgba grid, one row at a time
 */
export class PixelAssembler {
	private readonly header: ImageHeader
	private readonly layout: ScanlineLayout
	private readonly format: PixelFormat
	private readonly channels: 3 | 4
	private readonly palette: Palette | undefined
	private readonly transparency: Transparency | undefined
	private readonly data: Uint8Array

	constructor(header: ImageHeader, layout: ScanlineLayout, options: AssemblerOptions) {
		if (header.colorType === ColorType.Indexed && !options.palette) {
			throw new DecodeError('MissingPalette', 'indexed image has no PLTE chunk')
		}

		this.header = header
		this.layout = layout
		this.format = options.format
		this.channels = channelsOf(options.format)
		this.palette = options.palette
		this.transparency = options.transparency
		this.data = new Uint8Array(header.width * header.height * this.channels)
	}

	get grid(): PixelGrid {
		return {
			width: this.header.width,
			height: this.header.height,
			format: this.format,
			data: this.data,
		}
	}

	/**
	 * Write one unfiltered scanline (without its filter-type byte)
	 */
	writeRow(row: Uint8Array, y: number): void {
		const { width, colorType } = this.header
		const key = this.transparency
		let out = y * width * this.channels

		for (let x = 0; x < width; x++) {
			let r = 0
			let g = 0
			let b = 0
			let a = 255

			switch (colorType) {
				case ColorType.Grayscale: {
					const gray = this.sample(row, x, 0)
					r = g = b = this.toByte(gray)
					if (key?.kind === 'gray' && key.gray === gray) a = 0
					break
				}
				case ColorType.Truecolor: {
					const red = this.sample(row, x, 0)
					const green = this.sample(row, x, 1)
					const blue = this.sample(row, x, 2)
					r = this.toByte(red)
					g = this.toByte(green)
					b = this.toByte(blue)
					if (key?.kind === 'rgb' && key.red === red && key.green === green && key.blue === blue) a = 0
					break
				}
				case ColorType.Indexed: {
					const index = this.sample(row, x, 0)
					const palette = this.paletteFor(index, x, y)
					r = palette.colors[index * 3]!
					g = palette.colors[index * 3 + 1]!
					b = palette.colors[index * 3 + 2]!
					a = palette.alpha[index]!
					break
				}
				case ColorType.GrayscaleAlpha:
					r = g = b = this.toByte(this.sample(row, x, 0))
					a = this.toByte(this.sample(row, x, 1))
					break
				case ColorType.TruecolorAlpha:
					r = this.toByte(this.sample(row, x, 0))
					g = this.toByte(this.sample(row, x, 1))
					b = this.toByte(this.sample(row, x, 2))
					a = this.toByte(this.sample(row, x, 3))
					break
			}

			this.data[out] = r
			this.data[out + 1] = g
			this.data[out + 2] = b
			if (this.channels === 4) this.data[out + 3] = a
			out += this.channels
		}
	}

	/**
	 * Raw sample value at its own depth (0..2^depth-1)
	 */
	private sample(row: Uint8Array, x: number, channel: number): number {
		const { bitDepth } = this.header
		const index = x * this.layout.channels + channel

		if (bitDepth === 8) return row[index]!
		if (bitDepth === 16) return (row[index * 2]! << 8) | row[index * 2 + 1]!

		// Sub-byte samples are packed MSB-first
		const bit = index * bitDepth
		const shift = 8 - bitDepth - (bit & 7)
		return (row[bit >> 3]! >> shift) & ((1 << bitDepth) - 1)
	}

	/**
	 * 16-bit samples keep their high byte
	 */
	private toByte(value: number): number {
		const { bitDepth, colorType } = this.header
		if (bitDepth === 16) return value >> 8
		if (bitDepth < 8 && colorType === ColorType.Grayscale) return value * GRAY_SCALE[bitDepth]!
		return value
	}

	private paletteFor(index: number, x: number, y: number): Palette {
		const { palette } = this
		if (!palette) {
			throw new DecodeError('MissingPalette', 'indexed image has no PLTE chunk')
		}
		if (index >= palette.size) {
			const offset = y * (this.layout.stride + 1) + 1 + ((x * this.layout.bitsPerPixel) >> 3)
			throw new DecodeError(
				'PaletteIndexOutOfRange',
				`index ${index} at row ${y}, column ${x}; palette has ${palette.size} entries`,
				offset
			)
		}
		return palette
	}
}
