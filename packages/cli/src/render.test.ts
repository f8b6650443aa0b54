import { describe, expect, test } from 'vitest'
import type { PixelGrid } from '@scanline/core'
import { ColorType, DecodeError, getScanlineLayout, type ImageHeader, type PngInfo } from '@scanline/codecs'
import { downsample, formatBytes, formatError, formatInfo, renderAnsi } from './render'

const grid = (width: number, height: number, data: number[]): PixelGrid => ({
	width,
	height,
	format: 'rgb',
	data: Uint8Array.from(data),
})

describe('render', () => {
	test('renderAnsi prints one background-colored space per pixel', () => {
		const out = renderAnsi(grid(2, 1, [255, 0, 0, 0, 0, 255]))
		expect(out).toBe('\x1b[48;2;255;0;0m \x1b[48;2;0;0;255m \x1b[0m\n')
	})

	test('renderAnsi resets at the end of every row', () => {
		const out = renderAnsi(grid(1, 2, [1, 2, 3, 4, 5, 6]))
		expect(out.split('\n')).toEqual(['\x1b[48;2;1;2;3m \x1b[0m', '\x1b[48;2;4;5;6m \x1b[0m', ''])
	})

	test('renderAnsi ignores alpha', () => {
		const rgba: PixelGrid = { width: 1, height: 1, format: 'rgba', data: Uint8Array.of(7, 8, 9, 0) }
		expect(renderAnsi(rgba)).toBe('\x1b[48;2;7;8;9m \x1b[0m\n')
	})

	describe('downsample', () => {
		test('narrow images are unchanged', () => {
			const image = grid(2, 1, [1, 1, 1, 2, 2, 2])
			expect(downsample(image, 2)).toBe(image)
		})

		test('picks the nearest source pixel and keeps the aspect ratio', () => {
			// 4x2 grayscale ramp, values x + 10 * y
			const data: number[] = []
			for (let y = 0; y < 2; y++) {
				for (let x = 0; x < 4; x++) data.push(x + 10 * y, x + 10 * y, x + 10 * y)
			}
			const small = downsample(grid(4, 2, data), 2)
			expect(small.width).toBe(2)
			expect(small.height).toBe(1)
			expect(Array.from(small.data)).toEqual([0, 0, 0, 2, 2, 2])
		})
	})

	test('formatBytes', () => {
		expect(formatBytes(512)).toBe('512 B')
		expect(formatBytes(2048)).toBe('2.0 KB')
		expect(formatBytes(3 * 1024 * 1024)).toBe('3.0 MB')
	})

	test('formatInfo', () => {
		const header: ImageHeader = {
			width: 16,
			height: 8,
			bitDepth: 4,
			colorType: ColorType.Indexed,
			compressionMethod: 0,
			filterMethod: 0,
			interlaceMethod: 0,
		}
		const info: PngInfo = {
			header,
			layout: getScanlineLayout(header),
			paletteSize: 12,
			hasTransparency: false,
			imageDataChunks: 1,
			compressedSize: 90,
		}
		expect(formatInfo('icon.png', 200, info)).toEqual([
			'Source: icon.png',
			'Size: 200 B',
			'Dimensions: 16 x 8',
			'Color: Indexed, 4-bit',
			'Palette: 12 entries',
			'Transparency: no',
			'Image data: 90 B in 1 IDAT chunk',
		])
	})

	test('formatError names the stage and code', () => {
		expect(formatError(new DecodeError('BadSignature', 'not a PNG file', 0))).toBe(
			'Error [container/BadSignature]: not a PNG file (offset 0)'
		)
		expect(formatError(new DecodeError('MissingPalette', 'indexed image has no PLTE chunk'))).toBe(
			'Error [header/MissingPalette]: indexed image has no PLTE chunk'
		)
	})
})
