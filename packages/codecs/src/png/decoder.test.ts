import { describe, expect, test, vi } from 'vitest'
import { type Logger, silentLogger } from '@scanline/core'
import { PngCodec } from './codec'
import { DEFAULT_DECODE_OPTIONS, decodePng, readPngInfo, tryDecodePng } from './decoder'
import {
	buildPng,
	catchDecodeError,
	concatBytes,
	createChunk,
	filterRows,
	type HeaderFields,
	headerData,
	zlibStored,
} from './test-fixtures'
import { ColorType, FilterType, PNG_SIGNATURE } from './types'

const quiet = { logger: silentLogger }

function withStream(fields: HeaderFields, stream: Uint8Array, ...extra: Uint8Array[]): Uint8Array {
	return concatBytes([
		Uint8Array.from(PNG_SIGNATURE),
		createChunk('IHDR', headerData(fields)),
		...extra,
		createChunk('IDAT', stream),
		createChunk('IEND'),
	])
}

describe('PNG decoder', () => {
	test('2x2 grayscale, filter None', () => {
		const png = buildPng({ width: 2, height: 2, raw: [0, 10, 20, 0, 30, 40] })
		const grid = decodePng(png, { format: 'rgb' })
		expect(grid.format).toBe('rgb')
		expect(Array.from(grid.data)).toEqual([10, 10, 10, 20, 20, 20, 30, 30, 30, 40, 40, 40])
	})

	test('indexed image with a two-entry palette', () => {
		const png = buildPng({
			width: 2,
			height: 2,
			colorType: ColorType.Indexed,
			palette: [255, 0, 0, 0, 255, 0],
			raw: [0, 0, 1, 0, 1, 0],
		})
		const grid = decodePng(png, { format: 'rgb' })
		expect(Array.from(grid.data)).toEqual([255, 0, 0, 0, 255, 0, 0, 255, 0, 255, 0, 0])
	})

	test('interlaced images are rejected', () => {
		const png = buildPng({ width: 1, height: 1, interlaceMethod: 1, raw: [0, 0] })
		const error = catchDecodeError(() => decodePng(png))
		expect(error.code).toBe('UnsupportedInterlacing')
		expect(error.stage).toBe('header')
	})

	test('a corrupted payload byte fails the chunk CRC', () => {
		const png = buildPng({ width: 2, height: 2, raw: [0, 10, 20, 0, 30, 40], compression: 'stored' })
		png[png.length - 20]! ^= 0x01 // inside the IDAT payload
		const result = tryDecodePng(png, quiet)
		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.code).toBe('ChunkChecksumMismatch')
			expect(result.error.offset).toBe(33)
		}
	})

	test('decoding is idempotent', () => {
		const rows = [Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8, 9), Uint8Array.of(9, 8, 7, 6, 5, 4, 3, 2, 1)]
		const raw = filterRows(rows, 3, FilterType.Paeth)
		const png = buildPng({ width: 3, height: 2, colorType: ColorType.Truecolor, raw })
		expect(decodePng(png)).toEqual(decodePng(png))
	})

	test('output is rgba by default', () => {
		const grid = decodePng(buildPng({ width: 1, height: 1, raw: [0, 99] }))
		expect(grid.format).toBe('rgba')
		expect(Array.from(grid.data)).toEqual([99, 99, 99, 255])
	})

	test('filtered truecolor rows', () => {
		const rows = [
			Uint8Array.of(10, 20, 30, 200, 210, 220, 5, 250, 128),
			Uint8Array.of(11, 19, 33, 190, 215, 225, 0, 255, 127),
			Uint8Array.of(250, 1, 2, 3, 4, 5, 6, 7, 8),
		]
		const raw = filterRows(rows, 3, [FilterType.Sub, FilterType.Paeth, FilterType.Average])
		const grid = decodePng(buildPng({ width: 3, height: 3, colorType: ColorType.Truecolor, raw }), { format: 'rgb' })
		expect(grid.data).toEqual(concatBytes(rows))
	})

	test('16-bit truecolor with alpha keeps the high bytes', () => {
		const png = buildPng({
			width: 1,
			height: 1,
			bitDepth: 16,
			colorType: ColorType.TruecolorAlpha,
			raw: [0, 0x12, 0x34, 0x56, 0x78, 0x9a, 0xbc, 0xde, 0xf0],
		})
		expect(Array.from(decodePng(png).data)).toEqual([0x12, 0x56, 0x9a, 0xde])
	})

	test('1-bit grayscale rows with padding', () => {
		const png = buildPng({ width: 3, height: 2, bitDepth: 1, raw: [0, 0b10111111, 0, 0b01000000] })
		const grid = decodePng(png, { format: 'rgb' })
		expect(Array.from(grid.data)).toEqual([255, 255, 255, 0, 0, 0, 255, 255, 255, 0, 0, 0, 255, 255, 255, 0, 0, 0])
	})

	test('image data split across IDAT chunks', () => {
		const raw = [0, 1, 2, 3, 4, 0, 5, 6, 7, 8]
		const single = decodePng(buildPng({ width: 4, height: 2, raw }))
		const split = decodePng(buildPng({ width: 4, height: 2, raw, imageDataChunks: 3, compression: 'stored' }))
		expect(split).toEqual(single)
	})

	describe('transparency', () => {
		const png = buildPng({ width: 2, height: 1, raw: [0, 7, 8], transparency: [0, 7] })

		test('tRNS key is applied to rgba output', () => {
			expect(Array.from(decodePng(png, quiet).data)).toEqual([7, 7, 7, 0, 8, 8, 8, 255])
		})

		test('transparency: false ignores tRNS', () => {
			expect(Array.from(decodePng(png, { transparency: false }).data)).toEqual([7, 7, 7, 255, 8, 8, 8, 255])
		})

		test('palette alpha', () => {
			const indexed = buildPng({
				width: 2,
				height: 1,
				colorType: ColorType.Indexed,
				palette: [1, 2, 3, 4, 5, 6],
				transparency: [0],
				raw: [0, 1, 0],
			})
			expect(Array.from(decodePng(indexed).data)).toEqual([4, 5, 6, 255, 1, 2, 3, 0])
		})

		test('malformed tRNS is dropped with a warning', () => {
			const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
			const bad = buildPng({ width: 1, height: 1, raw: [0, 7], transparency: [0, 7, 0] })
			expect(Array.from(decodePng(bad, { logger }).data)).toEqual([7, 7, 7, 255])
			expect(logger.warn).toHaveBeenCalledWith('ignoring tRNS chunk: expected 2 bytes, found 3')
		})
	})

	describe('failures', () => {
		test('palette index out of range', () => {
			const png = buildPng({
				width: 2,
				height: 1,
				colorType: ColorType.Indexed,
				palette: [1, 2, 3, 4, 5, 6],
				raw: [0, 0, 2],
			})
			const error = catchDecodeError(() => decodePng(png))
			expect(error.code).toBe('PaletteIndexOutOfRange')
			expect(error.message).toContain('row 0, column 1')
		})

		test('a missing palette is reported before inflating', () => {
			const png = withStream({ width: 1, height: 1, colorType: ColorType.Indexed }, Uint8Array.of(1, 2, 3))
			expect(catchDecodeError(() => decodePng(png)).code).toBe('MissingPalette')
		})

		test('image limits', () => {
			const png = buildPng({ width: 100, height: 100, raw: new Uint8Array(100 * 101) })
			expect(catchDecodeError(() => decodePng(png, { maxPixels: 9999 })).code).toBe('ImageTooLarge')
			expect(catchDecodeError(() => decodePng(png, { maxDimension: 99 })).code).toBe('ImageTooLarge')
			expect(decodePng(png, { maxPixels: 10000, maxDimension: 100 }).width).toBe(100)
		})

		test('too little image data', () => {
			const png = buildPng({ width: 2, height: 2, raw: [0, 10, 20, 0, 30] })
			const error = catchDecodeError(() => decodePng(png))
			expect(error.code).toBe('TruncatedStream')
			expect(error.stage).toBe('inflate')
		})

		test('too much image data', () => {
			const png = buildPng({ width: 2, height: 2, raw: [0, 10, 20, 0, 30, 40, 50] })
			expect(catchDecodeError(() => decodePng(png)).code).toBe('OutputOverrun')
		})

		test('unknown filter type', () => {
			const png = buildPng({ width: 2, height: 2, raw: [0, 10, 20, 9, 30, 40] })
			const error = catchDecodeError(() => decodePng(png))
			expect(error.code).toBe('UnknownFilterType')
			expect(error.offset).toBe(3)
		})

		test('Adler-32 mismatch unless verification is off', () => {
			const stream = zlibStored(Uint8Array.of(0, 42))
			stream[stream.length - 1]! ^= 0xff
			const png = withStream({ width: 1, height: 1 }, stream)
			expect(catchDecodeError(() => decodePng(png)).code).toBe('StreamChecksumMismatch')
			expect(Array.from(decodePng(png, { verifyChecksum: false, format: 'rgb' }).data)).toEqual([42, 42, 42])
		})
	})

	test('shared defaults cannot be changed by a caller', () => {
		expect(Object.isFrozen(DEFAULT_DECODE_OPTIONS)).toBe(true)
		expect(Reflect.set(DEFAULT_DECODE_OPTIONS, 'maxPixels', 1)).toBe(false)
		expect(DEFAULT_DECODE_OPTIONS.maxPixels).toBe(2 ** 28)

		const grid = decodePng(buildPng({ width: 2, height: 2, raw: [0, 1, 2, 0, 3, 4] }), quiet)
		expect(grid.width * grid.height).toBe(4)
	})

	test('tryDecodePng wraps the grid', () => {
		const result = tryDecodePng(buildPng({ width: 1, height: 1, raw: [0, 5] }), { format: 'rgb' })
		expect(result).toEqual({ ok: true, value: { width: 1, height: 1, format: 'rgb', data: Uint8Array.of(5, 5, 5) } })
	})

	test('logs a summary at debug level', () => {
		const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
		decodePng(buildPng({ width: 2, height: 2, raw: [0, 10, 20, 0, 30, 40], compression: 'stored' }), { logger })
		expect(logger.debug).toHaveBeenCalledWith('decoded 2x2 Grayscale 8-bit image (17 compressed bytes, 6 raw)')
	})

	test('readPngInfo reports structure without inflating', () => {
		const png = buildPng({
			width: 2,
			height: 2,
			colorType: ColorType.Indexed,
			bitDepth: 4,
			palette: [1, 2, 3, 4, 5, 6],
			transparency: [0],
			raw: [0, 0x01, 0, 0x10],
			compression: 'stored',
			imageDataChunks: 3,
		})
		const info = readPngInfo(png)
		expect(info.header).toEqual({
			width: 2,
			height: 2,
			bitDepth: 4,
			colorType: ColorType.Indexed,
			compressionMethod: 0,
			filterMethod: 0,
			interlaceMethod: 0,
		})
		expect(info.layout.stride).toBe(1)
		expect(info.paletteSize).toBe(2)
		expect(info.hasTransparency).toBe(true)
		expect(info.imageDataChunks).toBe(3)
		expect(info.compressedSize).toBe(15)
	})

	test('PngCodec decodes through the common interface', () => {
		expect(PngCodec.format).toBe('png')
		const grid = PngCodec.decode(buildPng({ width: 1, height: 1, raw: [0, 1] }), { format: 'rgb' })
		expect(Array.from(grid.data)).toEqual([1, 1, 1])
	})
})
