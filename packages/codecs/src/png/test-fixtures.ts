import { deflateSync } from 'node:zlib'
import { crc32 } from './crc'
import { type DecodeError, isDecodeError } from './errors'
import { adler32 } from './inflate'
import { paethPredictor } from './unfilter'
import { ColorType, FilterType, PNG_SIGNATURE } from './types'

/**
 * Fixture writers for tests: PNG containers built in memory
 */

function writeU32BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >>> 24) & 0xff
	data[offset + 1] = (value >>> 16) & 0xff
	data[offset + 2] = (value >>> 8) & 0xff
	data[offset + 3] = value & 0xff
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
	const total = parts.reduce((sum, part) => sum + part.length, 0)
	const result = new Uint8Array(total)
	let offset = 0
	for (const part of parts) {
		result.set(part, offset)
		offset += part.length
	}
	return result
}

/**
 * Create a PNG chunk: length, type, data, CRC over type + data
 */
export function createChunk(type: string, data: ArrayLike<number> = []): Uint8Array {
	const chunk = new Uint8Array(12 + data.length)
	writeU32BE(chunk, 0, data.length)
	for (let i = 0; i < 4; i++) chunk[4 + i] = type.charCodeAt(i)
	chunk.set(Uint8Array.from(data), 8)
	writeU32BE(chunk, 8 + data.length, crc32(chunk, 4, data.length + 4))
	return chunk
}

export interface HeaderFields {
	width: number
	height: number
	bitDepth?: number
	colorType?: number
	compressionMethod?: number
	filterMethod?: number
	interlaceMethod?: number
}

/**
 * IHDR payload; defaults to 8-bit grayscale, no interlacing
 */
export function headerData(fields: HeaderFields): Uint8Array {
	const data = new Uint8Array(13)
	writeU32BE(data, 0, fields.width)
	writeU32BE(data, 4, fields.height)
	data[8] = fields.bitDepth ?? 8
	data[9] = fields.colorType ?? ColorType.Grayscale
	data[10] = fields.compressionMethod ?? 0
	data[11] = fields.filterMethod ?? 0
	data[12] = fields.interlaceMethod ?? 0
	return data
}

/**
 * Raw deflate made of stored blocks only
 */
export function deflateStored(data: Uint8Array): Uint8Array {
	const maxBlockSize = 65535
	const blocks: Uint8Array[] = []

	for (let i = 0; i === 0 || i < data.length; i += maxBlockSize) {
		const blockData = data.subarray(i, Math.min(i + maxBlockSize, data.length))
		const isLast = i + maxBlockSize >= data.length
		const block = new Uint8Array(5 + blockData.length)

		// BFINAL, BTYPE=00, then LEN and NLEN little-endian
		block[0] = isLast ? 0x01 : 0x00
		block[1] = blockData.length & 0xff
		block[2] = (blockData.length >> 8) & 0xff
		const nlen = blockData.length ^ 0xffff
		block[3] = nlen & 0xff
		block[4] = (nlen >> 8) & 0xff
		block.set(blockData, 5)
		blocks.push(block)
	}

	return concatBytes(blocks)
}

/**
 * zlib stream of stored blocks with its Adler-32 trailer
 */
export function zlibStored(data: Uint8Array): Uint8Array {
	const trailer = new Uint8Array(4)
	writeU32BE(trailer, 0, adler32(data))
	return concatBytes([Uint8Array.of(0x78, 0x01), deflateStored(data), trailer])
}

/**
 * Apply a filter to a scanline and return the filtered bytes with the filter byte in front
 */
export function filterScanline(
	current: Uint8Array,
	previous: Uint8Array | undefined,
	bpp: number,
	filterType: FilterType
): Uint8Array {
	const len = current.length
	const filtered = new Uint8Array(len + 1)
	filtered[0] = filterType

	for (let i = 0; i < len; i++) {
		const a = i >= bpp ? current[i - bpp]! : 0
		const b = previous ? previous[i]! : 0
		const c = i >= bpp && previous ? previous[i - bpp]! : 0

		let predictor = 0
		switch (filterType) {
			case FilterType.Sub:
				predictor = a
				break
			case FilterType.Up:
				predictor = b
				break
			case FilterType.Average:
				predictor = (a + b) >> 1
				break
			case FilterType.Paeth:
				predictor = paethPredictor(a, b, c)
				break
		}
		filtered[i + 1] = (current[i]! - predictor) & 0xff
	}

	return filtered
}

/**
 * Filter every row with the given filter type(s), one per row when an array
 */
export function filterRows(
	rows: readonly Uint8Array[],
	bpp: number,
	filters: FilterType | readonly FilterType[]
): Uint8Array {
	const filtered = rows.map((row, y) => {
		const filterType = typeof filters === 'number' ? filters : filters[y % filters.length]!
		return filterScanline(row, y > 0 ? rows[y - 1] : undefined, bpp, filterType)
	})
	return concatBytes(filtered)
}

export interface PngFixture extends HeaderFields {
	/** filtered scanlines, filter bytes included */
	raw: ArrayLike<number>
	/** flat RGB triples */
	palette?: ArrayLike<number>
	transparency?: ArrayLike<number>
	/** 'zlib' uses node:zlib (fixed and dynamic codes) */
	compression?: 'stored' | 'zlib'
	/** split the zlib stream across this many IDAT chunks */
	imageDataChunks?: number
	/** extra chunks placed right after IHDR */
	extraChunks?: readonly Uint8Array[]
}

/**
 * Build a complete PNG file
 */
export function buildPng(fixture: PngFixture): Uint8Array {
	const raw = Uint8Array.from(fixture.raw)
	const stream = fixture.compression === 'stored' ? zlibStored(raw) : Uint8Array.from(deflateSync(raw))

	const parts: Uint8Array[] = [Uint8Array.from(PNG_SIGNATURE), createChunk('IHDR', headerData(fixture))]
	parts.push(...(fixture.extraChunks ?? []))
	if (fixture.palette) parts.push(createChunk('PLTE', fixture.palette))
	if (fixture.transparency) parts.push(createChunk('tRNS', fixture.transparency))

	const count = Math.max(1, fixture.imageDataChunks ?? 1)
	const size = Math.ceil(stream.length / count)
	for (let i = 0; i < count; i++) {
		parts.push(createChunk('IDAT', stream.subarray(i * size, (i + 1) * size)))
	}

	parts.push(createChunk('IEND'))
	return concatBytes(parts)
}

/**
 * Run fn and return the DecodeError it throws
 */
export function catchDecodeError(fn: () => unknown): DecodeError {
	try {
		fn()
	} catch (error) {
		if (isDecodeError(error)) return error
		throw error
	}
	throw new Error('expected a DecodeError')
}
