import { type Logger, silentLogger } from '@scanline/core'
import { crc32 } from './crc'
import { DecodeError } from './errors'
import { ByteReader, chunkName } from './reader'
import { ChunkType, PNG_SIGNATURE, type PngChunk } from './types'

const MAX_CHUNK_LENGTH = 0x7fffffff

/**
 * Critical chunks have an uppercase first letter (bit 5 of the first byte clear)
 */
export function isCriticalChunk(type: number): boolean {
	return ((type >>> 24) & 0x20) === 0
}

/**
 * Check the 8-byte signature
 */
export function hasPngSignature(data: Uint8Array): boolean {
	if (data.length < PNG_SIGNATURE.length) return false
	return PNG_SIGNATURE.every((byte, i) => data[i] === byte)
}

/**
 * Tracks chunk ordering constraints while walking the container
 */
class ChunkOrder {
	private count = 0
	private sawPalette = false
	private sawTransparency = false
	private idatState: 'before' | 'inside' | 'after' = 'before'

	accept(chunk: PngChunk): void {
		const { type, name, offset } = chunk
		const fail = (detail: string): never => {
			throw new DecodeError('MalformedChunkOrder', detail, offset)
		}

		if (this.count === 0 && type !== ChunkType.IHDR) {
			fail(`first chunk is ${name}, expected IHDR`)
		}
		this.count++

		if (type === ChunkType.IDAT) {
			if (this.idatState === 'after') fail('IDAT chunks are not consecutive')
			this.idatState = 'inside'
			return
		}
		if (this.idatState === 'inside') this.idatState = 'after'

		switch (type) {
			case ChunkType.IHDR:
				if (this.count > 1) fail('duplicate IHDR chunk')
				break
			case ChunkType.PLTE:
				if (this.sawPalette) fail('duplicate PLTE chunk')
				if (this.idatState !== 'before') fail('PLTE after image data')
				if (this.sawTransparency) fail('PLTE after tRNS')
				this.sawPalette = true
				break
			case ChunkType.tRNS:
				if (this.sawTransparency) fail('duplicate tRNS chunk')
				if (this.idatState !== 'before') fail('tRNS after image data')
				this.sawTransparency = true
				break
			case ChunkType.IEND:
				if (this.idatState === 'before') fail('IEND before any IDAT chunk')
				if (chunk.length !== 0) fail(`IEND payload is ${chunk.length} bytes, expected 0`)
				break
		}
	}
}

/**
 * Parse PNG chunks.
 *
 * Verifies the signature, framing, CRC of every chunk and the ordering
 * constraints, and returns the chunks needed to rebuild pixels
 * (IHDR, PLTE, tRNS, IDAT, IEND) in file order. Other ancillary chunks are
 * skipped after their CRC check.
 */
export function parseChunks(data: Uint8Array, logger: Logger = silentLogger): PngChunk[] {
	if (!hasPngSignature(data)) {
		throw new DecodeError('BadSignature', 'not a PNG file', 0)
	}

	const reader = new ByteReader(data, 'TruncatedChunk', PNG_SIGNATURE.length)
	const order = new ChunkOrder()
	const chunks: PngChunk[] = []

	for (;;) {
		const offset = reader.offset
		if (reader.isAtEnd()) {
			throw new DecodeError('TruncatedChunk', 'data ended before IEND', offset)
		}
		if (reader.remaining < 12) {
			throw new DecodeError('TruncatedChunk', `${reader.remaining} bytes left, a chunk needs at least 12`, offset)
		}

		const length = reader.readU32BE()
		const type = reader.readU32BE()
		const name = chunkName(type)
		if (length > MAX_CHUNK_LENGTH || length + 4 > reader.remaining) {
			throw new DecodeError(
				'TruncatedChunk',
				`${name} declares ${length} bytes, ${Math.max(0, reader.remaining - 4)} available`,
				offset
			)
		}
		const payload = reader.readBytes(length)
		const crc = reader.readU32BE()

		// CRC covers type + data
		const actual = crc32(data, offset + 4, length + 4)
		if (actual !== crc) {
			throw new DecodeError(
				'ChunkChecksumMismatch',
				`CRC mismatch in chunk ${name}: stored 0x${crc.toString(16).padStart(8, '0')}, computed 0x${actual.toString(16).padStart(8, '0')}`,
				offset
			)
		}

		const chunk: PngChunk = { type, name, offset, length, data: payload, crc }

		if (!isInterpreted(type)) {
			if (isCriticalChunk(type)) {
				throw new DecodeError('UnsupportedCriticalChunk', `unknown critical chunk ${name}`, offset)
			}
			// Still subject to "IHDR first"
			order.accept(chunk)
			logger.debug(`skipping ancillary chunk ${name} (${length} bytes)`)
			continue
		}

		order.accept(chunk)
		chunks.push(chunk)

		if (type === ChunkType.IEND) {
			if (!reader.isAtEnd()) {
				logger.warn(`ignoring ${reader.remaining} bytes after IEND`)
			}
			return chunks
		}
	}
}

function isInterpreted(type: number): boolean {
	return (
		type === ChunkType.IHDR ||
		type === ChunkType.PLTE ||
		type === ChunkType.IDAT ||
		type === ChunkType.IEND ||
		type === ChunkType.tRNS
	)
}

/**
 * Concatenate IDAT payloads in file order
 */
export function concatImageData(chunks: readonly PngChunk[]): Uint8Array {
	const idat = chunks.filter((c) => c.type === ChunkType.IDAT)
	const total = idat.reduce((sum, c) => sum + c.length, 0)
	const compressed = new Uint8Array(total)
	let offset = 0
	for (const chunk of idat) {
		compressed.set(chunk.data, offset)
		offset += chunk.length
	}
	return compressed
}
