import { DecodeError, type DecodeErrorCode } from './errors'

/**
 * Bounds-checked big-endian cursor over an immutable buffer.
 * Reads past the end throw a DecodeError with the code given at construction.
 */
export class ByteReader {
	private readonly data: Uint8Array
	private readonly onShortRead: DecodeErrorCode
	private pos: number

	constructor(data: Uint8Array, onShortRead: DecodeErrorCode, start = 0) {
		this.data = data
		this.onShortRead = onShortRead
		this.pos = start
	}

	get offset(): number {
		return this.pos
	}

	get remaining(): number {
		return this.data.length - this.pos
	}

	isAtEnd(): boolean {
		return this.pos >= this.data.length
	}

	/**
	 * Read 8-bit unsigned integer
	 */
	readU8(): number {
		this.require(1)
		return this.data[this.pos++]!
	}

	/**
	 * Read 16-bit big-endian unsigned integer
	 */
	readU16BE(): number {
		this.require(2)
		const value = (this.data[this.pos]! << 8) | this.data[this.pos + 1]!
		this.pos += 2
		return value
	}

	/**
	 * Read 32-bit big-endian unsigned integer
	 */
	readU32BE(): number {
		this.require(4)
		const value = readU32BE(this.data, this.pos)
		this.pos += 4
		return value
	}

	/**
	 * View of the next n bytes (no copy)
	 */
	readBytes(n: number): Uint8Array {
		this.require(n)
		const bytes = this.data.subarray(this.pos, this.pos + n)
		this.pos += n
		return bytes
	}

	private require(n: number): void {
		if (n < 0 || this.pos + n > this.data.length) {
			throw new DecodeError(
				this.onShortRead,
				`need ${n} bytes, ${Math.max(0, this.remaining)} remain`,
				this.pos
			)
		}
	}
}

/**
 * Read 32-bit big-endian unsigned integer at a known-valid offset
 */
export function readU32BE(data: Uint8Array, offset: number): number {
	return ((data[offset]! << 24) | (data[offset + 1]! << 16) | (data[offset + 2]! << 8) | data[offset + 3]!) >>> 0
}

/**
 * Four-character name of a chunk tag
 */
export function chunkName(type: number): string {
	return String.fromCharCode((type >>> 24) & 0xff, (type >>> 16) & 0xff, (type >>> 8) & 0xff, type & 0xff)
}
