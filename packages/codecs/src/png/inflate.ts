/**
 * Pure TypeScript inflate (zlib/deflate decompression) implementation
 * Based on RFC 1951 (DEFLATE) and RFC 1950 (ZLIB)
 */

import { DecodeError } from './errors'

export interface InflateOptions {
	/** exact output length; anything else is an error */
	expectedLength?: number
	/** output cap when no exact length is known */
	maxOutputLength?: number
	/** check the zlib Adler-32 trailer (zlib only) */
	verifyChecksum?: boolean
}

export const DEFAULT_MAX_OUTPUT_LENGTH = 256 * 1024 * 1024

const MAX_CODE_BITS = 15

/** Codes up to this length resolve with one table lookup */
const FAST_BITS = 9

/**
 * Bit reader for reading bits from a byte stream (LSB first)
 */
class BitReader {
	private readonly data: Uint8Array
	private pos: number
	private bitBuffer = 0
	private bitCount = 0

	constructor(data: Uint8Array, start = 0) {
		this.data = data
		this.pos = start
	}

	/** byte position of the next unread byte; whole bytes held by a peek count as unread */
	get offset(): number {
		return this.pos - (this.bitCount >> 3)
	}

	/** number of buffered bits */
	get available(): number {
		return this.bitCount
	}

	/**
	 * Read n bits (n <= 16), first bit in the least significant position
	 */
	readBits(n: number): number {
		while (this.bitCount < n) {
			if (this.pos >= this.data.length) {
				throw new DecodeError('TruncatedStream', 'compressed data ended mid-block', this.pos)
			}
			this.bitBuffer |= this.data[this.pos++]! << this.bitCount
			this.bitCount += 8
		}
		const value = this.bitBuffer & ((1 << n) - 1)
		this.dropBits(n)
		return value
	}

	readBit(): number {
		return this.readBits(1)
	}

	/**
	 * Look at the next n bits without consuming them. Near the end of the
	 * data fewer than n may be buffered; the missing bits read as zero.
	 */
	peekBits(n: number): number {
		while (this.bitCount < n && this.pos < this.data.length) {
			this.bitBuffer |= this.data[this.pos++]! << this.bitCount
			this.bitCount += 8
		}
		return this.bitBuffer & ((1 << n) - 1)
	}

	dropBits(n: number): void {
		this.bitBuffer >>>= n
		this.bitCount -= n
	}

	/**
	 * Align to byte boundary, dropping the rest of the current byte.
	 * Whole bytes buffered by a peek go back to the byte stream.
	 */
	alignToByte(): void {
		this.pos -= this.bitCount >> 3
		this.bitBuffer = 0
		this.bitCount = 0
	}

	/**
	 * Read bytes (aligned)
	 */
	readBytes(n: number): Uint8Array {
		if (this.pos + n > this.data.length) {
			throw new DecodeError(
				'TruncatedStream',
				`stored block needs ${n} bytes, ${this.data.length - this.pos} remain`,
				this.pos
			)
		}
		const bytes = this.data.subarray(this.pos, this.pos + n)
		this.pos += n
		return bytes
	}
}

function reverseBits(code: number, length: number): number {
	let reversed = 0
	for (let i = 0; i < length; i++) {
		reversed = (reversed << 1) | (code & 1)
		code >>= 1
	}
	return reversed
}

/**
 * Canonical Huffman code: symbols sorted by code length then value
 */
class HuffmanTable {
	private readonly counts: Uint16Array
	private readonly symbols: Uint16Array
	/** (symbol << 4) | length, indexed by the next FAST_BITS stream bits; 0 for longer codes */
	private readonly fast: Uint16Array

	constructor(lengths: ArrayLike<number>) {
		this.counts = new Uint16Array(MAX_CODE_BITS + 1)
		for (let i = 0; i < lengths.length; i++) {
			this.counts[lengths[i]!]!++
		}
		this.counts[0] = 0

		// Over-subscribed sets cannot be decoded; incomplete ones can
		let left = 1
		for (let len = 1; len <= MAX_CODE_BITS; len++) {
			left <<= 1
			left -= this.counts[len]!
			if (left < 0) {
				throw new DecodeError('InvalidCode', `over-subscribed code lengths at ${len} bits`)
			}
		}

		const offsets = new Uint16Array(MAX_CODE_BITS + 2)
		for (let len = 1; len <= MAX_CODE_BITS; len++) {
			offsets[len + 1] = offsets[len]! + this.counts[len]!
		}

		this.symbols = new Uint16Array(lengths.length)
		for (let symbol = 0; symbol < lengths.length; symbol++) {
			const len = lengths[symbol]!
			if (len !== 0) this.symbols[offsets[len]!++] = symbol
		}

		// Stream bits arrive first-bit-lowest, so short codes go in reversed,
		// once for every value of the bits that follow them
		this.fast = new Uint16Array(1 << FAST_BITS)
		let first = 0
		let index = 0
		for (let len = 1; len <= FAST_BITS; len++) {
			const count = this.counts[len]!
			for (let k = 0; k < count; k++) {
				const entry = (this.symbols[index + k]! << 4) | len
				for (let slot = reverseBits(first + k, len); slot < this.fast.length; slot += 1 << len) {
					this.fast[slot] = entry
				}
			}
			index += count
			first = (first + count) << 1
		}
	}

	/**
	 * Decode a symbol from the bit reader
	 */
	decode(reader: BitReader): number {
		const entry = this.fast[reader.peekBits(FAST_BITS)]!
		const len = entry & 0x0f
		if (len !== 0 && len <= reader.available) {
			reader.dropBits(len)
			return entry >> 4
		}
		return this.decodeLong(reader)
	}

	/**
	 * Bit-by-bit walk for codes longer than FAST_BITS and for the last few bits of the data
	 */
	private decodeLong(reader: BitReader): number {
		let code = 0
		let first = 0
		let index = 0

		for (let len = 1; len <= MAX_CODE_BITS; len++) {
			code |= reader.readBit()
			const count = this.counts[len]!
			if (code - first < count) {
				return this.symbols[index + (code - first)]!
			}
			index += count
			first = (first + count) << 1
			code <<= 1
		}

		throw new DecodeError('InvalidCode', 'bit pattern matches no symbol', reader.offset)
	}
}

/**
 * Append-only output arena. Back-references are index arithmetic on the
 * absolute output position; the buffer doubles until it reaches the limit.
 */
class OutputBuffer {
	private buffer: Uint8Array
	private readonly limit: number
	length = 0

	constructor(initialCapacity: number, limit: number) {
		this.buffer = new Uint8Array(Math.max(1, Math.min(initialCapacity, limit)))
		this.limit = limit
	}

	push(byte: number, inputOffset: number): void {
		this.reserve(1, inputOffset)
		this.buffer[this.length++] = byte
	}

	append(bytes: Uint8Array, inputOffset: number): void {
		this.reserve(bytes.length, inputOffset)
		this.buffer.set(bytes, this.length)
		this.length += bytes.length
	}

	/**
	 * Copy length bytes starting distance bytes back; overlapping runs repeat
	 */
	copyBack(distance: number, length: number, inputOffset: number): void {
		if (distance > this.length) {
			throw new DecodeError(
				'InvalidCompressedBlock',
				`back-reference distance ${distance} exceeds ${this.length} bytes of output`,
				inputOffset
			)
		}
		this.reserve(length, inputOffset)
		const buffer = this.buffer
		let from = this.length - distance
		for (let i = 0; i < length; i++) {
			buffer[this.length++] = buffer[from++]!
		}
	}

	toBytes(): Uint8Array {
		return this.length === this.buffer.length ? this.buffer : this.buffer.slice(0, this.length)
	}

	private reserve(n: number, inputOffset: number): void {
		const needed = this.length + n
		if (needed > this.limit) {
			throw new DecodeError(
				'OutputOverrun',
				`output would grow past ${this.limit} bytes`,
				inputOffset
			)
		}
		if (needed <= this.buffer.length) return

		let capacity = this.buffer.length
		while (capacity < needed) capacity *= 2
		const grown = new Uint8Array(Math.min(capacity, this.limit))
		grown.set(this.buffer.subarray(0, this.length))
		this.buffer = grown
	}
}

// Length base values and extra bits (symbols 257..285)
const LENGTH_BASE = [
	3, 4, 5, 6, 7, 8, 9, 10, 11, 13, 15, 17, 19, 23, 27, 31, 35, 43, 51, 59, 67, 83, 99, 115, 131,
	163, 195, 227, 258,
]
const LENGTH_EXTRA = [
	0, 0, 0, 0, 0, 0, 0, 0, 1, 1, 1, 1, 2, 2, 2, 2, 3, 3, 3, 3, 4, 4, 4, 4, 5, 5, 5, 5, 0,
]

// Distance base values and extra bits (symbols 0..29)
const DIST_BASE = [
	1, 2, 3, 4, 5, 7, 9, 13, 17, 25, 33, 49, 65, 97, 129, 193, 257, 385, 513, 769, 1025, 1537, 2049,
	3073, 4097, 6145, 8193, 12289, 16385, 24577,
]
const DIST_EXTRA = [
	0, 0, 0, 0, 1, 1, 2, 2, 3, 3, 4, 4, 5, 5, 6, 6, 7, 7, 8, 8, 9, 9, 10, 10, 11, 11, 12, 12, 13, 13,
]

// Code length alphabet order
const CL_ORDER = [16, 17, 18, 0, 8, 7, 9, 6, 10, 5, 11, 4, 12, 3, 13, 2, 14, 1, 15]

const END_OF_BLOCK = 256

/**
 * Fixed Huffman tables for literal/length and distance codes, built once
 */
const FIXED_LITLEN_TABLE = (() => {
	const lengths = new Uint8Array(288)
	lengths.fill(8, 0, 144)
	lengths.fill(9, 144, 256)
	lengths.fill(7, 256, 280)
	lengths.fill(8, 280, 288)
	return new HuffmanTable(lengths)
})()

const FIXED_DIST_TABLE = new HuffmanTable(new Uint8Array(30).fill(5))

/**
 * Read the code tables of a dynamic block
 */
function readDynamicTables(reader: BitReader): [HuffmanTable, HuffmanTable] {
	const blockStart = reader.offset
	const hlit = reader.readBits(5) + 257
	const hdist = reader.readBits(5) + 1
	const hclen = reader.readBits(4) + 4

	if (hlit > 286 || hdist > 30) {
		throw new DecodeError('InvalidCompressedBlock', `too many codes: HLIT=${hlit}, HDIST=${hdist}`, blockStart)
	}

	// Read code length code lengths
	const clLengths = new Uint8Array(19)
	for (let i = 0; i < hclen; i++) {
		clLengths[CL_ORDER[i]!] = reader.readBits(3)
	}
	const clTable = new HuffmanTable(clLengths)

	// Read literal/length and distance code lengths
	const lengths = new Uint8Array(hlit + hdist)
	let n = 0
	while (n < lengths.length) {
		const sym = clTable.decode(reader)
		if (sym < 16) {
			lengths[n++] = sym
			continue
		}

		let value = 0
		let repeat: number
		if (sym === 16) {
			if (n === 0) {
				throw new DecodeError('InvalidCompressedBlock', 'repeat code with no previous length', reader.offset)
			}
			value = lengths[n - 1]!
			repeat = reader.readBits(2) + 3
		} else if (sym === 17) {
			repeat = reader.readBits(3) + 3
		} else {
			repeat = reader.readBits(7) + 11
		}

		if (n + repeat > lengths.length) {
			throw new DecodeError('InvalidCompressedBlock', 'code length repeat runs past the table', reader.offset)
		}
		lengths.fill(value, n, n + repeat)
		n += repeat
	}

	if (lengths[END_OF_BLOCK] === 0) {
		throw new DecodeError('InvalidCompressedBlock', 'no code for end-of-block', reader.offset)
	}

	return [new HuffmanTable(lengths.subarray(0, hlit)), new HuffmanTable(lengths.subarray(hlit))]
}

/**
 * Decode symbols of one Huffman-coded block
 */
function inflateBlock(
	reader: BitReader,
	output: OutputBuffer,
	litLenTable: HuffmanTable,
	distTable: HuffmanTable
): void {
	for (;;) {
		const sym = litLenTable.decode(reader)
		if (sym < 256) {
			// Literal
			output.push(sym, reader.offset)
		} else if (sym === END_OF_BLOCK) {
			return
		} else {
			// Length-distance pair
			const lengthIdx = sym - 257
			if (lengthIdx >= LENGTH_BASE.length) {
				throw new DecodeError('InvalidCode', `invalid length symbol ${sym}`, reader.offset)
			}
			const length = LENGTH_BASE[lengthIdx]! + reader.readBits(LENGTH_EXTRA[lengthIdx]!)

			const distSym = distTable.decode(reader)
			if (distSym >= DIST_BASE.length) {
				throw new DecodeError('InvalidCode', `invalid distance symbol ${distSym}`, reader.offset)
			}
			const distance = DIST_BASE[distSym]! + reader.readBits(DIST_EXTRA[distSym]!)

			output.copyBack(distance, length, reader.offset)
		}
	}
}

/**
 * Inflate compressed data (raw deflate, no zlib header)
 */
export function inflateRaw(data: Uint8Array, options: InflateOptions = {}): Uint8Array {
	return inflateStream(new BitReader(data), options)
}

function inflateStream(reader: BitReader, options: InflateOptions): Uint8Array {
	const { expectedLength } = options
	const limit = expectedLength ?? options.maxOutputLength ?? DEFAULT_MAX_OUTPUT_LENGTH
	const output = new OutputBuffer(expectedLength ?? Math.min(limit, 64 * 1024), limit)

	let bfinal = 0
	while (bfinal === 0) {
		const blockStart = reader.offset
		bfinal = reader.readBits(1)
		const btype = reader.readBits(2)

		if (btype === 0) {
			// Stored block
			reader.alignToByte()
			const len = reader.readBits(16)
			const nlen = reader.readBits(16)
			if ((len ^ 0xffff) !== nlen) {
				throw new DecodeError('InvalidCompressedBlock', `stored block LEN ${len} does not match NLEN ${nlen}`, blockStart)
			}
			output.append(reader.readBytes(len), reader.offset)
		} else if (btype === 1) {
			// Fixed Huffman codes
			inflateBlock(reader, output, FIXED_LITLEN_TABLE, FIXED_DIST_TABLE)
		} else if (btype === 2) {
			// Dynamic Huffman codes
			const [litLenTable, distTable] = readDynamicTables(reader)
			inflateBlock(reader, output, litLenTable, distTable)
		} else {
			throw new DecodeError('InvalidCompressedBlock', 'reserved block type 3', blockStart)
		}
	}

	if (expectedLength !== undefined && output.length < expectedLength) {
		throw new DecodeError(
			'TruncatedStream',
			`stream ended after ${output.length} of ${expectedLength} bytes`,
			reader.offset
		)
	}

	return output.toBytes()
}

/**
 * Adler-32 checksum
 */
export function adler32(data: Uint8Array): number {
	const MOD = 65521
	let a = 1
	let b = 0
	let i = 0

	while (i < data.length) {
		// Reduce every NMAX bytes, as zlib does
		const end = Math.min(i + 5552, data.length)
		for (; i < end; i++) {
			a += data[i]!
			b += a
		}
		a %= MOD
		b %= MOD
	}

	return ((b << 16) | a) >>> 0
}

/**
 * Inflate zlib-compressed data (with zlib header)
 */
export function inflate(data: Uint8Array, options: InflateOptions = {}): Uint8Array {
	if (data.length < 2) {
		throw new DecodeError('TruncatedStream', `zlib stream is ${data.length} bytes`, 0)
	}

	const cmf = data[0]!
	const flg = data[1]!

	// Compression method must be 8 = deflate, window at most 32K
	const cm = cmf & 0x0f
	const cinfo = cmf >> 4
	if (cm !== 8 || cinfo > 7) {
		throw new DecodeError('InvalidStreamHeader', `unsupported compression method ${cm} / window ${cinfo}`, 0)
	}
	if ((cmf * 256 + flg) % 31 !== 0) {
		throw new DecodeError('InvalidStreamHeader', 'header check bits are wrong', 0)
	}
	if (flg & 0x20) {
		throw new DecodeError('InvalidStreamHeader', 'preset dictionary is not supported', 1)
	}

	const reader = new BitReader(data, 2)
	const output = inflateStream(reader, options)
	if (options.verifyChecksum === false) return output

	const trailer = reader.offset
	if (trailer + 4 > data.length) {
		throw new DecodeError('TruncatedStream', 'missing Adler-32 trailer', trailer)
	}
	const stored = ((data[trailer]! << 24) | (data[trailer + 1]! << 16) | (data[trailer + 2]! << 8) | data[trailer + 3]!) >>> 0
	const actual = adler32(output)
	if (stored !== actual) {
		throw new DecodeError(
			'StreamChecksumMismatch',
			`Adler-32 stored 0x${stored.toString(16).padStart(8, '0')}, computed 0x${actual.toString(16).padStart(8, '0')}`,
			trailer
		)
	}
	return output
}
