import { describe, expect, test } from 'vitest'
import { ByteReader, chunkName, readU32BE } from './reader'
import { catchDecodeError } from './test-fixtures'

describe('ByteReader', () => {
	test('reads big-endian integers and advances', () => {
		const reader = new ByteReader(Uint8Array.of(0x01, 0x02, 0x03, 0xff, 0xff, 0xff, 0xfe, 0x09), 'TruncatedChunk')
		expect(reader.readU8()).toBe(1)
		expect(reader.readU16BE()).toBe(0x0203)
		expect(reader.readU32BE()).toBe(0xfffffffe)
		expect(reader.offset).toBe(7)
		expect(reader.remaining).toBe(1)
		expect(reader.isAtEnd()).toBe(false)
		expect(reader.readU8()).toBe(9)
		expect(reader.isAtEnd()).toBe(true)
	})

	test('readBytes returns a view', () => {
		const data = Uint8Array.of(1, 2, 3, 4)
		const reader = new ByteReader(data, 'TruncatedChunk', 1)
		const bytes = reader.readBytes(2)
		expect(Array.from(bytes)).toEqual([2, 3])
		expect(bytes.buffer).toBe(data.buffer)
	})

	test('short reads raise the configured code at the cursor', () => {
		const reader = new ByteReader(Uint8Array.of(1, 2, 3), 'InvalidImageHeader')
		reader.readU16BE()
		const error = catchDecodeError(() => reader.readU32BE())
		expect(error.code).toBe('InvalidImageHeader')
		expect(error.offset).toBe(2)
		expect(error.detail).toBe('need 4 bytes, 1 remain')
	})

	test('readU32BE and chunkName', () => {
		const tag = Uint8Array.of(0x49, 0x48, 0x44, 0x52)
		expect(readU32BE(tag, 0)).toBe(0x49484452)
		expect(chunkName(0x74524e53)).toBe('tRNS')
	})
})
