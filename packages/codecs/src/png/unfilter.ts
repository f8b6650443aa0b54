import { DecodeError } from './errors'
import { FilterType, type ScanlineLayout } from './types'

/**
 * Paeth predictor function
 */
export function paethPredictor(a: number, b: number, c: number): number {
	const p = a + b - c
	const pa = Math.abs(p - a)
	const pb = Math.abs(p - b)
	const pc = Math.abs(p - c)

	if (pa <= pb && pa <= pc) return a
	if (pb <= pc) return b
	return c
}

export function isFilterType(value: number): value is FilterType {
	return value >= FilterType.None && value <= FilterType.Paeth
}

/**
 * Unfilter a scanline in place.
 * `previous` is the reconstructed row above, all zeros for the first row.
 */
export function unfilterScanline(
	filter: number,
	current: Uint8Array,
	previous: Uint8Array,
	bpp: number
): void {
	const len = current.length

	switch (filter) {
		case FilterType.None:
			return

		case FilterType.Sub:
			for (let i = bpp; i < len; i++) {
				current[i] = (current[i]! + current[i - bpp]!) & 0xff
			}
			return

		case FilterType.Up:
			for (let i = 0; i < len; i++) {
				current[i] = (current[i]! + previous[i]!) & 0xff
			}
			return

		case FilterType.Average:
			for (let i = 0; i < bpp && i < len; i++) {
				current[i] = (current[i]! + (previous[i]! >> 1)) & 0xff
			}
			for (let i = bpp; i < len; i++) {
				current[i] = (current[i]! + ((current[i - bpp]! + previous[i]!) >> 1)) & 0xff
			}
			return

		case FilterType.Paeth:
			// a = c = 0 in the first pixel, so the predictor is b
			for (let i = 0; i < bpp && i < len; i++) {
				current[i] = (current[i]! + previous[i]!) & 0xff
			}
			for (let i = bpp; i < len; i++) {
				current[i] = (current[i]! + paethPredictor(current[i - bpp]!, previous[i]!, previous[i - bpp]!)) & 0xff
			}
			return

		default:
			throw new DecodeError('UnknownFilterType', `filter type ${filter}`)
	}
}

/**
 * Reconstruct every row of the inflated image data.
 *
 * Keeps two row buffers (current and previous) and hands each finished row
 * to `onRow`. The buffer passed to `onRow` is reused for a later row.
 */
export function unfilterScanlines(
	raw: Uint8Array,
	layout: ScanlineLayout,
	height: number,
	onRow: (row: Uint8Array, y: number) => void
): void {
	const { stride, filterStep } = layout
	let current = new Uint8Array(stride)
	let previous = new Uint8Array(stride)

	for (let y = 0; y < height; y++) {
		const start = y * (stride + 1)
		const filter = raw[start]!
		if (!isFilterType(filter)) {
			throw new DecodeError('UnknownFilterType', `row ${y} uses filter type ${filter}`, start)
		}

		current.set(raw.subarray(start + 1, start + 1 + stride))
		unfilterScanline(filter, current, previous, filterStep)
		onRow(current, y)

		const done = previous
		previous = current
		current = done
	}
}
