import { type PixelGrid, channelsOf } from '@scanline/core'
import { colorTypeName, type DecodeError, type PngInfo } from '@scanline/codecs'

const RESET = '\x1b[0m'

/**
 * Nearest-neighbour downsample to at most maxColumns pixels wide, keeping the aspect ratio
 */
export function downsample(grid: PixelGrid, maxColumns: number): PixelGrid {
	if (grid.width <= maxColumns) return grid

	const { width, height, format } = grid
	const channels = channelsOf(format)
	const outWidth = maxColumns
	const outHeight = Math.max(1, Math.round((height * maxColumns) / width))
	const data = new Uint8Array(outWidth * outHeight * channels)

	for (let y = 0; y < outHeight; y++) {
		const srcY = Math.floor((y * height) / outHeight)
		for (let x = 0; x < outWidth; x++) {
			const srcX = Math.floor((x * width) / outWidth)
			const src = (srcY * width + srcX) * channels
			data.set(grid.data.subarray(src, src + channels), (y * outWidth + x) * channels)
		}
	}

	return { width: outWidth, height: outHeight, format, data }
}

/**
 * One terminal line per image row; each pixel is a space on a 24-bit background.
 * Alpha, when present, is ignored.
 */
export function renderAnsi(grid: PixelGrid): string {
	const channels = channelsOf(grid.format)
	const lines: string[] = []

	for (let y = 0; y < grid.height; y++) {
		let line = ''
		for (let x = 0; x < grid.width; x++) {
			const i = (y * grid.width + x) * channels
			line += `\x1b[48;2;${grid.data[i]!};${grid.data[i + 1]!};${grid.data[i + 2]!}m `
		}
		lines.push(line + RESET)
	}

	return lines.map((line) => `${line}\n`).join('')
}

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

/**
 * Lines printed by --info
 */
export function formatInfo(source: string, size: number, info: PngInfo): string[] {
	const { header } = info
	const lines = [
		`Source: ${source}`,
		`Size: ${formatBytes(size)}`,
		`Dimensions: ${header.width} x ${header.height}`,
		`Color: ${colorTypeName(header.colorType)}, ${header.bitDepth}-bit`,
	]
	if (info.paletteSize > 0) lines.push(`Palette: ${info.paletteSize} entries`)
	lines.push(`Transparency: ${info.hasTransparency ? 'yes' : 'no'}`)
	lines.push(
		`Image data: ${formatBytes(info.compressedSize)} in ${info.imageDataChunks} IDAT chunk${info.imageDataChunks === 1 ? '' : 's'}`
	)
	return lines
}

export function formatError(error: DecodeError): string {
	const at = error.offset === undefined ? '' : ` (offset ${error.offset})`
	return `Error [${error.stage}/${error.code}]: ${error.detail}${at}`
}
