export { hasPngSignature, isCriticalChunk, parseChunks, concatImageData } from './chunks'
export { PngCodec } from './codec'
export { crc32, updateCrc32 } from './crc'
export { DEFAULT_DECODE_OPTIONS, decodePng, readPngInfo, tryDecodePng } from './decoder'
export { DecodeError, isDecodeError, stageOf } from './errors'
export type { DecodeErrorCode, DecodeStage } from './errors'
export {
	channelCount,
	checkImageLimits,
	colorTypeName,
	getScanlineLayout,
	isLegalCombination,
	parseImageHeader,
	parsePalette,
	parseTransparency,
} from './header'
export { adler32, DEFAULT_MAX_OUTPUT_LENGTH, inflate, inflateRaw } from './inflate'
export type { InflateOptions } from './inflate'
export { PixelAssembler } from './pixels'
export type { AssemblerOptions } from './pixels'
export { ByteReader, chunkName } from './reader'
export { ChunkType, ColorType, FilterType, PNG_SIGNATURE } from './types'
export type {
	BitDepth,
	DecodeOptions,
	ImageHeader,
	Palette,
	PngChunk,
	PngInfo,
	ResolvedDecodeOptions,
	ScanlineLayout,
	Transparency,
} from './types'
export { isFilterType, paethPredictor, unfilterScanline, unfilterScanlines } from './unfilter'
