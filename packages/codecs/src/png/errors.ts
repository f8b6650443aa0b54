export type DecodeStage = 'container' | 'header' | 'inflate' | 'unfilter' | 'pixels'

const STAGE_BY_CODE = {
	BadSignature: 'container',
	TruncatedChunk: 'container',
	ChunkChecksumMismatch: 'container',
	MalformedChunkOrder: 'container',
	UnsupportedCriticalChunk: 'container',

	InvalidImageHeader: 'header',
	UnsupportedColorTypeBitDepthCombination: 'header',
	UnsupportedInterlacing: 'header',
	MissingPalette: 'header',
	InvalidPalette: 'header',
	ImageTooLarge: 'header',

	InvalidStreamHeader: 'inflate',
	InvalidCompressedBlock: 'inflate',
	InvalidCode: 'inflate',
	OutputOverrun: 'inflate',
	TruncatedStream: 'inflate',
	StreamChecksumMismatch: 'inflate',

	UnknownFilterType: 'unfilter',

	PaletteIndexOutOfRange: 'pixels',
} as const satisfies Record<string, DecodeStage>

export type DecodeErrorCode = keyof typeof STAGE_BY_CODE

export function stageOf(code: DecodeErrorCode): DecodeStage {
	return STAGE_BY_CODE[code]
}

/**
 * Failure of one decode stage.
 *
 * `offset` is a byte position in that stage's input: the container for
 * container/header errors, the compressed stream for inflate errors and
 * the inflated scanlines for unfilter/pixel errors.
 */
export class DecodeError extends Error {
	override readonly name = 'DecodeError'
	readonly code: DecodeErrorCode
	readonly stage: DecodeStage
	readonly offset: number | undefined
	/** message without the stage and code prefix */
	readonly detail: string

	constructor(code: DecodeErrorCode, detail: string, offset?: number) {
		const stage = stageOf(code)
		const at = offset === undefined ? '' : ` at offset ${offset}`
		super(`${stage}: ${code}${at}: ${detail}`)
		this.code = code
		this.stage = stage
		this.offset = offset
		this.detail = detail
	}
}

export function isDecodeError(value: unknown): value is DecodeError {
	return value instanceof DecodeError
}
