/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Palette-indexed image: one byte per pixel
 */
export interface IndexedImage {
	readonly width: number
	readonly height: number
	readonly indices: Uint8Array // length = width * height
}

/**
 * Supported image formats
 */
export type ImageFormat = 'sti'

/**
 * Any supported format
 */
export type Format = ImageFormat

/**
 * Encode options
 */
export interface EncodeOptions {
	/** Bytes handed out per streaming step (default 16384) */
	chunkSize?: number
}

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T, O extends EncodeOptions = EncodeOptions> {
	readonly format: Format
	canDecode(data: Uint8Array): boolean
	decode(data: Uint8Array): T
	encode(input: T, options?: O): Uint8Array
}

/**
 * Image codec
 */
export type ImageCodec<O extends EncodeOptions = EncodeOptions> = Codec<ImageData, O>

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}
