import {
	DEFAULT_CHUNK_SIZE,
	type EncodeOptions,
	type ImageData,
	type IndexedImage,
	StreamEncoder,
	TruncatedInputError,
	UnsupportedFeatureError,
	concatArrays,
	drain,
} from '@stci/core'
import {
	type ColorSpec,
	DEFAULT_SPEC,
	type SpecName,
	bytesPerPixel,
	packColor,
	resolveSpec,
	validateSpec,
	writePixel,
} from '@stci/color'
import { composeFrames } from './canvas'
import { compressLine } from './etrle'
import {
	headerFromSpec,
	writeAuxObjectData,
	writeIndexedHeader,
	writeStiHeader,
	writeSubImageHeader,
	writeTrueColorHeader,
} from './header'
import { normalizePalette, writePalette } from './palette'
import {
	AUX_OBJECT_DATA,
	type FrameInput,
	INDEXED_COLOR_DEPTH,
	PALETTE_COLORS,
	type Palette,
	type StiFlags,
	type SubImageHeader,
} from './types'

export interface TrueColorEncodeOptions extends EncodeOptions {
	/** Pixel packing (default R5G6B5) */
	spec?: SpecName | ColorSpec
}

export interface IndexedEncodeOptions extends EncodeOptions {
	palette: Palette
	/** Palette index written as the transparent color (default 0) */
	transparentIndex?: number
}

export interface EtrleEncodeOptions extends EncodeOptions {
	palette: Palette
	/** Canvas size in the header (default: composed size of the frames) */
	width?: number
	height?: number
}

const NO_FLAGS: StiFlags = { auxObjectData: false, rgb: false, indexed: false, zlib: false, etrle: false }

/**
 * Encode RGBA pixels as a truecolor STCI file
 */
export function encodeTrueColorSti(image: ImageData, options: TrueColorEncodeOptions = {}): Uint8Array {
	const spec = resolveSpec(options.spec ?? DEFAULT_SPEC)
	validateSpec(spec)

	const { width, height, data } = image
	checkLength('image data', data, width * height * 4)

	const size = bytesPerPixel(spec)
	const pixelBytes = width * height * size

	const header = writeStiHeader({
		initialSize: pixelBytes,
		compressedSize: pixelBytes,
		transparentColor: 0,
		flags: { ...NO_FLAGS, rgb: true },
		height,
		width,
		formatHeader: writeTrueColorHeader(headerFromSpec(spec)),
		colorDepth: spec.colorDepth,
		auxDataSize: 0,
	})

	// One row per step
	const encoder = new StreamEncoder(height, (y) => {
		const row = new Uint8Array(width * size)
		for (let x = 0; x < width; x++) {
			const src = (y * width + x) * 4
			const color = packColor([data[src]!, data[src + 1]!, data[src + 2]!, data[src + 3]!], spec)
			writePixel(row, x * size, color, size)
		}
		return row
	})
	const pixels = drain(encoder, options.chunkSize ?? DEFAULT_CHUNK_SIZE)

	return concatArrays([header, pixels])
}

/**
 * Encode one index plane as an uncompressed indexed STCI file
 */
export function encodeIndexedSti(image: IndexedImage, options: IndexedEncodeOptions): Uint8Array {
	const { width, height, indices } = image
	const pixelCount = width * height
	checkLength('index data', indices, pixelCount)

	const header = writeStiHeader({
		initialSize: pixelCount,
		compressedSize: pixelCount,
		transparentColor: options.transparentIndex ?? 0,
		flags: { ...NO_FLAGS, indexed: true },
		height,
		width,
		formatHeader: indexedFormatHeader(0),
		colorDepth: INDEXED_COLOR_DEPTH,
		auxDataSize: 0,
	})

	// One pixel per step
	const encoder = new StreamEncoder(pixelCount, (i) => indices.subarray(i, i + 1))
	const body = drain(encoder, options.chunkSize ?? DEFAULT_CHUNK_SIZE)

	return concatArrays([header, writePalette(normalizePalette(options.palette)), body])
}

/**
 * Encode frames as an ETRLE-compressed indexed STCI file
 */
export function encodeEtrleSti(frames: readonly FrameInput[], options: EtrleEncodeOptions): Uint8Array {
	if (frames.length === 0) {
		throw new UnsupportedFeatureError('empty-etrle', 'ETRLE file without sub-images is not supported')
	}
	for (const [i, frame] of frames.entries()) {
		checkLength(`frame ${i} index data`, frame.image.indices, frame.image.width * frame.image.height)
	}

	const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
	const subHeaders: Uint8Array[] = []
	const payloads: Uint8Array[] = []
	let offset = 0
	let initialSize = 0

	for (const { image, offsetX = 0, offsetY = 0 } of frames) {
		const { width, height, indices } = image

		// One row per step
		const encoder = new StreamEncoder(height, (y) => compressLine(indices.subarray(y * width, (y + 1) * width)))
		const payload = drain(encoder, chunkSize)

		const sub: SubImageHeader = { offset, length: payload.length, offsetX, offsetY, height, width }
		subHeaders.push(writeSubImageHeader(sub))
		payloads.push(payload)
		offset += payload.length
		initialSize += width * height
	}

	const hasAux = frames.some((frame) => frame.aux != null)
	const aux = hasAux ? frames.map((frame) => writeAuxObjectData(frame.aux ?? null)) : []

	const canvas = composeFrames(frames.map((frame) => frame.image))
	const header = writeStiHeader({
		initialSize,
		compressedSize: offset,
		transparentColor: 0,
		flags: { ...NO_FLAGS, indexed: true, etrle: true, auxObjectData: hasAux },
		height: options.height ?? canvas.height,
		width: options.width ?? canvas.width,
		formatHeader: indexedFormatHeader(frames.length),
		colorDepth: INDEXED_COLOR_DEPTH,
		auxDataSize: hasAux ? frames.length * AUX_OBJECT_DATA.size : 0,
	})

	return concatArrays([
		header,
		writePalette(normalizePalette(options.palette)),
		...subHeaders,
		...payloads,
		...aux,
	])
}

function indexedFormatHeader(imageCount: number): Uint8Array {
	return writeIndexedHeader({
		paletteColorCount: PALETTE_COLORS,
		imageCount,
		redDepth: INDEXED_COLOR_DEPTH,
		greenDepth: INDEXED_COLOR_DEPTH,
		blueDepth: INDEXED_COLOR_DEPTH,
	})
}

function checkLength(what: string, data: Uint8Array, expected: number): void {
	if (data.length < expected) {
		throw new TruncatedInputError(what, 0, expected, data.length)
	}
}
