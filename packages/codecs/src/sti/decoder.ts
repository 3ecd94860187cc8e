import {
	DEFAULT_CHUNK_SIZE,
	FormatMismatchError,
	type ImageData,
	type IndexedImage,
	MalformedRunError,
	StreamDecoder,
	TruncatedInputError,
	UnsupportedFeatureError,
	feed,
} from '@stci/core'
import { type ColorSpec, bytesPerPixel, readPixel, unpackColor, validateSpec } from '@stci/color'
import { composeFrames } from './canvas'
import { decompress } from './etrle'
import {
	readAuxObjectData,
	readIndexedHeader,
	readStiHeader,
	readSubImageHeader,
	readTrueColorHeader,
	specFromHeader,
} from './header'
import { readPalette } from './palette'
import {
	AUX_OBJECT_DATA,
	type AuxObjectData,
	type DecodeOptions,
	type FrameSetSti,
	INDEXED_COLOR_DEPTH,
	type IndexedHeader,
	type IndexedSti,
	PALETTE_COLORS,
	PALETTE_SIZE,
	type Palette,
	STI_HEADER,
	type StiFrame,
	type StiHeader,
	type StiImage,
	SUB_IMAGE_HEADER,
	type SubImageHeader,
	type TrueColorSti,
} from './types'

/**
 * Decode an STCI file
 */
export function decodeSti(data: Uint8Array, options: DecodeOptions = {}): StiImage {
	const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
	const header = readStiHeader(data)
	const { flags } = header

	if (flags.zlib) {
		throw new UnsupportedFeatureError('zlib', 'ZLIB-compressed STCI data is not supported')
	}
	if (flags.rgb && flags.indexed) {
		throw new FormatMismatchError('STCI header sets both RGB and INDEXED')
	}
	if (!flags.rgb && !flags.indexed) {
		throw new FormatMismatchError('STCI header sets neither RGB nor INDEXED')
	}

	return flags.rgb
		? decodeTrueColor(data, header, chunkSize)
		: decodeIndexed(data, header, chunkSize)
}

function decodeTrueColor(data: Uint8Array, header: StiHeader, chunkSize: number): TrueColorSti {
	if (header.flags.auxObjectData) {
		throw new UnsupportedFeatureError('rgb-aux', 'Tile metadata on a truecolor STCI file is not supported')
	}

	const format = readTrueColorHeader(header.formatHeader)
	const spec = specFromHeader(format, header.colorDepth)
	validateSpec(spec)

	const { width, height } = header
	const size = bytesPerPixel(spec)
	const decoder = new StreamDecoder(
		width * height * size,
		(pixels) => unpackPixels(pixels, width, height, spec),
		'truecolor pixels'
	)
	const image = feed(decoder, data.subarray(STI_HEADER.size), chunkSize)

	return {
		kind: 'truecolor',
		header,
		format,
		spec,
		mode: spec.masks[3] === 0 ? 'RGB' : 'RGBA',
		image,
	}
}

/**
 * Unpack pixels to RGBA; alpha is opaque when the color spec has no alpha channel
 */
function unpackPixels(pixels: Uint8Array, width: number, height: number, spec: ColorSpec): ImageData {
	const size = bytesPerPixel(spec)
	const hasAlpha = spec.masks[3] !== 0
	const output = new Uint8Array(width * height * 4)

	for (let i = 0; i < width * height; i++) {
		const [r, g, b, a] = unpackColor(readPixel(pixels, i * size, size), spec)
		output[i * 4] = r
		output[i * 4 + 1] = g
		output[i * 4 + 2] = b
		output[i * 4 + 3] = hasAlpha ? a : 255
	}

	return { width, height, data: output }
}

function decodeIndexed(data: Uint8Array, header: StiHeader, chunkSize: number): IndexedSti | FrameSetSti {
	const format = readIndexedHeader(header.formatHeader)

	if (format.paletteColorCount !== PALETTE_COLORS) {
		throw new UnsupportedFeatureError(
			'palette-size',
			`Palette of ${format.paletteColorCount} colors is not supported`
		)
	}
	if (
		format.redDepth !== INDEXED_COLOR_DEPTH ||
		format.greenDepth !== INDEXED_COLOR_DEPTH ||
		format.blueDepth !== INDEXED_COLOR_DEPTH
	) {
		throw new UnsupportedFeatureError(
			'palette-depth',
			`Palette channel depths ${format.redDepth}/${format.greenDepth}/${format.blueDepth} are not supported`
		)
	}

	const palette = readPalette(data, STI_HEADER.size)
	const offset = STI_HEADER.size + PALETTE_SIZE

	if (header.flags.etrle) {
		return decodeFrames(data, offset, header, format, palette, chunkSize)
	}

	if (header.flags.auxObjectData) {
		throw new UnsupportedFeatureError(
			'indexed-aux',
			'Tile metadata without ETRLE compression is not supported'
		)
	}

	const { width, height } = header
	const decoder = new StreamDecoder(
		width * height,
		(indices): IndexedImage => ({ width, height, indices: indices.slice() }),
		'index data'
	)
	const image = feed(decoder, data.subarray(offset), chunkSize)

	return { kind: 'indexed', header, format, palette, image }
}

function decodeFrames(
	data: Uint8Array,
	offset: number,
	header: StiHeader,
	format: IndexedHeader,
	palette: Palette,
	chunkSize: number
): FrameSetSti {
	const count = format.imageCount
	if (count === 0) {
		throw new UnsupportedFeatureError('empty-etrle', 'ETRLE file without sub-images is not supported')
	}

	const subHeaders: SubImageHeader[] = []
	for (let i = 0; i < count; i++) {
		subHeaders.push(readSubImageHeader(data, offset + i * SUB_IMAGE_HEADER.size))
	}

	const blockStart = offset + count * SUB_IMAGE_HEADER.size
	const decoder = new StreamDecoder(
		header.compressedSize,
		(block) => subHeaders.map((sub, i) => decodeFrame(block, blockStart, sub, i)),
		'ETRLE data'
	)
	const images = feed(decoder, data.subarray(blockStart), chunkSize)

	let aux: (AuxObjectData | null)[] = subHeaders.map(() => null)
	if (header.flags.auxObjectData) {
		const auxStart = blockStart + header.compressedSize
		aux = subHeaders.map((_, i) => readAuxObjectData(data, auxStart + i * AUX_OBJECT_DATA.size))
	}

	const canvas = composeFrames(subHeaders)
	const frames: StiFrame[] = subHeaders.map((sub, i) => ({
		header: sub,
		box: canvas.boxes[i]!,
		image: images[i]!,
		aux: aux[i] ?? null,
	}))

	return {
		kind: 'frames',
		header,
		format,
		palette,
		width: canvas.width,
		height: canvas.height,
		canvasResized: canvas.width !== header.width || canvas.height !== header.height,
		frames,
	}
}

function decodeFrame(block: Uint8Array, blockStart: number, sub: SubImageHeader, index: number): IndexedImage {
	const end = sub.offset + sub.length
	if (end > block.length) {
		throw new TruncatedInputError(
			`sub-image ${index}`,
			blockStart + sub.offset,
			sub.length,
			Math.max(0, block.length - sub.offset)
		)
	}

	try {
		const indices = decompress(block.subarray(sub.offset, end), sub.width, sub.height)
		return { width: sub.width, height: sub.height, indices }
	} catch (error) {
		if (error instanceof MalformedRunError) {
			// offsets relative to the file
			throw new MalformedRunError(blockStart + sub.offset + error.offset, `sub-image ${index}: ${error.reason}`)
		}
		throw error
	}
}
