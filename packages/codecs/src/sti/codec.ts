import type { ImageCodec, ImageData } from '@stci/core'
import { stiToImageData } from './canvas'
import { decodeSti } from './decoder'
import { type TrueColorEncodeOptions, encodeEtrleSti, encodeTrueColorSti } from './encoder'
import { hasStiMagic, readStiHeader } from './header'
import { type QuantizeOptions, quantizeFrames } from './quantize'
import { STI_HEADER, type StiHeader } from './types'

export interface StiEncodeOptions extends TrueColorEncodeOptions, QuantizeOptions {
	/** 'truecolor' packs pixels (default), 'etrle' quantizes to a one-frame indexed file */
	variant?: 'truecolor' | 'etrle'
}

function probe(data: Uint8Array): StiHeader | null {
	if (data.length < STI_HEADER.size || !hasStiMagic(data)) return null
	return readStiHeader(data)
}

/**
 * Check for a truecolor STCI header
 */
export function isTrueColorSti(data: Uint8Array): boolean {
	const header = probe(data)
	return header !== null && header.flags.rgb && !header.flags.indexed
}

/**
 * Check for an indexed STCI header
 */
export function isIndexedSti(data: Uint8Array): boolean {
	const header = probe(data)
	return header !== null && header.flags.indexed && !header.flags.rgb
}

/**
 * STCI codec
 */
export const StiCodec: ImageCodec<StiEncodeOptions> = {
	format: 'sti',

	canDecode(data: Uint8Array): boolean {
		return hasStiMagic(data)
	},

	decode(data: Uint8Array): ImageData {
		return stiToImageData(decodeSti(data))
	},

	encode(image: ImageData, options: StiEncodeOptions = {}): Uint8Array {
		if (options.variant === 'etrle') {
			const { palette, images } = quantizeFrames([image], options)
			return encodeEtrleSti(
				images.map((indexed) => ({ image: indexed })),
				{ palette, chunkSize: options.chunkSize }
			)
		}
		return encodeTrueColorSti(image, options)
	},
}
