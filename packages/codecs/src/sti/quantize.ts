import { type ImageData, type IndexedImage, InvalidComponentError, PaletteOverflowError } from '@stci/core'
import type { RGB } from '@stci/color'
import { PALETTE_COLORS, PALETTE_SIZE, type Palette } from './types'

/**
 * How to treat pixels with alpha strictly between 0 and 255
 */
export type SemiTransparentPolicy = 'transparent' | 'opaque'

export interface QuantizeOptions {
	/** Color stored in palette entry 0 (default black) */
	transparent?: RGB
	/** Required when any pixel is semi-transparent */
	semiTransparent?: SemiTransparentPolicy
}

export interface QuantizedFrames {
	palette: Palette
	images: IndexedImage[]
}

/**
 * Map RGBA images onto one shared palette. Index 0 is transparent, opaque
 * colors take indices 1-255 in order of first appearance.
 */
export function quantizeFrames(images: readonly ImageData[], options: QuantizeOptions = {}): QuantizedFrames {
	const [tr, tg, tb] = options.transparent ?? [0, 0, 0]
	const palette = new Uint8Array(PALETTE_SIZE)
	palette[0] = tr
	palette[1] = tg
	palette[2] = tb

	const lookup = new Map<number, number>()
	const capacity = PALETTE_COLORS - 1

	const indexed = images.map((image, n): IndexedImage => {
		const { width, height, data } = image
		const indices = new Uint8Array(width * height)

		for (let i = 0; i < width * height; i++) {
			const r = data[i * 4]!
			const g = data[i * 4 + 1]!
			const b = data[i * 4 + 2]!
			let a = data[i * 4 + 3]!

			if (a !== 0 && a !== 255) {
				if (options.semiTransparent === undefined) {
					const x = i % width
					const y = Math.floor(i / width)
					throw new InvalidComponentError(
						'alpha',
						`semi-transparent pixel (${a}) at ${x},${y} of image ${n}; set semiTransparent to 'transparent' or 'opaque'`
					)
				}
				a = options.semiTransparent === 'transparent' ? 0 : 255
			}
			if (a === 0) continue // index 0

			const key = (r << 16) | (g << 8) | b
			let index = lookup.get(key)
			if (index === undefined) {
				if (lookup.size >= capacity) {
					throw new PaletteOverflowError(lookup.size + 1, capacity)
				}
				index = lookup.size + 1
				lookup.set(key, index)
				palette[index * 3] = r
				palette[index * 3 + 1] = g
				palette[index * 3 + 2] = b
			}
			indices[i] = index
		}

		return { width, height, indices }
	})

	return { palette, images: indexed }
}
