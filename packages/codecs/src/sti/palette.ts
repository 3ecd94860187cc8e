import { TruncatedInputError } from '@stci/core'
import { PALETTE_COLORS, PALETTE_SIZE, type Palette } from './types'

/**
 * Read the on-disk palette (R plane, G plane, B plane) into RGB triples
 */
export function readPalette(data: Uint8Array, offset: number): Palette {
	const available = data.length - offset
	if (available < PALETTE_SIZE) {
		throw new TruncatedInputError('palette', offset, PALETTE_SIZE, Math.max(0, available))
	}

	const palette = new Uint8Array(PALETTE_SIZE)
	for (let i = 0; i < PALETTE_COLORS; i++) {
		palette[i * 3] = data[offset + i]!
		palette[i * 3 + 1] = data[offset + PALETTE_COLORS + i]!
		palette[i * 3 + 2] = data[offset + PALETTE_COLORS * 2 + i]!
	}
	return palette
}

/**
 * Write RGB triples as three planes. Entries past 256 are dropped, missing ones
 * are black.
 */
export function writePalette(palette: Palette): Uint8Array {
	const output = new Uint8Array(PALETTE_SIZE)
	const count = Math.min(PALETTE_COLORS, Math.floor(palette.length / 3))
	for (let i = 0; i < count; i++) {
		output[i] = palette[i * 3]!
		output[PALETTE_COLORS + i] = palette[i * 3 + 1]!
		output[PALETTE_COLORS * 2 + i] = palette[i * 3 + 2]!
	}
	return output
}

/**
 * Pad or truncate to exactly 256 triples
 */
export function normalizePalette(palette: Palette): Palette {
	if (palette.length === PALETTE_SIZE) return palette
	const output = new Uint8Array(PALETTE_SIZE)
	output.set(palette.subarray(0, PALETTE_SIZE))
	return output
}
