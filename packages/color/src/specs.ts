/**
 * Well-known pixel packings, named by channel order from the most to the least
 * significant bit (X marks unused bits)
 */

import type { ColorSpec } from './types'

function spec(
	masks: ColorSpec['masks'],
	depths: ColorSpec['depths'],
	colorDepth: number
): ColorSpec {
	return { masks, depths, colorDepth }
}

export const NAMED_SPECS = {
	// 16 bits
	R5G6B5: spec([0xf800, 0x07e0, 0x001f, 0x0000], [5, 6, 5, 0], 16),
	X1R5G5B5: spec([0x7c00, 0x03e0, 0x001f, 0x0000], [5, 5, 5, 0], 16),
	A1R5G5B5: spec([0x7c00, 0x03e0, 0x001f, 0x8000], [5, 5, 5, 1], 16),
	A1B5G5R5: spec([0x001f, 0x03e0, 0x7c00, 0x8000], [5, 5, 5, 1], 16),
	X4B4G4R4: spec([0x000f, 0x00f0, 0x0f00, 0x0000], [4, 4, 4, 0], 16),
	A4B4G4R4: spec([0x000f, 0x00f0, 0x0f00, 0xf000], [4, 4, 4, 4], 16),

	// 24 bits
	R8G8B8: spec([0xff0000, 0x00ff00, 0x0000ff, 0x000000], [8, 8, 8, 0], 24),
	B8G8R8: spec([0x0000ff, 0x00ff00, 0xff0000, 0x000000], [8, 8, 8, 0], 24),

	// 32 bits
	R8G8B8A8: spec([0xff000000, 0x00ff0000, 0x0000ff00, 0x000000ff], [8, 8, 8, 8], 32),
	R8G8B8X8: spec([0xff000000, 0x00ff0000, 0x0000ff00, 0x00000000], [8, 8, 8, 0], 32),
	B8G8R8A8: spec([0x0000ff00, 0x00ff0000, 0xff000000, 0x000000ff], [8, 8, 8, 8], 32),
	B8G8R8X8: spec([0x0000ff00, 0x00ff0000, 0xff000000, 0x00000000], [8, 8, 8, 0], 32),
	A8R8G8B8: spec([0x00ff0000, 0x0000ff00, 0x000000ff, 0xff000000], [8, 8, 8, 8], 32),
	X8R8G8B8: spec([0x00ff0000, 0x0000ff00, 0x000000ff, 0x00000000], [8, 8, 8, 0], 32),
	A8B8G8R8: spec([0x000000ff, 0x0000ff00, 0x00ff0000, 0xff000000], [8, 8, 8, 8], 32),
	X8B8G8R8: spec([0x000000ff, 0x0000ff00, 0x00ff0000, 0x00000000], [8, 8, 8, 0], 32),

	// 8 bits
	R8: spec([0xff, 0x00, 0x00, 0x00], [8, 0, 0, 0], 8),
	G8: spec([0x00, 0xff, 0x00, 0x00], [0, 8, 0, 0], 8),
	B8: spec([0x00, 0x00, 0xff, 0x00], [0, 0, 8, 0], 8),
	A8: spec([0x00, 0x00, 0x00, 0xff], [0, 0, 0, 8], 8),

	// 40 and 48 bits, padding bytes after the first 32 bits
	X8A8B8G8R8: spec([0x000000ff, 0x0000ff00, 0x00ff0000, 0xff000000], [8, 8, 8, 8], 40),
	X16A8B8G8R8: spec([0x000000ff, 0x0000ff00, 0x00ff0000, 0xff000000], [8, 8, 8, 8], 48),
}

export type SpecName = keyof typeof NAMED_SPECS

/**
 * Packing used by every official truecolor STCI file: 5-6-5, little-endian
 */
export const DEFAULT_SPEC: ColorSpec = NAMED_SPECS.R5G6B5

function sameSpec(a: ColorSpec, b: ColorSpec): boolean {
	return (
		a.colorDepth === b.colorDepth &&
		a.masks.every((mask, i) => mask === b.masks[i]) &&
		a.depths.every((depth, i) => depth === b.depths[i])
	)
}

/**
 * Name of a well-known spec, or null
 */
export function specName(spec: ColorSpec): SpecName | null {
	for (const [name, known] of Object.entries(NAMED_SPECS)) {
		if (sameSpec(spec, known) && isSpecName(name)) return name
	}
	return null
}

export function isSpecName(name: string): name is SpecName {
	return Object.prototype.hasOwnProperty.call(NAMED_SPECS, name)
}

/**
 * Resolve a spec given by name or value
 */
export function resolveSpec(spec: SpecName | ColorSpec): ColorSpec {
	return typeof spec === 'string' ? NAMED_SPECS[spec] : spec
}
