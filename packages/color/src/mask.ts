/**
 * Bit-mask color packing
 *
 * Converts between packed pixel values described by a ColorSpec and 8-bit
 * RGBA components, and between packed values and their little-endian bytes.
 */

import { InvalidComponentError, InvalidSpecError } from '@stci/core'
import { CHANNEL_NAMES, type ChannelTuple, type ColorSpec, type RGBA } from './types'

/**
 * Number of significant bits in a 32-bit unsigned value
 */
export function bitLength(value: number): number {
	return value === 0 ? 0 : 32 - Math.clz32(value)
}

/**
 * Number of zero bits below the lowest set bit
 */
function trailingZeros(value: number): number {
	return 31 - Math.clz32(value & -value)
}

function hex(value: number): string {
	return `0x${value.toString(16)}`
}

/**
 * Throw InvalidSpecError unless every mask is `depth` contiguous bits, the total
 * depth is a positive multiple of 8 up to 64, and the channels fit in it
 */
export function validateSpec(spec: ColorSpec): void {
	const { masks, depths, colorDepth } = spec

	if (!Number.isInteger(colorDepth) || colorDepth <= 0 || colorDepth % 8 !== 0 || colorDepth > 64) {
		throw new InvalidSpecError(null, `total depth ${colorDepth} must be a positive multiple of 8 up to 64`)
	}

	let total = 0
	for (let i = 0; i < 4; i++) {
		const channel = CHANNEL_NAMES[i]!
		const mask = masks[i]!
		const depth = depths[i]!

		if (!Number.isInteger(mask) || mask < 0 || mask > 0xffffffff) {
			throw new InvalidSpecError(channel, `mask ${mask} is not a 32-bit value`)
		}
		if (!Number.isInteger(depth) || depth < 0 || depth > 32) {
			throw new InvalidSpecError(channel, `depth ${depth} out of range`)
		}

		if (depth === 0) {
			if (mask !== 0) {
				throw new InvalidSpecError(channel, `mask ${hex(mask)} declared with depth 0`)
			}
			continue
		}

		if (mask === 0 || mask / 2 ** trailingZeros(mask) !== 2 ** depth - 1) {
			throw new InvalidSpecError(channel, `mask ${hex(mask)} is not ${depth} contiguous bits`)
		}
		if (bitLength(mask) > colorDepth) {
			throw new InvalidSpecError(channel, `mask ${hex(mask)} exceeds ${colorDepth}-bit pixel`)
		}

		total += depth
	}

	if (total > colorDepth) {
		throw new InvalidSpecError(null, `channel depths (${total}) exceed total depth ${colorDepth}`)
	}
}

/**
 * Expand one channel to 0-255
 */
function unpackChannel(color: number, mask: number, bits: number): number {
	if (mask === 0 || bits === 0) return 0

	const value = (color & mask) >>> 0
	if (value === mask) return 255 // saturated: pure white / opaque

	if (bits > 8) {
		// keep the top 8 bits
		return value >>> (bitLength(mask) - 8)
	}

	const shift = bitLength(mask) - bits
	const max = 2 ** bits - 1
	return Math.floor(((value >>> shift) * 255) / max)
}

/**
 * Split a packed pixel into RGBA components.
 * Absent channels come back as 0, alpha included.
 */
export function unpackColor(color: number, spec: ColorSpec): RGBA {
	const { masks, depths } = spec
	return [
		unpackChannel(color, masks[0], depths[0]),
		unpackChannel(color, masks[1], depths[1]),
		unpackChannel(color, masks[2], depths[2]),
		unpackChannel(color, masks[3], depths[3]),
	]
}

/**
 * Pack RGBA components into a pixel value. Lossy for channels under 8 bits.
 */
export function packColor(components: ChannelTuple, spec: ColorSpec): number {
	for (let i = 0; i < 4; i++) {
		const value = components[i]!
		if (!Number.isInteger(value) || value < 0 || value > 255) {
			throw new InvalidComponentError(CHANNEL_NAMES[i]!, `${value} outside 0-255`)
		}
	}

	let color = 0
	for (let i = 0; i < 4; i++) {
		const byte = components[i]!
		const mask = spec.masks[i]!
		if (byte === 0 || mask === 0) continue // already 0

		const shift = bitLength(mask) - 8
		if (shift > 0) {
			color |= (byte << shift) & mask
		} else if (shift < 0) {
			color |= (byte >> -shift) & mask
		} else {
			color |= byte & mask
		}
	}

	return color >>> 0
}

/**
 * Bytes per serialized pixel
 */
export function bytesPerPixel(spec: ColorSpec): number {
	return spec.colorDepth / 8
}

/**
 * Read a packed pixel. Bytes past the first four are ignored.
 */
export function readPixel(data: Uint8Array, offset: number, size: number): number {
	switch (size) {
		case 1:
			return data[offset]!
		case 2:
			return data[offset]! | (data[offset + 1]! << 8)
		case 3:
			return (data[offset]! | (data[offset + 1]! << 8) | (data[offset + 2]! << 16)) >>> 0
		default:
			return (
				(data[offset]! |
					(data[offset + 1]! << 8) |
					(data[offset + 2]! << 16) |
					(data[offset + 3]! << 24)) >>>
				0
			)
	}
}

/**
 * Write a packed pixel. Bytes past the first four are zero.
 */
export function writePixel(output: Uint8Array, offset: number, color: number, size: number): void {
	output[offset] = color & 0xff
	if (size === 1) return

	output[offset + 1] = (color >>> 8) & 0xff
	if (size === 2) return

	output[offset + 2] = (color >>> 16) & 0xff
	if (size === 3) return

	output[offset + 3] = (color >>> 24) & 0xff
	output.fill(0, offset + 4, offset + size)
}

/**
 * Pack RGBA components straight to bytes
 */
export function encodePixel(components: ChannelTuple, spec: ColorSpec): Uint8Array {
	const size = bytesPerPixel(spec)
	const output = new Uint8Array(size)
	writePixel(output, 0, packColor(components, spec), size)
	return output
}

/**
 * Read bytes straight to RGBA components
 */
export function decodePixel(data: Uint8Array, offset: number, spec: ColorSpec): RGBA {
	return unpackColor(readPixel(data, offset, bytesPerPixel(spec)), spec)
}
