import type { Format, ImageFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<ImageFormat, { bytes: number[]; offset?: number }> = {
	sti: { bytes: [0x53, 0x54, 0x43, 0x49] }, // "STCI"
}

const MIME_TYPES: Record<ImageFormat, string> = {
	sti: 'image/x-stci',
}

/**
 * Image formats set
 */
const IMAGE_FORMATS: Set<string> = new Set<ImageFormat>(['sti'])

/**
 * Check if bytes match magic signature
 */
export function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): Format | null {
	if (matchMagic(data, MAGIC_BYTES.sti)) return 'sti'
	return null
}

/**
 * Check if a string names a supported image format
 */
export function isImageFormat(format: string): format is ImageFormat {
	return IMAGE_FORMATS.has(format)
}

/**
 * Get file extension for format
 */
export function getExtension(format: Format): string {
	return format
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: Format): string {
	return MIME_TYPES[format]
}
