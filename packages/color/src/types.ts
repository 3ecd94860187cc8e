/**
 * Color types
 */

/** RGB color */
export type RGB = [number, number, number]

/** RGBA color */
export type RGBA = [number, number, number, number]

/** Per-channel values in R, G, B, A order */
export type ChannelTuple = readonly [number, number, number, number]

/**
 * Packing scheme of one truecolor pixel
 */
export interface ColorSpec {
	/** Bit masks selecting R, G, B, A inside the packed pixel */
	readonly masks: ChannelTuple
	/** Bits per channel (0 = channel absent) */
	readonly depths: ChannelTuple
	/** Total bits per pixel, a multiple of 8 */
	readonly colorDepth: number
}

export const CHANNEL_NAMES = ['red', 'green', 'blue', 'alpha'] as const
