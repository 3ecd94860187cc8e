/**
 * Error taxonomy shared by every codec.
 *
 * All failures are fatal: a decode or encode either completes or throws one of
 * these before any output is returned.
 */

/**
 * Base class for all codec errors
 */
export class CodecError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CodecError'
	}
}

/**
 * Wrong magic bytes or contradictory format flags
 */
export class FormatMismatchError extends CodecError {
	constructor(message: string) {
		super(message)
		this.name = 'FormatMismatchError'
	}
}

/**
 * Valid input that uses a variant this codec does not implement
 */
export class UnsupportedFeatureError extends CodecError {
	readonly feature: string

	constructor(feature: string, message?: string) {
		super(message ?? `Unsupported feature: ${feature}`)
		this.name = 'UnsupportedFeatureError'
		this.feature = feature
	}
}

/**
 * Fewer bytes available than a fixed-size structure or block needs
 */
export class TruncatedInputError extends CodecError {
	readonly offset: number
	readonly expected: number
	readonly actual: number

	constructor(what: string, offset: number, expected: number, actual: number) {
		super(`Truncated ${what} at offset ${offset}: need ${expected} bytes, got ${actual}`)
		this.name = 'TruncatedInputError'
		this.offset = offset
		this.expected = expected
		this.actual = actual
	}
}

/**
 * Corrupt run-length data
 */
export class MalformedRunError extends CodecError {
	/** Offset of the offending control byte */
	readonly offset: number
	readonly reason: string

	constructor(offset: number, reason: string) {
		super(`Malformed run at control byte ${offset}: ${reason}`)
		this.name = 'MalformedRunError'
		this.offset = offset
		this.reason = reason
	}
}

/**
 * Color spec whose masks, depths or total depth are inconsistent
 */
export class InvalidSpecError extends CodecError {
	readonly channel: string | null

	constructor(channel: string | null, message: string) {
		super(channel === null ? `Invalid color spec: ${message}` : `Invalid color spec (${channel}): ${message}`)
		this.name = 'InvalidSpecError'
		this.channel = channel
	}
}

/**
 * Value that does not fit its struct field
 */
export class FieldOverflowError extends CodecError {
	readonly field: string

	constructor(field: string, message: string) {
		super(`Field ${field}: ${message}`)
		this.name = 'FieldOverflowError'
		this.field = field
	}
}

/**
 * Color component outside 0-255, or a pixel the encoder has no policy for
 */
export class InvalidComponentError extends CodecError {
	readonly channel: string

	constructor(channel: string, message: string) {
		super(`Invalid ${channel} component: ${message}`)
		this.name = 'InvalidComponentError'
		this.channel = channel
	}
}

/**
 * Flag name missing from a field's flag map
 */
export class UnknownFlagError extends CodecError {
	readonly field: string
	readonly flag: string

	constructor(field: string, flag: string) {
		super(`Unknown flag ${flag} for field ${field}`)
		this.name = 'UnknownFlagError'
		this.field = field
		this.flag = flag
	}
}

/**
 * More distinct colors than the palette can hold
 */
export class PaletteOverflowError extends CodecError {
	readonly count: number

	constructor(count: number, capacity: number) {
		super(`Palette overflow: ${count} colors, capacity ${capacity}`)
		this.name = 'PaletteOverflowError'
		this.count = count
	}
}
