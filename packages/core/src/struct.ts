import {
	CodecError,
	FieldOverflowError,
	TruncatedInputError,
	UnknownFlagError,
} from './errors'

/**
 * Fixed-layout binary structs.
 *
 * A layout is an ordered list of little-endian fields. Its size never depends on
 * the values, so a struct always occupies exactly `layout.size` bytes.
 */

export type IntType = 'u8' | 'u16' | 'u32'

export type FieldDef<N extends string> =
	| { readonly name: N; readonly type: IntType }
	| { readonly name: N; readonly type: 'bytes'; readonly size: number }
	| { readonly type: 'pad'; readonly size: number }

export type FieldValue = number | Uint8Array

/** Flag name to bit index */
export type FlagMap = Readonly<Record<string, number>>

export type FlagMaps<N extends string> = { readonly [K in N]?: FlagMap }

export type StructInit<N extends string> = { readonly [K in N]?: FieldValue }

const INT_SIZE: Record<IntType, number> = { u8: 1, u16: 2, u32: 4 }

function fieldSize<N extends string>(field: FieldDef<N>): number {
	return field.type === 'bytes' || field.type === 'pad' ? field.size : INT_SIZE[field.type]
}

/**
 * Ordered field layout with optional bit-flag maps on integer fields
 */
export class StructLayout<N extends string> {
	readonly size: number
	private readonly flagMaps: Map<N, ReadonlyMap<string, number>>

	constructor(
		readonly name: string,
		readonly fields: readonly FieldDef<N>[],
		flags: FlagMaps<N> = {}
	) {
		this.size = fields.reduce((sum, field) => sum + fieldSize(field), 0)
		this.flagMaps = new Map()

		for (const field of fields) {
			if (field.type === 'pad') continue
			const map = flags[field.name]
			if (!map) continue
			if (field.type === 'bytes') {
				throw new CodecError(`${name}: flags declared on byte field ${field.name}`)
			}
			const bits = INT_SIZE[field.type] * 8
			const entries = new Map<string, number>()
			for (const [flag, bit] of Object.entries(map)) {
				if (!Number.isInteger(bit) || bit < 0 || bit >= bits) {
					throw new CodecError(`${name}: flag ${flag} bit ${bit} outside ${field.type} field ${field.name}`)
				}
				entries.set(flag, bit)
			}
			this.flagMaps.set(field.name, entries)
		}

		const declared = new Set<string>(this.flagMaps.keys())
		for (const key of Object.keys(flags)) {
			if (!declared.has(key)) {
				throw new CodecError(`${name}: flags declared on unknown field ${key}`)
			}
		}
	}

	/**
	 * Decode a struct from `data` starting at `offset`; excess bytes are ignored
	 */
	decode(data: Uint8Array, offset = 0): Struct<N> {
		const available = data.length - offset
		if (available < this.size) {
			throw new TruncatedInputError(this.name, offset, this.size, Math.max(0, available))
		}

		const view = new DataView(data.buffer, data.byteOffset + offset, this.size)
		const values = new Map<N, FieldValue>()
		let pos = 0

		for (const field of this.fields) {
			switch (field.type) {
				case 'u8':
					values.set(field.name, view.getUint8(pos))
					break
				case 'u16':
					values.set(field.name, view.getUint16(pos, true))
					break
				case 'u32':
					values.set(field.name, view.getUint32(pos, true))
					break
				case 'bytes':
					values.set(field.name, data.slice(offset + pos, offset + pos + field.size))
					break
				case 'pad':
					break
			}
			pos += fieldSize(field)
		}

		return new Struct(this, values)
	}

	/**
	 * Encode values to exactly `size` bytes. Missing fields and padding are zero.
	 */
	encode(values: StructInit<N>): Uint8Array {
		return this.encodeWith((name) => values[name])
	}

	/**
	 * Build a struct value, zero-filling missing fields
	 */
	create(values: StructInit<N> = {}): Struct<N> {
		const map = new Map<N, FieldValue>()
		for (const field of this.fields) {
			if (field.type === 'pad') continue
			const value = values[field.name] ?? this.defaultValue(field)
			this.check(field, value)
			map.set(field.name, value)
		}
		return new Struct(this, map)
	}

	/**
	 * Bit index of a named flag on an integer field
	 */
	flagBit(field: N, flag: string): number {
		const bit = this.flagMaps.get(field)?.get(flag)
		if (bit === undefined) {
			throw new UnknownFlagError(field, flag)
		}
		return bit
	}

	/**
	 * Names declared in a field's flag map
	 */
	flagNames(field: N): string[] {
		return [...(this.flagMaps.get(field)?.keys() ?? [])]
	}

	/** @internal */
	encodeWith(lookup: (name: N) => FieldValue | undefined): Uint8Array {
		const output = new Uint8Array(this.size)
		const view = new DataView(output.buffer)
		let pos = 0

		for (const field of this.fields) {
			if (field.type !== 'pad') {
				const value = lookup(field.name) ?? this.defaultValue(field)
				this.check(field, value)
				if (typeof value === 'number') {
					if (field.type === 'u8') view.setUint8(pos, value)
					else if (field.type === 'u16') view.setUint16(pos, value, true)
					else view.setUint32(pos, value, true)
				} else {
					output.set(value, pos)
				}
			}
			pos += fieldSize(field)
		}

		return output
	}

	/** @internal */
	check(field: FieldDef<N>, value: FieldValue): void {
		if (field.type === 'pad') return

		if (field.type === 'bytes') {
			if (!(value instanceof Uint8Array)) {
				throw new FieldOverflowError(field.name, 'expected a byte string')
			}
			if (value.length !== field.size) {
				throw new FieldOverflowError(field.name, `expected ${field.size} bytes, got ${value.length}`)
			}
			return
		}

		if (typeof value !== 'number') {
			throw new FieldOverflowError(field.name, 'expected an integer')
		}
		const max = 2 ** (INT_SIZE[field.type] * 8) - 1
		if (!Number.isInteger(value) || value < 0 || value > max) {
			throw new FieldOverflowError(field.name, `${value} does not fit ${field.type}`)
		}
	}

	private defaultValue(field: FieldDef<N>): FieldValue {
		return field.type === 'bytes' ? new Uint8Array(field.size) : 0
	}
}

/**
 * Immutable decoded struct value
 */
export class Struct<N extends string> {
	constructor(
		readonly layout: StructLayout<N>,
		private readonly values: ReadonlyMap<N, FieldValue>
	) {}

	/**
	 * Read an integer field
	 */
	int(name: N): number {
		const value = this.values.get(name)
		if (typeof value !== 'number') {
			throw new CodecError(`${this.layout.name}: ${name} is not an integer field`)
		}
		return value
	}

	/**
	 * Read a byte-string field
	 */
	bytes(name: N): Uint8Array {
		const value = this.values.get(name)
		if (!(value instanceof Uint8Array)) {
			throw new CodecError(`${this.layout.name}: ${name} is not a byte field`)
		}
		return value
	}

	/**
	 * Read one named bit of an integer field
	 */
	flag(field: N, flag: string): boolean {
		const bit = this.layout.flagBit(field, flag)
		return Math.floor(this.int(field) / 2 ** bit) % 2 === 1
	}

	/**
	 * Names of all set flags of an integer field
	 */
	flags(field: N): string[] {
		return this.layout.flagNames(field).filter((flag) => this.flag(field, flag))
	}

	/**
	 * Copy with one named bit set or cleared
	 */
	withFlag(field: N, flag: string, on: boolean): Struct<N> {
		const bit = this.layout.flagBit(field, flag)
		const current = this.int(field)
		const isSet = Math.floor(current / 2 ** bit) % 2 === 1
		if (isSet === on) return this
		return this.withValue(field, on ? current + 2 ** bit : current - 2 ** bit)
	}

	/**
	 * Copy with some fields replaced
	 */
	with(changes: StructInit<N>): Struct<N> {
		const values = new Map(this.values)
		for (const field of this.layout.fields) {
			if (field.type === 'pad') continue
			const value = changes[field.name]
			if (value === undefined) continue
			this.layout.check(field, value)
			values.set(field.name, value)
		}
		return new Struct(this.layout, values)
	}

	/**
	 * Encode back to `layout.size` bytes
	 */
	toBytes(): Uint8Array {
		return this.layout.encodeWith((name) => this.values.get(name))
	}

	private withValue(name: N, value: number): Struct<N> {
		const values = new Map(this.values)
		values.set(name, value)
		return new Struct(this.layout, values)
	}
}
