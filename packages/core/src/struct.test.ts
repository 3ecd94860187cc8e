import { describe, expect, test } from 'vitest'
import {
	CodecError,
	FieldOverflowError,
	TruncatedInputError,
	UnknownFlagError,
} from './errors'
import { StructLayout } from './struct'

describe('StructLayout', () => {
	const Sample = new StructLayout(
		'Sample',
		[
			{ name: 'tag', type: 'bytes', size: 4 },
			{ name: 'count', type: 'u32' },
			{ name: 'kind', type: 'u8' },
			{ type: 'pad', size: 1 },
			{ name: 'width', type: 'u16' },
			{ name: 'options', type: 'u32' },
		],
		{ options: { FIRST: 0, THIRD: 2, LAST: 31 } }
	)

	const sample = new Uint8Array([
		0x41, 0x42, 0x43, 0x44, // tag
		0x01, 0x02, 0x03, 0x04, // count
		0x05, // kind
		0x00, // pad
		0x06, 0x07, // width
		0x05, 0x00, 0x00, 0x80, // options
	])

	describe('size', () => {
		test('sums field widths', () => {
			expect(Sample.size).toBe(16)
		})
	})

	describe('decode', () => {
		test('reads little-endian fields', () => {
			const value = Sample.decode(sample)

			expect([...value.bytes('tag')]).toEqual([0x41, 0x42, 0x43, 0x44])
			expect(value.int('count')).toBe(0x04030201)
			expect(value.int('kind')).toBe(5)
			expect(value.int('width')).toBe(0x0706)
			expect(value.int('options')).toBe(0x80000005)
		})

		test('reads at an offset and ignores excess bytes', () => {
			const padded = new Uint8Array(sample.length + 10)
			padded.set(sample, 3)

			const value = Sample.decode(padded, 3)
			expect(value.int('width')).toBe(0x0706)
		})

		test('throws on input one byte short', () => {
			expect(() => Sample.decode(sample.subarray(0, 15))).toThrow(TruncatedInputError)
		})

		test('reports the missing byte count', () => {
			try {
				Sample.decode(sample.subarray(0, 10))
				expect.unreachable()
			} catch (error) {
				expect(error).toBeInstanceOf(TruncatedInputError)
				if (error instanceof TruncatedInputError) {
					expect(error.expected).toBe(16)
					expect(error.actual).toBe(10)
				}
			}
		})

		test('exact-size input re-encodes to the same bytes', () => {
			expect([...Sample.decode(sample).toBytes()]).toEqual([...sample])
		})
	})

	describe('encode', () => {
		test('writes fields and zero padding', () => {
			const bytes = Sample.encode({
				tag: new Uint8Array([0x41, 0x42, 0x43, 0x44]),
				count: 0x04030201,
				kind: 5,
				width: 0x0706,
				options: 0x80000005,
			})

			expect([...bytes]).toEqual([...sample])
		})

		test('missing fields encode as zero', () => {
			const bytes = Sample.encode({ kind: 9 })

			expect(bytes.length).toBe(16)
			expect(bytes[8]).toBe(9)
			expect(bytes.filter((byte) => byte !== 0).length).toBe(1)
		})

		test('throws when an integer does not fit its width', () => {
			expect(() => Sample.encode({ kind: 256 })).toThrow(FieldOverflowError)
			expect(() => Sample.encode({ width: 0x10000 })).toThrow(FieldOverflowError)
			expect(() => Sample.encode({ count: -1 })).toThrow(FieldOverflowError)
			expect(() => Sample.encode({ count: 1.5 })).toThrow(FieldOverflowError)
		})

		test('throws when a byte string is not exactly its width', () => {
			expect(() => Sample.encode({ tag: new Uint8Array(3) })).toThrow(FieldOverflowError)
			expect(() => Sample.encode({ tag: new Uint8Array(5) })).toThrow(FieldOverflowError)
		})

		test('throws on a value of the wrong kind', () => {
			expect(() => Sample.encode({ tag: 4 })).toThrow(FieldOverflowError)
			expect(() => Sample.encode({ kind: new Uint8Array(1) })).toThrow(FieldOverflowError)
		})

		test('names the offending field', () => {
			expect(() => Sample.encode({ width: 70000 })).toThrow('Field width: 70000 does not fit u16')
		})
	})

	describe('flags', () => {
		test('reads named bits', () => {
			const value = Sample.decode(sample)

			expect(value.flag('options', 'FIRST')).toBe(true)
			expect(value.flag('options', 'THIRD')).toBe(true)
			expect(value.flag('options', 'LAST')).toBe(true)
			expect(value.flags('options')).toEqual(['FIRST', 'THIRD', 'LAST'])
		})

		test('sets and clears bits without touching others', () => {
			const value = Sample.create()

			const first = value.withFlag('options', 'FIRST', true)
			expect(first.int('options')).toBe(1)

			const both = first.withFlag('options', 'LAST', true)
			expect(both.int('options')).toBe(0x80000001)

			const cleared = both.withFlag('options', 'FIRST', false)
			expect(cleared.int('options')).toBe(0x80000000)

			expect(value.int('options')).toBe(0)
		})

		test('setting an already-set flag is a no-op', () => {
			const value = Sample.create({ options: 4 })
			expect(value.withFlag('options', 'THIRD', true).int('options')).toBe(4)
		})

		test('throws on unknown flag names', () => {
			const value = Sample.create()

			expect(() => value.flag('options', 'SECOND')).toThrow(UnknownFlagError)
			expect(() => value.withFlag('options', 'toString', true)).toThrow(UnknownFlagError)
			expect(() => value.flag('count', 'FIRST')).toThrow(UnknownFlagError)
		})
	})

	describe('create', () => {
		test('fills defaults and validates', () => {
			const value = Sample.create({ width: 3 })

			expect(value.int('count')).toBe(0)
			expect([...value.bytes('tag')]).toEqual([0, 0, 0, 0])
			expect(() => Sample.create({ kind: 300 })).toThrow(FieldOverflowError)
		})

		test('with() returns an updated copy', () => {
			const value = Sample.create({ width: 3 })
			const changed = value.with({ width: 4 })

			expect(value.int('width')).toBe(3)
			expect(changed.int('width')).toBe(4)
		})

		test('typed accessors reject the other kind', () => {
			const value = Sample.create()

			expect(() => value.int('tag')).toThrow(CodecError)
			expect(() => value.bytes('count')).toThrow(CodecError)
		})
	})

	describe('layout validation', () => {
		test('rejects flags on byte fields', () => {
			expect(
				() => new StructLayout('Bad', [{ name: 'id', type: 'bytes', size: 2 }], { id: { A: 0 } })
			).toThrow(CodecError)
		})

		test('rejects bits outside the field width', () => {
			expect(
				() => new StructLayout('Bad', [{ name: 'f', type: 'u8' }], { f: { HIGH: 8 } })
			).toThrow(CodecError)
		})
	})
})
