import { detectFormat } from '@stci/core'
import { describe, expect, test } from 'vitest'
import { StiCodec, isIndexedSti, isTrueColorSti } from './codec'
import { decodeSti } from './decoder'
import { encodeEtrleSti, encodeIndexedSti } from './encoder'

describe('STCI Codec', () => {
	// Colors that survive 5-6-5 packing unchanged
	const COLORS = [
		[255, 0, 0, 255],
		[0, 255, 0, 255],
		[0, 0, 255, 255],
		[255, 255, 255, 255],
		[0, 0, 0, 255],
	]

	const createTestImage = (width: number, height: number) => ({
		width,
		height,
		data: new Uint8Array(
			Array.from({ length: width * height }, (_, i) => COLORS[i % COLORS.length]!).flat()
		),
	})

	// Transparent pixels are black so they survive the palette round trip
	const createSpriteImage = (width: number, height: number) => ({
		width,
		height,
		data: new Uint8Array(
			Array.from({ length: width * height }, (_, i) =>
				(i + Math.floor(i / width)) % 3 === 0 ? [0, 0, 0, 0] : COLORS[i % COLORS.length]!
			).flat()
		),
	})

	describe('detection', () => {
		test('canDecode checks the identifier', () => {
			const encoded = StiCodec.encode(createTestImage(2, 2))

			expect(StiCodec.canDecode(encoded)).toBe(true)
			expect(StiCodec.canDecode(new Uint8Array([0x53, 0x54, 0x43]))).toBe(false)
			expect(detectFormat(encoded)).toBe('sti')
		})

		test('tells truecolor and indexed files apart', () => {
			const truecolor = StiCodec.encode(createTestImage(2, 2))
			const indexed = StiCodec.encode(createTestImage(2, 2), { variant: 'etrle' })

			expect(isTrueColorSti(truecolor)).toBe(true)
			expect(isIndexedSti(truecolor)).toBe(false)
			expect(isTrueColorSti(indexed)).toBe(false)
			expect(isIndexedSti(indexed)).toBe(true)
		})

		test('probes never throw', () => {
			expect(isTrueColorSti(new Uint8Array(10))).toBe(false)
			expect(isIndexedSti(new Uint8Array([0x53, 0x54, 0x43, 0x49]))).toBe(false)
		})
	})

	describe('round trip', () => {
		test('truecolor', () => {
			const image = createTestImage(7, 5)
			const decoded = StiCodec.decode(StiCodec.encode(image))

			expect(decoded.width).toBe(7)
			expect(decoded.height).toBe(5)
			expect([...decoded.data]).toEqual([...image.data])
		})

		test('truecolor with alpha', () => {
			const image = createSpriteImage(4, 3)
			const decoded = StiCodec.decode(StiCodec.encode(image, { spec: 'A8B8G8R8' }))

			expect([...decoded.data]).toEqual([...image.data])
		})

		test('ETRLE', () => {
			const image = createSpriteImage(9, 4)
			const encoded = StiCodec.encode(image, { variant: 'etrle' })
			const decoded = StiCodec.decode(encoded)

			expect(decoded.width).toBe(9)
			expect(decoded.height).toBe(4)
			expect([...decoded.data]).toEqual([...image.data])
		})

		test('ETRLE needs a policy for semi-transparent pixels', () => {
			const image = { width: 1, height: 1, data: new Uint8Array([10, 10, 10, 100]) }

			expect(() => StiCodec.encode(image, { variant: 'etrle' })).toThrow('semi-transparent')
			const decoded = StiCodec.decode(StiCodec.encode(image, { variant: 'etrle', semiTransparent: 'opaque' }))
			expect([...decoded.data]).toEqual([10, 10, 10, 255])
		})
	})

	describe('decode to RGBA', () => {
		const palette = new Uint8Array(768)
		palette.set([1, 2, 3, 40, 50, 60], 0)

		test('indexed files use the transparent color as an index', () => {
			const encoded = encodeIndexedSti(
				{ width: 2, height: 1, indices: new Uint8Array([0, 1]) },
				{ palette, transparentIndex: 1 }
			)

			expect([...StiCodec.decode(encoded).data]).toEqual([1, 2, 3, 255, 40, 50, 60, 0])
		})

		test('frames are drawn onto the composed canvas', () => {
			const encoded = encodeEtrleSti(
				[
					{ image: { width: 1, height: 2, indices: new Uint8Array([1, 1]) } },
					{ image: { width: 1, height: 1, indices: new Uint8Array([1]) } },
				],
				{ palette }
			)
			const decoded = StiCodec.decode(encoded)

			expect(decoded.width).toBe(3)
			expect(decoded.height).toBe(2)
			expect([...decoded.data]).toEqual([
				40, 50, 60, 255, 0, 0, 0, 0, 40, 50, 60, 255, // row 0
				40, 50, 60, 255, 0, 0, 0, 0, 0, 0, 0, 0, // row 1
			])

			const frameSet = decodeSti(encoded)
			expect(frameSet.kind).toBe('frames')
		})
	})
})
