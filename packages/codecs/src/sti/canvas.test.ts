import { describe, expect, test } from 'vitest'
import { composeFrames, indexedToImageData } from './canvas'

describe('STCI canvas', () => {
	describe('composeFrames', () => {
		test('lays frames out left to right with a one-pixel gap', () => {
			const canvas = composeFrames([
				{ width: 2, height: 3 },
				{ width: 4, height: 1 },
				{ width: 1, height: 5 },
			])

			expect(canvas.width).toBe(2 + 1 + 4 + 1 + 1)
			expect(canvas.height).toBe(5)
			expect(canvas.boxes).toEqual([
				{ x: 0, y: 0, width: 2, height: 3 },
				{ x: 3, y: 0, width: 4, height: 1 },
				{ x: 8, y: 0, width: 1, height: 5 },
			])
		})

		test('a single frame fills the canvas', () => {
			expect(composeFrames([{ width: 7, height: 2 }])).toEqual({
				width: 7,
				height: 2,
				boxes: [{ x: 0, y: 0, width: 7, height: 2 }],
			})
		})
	})

	describe('indexedToImageData', () => {
		const palette = new Uint8Array(768)
		palette.set([9, 8, 7, 10, 20, 30], 0)

		test('expands indices and makes the transparent index clear', () => {
			const image = indexedToImageData({ width: 2, height: 1, indices: new Uint8Array([0, 1]) }, palette)
			expect([...image.data]).toEqual([9, 8, 7, 0, 10, 20, 30, 255])
		})

		test('without a transparent index every pixel is opaque', () => {
			const image = indexedToImageData({ width: 2, height: 1, indices: new Uint8Array([0, 1]) }, palette, null)
			expect([...image.data]).toEqual([9, 8, 7, 255, 10, 20, 30, 255])
		})
	})
})
