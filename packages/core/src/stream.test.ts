import { describe, expect, test } from 'vitest'
import { CodecError, TruncatedInputError } from './errors'
import { StreamDecoder, StreamEncoder, drain, feed } from './stream'

describe('StreamDecoder', () => {
	const sum = (data: Uint8Array) => data.reduce((acc, byte) => acc + byte, 0)

	test('asks for more input until the target is reached', () => {
		const decoder = new StreamDecoder(5, sum)

		expect(decoder.push(new Uint8Array([1, 2]))).toEqual({ status: 'more', consumed: 2 })
		expect(decoder.remaining).toBe(3)
		expect(decoder.push(new Uint8Array([3, 4, 5, 6, 7]))).toEqual({
			status: 'done',
			consumed: 3,
			result: 15,
		})
		expect(decoder.done).toBe(true)
	})

	test('size hint limits how much of the chunk is consumed', () => {
		const decoder = new StreamDecoder(4, sum)

		expect(decoder.push(new Uint8Array([1, 2, 3, 4]), 1)).toEqual({ status: 'more', consumed: 1 })
		expect(decoder.push(new Uint8Array([10, 10, 10]))).toEqual({ status: 'done', consumed: 3, result: 31 })
	})

	test('decodes exactly once', () => {
		let calls = 0
		const decoder = new StreamDecoder(2, (data) => {
			calls++
			return data.length
		})

		decoder.push(new Uint8Array([1]))
		decoder.push(new Uint8Array([2]))
		expect(calls).toBe(1)
		expect(() => decoder.push(new Uint8Array([3]))).toThrow(CodecError)
	})

	test('zero target completes on the first push', () => {
		const decoder = new StreamDecoder(0, (data) => data.length)
		expect(decoder.push(new Uint8Array(0))).toEqual({ status: 'done', consumed: 0, result: 0 })
	})

	test('end() before the target throws TruncatedInputError', () => {
		const decoder = new StreamDecoder(4, sum, 'pixels')
		decoder.push(new Uint8Array([1]))

		expect(() => decoder.end()).toThrow(TruncatedInputError)
		expect(() => decoder.end()).toThrow('Truncated pixels at offset 1: need 4 bytes, got 1')
	})

	test('a huge target only costs the bytes pushed', () => {
		const decoder = new StreamDecoder(2 ** 40, sum)

		expect(decoder.push(new Uint8Array([1, 2, 3]))).toEqual({ status: 'more', consumed: 3 })
		expect(() => decoder.end()).toThrow('Truncated stream at offset 3: need 1099511627776 bytes, got 3')
	})

	test('buffer growth keeps earlier bytes', () => {
		const decoder = new StreamDecoder(7, (data) => [...data])

		decoder.push(new Uint8Array([1]))
		decoder.push(new Uint8Array([2, 3]))
		expect(decoder.push(new Uint8Array([4, 5, 6, 7, 8]))).toEqual({
			status: 'done',
			consumed: 4,
			result: [1, 2, 3, 4, 5, 6, 7],
		})
	})
})

describe('StreamEncoder', () => {
	// Three "rows" of 3, 1 and 4 bytes
	const rows = [new Uint8Array([1, 2, 3]), new Uint8Array([4]), new Uint8Array([5, 6, 7, 8])]
	const createEncoder = () => new StreamEncoder(rows.length, (y) => rows[y]!)

	test('hands out at most maxBytes per step', () => {
		const encoder = createEncoder()

		const first = encoder.pull(2)
		expect([...first.bytes]).toEqual([1, 2])
		expect(first.status).toBe('more')

		const second = encoder.pull(2)
		expect([...second.bytes]).toEqual([3, 4])

		const third = encoder.pull(2)
		expect([...third.bytes]).toEqual([5, 6])
		expect(third.status).toBe('more')

		const last = encoder.pull(2)
		expect([...last.bytes]).toEqual([7, 8])
		expect(last.status).toBe('done')
	})

	test('only encodes whole units and only when needed', () => {
		const encoder = createEncoder()

		encoder.pull(2)
		expect(encoder.position).toBe(1)

		encoder.pull(2)
		expect(encoder.position).toBe(2)
	})

	test('returns everything in one step when the budget allows', () => {
		const encoder = createEncoder()
		const step = encoder.pull(100)

		expect([...step.bytes]).toEqual([1, 2, 3, 4, 5, 6, 7, 8])
		expect(step.status).toBe('done')
	})

	test('empty input is done immediately', () => {
		const step = new StreamEncoder(0, () => new Uint8Array(1)).pull(10)
		expect(step.bytes.length).toBe(0)
		expect(step.status).toBe('done')
	})

	test('rejects a non-positive budget', () => {
		expect(() => createEncoder().pull(0)).toThrow(CodecError)
	})
})

describe('feed / drain', () => {
	test('output is identical for every chunk size', () => {
		const expected = [1, 2, 3, 4, 5, 6, 7, 8]
		const rows = [new Uint8Array([1, 2, 3]), new Uint8Array([4]), new Uint8Array([5, 6, 7, 8])]

		for (let chunkSize = 1; chunkSize <= 9; chunkSize++) {
			const encoded = drain(new StreamEncoder(rows.length, (y) => rows[y]!), chunkSize)
			expect([...encoded]).toEqual(expected)

			const decoded = feed(new StreamDecoder(8, (data) => [...data]), encoded, chunkSize)
			expect(decoded).toEqual(expected)
		}
	})

	test('feed throws when the data runs out', () => {
		expect(() => feed(new StreamDecoder(8, (data) => data), new Uint8Array(5), 2)).toThrow(
			TruncatedInputError
		)
	})

	test('feed rejects a non-positive chunk size', () => {
		const decoder = new StreamDecoder(2, (data) => data)
		expect(() => feed(decoder, new Uint8Array(2), 0)).toThrow('Invalid input budget: 0')
	})
})
