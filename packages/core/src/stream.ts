import { CodecError, TruncatedInputError } from './errors'

/**
 * Resumable, bounded-buffer encode/decode state machines.
 *
 * Nothing here runs on its own: every bit of progress happens inside a `push` or
 * `pull` call, so the caller picks the I/O strategy and the per-step budget.
 */

export const DEFAULT_CHUNK_SIZE = 16384

export type DecodeStep<T> =
	| { readonly status: 'more'; readonly consumed: number }
	| { readonly status: 'done'; readonly consumed: number; readonly result: T }

export interface EncodeStep {
	readonly status: 'more' | 'done'
	readonly bytes: Uint8Array
}

/**
 * Accumulates exactly `target` bytes, then decodes them in one go. The buffer
 * grows with the input, so a declared size never allocates ahead of the data.
 */
export class StreamDecoder<T> {
	private buffer: Uint8Array = new Uint8Array(0)
	private filled = 0
	private finished = false

	constructor(
		readonly target: number,
		private readonly decode: (data: Uint8Array) => T,
		private readonly what = 'stream'
	) {
		if (!Number.isInteger(target) || target < 0) {
			throw new CodecError(`Invalid target byte count: ${target}`)
		}
	}

	get remaining(): number {
		return this.target - this.filled
	}

	get done(): boolean {
		return this.finished
	}

	/**
	 * Consume up to `sizeHint` bytes of `chunk`
	 */
	push(chunk: Uint8Array, sizeHint = chunk.length): DecodeStep<T> {
		if (this.finished) {
			throw new CodecError(`${this.what}: decoder already finished`)
		}

		const consumed = Math.max(0, Math.min(sizeHint, chunk.length, this.remaining))
		this.reserve(this.filled + consumed)
		this.buffer.set(chunk.subarray(0, consumed), this.filled)
		this.filled += consumed

		if (this.filled < this.target) {
			return { status: 'more', consumed }
		}

		this.finished = true
		return { status: 'done', consumed, result: this.decode(this.buffer) }
	}

	private reserve(size: number): void {
		if (size <= this.buffer.length) return

		const grown = new Uint8Array(Math.min(this.target, Math.max(size, this.buffer.length * 2)))
		grown.set(this.buffer.subarray(0, this.filled))
		this.buffer = grown
	}

	/**
	 * Signal end of input; fails unless the target was reached
	 */
	end(): void {
		if (!this.finished) {
			throw new TruncatedInputError(this.what, this.filled, this.target, this.filled)
		}
	}
}

/**
 * Produces output unit by unit (a row or a pixel), handing it out in slices of
 * at most `maxBytes`. A unit's bytes are always produced together.
 */
export class StreamEncoder {
	private pending: Uint8Array = new Uint8Array(0)
	private cursor = 0

	constructor(
		readonly units: number,
		private readonly encodeUnit: (index: number) => Uint8Array
	) {}

	get position(): number {
		return this.cursor
	}

	get done(): boolean {
		return this.cursor >= this.units && this.pending.length === 0
	}

	pull(maxBytes: number): EncodeStep {
		if (!Number.isInteger(maxBytes) || maxBytes < 1) {
			throw new CodecError(`Invalid output budget: ${maxBytes}`)
		}

		const produced: Uint8Array[] = [this.pending]
		let size = this.pending.length
		while (size < maxBytes && this.cursor < this.units) {
			const bytes = this.encodeUnit(this.cursor++)
			produced.push(bytes)
			size += bytes.length
		}

		const all = produced.length === 1 ? this.pending : concatArrays(produced, size)
		const bytes = all.slice(0, maxBytes)
		this.pending = all.slice(bytes.length)

		return { status: this.done ? 'done' : 'more', bytes }
	}
}

/**
 * Push `data` through a decoder in `chunkSize` steps
 */
export function feed<T>(decoder: StreamDecoder<T>, data: Uint8Array, chunkSize = DEFAULT_CHUNK_SIZE): T {
	if (!Number.isInteger(chunkSize) || chunkSize < 1) {
		throw new CodecError(`Invalid input budget: ${chunkSize}`)
	}

	let offset = 0
	for (;;) {
		const step = decoder.push(data.subarray(offset, offset + chunkSize))
		offset += step.consumed
		if (step.status === 'done') return step.result
		if (step.consumed === 0) break
	}
	decoder.end()
	throw new CodecError('unreachable: decoder ended without result')
}

/**
 * Pull every byte out of an encoder in `chunkSize` steps
 */
export function drain(encoder: StreamEncoder, chunkSize = DEFAULT_CHUNK_SIZE): Uint8Array {
	const chunks: Uint8Array[] = []
	let size = 0
	for (;;) {
		const step = encoder.pull(chunkSize)
		chunks.push(step.bytes)
		size += step.bytes.length
		if (step.status === 'done') break
	}
	return concatArrays(chunks, size)
}

/**
 * Concatenate arrays
 */
export function concatArrays(arrays: readonly Uint8Array[], totalLength?: number): Uint8Array {
	const result = new Uint8Array(totalLength ?? arrays.reduce((sum, arr) => sum + arr.length, 0))
	let offset = 0

	for (const arr of arrays) {
		result.set(arr, offset)
		offset += arr.length
	}

	return result
}
