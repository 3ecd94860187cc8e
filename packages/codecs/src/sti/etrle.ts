/**
 * ETRLE: scanline run-length coding of 8-bit palette indices
 *
 * Each line is a sequence of control bytes. A control byte with the high bit set
 * stands for `control & 0x7f` zero indices; otherwise it is followed by that
 * many literal indices. A control byte of 0 ends the line.
 */

import { MalformedRunError, concatArrays } from '@stci/core'

export const END_OF_LINE = 0x00
export const COMPRESSED = 0x80
export const MAX_RUN = 0x7f

/**
 * Compress one line. Runs of two or more zeros become compressed runs; a lone
 * zero between non-zero indices stays in the literal run.
 */
export function compressLine(line: Uint8Array): Uint8Array {
	const output: number[] = []
	let pos = 0

	while (pos < line.length) {
		const rest = line.length - pos
		let control = 0
		let n = rest

		let i = 1
		for (; i < rest; i++) {
			if (line[pos + i] !== 0) continue

			if (line[pos + i - 1] !== 0) {
				// lone zero at the end gets its own compressed run
				if (i + 1 === rest) {
					n = rest - 1
					break
				}
				continue
			}

			if (i === 1) {
				// starts with a zero pair
				control = COMPRESSED
				let end = 2
				while (end < rest && line[pos + end] === 0) end++
				n = end
			} else {
				// literals up to the zero pair
				n = i - 1
			}
			break
		}

		if (i === rest && n === 1 && line[pos] === 0) {
			control = COMPRESSED
		}

		n = Math.min(n, MAX_RUN)
		output.push(control | n)
		if (control === 0) {
			for (let j = 0; j < n; j++) output.push(line[pos + j]!)
		}
		pos += n
	}

	output.push(END_OF_LINE)
	return new Uint8Array(output)
}

/**
 * Compress every row of an index plane independently
 */
export function compress(
	indices: Uint8Array,
	width: number,
	height = width === 0 ? 0 : Math.ceil(indices.length / width)
): Uint8Array {
	const rows: Uint8Array[] = []
	for (let y = 0; y < height; y++) {
		rows.push(compressLine(indices.subarray(y * width, (y + 1) * width)))
	}
	return concatArrays(rows)
}

/**
 * Decompress to a flat index buffer. When `width` is given every line must
 * decode to exactly that many indices; when `height` is given the buffer must
 * hold exactly that many lines.
 */
export function decompress(buffer: Uint8Array, width?: number, height?: number): Uint8Array {
	const output: number[] = []
	let lineStart = 0
	let lines = 0
	let pos = 0

	while (pos < buffer.length) {
		const control = buffer[pos]!

		if (control === END_OF_LINE) {
			const length = output.length - lineStart
			if (width !== undefined && length !== width) {
				throw new MalformedRunError(pos, `line ${lines} has ${length} indices, expected ${width}`)
			}
			lines++
			lineStart = output.length
			pos++
			continue
		}

		const n = control & MAX_RUN
		if (control & COMPRESSED) {
			for (let j = 0; j < n; j++) output.push(0)
			pos++
			continue
		}

		if (pos + 1 + n > buffer.length) {
			throw new MalformedRunError(
				pos,
				`literal run of ${n} needs ${n} bytes, ${buffer.length - pos - 1} left`
			)
		}
		for (let j = 1; j <= n; j++) output.push(buffer[pos + j]!)
		pos += 1 + n
	}

	if (output.length > lineStart) {
		// unterminated last line
		const length = output.length - lineStart
		if (width !== undefined && length !== width) {
			throw new MalformedRunError(pos, `line ${lines} has ${length} indices, expected ${width}`)
		}
		lines++
	}

	if (height !== undefined && lines !== height) {
		throw new MalformedRunError(pos, `found ${lines} lines, expected ${height}`)
	}

	return new Uint8Array(output)
}
