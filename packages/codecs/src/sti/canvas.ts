import { type ImageData, type IndexedImage, createImageData } from '@stci/core'
import type { Box, FrameSetSti, Palette, StiImage } from './types'

export interface Canvas {
	width: number
	height: number
	boxes: Box[]
}

/**
 * Lay frames out left to right with a one-pixel transparent column between
 * them. The canvas is as tall as the tallest frame.
 */
export function composeFrames(frames: readonly { width: number; height: number }[]): Canvas {
	const boxes: Box[] = []
	let width = 0
	let height = 0

	for (const frame of frames) {
		if (width > 0) width += 1
		boxes.push({ x: width, y: 0, width: frame.width, height: frame.height })
		width += frame.width
		height = Math.max(height, frame.height)
	}

	return { width, height, boxes }
}

/**
 * Expand palette indices to RGBA. The transparent index gets alpha 0.
 */
export function indexedToImageData(
	image: IndexedImage,
	palette: Palette,
	transparentIndex: number | null = 0
): ImageData {
	const output = createImageData(image.width, image.height)
	drawIndexed(output, image, palette, transparentIndex, 0, 0)
	return output
}

/**
 * Render every frame onto the composed canvas. Uncovered pixels are transparent.
 */
export function frameSetToImageData(frameSet: FrameSetSti): ImageData {
	const output = createImageData(frameSet.width, frameSet.height)
	for (const frame of frameSet.frames) {
		drawIndexed(output, frame.image, frameSet.palette, 0, frame.box.x, frame.box.y)
	}
	return output
}

/**
 * Flatten any decoded variant to RGBA
 */
export function stiToImageData(sti: StiImage): ImageData {
	switch (sti.kind) {
		case 'truecolor':
			return sti.image
		case 'indexed': {
			const transparent = sti.header.transparentColor
			return indexedToImageData(sti.image, sti.palette, transparent < 256 ? transparent : null)
		}
		case 'frames':
			return frameSetToImageData(sti)
	}
}

function drawIndexed(
	output: ImageData,
	image: IndexedImage,
	palette: Palette,
	transparentIndex: number | null,
	left: number,
	top: number
): void {
	for (let y = 0; y < image.height; y++) {
		for (let x = 0; x < image.width; x++) {
			const index = image.indices[y * image.width + x]!
			const dst = ((top + y) * output.width + left + x) * 4
			output.data[dst] = palette[index * 3] ?? 0
			output.data[dst + 1] = palette[index * 3 + 1] ?? 0
			output.data[dst + 2] = palette[index * 3 + 2] ?? 0
			output.data[dst + 3] = index === transparentIndex ? 0 : 255
		}
	}
}
