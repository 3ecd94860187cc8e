/**
 * STCI format types and constants
 */

import { type ImageData, type IndexedImage, StructLayout } from '@stci/core'
import type { ColorSpec } from '@stci/color'

// "STCI"
export const STI_MAGIC = new Uint8Array([0x53, 0x54, 0x43, 0x49])

export const PALETTE_COLORS = 256
export const PALETTE_SIZE = PALETTE_COLORS * 3
export const INDEXED_COLOR_DEPTH = 8

/**
 * Outer header (64 bytes)
 */
export const STI_HEADER = new StructLayout(
	'StiHeader',
	[
		{ name: 'id', type: 'bytes', size: 4 },
		{ name: 'initialSize', type: 'u32' },
		{ name: 'compressedSize', type: 'u32' },
		{ name: 'transparentColor', type: 'u32' },
		{ name: 'flags', type: 'u32' },
		{ name: 'height', type: 'u16' },
		{ name: 'width', type: 'u16' },
		{ name: 'formatHeader', type: 'bytes', size: 20 },
		{ name: 'colorDepth', type: 'u8' },
		{ type: 'pad', size: 3 },
		{ name: 'auxDataSize', type: 'u32' },
		{ type: 'pad', size: 12 },
	],
	{
		flags: { AUX_OBJECT_DATA: 0, RGB: 2, INDEXED: 3, ZLIB: 4, ETRLE: 5 },
	}
)

/**
 * Truecolor format header (20 bytes)
 */
export const TRUECOLOR_HEADER = new StructLayout('TrueColorHeader', [
	{ name: 'redMask', type: 'u32' },
	{ name: 'greenMask', type: 'u32' },
	{ name: 'blueMask', type: 'u32' },
	{ name: 'alphaMask', type: 'u32' },
	{ name: 'redDepth', type: 'u8' },
	{ name: 'greenDepth', type: 'u8' },
	{ name: 'blueDepth', type: 'u8' },
	{ name: 'alphaDepth', type: 'u8' },
])

/**
 * Indexed format header (20 bytes)
 */
export const INDEXED_HEADER = new StructLayout('IndexedHeader', [
	{ name: 'paletteColorCount', type: 'u32' },
	{ name: 'imageCount', type: 'u16' },
	{ name: 'redDepth', type: 'u8' },
	{ name: 'greenDepth', type: 'u8' },
	{ name: 'blueDepth', type: 'u8' },
	{ type: 'pad', size: 11 },
])

/**
 * Sub-image header (16 bytes), one per ETRLE frame
 */
export const SUB_IMAGE_HEADER = new StructLayout('SubImageHeader', [
	{ name: 'offset', type: 'u32' },
	{ name: 'length', type: 'u32' },
	{ name: 'offsetX', type: 'u16' },
	{ name: 'offsetY', type: 'u16' },
	{ name: 'height', type: 'u16' },
	{ name: 'width', type: 'u16' },
])

/**
 * Tile metadata record (16 bytes), one per ETRLE frame
 */
export const AUX_OBJECT_DATA = new StructLayout(
	'AuxObjectData',
	[
		{ name: 'wallOrientation', type: 'u8' },
		{ name: 'tileCount', type: 'u8' },
		{ name: 'tileLocationIndex', type: 'u16' },
		{ type: 'pad', size: 3 },
		{ name: 'currentFrame', type: 'u8' },
		{ name: 'frameCount', type: 'u8' },
		{ name: 'flags', type: 'u8' },
		{ type: 'pad', size: 6 },
	],
	{
		flags: {
			FULL_TILE: 0,
			ANIMATED_TILE: 1,
			DYNAMIC_TILE: 2,
			INTERACTIVE_TILE: 3,
			IGNORES_HEIGHT: 4,
			USES_LAND_Z: 5,
		},
	}
)

export interface StiFlags {
	auxObjectData: boolean
	rgb: boolean
	indexed: boolean
	zlib: boolean
	etrle: boolean
}

/**
 * Decoded outer header
 */
export interface StiHeader {
	initialSize: number
	compressedSize: number
	transparentColor: number
	flags: StiFlags
	height: number
	width: number
	formatHeader: Uint8Array // 20 bytes, TrueColorHeader or IndexedHeader
	colorDepth: number
	auxDataSize: number
}

export interface TrueColorHeader {
	redMask: number
	greenMask: number
	blueMask: number
	alphaMask: number
	redDepth: number
	greenDepth: number
	blueDepth: number
	alphaDepth: number
}

export interface IndexedHeader {
	paletteColorCount: number
	imageCount: number
	redDepth: number
	greenDepth: number
	blueDepth: number
}

export interface SubImageHeader {
	offset: number // relative to the start of the compressed block
	length: number
	offsetX: number
	offsetY: number
	height: number
	width: number
}

export interface TileFlags {
	fullTile: boolean
	animatedTile: boolean
	dynamicTile: boolean
	interactiveTile: boolean
	ignoresHeight: boolean
	usesLandZ: boolean
}

/**
 * Per-frame tile metadata
 */
export interface AuxObjectData {
	wallOrientation: number
	tileCount: number
	tileLocationIndex: number
	currentFrame: number
	frameCount: number
	flags: TileFlags
}

/**
 * Palette as interleaved RGB triples (768 bytes)
 */
export type Palette = Uint8Array

/**
 * Placement of a frame on the composed canvas
 */
export interface Box {
	x: number
	y: number
	width: number
	height: number
}

/**
 * One ETRLE sub-image
 */
export interface StiFrame {
	header: SubImageHeader
	box: Box
	image: IndexedImage
	aux: AuxObjectData | null
}

export interface TrueColorSti {
	kind: 'truecolor'
	header: StiHeader
	format: TrueColorHeader
	spec: ColorSpec
	mode: 'RGB' | 'RGBA'
	image: ImageData
}

export interface IndexedSti {
	kind: 'indexed'
	header: StiHeader
	format: IndexedHeader
	palette: Palette
	image: IndexedImage
}

export interface FrameSetSti {
	kind: 'frames'
	header: StiHeader
	format: IndexedHeader
	palette: Palette
	width: number
	height: number
	/** Composed canvas size differs from the size in the header */
	canvasResized: boolean
	frames: StiFrame[]
}

export type StiImage = TrueColorSti | IndexedSti | FrameSetSti

export interface DecodeOptions {
	/** Bytes fed to the payload decoder per step (default 16384) */
	chunkSize?: number
}

/**
 * Frame to save in an ETRLE file
 */
export interface FrameInput {
	image: IndexedImage
	offsetX?: number
	offsetY?: number
	aux?: AuxObjectData | null
}
