import { FormatMismatchError, matchMagic } from '@stci/core'
import type { ColorSpec } from '@stci/color'
import {
	AUX_OBJECT_DATA,
	type AuxObjectData,
	INDEXED_HEADER,
	type IndexedHeader,
	STI_HEADER,
	STI_MAGIC,
	type StiHeader,
	SUB_IMAGE_HEADER,
	type SubImageHeader,
	TRUECOLOR_HEADER,
	type TrueColorHeader,
} from './types'

/**
 * Check for the STCI identifier
 */
export function hasStiMagic(data: Uint8Array): boolean {
	return matchMagic(data, { bytes: [...STI_MAGIC] })
}

/**
 * Read the 64-byte outer header
 */
export function readStiHeader(data: Uint8Array): StiHeader {
	if (data.length >= STI_MAGIC.length && !hasStiMagic(data)) {
		throw new FormatMismatchError('Invalid STCI signature')
	}

	const value = STI_HEADER.decode(data)

	return {
		initialSize: value.int('initialSize'),
		compressedSize: value.int('compressedSize'),
		transparentColor: value.int('transparentColor'),
		flags: {
			auxObjectData: value.flag('flags', 'AUX_OBJECT_DATA'),
			rgb: value.flag('flags', 'RGB'),
			indexed: value.flag('flags', 'INDEXED'),
			zlib: value.flag('flags', 'ZLIB'),
			etrle: value.flag('flags', 'ETRLE'),
		},
		height: value.int('height'),
		width: value.int('width'),
		formatHeader: value.bytes('formatHeader'),
		colorDepth: value.int('colorDepth'),
		auxDataSize: value.int('auxDataSize'),
	}
}

/**
 * Write the 64-byte outer header
 */
export function writeStiHeader(header: StiHeader): Uint8Array {
	const { flags } = header
	return STI_HEADER.create({
		id: STI_MAGIC,
		initialSize: header.initialSize,
		compressedSize: header.compressedSize,
		transparentColor: header.transparentColor,
		height: header.height,
		width: header.width,
		formatHeader: header.formatHeader,
		colorDepth: header.colorDepth,
		auxDataSize: header.auxDataSize,
	})
		.withFlag('flags', 'AUX_OBJECT_DATA', flags.auxObjectData)
		.withFlag('flags', 'RGB', flags.rgb)
		.withFlag('flags', 'INDEXED', flags.indexed)
		.withFlag('flags', 'ZLIB', flags.zlib)
		.withFlag('flags', 'ETRLE', flags.etrle)
		.toBytes()
}

export function readTrueColorHeader(data: Uint8Array): TrueColorHeader {
	const value = TRUECOLOR_HEADER.decode(data)
	return {
		redMask: value.int('redMask'),
		greenMask: value.int('greenMask'),
		blueMask: value.int('blueMask'),
		alphaMask: value.int('alphaMask'),
		redDepth: value.int('redDepth'),
		greenDepth: value.int('greenDepth'),
		blueDepth: value.int('blueDepth'),
		alphaDepth: value.int('alphaDepth'),
	}
}

export function writeTrueColorHeader(header: TrueColorHeader): Uint8Array {
	return TRUECOLOR_HEADER.encode({ ...header })
}

/**
 * Color spec described by a truecolor header and the outer color depth
 */
export function specFromHeader(header: TrueColorHeader, colorDepth: number): ColorSpec {
	return {
		masks: [header.redMask, header.greenMask, header.blueMask, header.alphaMask],
		depths: [header.redDepth, header.greenDepth, header.blueDepth, header.alphaDepth],
		colorDepth,
	}
}

export function headerFromSpec(spec: ColorSpec): TrueColorHeader {
	const [redMask, greenMask, blueMask, alphaMask] = spec.masks
	const [redDepth, greenDepth, blueDepth, alphaDepth] = spec.depths
	return { redMask, greenMask, blueMask, alphaMask, redDepth, greenDepth, blueDepth, alphaDepth }
}

export function readIndexedHeader(data: Uint8Array): IndexedHeader {
	const value = INDEXED_HEADER.decode(data)
	return {
		paletteColorCount: value.int('paletteColorCount'),
		imageCount: value.int('imageCount'),
		redDepth: value.int('redDepth'),
		greenDepth: value.int('greenDepth'),
		blueDepth: value.int('blueDepth'),
	}
}

export function writeIndexedHeader(header: IndexedHeader): Uint8Array {
	return INDEXED_HEADER.encode({ ...header })
}

export function readSubImageHeader(data: Uint8Array, offset: number): SubImageHeader {
	const value = SUB_IMAGE_HEADER.decode(data, offset)
	return {
		offset: value.int('offset'),
		length: value.int('length'),
		offsetX: value.int('offsetX'),
		offsetY: value.int('offsetY'),
		height: value.int('height'),
		width: value.int('width'),
	}
}

export function writeSubImageHeader(header: SubImageHeader): Uint8Array {
	return SUB_IMAGE_HEADER.encode({ ...header })
}

export function readAuxObjectData(data: Uint8Array, offset: number): AuxObjectData {
	const value = AUX_OBJECT_DATA.decode(data, offset)
	return {
		wallOrientation: value.int('wallOrientation'),
		tileCount: value.int('tileCount'),
		tileLocationIndex: value.int('tileLocationIndex'),
		currentFrame: value.int('currentFrame'),
		frameCount: value.int('frameCount'),
		flags: {
			fullTile: value.flag('flags', 'FULL_TILE'),
			animatedTile: value.flag('flags', 'ANIMATED_TILE'),
			dynamicTile: value.flag('flags', 'DYNAMIC_TILE'),
			interactiveTile: value.flag('flags', 'INTERACTIVE_TILE'),
			ignoresHeight: value.flag('flags', 'IGNORES_HEIGHT'),
			usesLandZ: value.flag('flags', 'USES_LAND_Z'),
		},
	}
}

/**
 * Write a tile metadata record; null writes all zeros
 */
export function writeAuxObjectData(aux: AuxObjectData | null): Uint8Array {
	if (aux === null) return AUX_OBJECT_DATA.encode({})

	const { flags } = aux
	return AUX_OBJECT_DATA.create({
		wallOrientation: aux.wallOrientation,
		tileCount: aux.tileCount,
		tileLocationIndex: aux.tileLocationIndex,
		currentFrame: aux.currentFrame,
		frameCount: aux.frameCount,
	})
		.withFlag('flags', 'FULL_TILE', flags.fullTile)
		.withFlag('flags', 'ANIMATED_TILE', flags.animatedTile)
		.withFlag('flags', 'DYNAMIC_TILE', flags.dynamicTile)
		.withFlag('flags', 'INTERACTIVE_TILE', flags.interactiveTile)
		.withFlag('flags', 'IGNORES_HEIGHT', flags.ignoresHeight)
		.withFlag('flags', 'USES_LAND_Z', flags.usesLandZ)
		.toBytes()
}
