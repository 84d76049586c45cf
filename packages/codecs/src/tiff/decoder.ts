import { DecodeError, RGB_CHANNELS, type RgbImage } from '@poisson-hdr/core'
import { decompressPackBits } from './compression'
import {
	Compression,
	type IFD,
	type IFDEntry,
	PHOTOMETRIC_NAMES,
	Photometric,
	PlanarConfig,
	SampleFormat,
	TIFF_BIG_ENDIAN,
	TIFF_LITTLE_ENDIAN,
	TIFF_MAGIC,
	TYPE_SIZES,
	Tag,
	TagType,
	type TiffImage,
} from './types'

/**
 * Binary reader with endianness support
 */
class TiffReader {
	private data: Uint8Array
	private view: DataView
	littleEndian: boolean

	constructor(data: Uint8Array, littleEndian = true) {
		this.data = data
		this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
		this.littleEndian = littleEndian
	}

	readU8(offset: number): number {
		return this.view.getUint8(offset)
	}

	readU16(offset: number): number {
		return this.view.getUint16(offset, this.littleEndian)
	}

	readU32(offset: number): number {
		return this.view.getUint32(offset, this.littleEndian)
	}

	readI16(offset: number): number {
		return this.view.getInt16(offset, this.littleEndian)
	}

	readI32(offset: number): number {
		return this.view.getInt32(offset, this.littleEndian)
	}

	readF32(offset: number): number {
		return this.view.getFloat32(offset, this.littleEndian)
	}

	readF64(offset: number): number {
		return this.view.getFloat64(offset, this.littleEndian)
	}

	slice(start: number, end: number): Uint8Array {
		return this.data.slice(start, end)
	}

	get length(): number {
		return this.data.length
	}
}

/**
 * Decode the first image of a TIFF file to float RGB
 */
export function decodeTiff(data: Uint8Array): RgbImage {
	const tiff = parseTiff(data)

	const first = tiff.ifds[0]
	if (!first) {
		throw new DecodeError('No image data in TIFF')
	}

	return decodeIFD(data, first, tiff.littleEndian)
}

/**
 * Parse TIFF structure
 */
export function parseTiff(data: Uint8Array): TiffImage {
	if (data.length < 8) {
		throw new DecodeError('Invalid TIFF: file too short')
	}

	const reader = new TiffReader(data)

	const byteOrder = reader.readU16(0)
	let littleEndian: boolean

	if (byteOrder === TIFF_LITTLE_ENDIAN) {
		littleEndian = true
	} else if (byteOrder === TIFF_BIG_ENDIAN) {
		littleEndian = false
	} else {
		throw new DecodeError('Invalid TIFF byte order')
	}

	reader.littleEndian = littleEndian

	const magic = reader.readU16(2)
	if (magic !== TIFF_MAGIC) {
		throw new DecodeError(`Invalid TIFF magic number: ${magic}`)
	}

	// Follow the IFD chain, guarding against loops
	const ifds: IFD[] = []
	const visited = new Set<number>()
	let ifdOffset = reader.readU32(4)

	while (ifdOffset !== 0 && ifdOffset + 2 <= data.length && !visited.has(ifdOffset)) {
		visited.add(ifdOffset)
		const ifd = readIFD(reader, ifdOffset)
		ifds.push(ifd)
		ifdOffset = ifd.nextIFDOffset
	}

	return { littleEndian, ifds }
}

function readIFD(reader: TiffReader, offset: number): IFD {
	const numEntries = reader.readU16(offset)
	const entries = new Map<number, IFDEntry>()

	let pos = offset + 2
	for (let i = 0; i < numEntries && pos + 12 <= reader.length; i++) {
		const entry = readIFDEntry(reader, pos)
		entries.set(entry.tag, entry)
		pos += 12
	}

	const nextIFDOffset = pos + 4 <= reader.length ? reader.readU32(pos) : 0

	return { entries, nextIFDOffset }
}

function readIFDEntry(reader: TiffReader, offset: number): IFDEntry {
	const tag = reader.readU16(offset)
	const type = reader.readU16(offset + 2)
	const count = reader.readU32(offset + 4)

	const typeSize = TYPE_SIZES[type] ?? 1
	const totalSize = typeSize * count

	// Inline when the value fits in 4 bytes
	const valueOffset = totalSize <= 4 ? offset + 8 : reader.readU32(offset + 8)

	if (valueOffset + totalSize > reader.length) {
		throw new DecodeError(`Invalid TIFF: tag ${tag} points outside the file`)
	}

	const value = readValue(reader, valueOffset, type, count)

	return { tag, type, count, value }
}

function readValue(reader: TiffReader, offset: number, type: number, count: number): number | number[] | string {
	if (type === TagType.Ascii) {
		const bytes = reader.slice(offset, offset + count)
		const end = bytes.indexOf(0)
		return new TextDecoder().decode(end >= 0 ? bytes.slice(0, end) : bytes)
	}

	if (count === 1) {
		return readSingleValue(reader, offset, type)
	}

	const values: number[] = []
	const typeSize = TYPE_SIZES[type] ?? 1

	for (let i = 0; i < count; i++) {
		values.push(readSingleValue(reader, offset + i * typeSize, type))
	}

	return values
}

function readSingleValue(reader: TiffReader, offset: number, type: number): number {
	switch (type) {
		case TagType.Byte:
		case TagType.Undefined:
			return reader.readU8(offset)
		case TagType.Short:
			return reader.readU16(offset)
		case TagType.Long:
			return reader.readU32(offset)
		case TagType.SByte:
			return (reader.readU8(offset) << 24) >> 24
		case TagType.SShort:
			return reader.readI16(offset)
		case TagType.SLong:
			return reader.readI32(offset)
		case TagType.Rational: {
			const num = reader.readU32(offset)
			const den = reader.readU32(offset + 4)
			return den !== 0 ? num / den : 0
		}
		case TagType.SRational: {
			const num = reader.readI32(offset)
			const den = reader.readI32(offset + 4)
			return den !== 0 ? num / den : 0
		}
		case TagType.Float:
			return reader.readF32(offset)
		case TagType.Double:
			return reader.readF64(offset)
		default:
			return reader.readU8(offset)
	}
}

function getTag(ifd: IFD, tag: Tag, defaultValue: number): number {
	const entry = ifd.entries.get(tag)
	if (!entry) return defaultValue
	if (typeof entry.value === 'number') return entry.value
	if (Array.isArray(entry.value)) return entry.value[0] ?? defaultValue
	return defaultValue
}

function getTagArray(ifd: IFD, tag: Tag): number[] {
	const entry = ifd.entries.get(tag)
	if (!entry) return []
	if (typeof entry.value === 'number') return [entry.value]
	if (Array.isArray(entry.value)) return entry.value
	return []
}

/**
 * Sample layout after validation
 */
interface SampleLayout {
	bitsPerSample: 8 | 16 | 32
	isFloat: boolean
	planar: boolean
}

function toBitDepth(bits: number): SampleLayout['bitsPerSample'] | undefined {
	return bits === 8 || bits === 16 || bits === 32 ? bits : undefined
}

function validateLayout(ifd: IFD): SampleLayout {
	const photometric = getTag(ifd, Tag.PhotometricInterpretation, Photometric.RGB)
	if (photometric !== Photometric.RGB) {
		const name = PHOTOMETRIC_NAMES[photometric] ?? `photometric ${photometric}`
		throw new DecodeError(`Unsupported TIFF: ${name} images are not RGB`)
	}

	const samplesPerPixel = getTag(ifd, Tag.SamplesPerPixel, 1)
	if (samplesPerPixel !== RGB_CHANNELS || ifd.entries.has(Tag.ExtraSamples)) {
		throw new DecodeError(
			`Unsupported TIFF: ${samplesPerPixel} samples per pixel, expected 3 RGB samples without alpha`
		)
	}

	if (ifd.entries.has(Tag.TileWidth)) {
		throw new DecodeError('Unsupported TIFF: tiled images')
	}

	const bits = getTagArray(ifd, Tag.BitsPerSample)
	const firstBits = bits[0] ?? 8
	if (bits.some((b) => b !== firstBits)) {
		throw new DecodeError(`Unsupported TIFF: mixed bits per sample ${bits.join(',')}`)
	}

	const sampleFormat = getTag(ifd, Tag.SampleFormat, SampleFormat.Unsigned)
	const isFloat = sampleFormat === SampleFormat.Float

	if (isFloat && firstBits !== 32) {
		throw new DecodeError(`Unsupported TIFF: ${firstBits}-bit float samples`)
	}
	if (!isFloat && sampleFormat !== SampleFormat.Unsigned) {
		throw new DecodeError(`Unsupported TIFF: sample format ${sampleFormat}`)
	}

	const bitsPerSample = toBitDepth(firstBits)
	if (bitsPerSample === undefined) {
		throw new DecodeError(`Unsupported TIFF: ${firstBits} bits per sample`)
	}
	if (bitsPerSample === 32 && !isFloat) {
		throw new DecodeError('Unsupported TIFF: 32-bit integer samples')
	}

	const planar = getTag(ifd, Tag.PlanarConfiguration, PlanarConfig.Chunky) === PlanarConfig.Planar

	return { bitsPerSample, isFloat, planar }
}

/**
 * Decode an IFD to float RGB
 */
function decodeIFD(data: Uint8Array, ifd: IFD, littleEndian: boolean): RgbImage {
	const width = getTag(ifd, Tag.ImageWidth, 0)
	const height = getTag(ifd, Tag.ImageLength, 0)

	if (width <= 0 || height <= 0) {
		throw new DecodeError('Invalid TIFF dimensions')
	}

	const layout = validateLayout(ifd)
	const compression = getTag(ifd, Tag.Compression, Compression.None)
	if (compression !== Compression.None && compression !== Compression.PackBits) {
		throw new DecodeError(`Unsupported TIFF compression: ${compression}`)
	}

	const rowsPerStrip = Math.min(getTag(ifd, Tag.RowsPerStrip, height), height)
	const stripOffsets = getTagArray(ifd, Tag.StripOffsets)
	const stripByteCounts = getTagArray(ifd, Tag.StripByteCounts)

	const bytesPerSample = layout.bitsPerSample / 8
	// Planar files hold one strip set per channel
	const samplesPerStripRow = layout.planar ? width : width * RGB_CHANNELS
	const stripsPerPlane = Math.ceil(height / rowsPerStrip)
	const planes = layout.planar ? RGB_CHANNELS : 1

	if (stripOffsets.length < stripsPerPlane * planes || stripByteCounts.length < stripOffsets.length) {
		throw new DecodeError('Invalid TIFF: missing strip offsets')
	}

	const raw = new Uint8Array(width * height * RGB_CHANNELS * bytesPerSample)
	let rawOffset = 0

	for (let stripIdx = 0; stripIdx < stripsPerPlane * planes; stripIdx++) {
		const offset = stripOffsets[stripIdx] ?? 0
		const byteCount = stripByteCounts[stripIdx] ?? 0
		if (offset + byteCount > data.length) {
			throw new DecodeError(`Invalid TIFF: strip ${stripIdx} is truncated`)
		}

		const stripInPlane = stripIdx % stripsPerPlane
		const stripRows = Math.min(rowsPerStrip, height - stripInPlane * rowsPerStrip)
		const expectedSize = samplesPerStripRow * stripRows * bytesPerSample
		const stripData = data.subarray(offset, offset + byteCount)

		const decompressed =
			compression === Compression.PackBits ? decompressPackBits(stripData, expectedSize) : stripData

		if (decompressed.length < expectedSize) {
			throw new DecodeError(`Invalid TIFF: strip ${stripIdx} holds ${decompressed.length} bytes, expected ${expectedSize}`)
		}

		raw.set(decompressed.subarray(0, expectedSize), rawOffset)
		rawOffset += expectedSize
	}

	return { width, height, data: toFloatRgb(raw, width, height, layout, littleEndian) }
}

/**
 * Convert raw samples to interleaved float RGB
 * Integer samples are normalised to [0, 1], float samples are kept
 */
function toFloatRgb(raw: Uint8Array, width: number, height: number, layout: SampleLayout, littleEndian: boolean): Float32Array {
	const view = new DataView(raw.buffer, raw.byteOffset, raw.byteLength)
	const bytesPerSample = layout.bitsPerSample / 8
	const pixelCount = width * height
	const output = new Float32Array(pixelCount * RGB_CHANNELS)

	const readSample = (index: number): number => {
		const byteOffset = index * bytesPerSample
		switch (layout.bitsPerSample) {
			case 8:
				return view.getUint8(byteOffset) / 255
			case 16:
				return view.getUint16(byteOffset, littleEndian) / 65535
			case 32:
				return view.getFloat32(byteOffset, littleEndian)
		}
	}

	for (let p = 0; p < pixelCount; p++) {
		for (let c = 0; c < RGB_CHANNELS; c++) {
			const sampleIndex = layout.planar ? c * pixelCount + p : p * RGB_CHANNELS + c
			output[p * RGB_CHANNELS + c] = readSample(sampleIndex)
		}
	}

	return output
}
