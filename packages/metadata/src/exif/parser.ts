/**
 * EXIF parser
 * Extracts EXIF metadata from JPEG/TIFF data
 */

import {
	EXIF_IFD_POINTER,
	type ExifData,
	type ExifEntry,
	ExifTags,
	ExifType,
	type ExifValue,
} from './types'

const EXIF_HEADER = 'Exif\x00\x00'

/**
 * Extract EXIF data from JPEG file
 */
export function parseExifFromJpeg(data: Uint8Array): ExifData | null {
	const segment = findExifSegment(data)
	return segment ? parseExifData(segment) : null
}

/**
 * Extract EXIF data from JPEG or raw TIFF/EXIF data
 */
export function readExif(data: Uint8Array): ExifData | null {
	if (data[0] === 0xff && data[1] === 0xd8) {
		return parseExifFromJpeg(data)
	}
	return parseExifData(data)
}

/**
 * Extract EXIF data from raw TIFF/EXIF data
 */
export function parseExifData(data: Uint8Array): ExifData | null {
	if (data.length < 8) return null

	// Check byte order (II = little endian, MM = big endian)
	const byteOrder = String.fromCharCode(data[0] ?? 0, data[1] ?? 0)
	const littleEndian = byteOrder === 'II'

	if (byteOrder !== 'II' && byteOrder !== 'MM') {
		return null
	}

	// Check TIFF marker (0x002A)
	const tiffMarker = readU16(data, 2, littleEndian)
	if (tiffMarker !== 0x002a) {
		return null
	}

	const ifd0Offset = readU32(data, 4, littleEndian)

	const raw: Record<string, ExifValue> = {}
	let exifIfdOffset = 0

	// Parse IFD0
	parseIfd(data, ifd0Offset, littleEndian, raw, (tag, value) => {
		if (tag === EXIF_IFD_POINTER && typeof value === 'number') exifIfdOffset = value
	})

	// Parse EXIF IFD
	if (exifIfdOffset > 0 && exifIfdOffset !== ifd0Offset) {
		parseIfd(data, exifIfdOffset, littleEndian, raw)
	}

	return buildExifData(raw)
}

/**
 * Walk JPEG markers up to the first APP1 segment carrying an EXIF header
 */
function findExifSegment(data: Uint8Array): Uint8Array | null {
	let offset = 2 // Skip SOI marker

	while (offset < data.length - 4) {
		if (data[offset] !== 0xff) {
			offset++
			continue
		}

		const marker = data[offset + 1] ?? 0

		// Start of scan: no metadata past this point
		if (marker === 0xda || marker === 0xd9) return null

		if (marker === 0xd8 || marker === 0xff) {
			offset += marker === 0xff ? 1 : 2
			continue
		}

		const length = readU16(data, offset + 2, false)

		// APP1 marker
		if (marker === 0xe1) {
			const segmentData = data.subarray(offset + 4, offset + 2 + length)
			const header = String.fromCharCode(...segmentData.subarray(0, 6))
			if (header === EXIF_HEADER) {
				return segmentData.subarray(6)
			}
		}

		offset += 2 + length
	}

	return null
}

function parseIfd(
	data: Uint8Array,
	offset: number,
	littleEndian: boolean,
	result: Record<string, ExifValue>,
	callback?: (tag: number, value: ExifValue) => void
): void {
	if (offset >= data.length - 2) return

	const entryCount = readU16(data, offset, littleEndian)
	let pos = offset + 2

	for (let i = 0; i < entryCount && pos + 12 <= data.length; i++) {
		const entry = parseEntry(data, pos, littleEndian)
		pos += 12

		const tagName = ExifTags[entry.tag] ?? `Tag_0x${entry.tag.toString(16).padStart(4, '0')}`
		result[tagName] = entry.value

		callback?.(entry.tag, entry.value)
	}
}

function parseEntry(data: Uint8Array, offset: number, littleEndian: boolean): ExifEntry {
	const tag = readU16(data, offset, littleEndian)
	const type = readU16(data, offset + 2, littleEndian)
	const count = readU32(data, offset + 4, littleEndian)

	const valueSize = getTypeSize(type) * count
	const valueOffset = valueSize <= 4 ? offset + 8 : readU32(data, offset + 8, littleEndian)

	const value = readValue(data, valueOffset, type, count, littleEndian)

	return { tag, type, count, value }
}

function readValue(
	data: Uint8Array,
	offset: number,
	type: number,
	count: number,
	littleEndian: boolean
): ExifValue {
	if (offset >= data.length) return null

	switch (type) {
		case ExifType.BYTE:
		case ExifType.UNDEFINED:
			if (count === 1) return data[offset] ?? null
			return data.slice(offset, offset + count)

		case ExifType.ASCII: {
			let str = ''
			for (let i = 0; i < count - 1 && offset + i < data.length; i++) {
				const char = data[offset + i] ?? 0
				if (char === 0) break
				str += String.fromCharCode(char)
			}
			return str.trim()
		}

		case ExifType.SHORT:
			return readList(count, (i) => readU16(data, offset + i * 2, littleEndian))

		case ExifType.LONG:
			return readList(count, (i) => readU32(data, offset + i * 4, littleEndian))

		case ExifType.RATIONAL:
			return readList(count, (i) => {
				const num = readU32(data, offset + i * 8, littleEndian)
				const den = readU32(data, offset + i * 8 + 4, littleEndian)
				return den === 0 ? 0 : num / den
			})

		case ExifType.SBYTE:
			return readList(count, (i) => {
				const val = data[offset + i] ?? 0
				return val > 127 ? val - 256 : val
			})

		case ExifType.SSHORT:
			return readList(count, (i) => readI16(data, offset + i * 2, littleEndian))

		case ExifType.SLONG:
			return readList(count, (i) => readI32(data, offset + i * 4, littleEndian))

		case ExifType.SRATIONAL:
			return readList(count, (i) => {
				const num = readI32(data, offset + i * 8, littleEndian)
				const den = readI32(data, offset + i * 8 + 4, littleEndian)
				return den === 0 ? 0 : num / den
			})

		default:
			return null
	}
}

/** Single values unwrap, multiple values stay a list */
function readList(count: number, read: (index: number) => number): number | number[] {
	if (count === 1) return read(0)
	const values: number[] = []
	for (let i = 0; i < count; i++) {
		values.push(read(i))
	}
	return values
}

function getTypeSize(type: number): number {
	switch (type) {
		case ExifType.SHORT:
		case ExifType.SSHORT:
			return 2
		case ExifType.LONG:
		case ExifType.SLONG:
		case ExifType.FLOAT:
			return 4
		case ExifType.RATIONAL:
		case ExifType.SRATIONAL:
		case ExifType.DOUBLE:
			return 8
		default:
			return 1
	}
}

function firstNumber(value: ExifValue | undefined): number | undefined {
	if (typeof value === 'number') return value
	if (Array.isArray(value)) return value[0]
	return undefined
}

function buildExifData(raw: Record<string, ExifValue>): ExifData {
	const exif: ExifData = { raw }

	// Camera settings
	const exposureTime = firstNumber(raw.ExposureTime)
	if (exposureTime !== undefined) exif.exposureTime = exposureTime
	// ISOSpeedRatings may list several values, the first is the sensitivity used
	const iso = firstNumber(raw.ISOSpeedRatings)
	if (iso !== undefined) exif.iso = iso

	return exif
}

// Binary reading helpers
function readU16(data: Uint8Array, offset: number, littleEndian: boolean): number {
	const b0 = data[offset] ?? 0
	const b1 = data[offset + 1] ?? 0
	return littleEndian ? b0 | (b1 << 8) : (b0 << 8) | b1
}

function readI16(data: Uint8Array, offset: number, littleEndian: boolean): number {
	const u = readU16(data, offset, littleEndian)
	return u > 0x7fff ? u - 0x10000 : u
}

function readU32(data: Uint8Array, offset: number, littleEndian: boolean): number {
	const b0 = data[offset] ?? 0
	const b1 = data[offset + 1] ?? 0
	const b2 = data[offset + 2] ?? 0
	const b3 = data[offset + 3] ?? 0
	if (littleEndian) {
		return (b0 | (b1 << 8) | (b2 << 16) | (b3 << 24)) >>> 0
	}
	return ((b0 << 24) | (b1 << 16) | (b2 << 8) | b3) >>> 0
}

function readI32(data: Uint8Array, offset: number, littleEndian: boolean): number {
	const u = readU32(data, offset, littleEndian)
	return u > 0x7fffffff ? u - 0x100000000 : u
}
