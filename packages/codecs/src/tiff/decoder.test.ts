import { DecodeError } from '@poisson-hdr/core'
import { describe, expect, test } from 'vitest'
import { decompressPackBits } from './compression'
import { decodeTiff, parseTiff } from './decoder'
import { Compression, Photometric, PlanarConfig, SampleFormat, Tag, TagType } from './types'

interface EntrySpec {
	tag: number
	type: TagType.Short | TagType.Long
	values: number[]
}

/**
 * Minimal TIFF writer: header, pixel data at offset 8, then IFD0
 */
function buildTiff(entries: EntrySpec[], pixelData: Uint8Array, littleEndian = true): Uint8Array {
	const sorted = [...entries].sort((a, b) => a.tag - b.tag)
	const ifdOffset = 8 + pixelData.length + (pixelData.length % 2)
	const ifdSize = 2 + sorted.length * 12 + 4

	let overflowOffset = ifdOffset + ifdSize
	let overflowSize = 0
	for (const entry of sorted) {
		const size = entry.values.length * (entry.type === TagType.Short ? 2 : 4)
		if (size > 4) overflowSize += size
	}

	const out = new Uint8Array(overflowOffset + overflowSize)
	const view = new DataView(out.buffer)
	out[0] = out[1] = littleEndian ? 0x49 : 0x4d
	view.setUint16(2, 42, littleEndian)
	view.setUint32(4, ifdOffset, littleEndian)
	out.set(pixelData, 8)

	view.setUint16(ifdOffset, sorted.length, littleEndian)
	let pos = ifdOffset + 2

	const writeValues = (at: number, entry: EntrySpec) => {
		entry.values.forEach((v, i) => {
			if (entry.type === TagType.Short) view.setUint16(at + i * 2, v, littleEndian)
			else view.setUint32(at + i * 4, v, littleEndian)
		})
	}

	for (const entry of sorted) {
		view.setUint16(pos, entry.tag, littleEndian)
		view.setUint16(pos + 2, entry.type, littleEndian)
		view.setUint32(pos + 4, entry.values.length, littleEndian)

		const size = entry.values.length * (entry.type === TagType.Short ? 2 : 4)
		if (size <= 4) {
			writeValues(pos + 8, entry)
		} else {
			view.setUint32(pos + 8, overflowOffset, littleEndian)
			writeValues(overflowOffset, entry)
			overflowOffset += size
		}
		pos += 12
	}

	view.setUint32(pos, 0, littleEndian)
	return out
}

interface RgbTiffOptions {
	bits?: number
	sampleFormat?: SampleFormat
	samplesPerPixel?: number
	photometric?: Photometric
	compression?: Compression
	planar?: boolean
	stripByteCounts?: number[]
	rowsPerStrip?: number
	extra?: EntrySpec[]
}

function rgbTiff(width: number, height: number, pixels: Uint8Array, options: RgbTiffOptions = {}, littleEndian = true) {
	const samplesPerPixel = options.samplesPerPixel ?? 3
	const counts = options.stripByteCounts ?? [pixels.length]
	const offsets: number[] = []
	let offset = 8
	for (const count of counts) {
		offsets.push(offset)
		offset += count
	}

	const entries: EntrySpec[] = [
		{ tag: Tag.ImageWidth, type: TagType.Long, values: [width] },
		{ tag: Tag.ImageLength, type: TagType.Long, values: [height] },
		{ tag: Tag.BitsPerSample, type: TagType.Short, values: Array<number>(samplesPerPixel).fill(options.bits ?? 8) },
		{ tag: Tag.Compression, type: TagType.Short, values: [options.compression ?? Compression.None] },
		{ tag: Tag.PhotometricInterpretation, type: TagType.Short, values: [options.photometric ?? Photometric.RGB] },
		{ tag: Tag.StripOffsets, type: TagType.Long, values: offsets },
		{ tag: Tag.SamplesPerPixel, type: TagType.Short, values: [samplesPerPixel] },
		{ tag: Tag.RowsPerStrip, type: TagType.Long, values: [options.rowsPerStrip ?? height] },
		{ tag: Tag.StripByteCounts, type: TagType.Long, values: counts },
		{
			tag: Tag.PlanarConfiguration,
			type: TagType.Short,
			values: [options.planar ? PlanarConfig.Planar : PlanarConfig.Chunky],
		},
		...(options.extra ?? []),
	]
	if (options.sampleFormat !== undefined) {
		entries.push({ tag: Tag.SampleFormat, type: TagType.Short, values: Array<number>(samplesPerPixel).fill(options.sampleFormat) })
	}
	return buildTiff(entries, pixels, littleEndian)
}

describe('PackBits Compression', () => {
	test('expands runs and literals', () => {
		// literal [1, 2], run of four 9s
		const packed = new Uint8Array([1, 1, 2, 253, 9])
		expect(Array.from(decompressPackBits(packed, 6))).toEqual([1, 2, 9, 9, 9, 9])
	})

	test('treats 128 as a no-op', () => {
		const packed = new Uint8Array([128, 0, 7])
		expect(Array.from(decompressPackBits(packed, 1))).toEqual([7])
	})

	test('returns only the bytes produced', () => {
		expect(Array.from(decompressPackBits(new Uint8Array([1, 4, 5]), 6))).toEqual([4, 5])
	})
})

describe('TIFF Decoder', () => {
	test('decodes 8-bit chunky RGB', () => {
		const tiff = rgbTiff(2, 1, new Uint8Array([255, 0, 0, 0, 255, 255]))
		const decoded = decodeTiff(tiff)

		expect(decoded.width).toBe(2)
		expect(decoded.height).toBe(1)
		expect(Array.from(decoded.data)).toEqual([1, 0, 0, 0, 1, 1])
	})

	test('decodes 16-bit big-endian samples', () => {
		const pixels = new Uint8Array([0xff, 0xff, 0x00, 0x00, 0x33, 0x33]) // 65535, 0, 13107
		const decoded = decodeTiff(rgbTiff(1, 1, pixels, { bits: 16 }, false))

		expect(decoded.data[0]).toBe(1)
		expect(decoded.data[1]).toBe(0)
		expect(decoded.data[2]).toBeCloseTo(0.2, 6)
	})

	test('keeps 32-bit float samples unchanged', () => {
		const floats = new DataView(new ArrayBuffer(12))
		floats.setFloat32(0, 0.5, true)
		floats.setFloat32(4, 2, true)
		floats.setFloat32(8, 1024, true)

		const decoded = decodeTiff(
			rgbTiff(1, 1, new Uint8Array(floats.buffer), { bits: 32, sampleFormat: SampleFormat.Float })
		)
		expect(Array.from(decoded.data)).toEqual([0.5, 2, 1024])
	})

	test('interleaves planar configuration', () => {
		// R plane, G plane, B plane, one strip each
		const pixels = new Uint8Array([255, 0, 0, 255, 255, 255])
		const decoded = decodeTiff(rgbTiff(2, 1, pixels, { planar: true, stripByteCounts: [2, 2, 2] }))

		expect(Array.from(decoded.data)).toEqual([1, 0, 1, 0, 1, 1])
	})

	test('joins multiple strips', () => {
		const pixels = new Uint8Array([0, 0, 0, 255, 255, 255])
		const decoded = decodeTiff(rgbTiff(1, 2, pixels, { rowsPerStrip: 1, stripByteCounts: [3, 3] }))

		expect(Array.from(decoded.data)).toEqual([0, 0, 0, 1, 1, 1])
	})

	test('decodes PackBits strips', () => {
		// Run of six 255s
		const packed = new Uint8Array([251, 255])
		const decoded = decodeTiff(rgbTiff(2, 1, packed, { compression: Compression.PackBits }))

		expect(Array.from(decoded.data)).toEqual([1, 1, 1, 1, 1, 1])
	})

	test('rejects PackBits strips that expand short', () => {
		// One literal byte where six are needed
		const tiff = rgbTiff(2, 1, new Uint8Array([0, 255]), { compression: Compression.PackBits })

		expect(() => decodeTiff(tiff)).toThrow(DecodeError)
		expect(() => decodeTiff(tiff)).toThrow('Invalid TIFF: strip 0 holds 1 bytes, expected 6')
	})

	test('rejects RGBA', () => {
		const tiff = rgbTiff(1, 1, new Uint8Array([1, 2, 3, 4]), {
			samplesPerPixel: 4,
			extra: [{ tag: Tag.ExtraSamples, type: TagType.Short, values: [2] }],
		})

		expect(() => decodeTiff(tiff)).toThrow(DecodeError)
		expect(() => decodeTiff(tiff)).toThrow('4 samples per pixel, expected 3 RGB samples without alpha')
	})

	test('rejects grayscale', () => {
		const tiff = rgbTiff(2, 1, new Uint8Array([10, 20]), { samplesPerPixel: 1, photometric: Photometric.BlackIsZero })
		expect(() => decodeTiff(tiff)).toThrow('grayscale (BlackIsZero) images are not RGB')
	})

	test('rejects CMYK', () => {
		const tiff = rgbTiff(1, 1, new Uint8Array([1, 2, 3, 4]), { samplesPerPixel: 4, photometric: Photometric.CMYK })
		expect(() => decodeTiff(tiff)).toThrow('CMYK images are not RGB')
	})

	test('rejects unsupported compression', () => {
		const tiff = rgbTiff(1, 1, new Uint8Array([1, 2, 3]), { compression: Compression.LZW })
		expect(() => decodeTiff(tiff)).toThrow('Unsupported TIFF compression: 5')
	})

	test('decode throws on invalid signature', () => {
		const invalid = new Uint8Array([0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00])
		expect(() => decodeTiff(invalid)).toThrow('Invalid TIFF byte order')
	})

	test('parseTiff extracts structure', () => {
		const tiff = parseTiff(rgbTiff(1, 1, new Uint8Array([1, 2, 3])))

		expect(tiff.littleEndian).toBe(true)
		expect(tiff.ifds.length).toBe(1)
		expect(tiff.ifds[0]?.entries.get(Tag.ImageWidth)?.value).toBe(1)
	})
})
