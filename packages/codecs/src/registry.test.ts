import { DecodeError, createRgbImage, setPixel } from '@poisson-hdr/core'
import { describe, expect, test } from 'vitest'
import { encodePfm } from './pfm/encoder'
import { createImageDecoder, decodeImage, supportedFormats } from './registry'

const ppm = (() => {
	const header = new TextEncoder().encode('P6\n1 1\n255\n')
	const out = new Uint8Array(header.length + 3)
	out.set(header, 0)
	out.set([255, 0, 51], header.length)
	return out
})()

describe('decodeImage', () => {
	test('dispatches PFM by magic bytes', () => {
		const image = createRgbImage(2, 1)
		setPixel(image, 0, 0, 0.5, 1, 2)
		setPixel(image, 1, 0, 4, 8, 16)

		const decoded = decodeImage(encodePfm(image))
		expect(decoded.width).toBe(2)
		expect(decoded.height).toBe(1)
		expect(Array.from(decoded.data)).toEqual([0.5, 1, 2, 4, 8, 16])
	})

	test('dispatches PPM by magic bytes', () => {
		expect(Array.from(decodeImage(ppm).data)).toEqual([1, 0, 0.2].map(Math.fround))
	})

	test('rejects JPEG pixel data', () => {
		const jpeg = new Uint8Array([0xff, 0xd8, 0xff, 0xe1, 0x00, 0x02])
		expect(() => decodeImage(jpeg)).toThrow(DecodeError)
		expect(() => decodeImage(jpeg)).toThrow('JPEG pixel data cannot be decoded')
	})

	test('rejects unknown bytes', () => {
		expect(() => decodeImage(new Uint8Array([1, 2, 3, 4]))).toThrow('Unknown image format')
	})

	test('lists supported formats', () => {
		expect(supportedFormats()).toEqual(['PFM', 'PPM', 'PAM', 'TIFF'])
	})
})

describe('createImageDecoder', () => {
	test('reads and decodes through the source reader', async () => {
		const decoder = createImageDecoder(async (identifier) => {
			expect(identifier).toBe('a.ppm')
			return ppm
		})
		const image = await decoder.readImage('a.ppm')
		expect(image.width).toBe(1)
	})

	test('wraps read failures with the identifier', async () => {
		const decoder = createImageDecoder(async () => {
			throw new Error('ENOENT')
		})

		const error = await decoder.readImage('missing.pfm').catch((err: unknown) => err)
		expect(error).toBeInstanceOf(DecodeError)
		expect(error).toMatchObject({ kind: 'decode', identifier: 'missing.pfm', message: 'Cannot read missing.pfm: ENOENT' })
	})

	test('tags decode failures with the identifier', async () => {
		const pgm = new TextEncoder().encode('P5\n1 1\n255\n\x80')
		const decoder = createImageDecoder(async () => pgm)

		await expect(decoder.readImage('gray.pgm')).rejects.toMatchObject({
			identifier: 'gray.pgm',
			message: 'gray.pgm: Unsupported PNM: P5 is not an RGB pixmap',
		})
	})
})
