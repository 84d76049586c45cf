/**
 * PFM (Portable FloatMap) decoder
 * Only the color variant (PF) is accepted, grayscale (Pf) is rejected
 */

import { DecodeError, RGB_CHANNELS, type RgbImage } from '@poisson-hdr/core'

/**
 * Decode PFM image to float RGB
 */
export function decodePfm(data: Uint8Array): RgbImage {
	let pos = 0

	// Read magic
	if (data[pos] !== 0x50) {
		// 'P'
		throw new DecodeError('Invalid PFM: wrong magic number')
	}
	pos++

	const formatByte = data[pos++]
	if (formatByte === 0x66) {
		throw new DecodeError('Unsupported PFM: grayscale (Pf) images are not RGB')
	}
	if (formatByte !== 0x46) {
		throw new DecodeError('Invalid PFM: must be PF (color)')
	}

	pos = skipWhitespace(data, pos)

	const widthEnd = findWhitespace(data, pos)
	const width = parseDimension(readAscii(data, pos, widthEnd))
	pos = skipWhitespace(data, widthEnd)

	const heightEnd = findWhitespace(data, pos)
	const height = parseDimension(readAscii(data, pos, heightEnd))
	pos = skipWhitespace(data, heightEnd)

	// Scale sign encodes endianness, magnitude is a sample multiplier
	const scaleEnd = findWhitespace(data, pos)
	const scale = Number.parseFloat(readAscii(data, pos, scaleEnd))
	pos = scaleEnd

	// Single whitespace after scale (LF or CRLF)
	if (data[pos] === 0x0a || data[pos] === 0x0d) {
		pos++
		if (data[pos] === 0x0a) pos++
	}

	if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
		throw new DecodeError('Invalid PFM dimensions')
	}
	if (!Number.isFinite(scale) || scale === 0) {
		throw new DecodeError('Invalid PFM: scale must be a non-zero number')
	}

	const isLittleEndian = scale < 0
	const absoluteScale = Math.abs(scale)

	const floatsPerRow = width * RGB_CHANNELS
	const bytesPerRow = floatsPerRow * 4
	if (data.byteLength - pos < bytesPerRow * height) {
		throw new DecodeError('Invalid PFM: truncated pixel data')
	}

	const pixels = new Float32Array(width * height * RGB_CHANNELS)
	const view = new DataView(data.buffer, data.byteOffset + pos, data.byteLength - pos)

	// PFM stores rows bottom-to-top
	for (let y = 0; y < height; y++) {
		const srcOffset = (height - 1 - y) * bytesPerRow
		const dstOffset = y * floatsPerRow

		for (let i = 0; i < floatsPerRow; i++) {
			pixels[dstOffset + i] = view.getFloat32(srcOffset + i * 4, isLittleEndian) * absoluteScale
		}
	}

	return { width, height, data: pixels }
}

function readAscii(data: Uint8Array, start: number, end: number): string {
	return new TextDecoder('ascii').decode(data.subarray(start, end))
}

function skipWhitespace(data: Uint8Array, start: number): number {
	let pos = start
	while (
		pos < data.length &&
		(data[pos] === 0x20 || data[pos] === 0x09 || data[pos] === 0x0a || data[pos] === 0x0d)
	) {
		pos++
	}
	return pos
}

function findWhitespace(data: Uint8Array, start: number): number {
	let pos = start
	while (
		pos < data.length &&
		data[pos] !== 0x20 &&
		data[pos] !== 0x09 &&
		data[pos] !== 0x0a &&
		data[pos] !== 0x0d
	) {
		pos++
	}
	return pos
}

function parseDimension(token: string): number {
	if (!/^\d+$/.test(token)) {
		throw new DecodeError('Invalid PFM dimensions')
	}
	return Number.parseInt(token, 10)
}
