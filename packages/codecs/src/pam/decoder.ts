/**
 * PAM (Portable Arbitrary Map) decoder
 * Accepts three-sample RGB tuples only; alpha and gray tuples are rejected
 */

import { DecodeError, RGB_CHANNELS, type RgbImage } from '@poisson-hdr/core'
import type { PAMHeader } from './types'

/**
 * Decode PAM image to float RGB normalised by maxval
 */
export function decodePam(data: Uint8Array): RgbImage {
	if (data[0] !== 0x50 || data[1] !== 0x37) {
		throw new DecodeError('Invalid PAM: wrong magic number')
	}

	const { header, dataOffset } = parseHeader(data)
	const { width, height, depth, maxval, tupleType } = header

	if (!(width > 0) || !(height > 0) || !(depth > 0)) {
		throw new DecodeError('Invalid PAM: missing required header fields')
	}

	if (tupleType !== undefined && tupleType !== 'RGB') {
		throw new DecodeError(`Unsupported PAM: tuple type ${tupleType} is not RGB`)
	}

	if (depth !== RGB_CHANNELS) {
		throw new DecodeError(`Unsupported PAM: depth ${depth}, expected 3 RGB samples`)
	}

	if (!(maxval > 0) || maxval > 65535) {
		throw new DecodeError(`Invalid PAM maxval: ${maxval}`)
	}

	const bytesPerSample = maxval > 255 ? 2 : 1
	const pixels = new Float32Array(width * height * RGB_CHANNELS)

	if (data.length - dataOffset < pixels.length * bytesPerSample) {
		throw new DecodeError('Invalid PAM: truncated pixel data')
	}

	let pos = dataOffset
	for (let i = 0; i < pixels.length; i++) {
		let value: number
		if (bytesPerSample === 2) {
			value = ((data[pos] ?? 0) << 8) | (data[pos + 1] ?? 0)
			pos += 2
		} else {
			value = data[pos++] ?? 0
		}
		pixels[i] = value / maxval
	}

	return { width, height, data: pixels }
}

function parseHeader(data: Uint8Array): { header: PAMHeader; dataOffset: number } {
	const header: PAMHeader = { width: 0, height: 0, depth: 0, maxval: 255, tupleType: undefined }
	let pos = skipWhitespace(data, 2)

	while (pos < data.length) {
		const lineEnd = findLineEnd(data, pos)
		const line = new TextDecoder().decode(data.subarray(pos, lineEnd)).trim()
		pos = lineEnd + 1

		if (line === 'ENDHDR') {
			return { header, dataOffset: pos }
		}

		if (line.startsWith('#') || line === '') {
			continue
		}

		const [field, value = ''] = line.split(/\s+/)

		switch (field) {
			case 'WIDTH':
				header.width = Number.parseInt(value, 10)
				break
			case 'HEIGHT':
				header.height = Number.parseInt(value, 10)
				break
			case 'DEPTH':
				header.depth = Number.parseInt(value, 10)
				break
			case 'MAXVAL':
				header.maxval = Number.parseInt(value, 10)
				break
			case 'TUPLTYPE':
				header.tupleType = value
				break
		}
	}

	throw new DecodeError('Invalid PAM: missing ENDHDR')
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

function findLineEnd(data: Uint8Array, start: number): number {
	let pos = start
	while (pos < data.length && data[pos] !== 0x0a && data[pos] !== 0x0d) {
		pos++
	}
	return pos
}
