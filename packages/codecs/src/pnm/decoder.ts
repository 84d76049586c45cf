import { DecodeError, RGB_CHANNELS, type RgbImage } from '@poisson-hdr/core'
import { type PnmHeader, PnmFormat, isAsciiFormat, isRgbFormat, parsePnmFormat } from './types'

/**
 * Decode PPM (P3/P6) to float RGB normalised by maxval
 * Bitmaps and graymaps are rejected rather than expanded to RGB
 */
export function decodePnm(data: Uint8Array): RgbImage {
	const { header, dataOffset } = parseHeader(data)
	const { width, height, maxVal, format } = header

	if (!isRgbFormat(format)) {
		throw new DecodeError(`Unsupported PNM: ${format} is not an RGB pixmap`)
	}

	if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
		throw new DecodeError('Invalid PNM dimensions')
	}

	if (!Number.isFinite(maxVal) || maxVal <= 0 || maxVal > 65535) {
		throw new DecodeError(`Invalid PNM maxval: ${maxVal}`)
	}

	const output = new Float32Array(width * height * RGB_CHANNELS)

	if (isAsciiFormat(format)) {
		decodeAscii(data, dataOffset, output, maxVal)
	} else {
		decodeBinary(data, dataOffset, output, maxVal)
	}

	return { width, height, data: output }
}

/**
 * Parse PNM header
 */
function parseHeader(data: Uint8Array): { header: PnmHeader; dataOffset: number } {
	const text = new TextDecoder('ascii').decode(data)

	const magicMatch = text.match(/^(P[1-6])/)
	const format = magicMatch?.[1] === undefined ? undefined : parsePnmFormat(magicMatch[1])
	if (format === undefined) {
		throw new DecodeError('Invalid PNM: missing magic number')
	}

	let pos = 2

	// Skip whitespace and comments
	const skipWhitespaceAndComments = () => {
		while (pos < text.length) {
			const ch = text[pos] ?? ''
			if (ch === '#') {
				while (pos < text.length && text[pos] !== '\n') pos++
				pos++
			} else if (/\s/.test(ch)) {
				pos++
			} else {
				break
			}
		}
	}

	const readNumber = (): number => {
		skipWhitespaceAndComments()
		let numStr = ''
		while (pos < text.length && /\d/.test(text[pos] ?? '')) {
			numStr += text[pos]
			pos++
		}
		return Number.parseInt(numStr, 10)
	}

	const width = readNumber()
	const height = readNumber()

	// PBM doesn't have maxVal
	let maxVal = 1
	if (format !== PnmFormat.PBM_ASCII && format !== PnmFormat.PBM_BINARY) {
		maxVal = readNumber()
	}

	// Binary formats: exactly one whitespace character before the raster
	if (isAsciiFormat(format)) {
		skipWhitespaceAndComments()
	} else {
		pos++
	}

	return {
		header: { format, width, height, maxVal },
		dataOffset: pos,
	}
}

function decodeAscii(data: Uint8Array, offset: number, output: Float32Array, maxVal: number): void {
	const text = new TextDecoder('ascii').decode(data.subarray(offset))
	const values = text.match(/\d+/g)?.map(Number) ?? []

	if (values.length < output.length) {
		throw new DecodeError(`Invalid PNM: expected ${output.length} samples, found ${values.length}`)
	}

	for (let i = 0; i < output.length; i++) {
		output[i] = (values[i] ?? 0) / maxVal
	}
}

function decodeBinary(data: Uint8Array, offset: number, output: Float32Array, maxVal: number): void {
	// 16-bit samples are big-endian
	const bytesPerSample = maxVal > 255 ? 2 : 1

	if (data.length - offset < output.length * bytesPerSample) {
		throw new DecodeError('Invalid PNM: truncated pixel data')
	}

	let srcIdx = offset
	for (let i = 0; i < output.length; i++) {
		let val: number
		if (bytesPerSample === 2) {
			val = ((data[srcIdx] ?? 0) << 8) | (data[srcIdx + 1] ?? 0)
			srcIdx += 2
		} else {
			val = data[srcIdx++] ?? 0
		}
		output[i] = val / maxVal
	}
}
