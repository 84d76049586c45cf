/**
 * PFM (Portable FloatMap) encoder
 * Writes radiance values unchanged, no tone mapping
 */

import { RGB_CHANNELS, type RgbImage, ShapeError } from '@poisson-hdr/core'
import type { PfmEncodeOptions } from '../types'

/**
 * Encode float RGB image to color PFM (PF)
 */
export function encodePfm(image: RgbImage, options: PfmEncodeOptions = {}): Uint8Array {
	const { width, height, data } = image
	const littleEndian = !options.bigEndian

	if (data.length !== width * height * RGB_CHANNELS) {
		throw new ShapeError(
			`PFM encode: expected ${width * height * RGB_CHANNELS} samples for ${width}x${height}, got ${data.length}`
		)
	}

	// Negative scale = little-endian, magnitude 1.0
	const header = `PF\n${width} ${height}\n${littleEndian ? '-1.0' : '1.0'}\n`
	const headerBytes = new TextEncoder().encode(header)

	const floatsPerRow = width * RGB_CHANNELS
	const output = new Uint8Array(headerBytes.length + data.length * 4)
	output.set(headerBytes, 0)

	const view = new DataView(output.buffer, headerBytes.length)
	let offset = 0

	// Bottom-to-top row order
	for (let y = height - 1; y >= 0; y--) {
		const rowStart = y * floatsPerRow
		for (let i = 0; i < floatsPerRow; i++) {
			view.setFloat32(offset, data[rowStart + i] ?? 0, littleEndian)
			offset += 4
		}
	}

	return output
}
