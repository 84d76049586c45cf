/**
 * Radiance scaling
 */

import { type ChannelCoefficients, RGB_CHANNELS, ShapeError, UNIT_CHANNEL_COEFFICIENTS } from '@poisson-hdr/core'

/**
 * Divide every sample by exposure x gain x its channel coefficient
 * Returns a new buffer, the input is not modified
 */
export function scaleRadiance(
	pixels: Float32Array,
	exposure: number,
	gain: number,
	coefficients: ChannelCoefficients = UNIT_CHANNEL_COEFFICIENTS
): Float32Array {
	if (pixels.length % RGB_CHANNELS !== 0) {
		throw new ShapeError(`Pixel buffer length ${pixels.length} is not a multiple of ${RGB_CHANNELS}`)
	}

	// Divisors rounded to single precision like the buffers they divide
	const scaling = Math.fround(exposure * gain)
	const red = Math.fround(scaling * coefficients.red)
	const green = Math.fround(scaling * coefficients.green)
	const blue = Math.fround(scaling * coefficients.blue)

	const radiance = new Float32Array(pixels.length)
	for (let i = 0; i < pixels.length; i += RGB_CHANNELS) {
		radiance[i] = (pixels[i] ?? 0) / red
		radiance[i + 1] = (pixels[i + 1] ?? 0) / green
		radiance[i + 2] = (pixels[i + 2] ?? 0) / blue
	}

	return radiance
}
