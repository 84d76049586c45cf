import { z } from 'zod'

/**
 * Floating-point RGB image
 * Samples are interleaved R, G, B with no alpha, length = width * height * 3
 */
export interface RgbImage {
	readonly width: number
	readonly height: number
	readonly data: Float32Array
}

/** Number of interleaved samples per pixel in every buffer */
export const RGB_CHANNELS = 3

/**
 * Relative per-channel sensor sensitivity
 */
export interface ChannelCoefficients {
	readonly red: number
	readonly green: number
	readonly blue: number
}

/**
 * Unit sensitivity for all channels
 */
export const UNIT_CHANNEL_COEFFICIENTS: ChannelCoefficients = Object.freeze({
	red: 1,
	green: 1,
	blue: 1,
})

/**
 * ISO value treated as gain 1
 */
export const DEFAULT_BASE_ISO = 100

const positiveFinite = z.number().finite().positive()

export const channelCoefficientsSchema = z.object({
	red: positiveFinite,
	green: positiveFinite,
	blue: positiveFinite,
})

/**
 * Input formats the decoder registry understands
 */
export type ImageFormat = 'pfm' | 'pnm' | 'pam' | 'tiff' | 'jpeg'

/**
 * Create a zero-filled RgbImage
 */
export function createRgbImage(width: number, height: number): RgbImage {
	return {
		width,
		height,
		data: new Float32Array(width * height * RGB_CHANNELS),
	}
}

/**
 * Set pixel at (x, y)
 */
export function setPixel(image: RgbImage, x: number, y: number, r: number, g: number, b: number): void {
	const idx = (y * image.width + x) * RGB_CHANNELS
	image.data[idx] = r
	image.data[idx + 1] = g
	image.data[idx + 2] = b
}

/**
 * Loads the raw bytes behind an image identifier
 */
export type SourceReader = (identifier: string) => Promise<Uint8Array>

/**
 * Supplies per-image exposure time and sensor gain, index-aligned with the identifiers
 */
export interface MetadataProvider {
	getExposures(identifiers: readonly string[]): Promise<number[]>
	getGains(identifiers: readonly string[]): Promise<number[]>
}

/**
 * Materializes an identifier as a 3-channel float pixel buffer
 * Rejects anything that is not RGB (alpha, grayscale, palette, CMYK)
 */
export interface ImageDecoder {
	readImage(identifier: string): Promise<RgbImage>
}
