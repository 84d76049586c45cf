import type { RgbImage } from '@poisson-hdr/core'

/**
 * Decoder for one container format, producing float RGB samples
 */
export interface RgbCodec {
	readonly name: string
	decode(data: Uint8Array): RgbImage
}

/**
 * PFM encode options
 */
export interface PfmEncodeOptions {
	/** Write big-endian floats (positive scale) instead of little-endian */
	bigEndian?: boolean
}
