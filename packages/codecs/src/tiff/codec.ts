import type { RgbImage } from '@poisson-hdr/core'
import type { RgbCodec } from '../types'
import { decodeTiff } from './decoder'

/**
 * TIFF codec - baseline RGB strips only
 */
export const TiffCodec: RgbCodec = {
	name: 'TIFF',

	decode(data: Uint8Array): RgbImage {
		return decodeTiff(data)
	},
}
