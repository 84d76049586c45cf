import type { RgbImage } from '@poisson-hdr/core'
import type { RgbCodec } from '../types'
import { decodePnm } from './decoder'

/**
 * PPM (Portable Pixmap) codec - RGB images only
 */
export const PpmCodec: RgbCodec = {
	name: 'PPM',

	decode(data: Uint8Array): RgbImage {
		return decodePnm(data)
	},
}
