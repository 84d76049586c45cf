/**
 * PFM codec implementation
 */

import type { RgbImage } from '@poisson-hdr/core'
import type { RgbCodec } from '../types'
import { decodePfm } from './decoder'

export class PFMCodec implements RgbCodec {
	readonly name = 'PFM'

	decode(data: Uint8Array): RgbImage {
		return decodePfm(data)
	}
}
