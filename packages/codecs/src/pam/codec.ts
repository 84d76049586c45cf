/**
 * PAM Codec implementation
 */

import type { RgbImage } from '@poisson-hdr/core'
import type { RgbCodec } from '../types'
import { decodePam } from './decoder'

export class PAMCodec implements RgbCodec {
	readonly name = 'PAM'

	decode(data: Uint8Array): RgbImage {
		return decodePam(data)
	}
}
