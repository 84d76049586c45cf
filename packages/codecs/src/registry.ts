import {
	DecodeError,
	type ImageDecoder,
	type ImageFormat,
	type RgbImage,
	type SourceReader,
	detectFormat,
} from '@poisson-hdr/core'
import { PAMCodec } from './pam/codec'
import { PFMCodec } from './pfm/codec'
import { PpmCodec } from './pnm/codec'
import { TiffCodec } from './tiff/codec'
import type { RgbCodec } from './types'

/**
 * Codec registry for pixel formats
 * JPEG is detected for its EXIF block only, its pixels are 8-bit gamma-encoded and not decoded here
 */
const rgbCodecs: Record<Exclude<ImageFormat, 'jpeg'>, RgbCodec> = {
	pfm: new PFMCodec(),
	pnm: PpmCodec,
	pam: new PAMCodec(),
	tiff: TiffCodec,
}

/**
 * Decode image bytes to float RGB (auto-detect format)
 */
export function decodeImage(data: Uint8Array): RgbImage {
	const format = detectFormat(data)
	if (!format) {
		throw new DecodeError('Unknown image format')
	}
	if (format === 'jpeg') {
		throw new DecodeError('Unsupported format: JPEG pixel data cannot be decoded, use TIFF, PFM, PPM or PAM')
	}
	return rgbCodecs[format].decode(data)
}

/**
 * List the formats decodeImage accepts
 */
export function supportedFormats(): string[] {
	return Object.values(rgbCodecs).map((codec) => codec.name)
}

/**
 * Image decoder reading identifiers through `readSource`
 * Every failure, including the read itself, becomes a DecodeError naming the identifier
 */
export function createImageDecoder(readSource: SourceReader): ImageDecoder {
	return {
		async readImage(identifier: string): Promise<RgbImage> {
			let data: Uint8Array
			try {
				data = await readSource(identifier)
			} catch (err) {
				const reason = err instanceof Error ? err.message : String(err)
				throw new DecodeError(`Cannot read ${identifier}: ${reason}`, { identifier, cause: err })
			}

			try {
				return decodeImage(data)
			} catch (err) {
				const reason = err instanceof Error ? err.message : String(err)
				throw new DecodeError(`${identifier}: ${reason}`, { identifier, cause: err })
			}
		},
	}
}
