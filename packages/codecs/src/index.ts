/**
 * @poisson-hdr/codecs
 *
 * Float RGB image codecs:
 * - PFM (PF) decode and encode
 * - PPM (P3/P6) decode, 8 and 16 bit
 * - PAM (P7, TUPLTYPE RGB) decode
 * - TIFF baseline RGB decode, 8/16-bit integer or 32-bit float, PackBits
 *
 * Alpha, grayscale, palette and CMYK inputs are rejected with a DecodeError.
 */

export { PAMCodec } from './pam/codec'
export { decodePam } from './pam/decoder'
export { PFMCodec } from './pfm/codec'
export { decodePfm } from './pfm/decoder'
export { encodePfm } from './pfm/encoder'
export * from './pnm'
export { TiffCodec } from './tiff/codec'
export { decodeTiff, parseTiff } from './tiff/decoder'
export { createImageDecoder, decodeImage, supportedFormats } from './registry'
export type { PfmEncodeOptions, RgbCodec } from './types'
