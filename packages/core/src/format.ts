import type { ImageFormat } from './types'

interface MagicSignature {
	bytes: number[]
	offset?: number
}

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES = {
	jpeg: { bytes: [0xff, 0xd8, 0xff] },
	tiff_le: { bytes: [0x49, 0x49, 0x2a, 0x00] }, // Little endian
	tiff_be: { bytes: [0x4d, 0x4d, 0x00, 0x2a] }, // Big endian
	pfm_color: { bytes: [0x50, 0x46] }, // "PF"
	pfm_gray: { bytes: [0x50, 0x66] }, // "Pf"
	pam: { bytes: [0x50, 0x37] }, // "P7"
} satisfies Record<string, MagicSignature>

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: MagicSignature): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.jpeg)) return 'jpeg'
	if (matchMagic(data, MAGIC_BYTES.tiff_le) || matchMagic(data, MAGIC_BYTES.tiff_be)) return 'tiff'
	if (matchMagic(data, MAGIC_BYTES.pfm_color) || matchMagic(data, MAGIC_BYTES.pfm_gray)) return 'pfm'
	if (matchMagic(data, MAGIC_BYTES.pam)) return 'pam'

	// PNM formats (P1-P6), the decoder decides which are RGB
	if (data.length >= 2 && data[0] === 0x50) {
		const type = data[1] ?? 0
		if (type >= 0x31 && type <= 0x36) return 'pnm'
	}

	return null
}
