/**
 * PNM (Portable Any Map) format types and constants
 * Includes PBM (Bitmap), PGM (Graymap), PPM (Pixmap)
 */

// Format types
export enum PnmFormat {
	PBM_ASCII = 'P1', // Portable Bitmap ASCII
	PGM_ASCII = 'P2', // Portable Graymap ASCII
	PPM_ASCII = 'P3', // Portable Pixmap ASCII
	PBM_BINARY = 'P4', // Portable Bitmap Binary
	PGM_BINARY = 'P5', // Portable Graymap Binary
	PPM_BINARY = 'P6', // Portable Pixmap Binary
}

const FORMATS_BY_MAGIC: Record<string, PnmFormat> = {
	P1: PnmFormat.PBM_ASCII,
	P2: PnmFormat.PGM_ASCII,
	P3: PnmFormat.PPM_ASCII,
	P4: PnmFormat.PBM_BINARY,
	P5: PnmFormat.PGM_BINARY,
	P6: PnmFormat.PPM_BINARY,
}

/**
 * PNM header structure
 */
export interface PnmHeader {
	format: PnmFormat
	width: number
	height: number
	maxVal: number // Maximum sample value, 1-65535
}

export function parsePnmFormat(magic: string): PnmFormat | undefined {
	return FORMATS_BY_MAGIC[magic]
}

/**
 * Check if format is ASCII (text)
 */
export function isAsciiFormat(format: PnmFormat): boolean {
	return (
		format === PnmFormat.PBM_ASCII ||
		format === PnmFormat.PGM_ASCII ||
		format === PnmFormat.PPM_ASCII
	)
}

/**
 * Only pixmaps carry three channels
 */
export function isRgbFormat(format: PnmFormat): boolean {
	return format === PnmFormat.PPM_ASCII || format === PnmFormat.PPM_BINARY
}
