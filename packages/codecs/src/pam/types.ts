/**
 * PAM (Portable Arbitrary Map) format types
 */

/**
 * Parsed PAM header
 */
export interface PAMHeader {
	width: number
	height: number
	depth: number
	maxval: number
	/** Absent when the file names no TUPLTYPE */
	tupleType: string | undefined
}
