/**
 * TIFF compression algorithms
 */

/**
 * Decompress PackBits-compressed data
 */
export function decompressPackBits(data: Uint8Array, expectedSize: number): Uint8Array {
	const output = new Uint8Array(expectedSize)
	let srcPos = 0
	let dstPos = 0

	while (srcPos < data.length && dstPos < expectedSize) {
		const n = data[srcPos++] ?? 128

		if (n >= 0 && n <= 127) {
			// Copy next n+1 bytes literally
			const count = n + 1
			for (let i = 0; i < count && dstPos < expectedSize; i++) {
				output[dstPos++] = data[srcPos++] ?? 0
			}
		} else if (n >= 129) {
			// Repeat next byte 257-n times
			const count = 257 - n
			const value = data[srcPos++] ?? 0
			for (let i = 0; i < count && dstPos < expectedSize; i++) {
				output[dstPos++] = value
			}
		}
		// n == 128 is no-op
	}

	return output.subarray(0, dstPos)
}
