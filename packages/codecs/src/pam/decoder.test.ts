import { DecodeError } from '@poisson-hdr/core'
import { describe, expect, it } from 'vitest'
import { decodePam } from './decoder'

function buildPam(fields: string[], samples: number[]): Uint8Array {
	const header = `P7\n${fields.join('\n')}\nENDHDR\n`
	const headerBytes = new TextEncoder().encode(header)
	const pam = new Uint8Array(headerBytes.length + samples.length)
	pam.set(headerBytes, 0)
	pam.set(samples, headerBytes.length)
	return pam
}

describe('PAM Decoder', () => {
	describe('decodePam', () => {
		it('should decode RGB PAM', () => {
			const pam = buildPam(
				['WIDTH 2', 'HEIGHT 1', 'DEPTH 3', 'MAXVAL 4', 'TUPLTYPE RGB'],
				[4, 2, 1, 0, 3, 4]
			)

			const decoded = decodePam(pam)

			expect(decoded.width).toBe(2)
			expect(decoded.height).toBe(1)
			expect(Array.from(decoded.data)).toEqual([1, 0.5, 0.25, 0, 0.75, 1])
		})

		it('should accept a header without TUPLTYPE when depth is 3', () => {
			const pam = buildPam(['# bracket', 'WIDTH 1', 'HEIGHT 1', 'DEPTH 3', 'MAXVAL 2'], [2, 1, 0])
			expect(Array.from(decodePam(pam).data)).toEqual([1, 0.5, 0])
		})

		it('should reject RGB_ALPHA PAM', () => {
			const pam = buildPam(
				['WIDTH 1', 'HEIGHT 1', 'DEPTH 4', 'MAXVAL 255', 'TUPLTYPE RGB_ALPHA'],
				[255, 0, 0, 255]
			)

			expect(() => decodePam(pam)).toThrow(DecodeError)
			expect(() => decodePam(pam)).toThrow('tuple type RGB_ALPHA is not RGB')
		})

		it('should reject GRAYSCALE PAM', () => {
			const pam = buildPam(['WIDTH 2', 'HEIGHT 1', 'DEPTH 1', 'MAXVAL 255', 'TUPLTYPE GRAYSCALE'], [0, 128])
			expect(() => decodePam(pam)).toThrow('tuple type GRAYSCALE is not RGB')
		})

		it('should reject four samples without a tuple type', () => {
			const pam = buildPam(['WIDTH 1', 'HEIGHT 1', 'DEPTH 4', 'MAXVAL 255'], [1, 2, 3, 4])
			expect(() => decodePam(pam)).toThrow('depth 4')
		})

		it('should throw for invalid magic', () => {
			const invalid = new Uint8Array([0x50, 0x36]) // P6 (not P7)
			expect(() => decodePam(invalid)).toThrow('Invalid PAM')
		})

		it('should throw when ENDHDR is missing', () => {
			const noEnd = new TextEncoder().encode('P7\nWIDTH 1\nHEIGHT 1\n')
			expect(() => decodePam(noEnd)).toThrow('missing ENDHDR')
		})
	})
})
