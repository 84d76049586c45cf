import { DecodeError, ShapeError } from '@poisson-hdr/core'
import { describe, expect, it } from 'vitest'
import { decodePfm } from './decoder'
import { encodePfm } from './encoder'

function buildPfm(magic: string, width: number, height: number, scale: string, floats: number[]): Uint8Array {
	const headerBytes = new TextEncoder().encode(`${magic}\n${width} ${height}\n${scale}\n`)
	const littleEndian = scale.startsWith('-')
	const floatData = new DataView(new ArrayBuffer(floats.length * 4))
	floats.forEach((value, i) => floatData.setFloat32(i * 4, value, littleEndian))

	const pfm = new Uint8Array(headerBytes.length + floatData.byteLength)
	pfm.set(headerBytes, 0)
	pfm.set(new Uint8Array(floatData.buffer), headerBytes.length)
	return pfm
}

describe('PFM Decoder', () => {
	describe('decodePfm', () => {
		it('should decode color PFM as float samples', () => {
			const decoded = decodePfm(buildPfm('PF', 2, 1, '-1.0', [0.5, 1, 2, 4, 8, 16]))

			expect(decoded.width).toBe(2)
			expect(decoded.height).toBe(1)
			expect(Array.from(decoded.data)).toEqual([0.5, 1, 2, 4, 8, 16])
		})

		it('should flip bottom-to-top rows', () => {
			// Stored order: row 1 then row 0
			const decoded = decodePfm(buildPfm('PF', 1, 2, '-1.0', [1, 2, 3, 4, 5, 6]))
			expect(Array.from(decoded.data)).toEqual([4, 5, 6, 1, 2, 3])
		})

		it('should read big-endian data and apply the scale magnitude', () => {
			const decoded = decodePfm(buildPfm('PF', 1, 1, '2.0', [0.25, 0.5, 0.75]))
			expect(Array.from(decoded.data)).toEqual([0.5, 1, 1.5])
		})

		it('should reject grayscale PFM', () => {
			const gray = buildPfm('Pf', 2, 2, '-1.0', [0.5, 0.6, 0.2, 0.8])
			expect(() => decodePfm(gray)).toThrow(DecodeError)
			expect(() => decodePfm(gray)).toThrow('grayscale')
		})

		it('should throw for invalid magic', () => {
			const invalid = new Uint8Array([0x50, 0x36]) // P6
			expect(() => decodePfm(invalid)).toThrow('Invalid PFM')
		})

		it('should reject dimensions with trailing characters', () => {
			const header = new TextEncoder().encode('PF\n1x 1\n-1.0\n')
			const pfm = new Uint8Array(header.length + 12)
			pfm.set(header, 0)

			expect(() => decodePfm(pfm)).toThrow(DecodeError)
			expect(() => decodePfm(pfm)).toThrow('Invalid PFM dimensions')
		})

		it('should throw for truncated data', () => {
			const truncated = buildPfm('PF', 2, 2, '-1.0', [1, 2, 3])
			expect(() => decodePfm(truncated)).toThrow('truncated')
		})
	})

	describe('encodePfm', () => {
		it('should encode with correct header', () => {
			const pfm = encodePfm({ width: 2, height: 1, data: new Float32Array(6) })
			const text = new TextDecoder().decode(pfm.subarray(0, 12))

			expect(text).toBe('PF\n2 1\n-1.0\n')
			expect(pfm.length).toBe(12 + 6 * 4)
		})

		it('should preserve radiance values above 1', () => {
			const original = {
				width: 2,
				height: 2,
				data: new Float32Array([0.125, 3.5, 1024, 7, 0, 65504, 2.25, 9.75, 0.5, 1, 2, 3]),
			}

			const decoded = decodePfm(encodePfm(original))

			expect(decoded.width).toBe(2)
			expect(decoded.height).toBe(2)
			expect(Array.from(decoded.data)).toEqual(Array.from(original.data))
		})

		it('should write big-endian when asked', () => {
			const pfm = encodePfm({ width: 1, height: 1, data: new Float32Array([1, 2, 3]) }, { bigEndian: true })
			expect(new TextDecoder().decode(pfm.subarray(0, 11))).toBe('PF\n1 1\n1.0\n')
			expect(Array.from(decodePfm(pfm).data)).toEqual([1, 2, 3])
		})

		it('should reject buffers that do not match the dimensions', () => {
			expect(() => encodePfm({ width: 2, height: 2, data: new Float32Array(6) })).toThrow(ShapeError)
		})
	})
})
