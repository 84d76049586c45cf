/**
 * Exposure-weighted accumulation of radiance buffers
 */

import { InsufficientInputError, ShapeError } from '@poisson-hdr/core'

/**
 * Fold radiance buffers into one estimate, in order
 *
 * The accumulator starts as a copy of the first buffer and every buffer,
 * the first included, is then folded in:
 *
 *   acc = ((acc + radiance[i]) * exposure[i]) / sum(exposures)
 *
 * so the first image is counted twice. Values are not clamped, NaN and
 * Infinity propagate.
 */
export function accumulateWeighted(radiances: readonly Float32Array[], exposures: readonly number[]): Float32Array {
	const first = radiances[0]
	if (!first) {
		throw new InsufficientInputError('Cannot accumulate an empty list of radiance buffers')
	}

	if (exposures.length !== radiances.length) {
		throw new ShapeError(`Expected ${radiances.length} exposures, got ${exposures.length}`)
	}

	radiances.forEach((radiance, index) => {
		if (radiance.length !== first.length) {
			throw new ShapeError(
				`Radiance buffer ${index} has length ${radiance.length}, expected ${first.length}`
			)
		}
	})

	let sum = 0
	for (const exposure of exposures) {
		sum = Math.fround(sum + exposure)
	}

	const acc = new Float32Array(first)
	radiances.forEach((radiance, index) => {
		const weight = Math.fround(exposures[index] ?? 0)
		for (let j = 0; j < acc.length; j++) {
			acc[j] = (((acc[j] ?? 0) + (radiance[j] ?? 0)) * weight) / sum
		}
	})

	return acc
}
