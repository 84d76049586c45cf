/**
 * Poisson photon noise estimate over a bracketed image set
 */

import {
	type ChannelCoefficients,
	DecodeError,
	type HdrMergeError,
	type ImageDecoder,
	InsufficientInputError,
	type MetadataProvider,
	MetadataError,
	RGB_CHANNELS,
	type Result,
	type RgbImage,
	ShapeError,
	UNIT_CHANNEL_COEFFICIENTS,
	UnknownMergeError,
	channelCoefficientsSchema,
	isHdrMergeError,
	toHdrMergeError,
} from '@poisson-hdr/core'
import { accumulateWeighted } from './accumulate'
import { scaleRadiance } from './radiance'

export interface MergeCollaborators {
	metadata: MetadataProvider
	decoder: ImageDecoder
}

/**
 * Stage notifications, in order
 */
export type MergeProgress =
	| {
			stage: 'metadata'
			identifiers: readonly string[]
			exposures: readonly number[]
			gains: readonly number[]
	  }
	| { stage: 'decoded'; identifiers: readonly string[]; width: number; height: number }
	| { stage: 'scaled'; images: number }
	| { stage: 'merged'; width: number; height: number }

export interface MergeOptions {
	/** Per-channel sensitivity (default 1, 1, 1) */
	coefficients?: ChannelCoefficients
	onProgress?: (progress: MergeProgress) => void
}

/**
 * Merged radiance map with the dimensions shared by every input
 */
export type MergedRadiance = RgbImage

function resolveCoefficients(coefficients: ChannelCoefficients | undefined): ChannelCoefficients {
	if (coefficients === undefined) return UNIT_CHANNEL_COEFFICIENTS
	const result = channelCoefficientsSchema.safeParse(coefficients)
	if (!result.success) {
		const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
		throw new UnknownMergeError(`Invalid channel coefficients: ${detail}`, { cause: result.error })
	}
	return Object.freeze(result.data)
}

async function fromMetadata(task: () => Promise<number[]>, what: string): Promise<number[]> {
	try {
		return await task()
	} catch (err) {
		if (isHdrMergeError(err)) throw err
		const reason = err instanceof Error ? err.message : String(err)
		throw new MetadataError(`Failed to read ${what}: ${reason}`, { cause: err })
	}
}

async function fromDecoder(decoder: ImageDecoder, identifier: string): Promise<RgbImage> {
	try {
		return await decoder.readImage(identifier)
	} catch (err) {
		if (isHdrMergeError(err)) throw err
		const reason = err instanceof Error ? err.message : String(err)
		throw new DecodeError(`${identifier}: ${reason}`, { identifier, cause: err })
	}
}

function checkVector(values: readonly number[], identifiers: readonly string[], what: string): void {
	if (values.length !== identifiers.length) {
		throw new MetadataError(`Expected ${identifiers.length} ${what}s, got ${values.length}`)
	}
	values.forEach((value, index) => {
		if (!Number.isFinite(value) || value <= 0) {
			const identifier = identifiers[index]
			throw new MetadataError(`${identifier}: ${what} must be a positive number, got ${value}`, { identifier })
		}
	})
}

function checkImages(images: readonly RgbImage[], identifiers: readonly string[]): void {
	const first = images[0]
	if (!first) return

	images.forEach((image, index) => {
		const identifier = identifiers[index]
		const { width, height, data } = image

		if (!(width > 0) || !(height > 0)) {
			throw new ShapeError(`${identifier}: invalid dimensions ${width}x${height}`, { identifier })
		}

		const pixels = width * height
		if (data.length !== pixels * RGB_CHANNELS) {
			const channels = data.length / pixels
			const found = Number.isInteger(channels) ? String(channels) : `${data.length} samples`
			throw new DecodeError(`${identifier}: expected ${RGB_CHANNELS} channels, got ${found}`, { identifier })
		}

		if (width !== first.width || height !== first.height) {
			throw new ShapeError(
				`${identifier}: ${width}x${height} does not match ${first.width}x${first.height}`,
				{ identifier }
			)
		}
	})
}

/**
 * Merge a bracketed image set into one radiance map
 *
 * Exposures, gains and pixels are fetched concurrently, validated, scaled to
 * radiance and folded in image set order. Failures reject with a tagged
 * HdrMergeError; nothing partial is returned.
 */
export async function calculatePoissonEstimate(
	identifiers: readonly string[],
	collaborators: MergeCollaborators,
	options: MergeOptions = {}
): Promise<MergedRadiance> {
	if (identifiers.length === 0) {
		throw new InsufficientInputError()
	}

	const coefficients = resolveCoefficients(options.coefficients)
	const { metadata, decoder } = collaborators
	const report = options.onProgress ?? (() => {})

	const [exposures, gains, images] = await Promise.all([
		fromMetadata(() => metadata.getExposures(identifiers), 'exposure'),
		fromMetadata(() => metadata.getGains(identifiers), 'gain'),
		Promise.all(identifiers.map((identifier) => fromDecoder(decoder, identifier))),
	])

	checkVector(exposures, identifiers, 'exposure')
	checkVector(gains, identifiers, 'gain')
	report({ stage: 'metadata', identifiers, exposures, gains })

	checkImages(images, identifiers)
	const { width, height } = images[0] ?? { width: 0, height: 0 }
	report({ stage: 'decoded', identifiers, width, height })

	const radiances = images.map((image, index) =>
		scaleRadiance(image.data, exposures[index] ?? 0, gains[index] ?? 0, coefficients)
	)
	report({ stage: 'scaled', images: radiances.length })

	const data = accumulateWeighted(radiances, exposures)
	report({ stage: 'merged', width, height })

	return { width, height, data }
}

/**
 * calculatePoissonEstimate returning a tagged result instead of rejecting
 */
export async function tryCalculatePoissonEstimate(
	identifiers: readonly string[],
	collaborators: MergeCollaborators,
	options: MergeOptions = {}
): Promise<Result<MergedRadiance, HdrMergeError>> {
	try {
		const value = await calculatePoissonEstimate(identifiers, collaborators, options)
		return { ok: true, value }
	} catch (err) {
		return { ok: false, error: toHdrMergeError(err) }
	}
}
