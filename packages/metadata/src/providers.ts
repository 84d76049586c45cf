/**
 * Metadata providers: EXIF read from the image sources, or a JSON sidecar
 */

import {
	DEFAULT_BASE_ISO,
	type MetadataProvider,
	MetadataError,
	type SourceReader,
	isHdrMergeError,
} from '@poisson-hdr/core'
import { z } from 'zod'
import { type CaptureSettings, isoToGain, readCaptureSettings } from './exposure'

const positiveFinite = z.number().finite().positive()

export const sidecarEntrySchema = z.object({
	exposure: positiveFinite,
	gain: positiveFinite.optional(),
	iso: positiveFinite.optional(),
})

export const sidecarSchema = z.object({
	images: z.record(z.string(), sidecarEntrySchema),
})

export type SidecarEntry = z.infer<typeof sidecarEntrySchema>
export type SidecarDocument = z.infer<typeof sidecarSchema>

export interface ExifMetadataProviderOptions {
	readSource: SourceReader
	/** ISO mapped to gain 1 (default 100) */
	baseIso?: number
}

export interface SidecarMetadataProviderOptions {
	baseIso?: number
}

function describeIssues(error: z.ZodError): string {
	return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ')
}

function checkBaseIso(baseIso: number): number {
	if (!positiveFinite.safeParse(baseIso).success) {
		throw new MetadataError(`Base ISO must be a positive number, got ${baseIso}`)
	}
	return baseIso
}

/**
 * Provider reading exposure and ISO from each source's EXIF block
 * Sources are read once per provider and shared between getExposures and getGains
 */
export function createExifMetadataProvider(options: ExifMetadataProviderOptions): MetadataProvider {
	const { readSource } = options
	const baseIso = checkBaseIso(options.baseIso ?? DEFAULT_BASE_ISO)
	const cache = new Map<string, Promise<CaptureSettings>>()

	const load = async (identifier: string): Promise<CaptureSettings> => {
		let data: Uint8Array
		try {
			data = await readSource(identifier)
		} catch (err) {
			if (isHdrMergeError(err)) throw err
			const reason = err instanceof Error ? err.message : String(err)
			throw new MetadataError(`Cannot read ${identifier}: ${reason}`, { identifier, cause: err })
		}
		return readCaptureSettings(data, identifier, baseIso)
	}

	const settingsFor = (identifier: string): Promise<CaptureSettings> => {
		let pending = cache.get(identifier)
		if (!pending) {
			pending = load(identifier)
			cache.set(identifier, pending)
		}
		return pending
	}

	return {
		async getExposures(identifiers) {
			const settings = await Promise.all(identifiers.map(settingsFor))
			return settings.map((s) => s.exposure)
		},
		async getGains(identifiers) {
			const settings = await Promise.all(identifiers.map(settingsFor))
			return settings.map((s) => s.gain)
		},
	}
}

/**
 * Validate a parsed sidecar document
 */
export function parseSidecar(input: unknown): SidecarDocument {
	const result = sidecarSchema.safeParse(input)
	if (!result.success) {
		throw new MetadataError(`Invalid sidecar: ${describeIssues(result.error)}`, { cause: result.error })
	}
	return result.data
}

/**
 * Validate sidecar JSON text
 */
export function parseSidecarJson(text: string): SidecarDocument {
	let input: unknown
	try {
		input = JSON.parse(text)
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err)
		throw new MetadataError(`Invalid sidecar JSON: ${reason}`, { cause: err })
	}
	return parseSidecar(input)
}

/**
 * Provider answering from a sidecar document
 * Gain falls back to iso / baseIso, then to 1
 */
export function createSidecarMetadataProvider(
	document: unknown,
	options: SidecarMetadataProviderOptions = {}
): MetadataProvider {
	const { images } = parseSidecar(document)
	const baseIso = checkBaseIso(options.baseIso ?? DEFAULT_BASE_ISO)

	const entryFor = (identifier: string): SidecarEntry => {
		const entry = images[identifier]
		if (!entry) {
			throw new MetadataError(`${identifier}: not listed in sidecar`, { identifier })
		}
		return entry
	}

	const gainOf = (entry: SidecarEntry): number => {
		if (entry.gain !== undefined) return entry.gain
		if (entry.iso !== undefined) return isoToGain(entry.iso, baseIso)
		return 1
	}

	return {
		async getExposures(identifiers) {
			return identifiers.map((id) => entryFor(id).exposure)
		},
		async getGains(identifiers) {
			return identifiers.map((id) => gainOf(entryFor(id)))
		},
	}
}
