/**
 * Exposure and gain extraction from EXIF
 */

import { DEFAULT_BASE_ISO, MetadataError } from '@poisson-hdr/core'
import { readExif } from './exif'

export interface CaptureSettings {
	/** Exposure time in seconds */
	exposure: number
	/** Sensor gain relative to the base ISO */
	gain: number
}

/**
 * Convert an ISO rating to a linear gain, base ISO = gain 1
 */
export function isoToGain(iso: number, baseIso: number = DEFAULT_BASE_ISO): number {
	return iso / baseIso
}

function isPositive(value: number | undefined): value is number {
	return value !== undefined && Number.isFinite(value) && value > 0
}

/**
 * Read exposure time and gain from the EXIF block of a JPEG or TIFF file
 */
export function readCaptureSettings(
	data: Uint8Array,
	identifier: string,
	baseIso: number = DEFAULT_BASE_ISO
): CaptureSettings {
	const exif = readExif(data)
	if (!exif) {
		throw new MetadataError(`${identifier}: no EXIF data`, { identifier })
	}

	if (!isPositive(exif.exposureTime)) {
		const reason = exif.exposureTime === undefined ? 'missing' : `invalid (${exif.exposureTime})`
		throw new MetadataError(`${identifier}: ExposureTime is ${reason}`, { identifier })
	}

	if (!isPositive(exif.iso)) {
		const reason = exif.iso === undefined ? 'missing' : `invalid (${exif.iso})`
		throw new MetadataError(`${identifier}: ISOSpeedRatings is ${reason}`, { identifier })
	}

	return { exposure: exif.exposureTime, gain: isoToGain(exif.iso, baseIso) }
}
