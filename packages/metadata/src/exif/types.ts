/**
 * EXIF metadata types
 */

/** EXIF data types */
export enum ExifType {
	BYTE = 1,
	ASCII = 2,
	SHORT = 3,
	LONG = 4,
	RATIONAL = 5,
	SBYTE = 6,
	UNDEFINED = 7,
	SSHORT = 8,
	SLONG = 9,
	SRATIONAL = 10,
	FLOAT = 11,
	DOUBLE = 12,
}

/** EXIF sub-IFD pointer tag */
export const EXIF_IFD_POINTER = 0x8769

/** Tags read from IFD0 and the EXIF sub-IFD */
export const ExifTags: Record<number, string> = {
	271: 'Make',
	272: 'Model',
	274: 'Orientation',
	305: 'Software',
	306: 'DateTime',
	34665: 'ExifIFDPointer',
	34853: 'GPSInfoIFDPointer',

	33434: 'ExposureTime',
	33437: 'FNumber',
	34850: 'ExposureProgram',
	34855: 'ISOSpeedRatings',
	34864: 'SensitivityType',
	34866: 'RecommendedExposureIndex',
	36867: 'DateTimeOriginal',
	37377: 'ShutterSpeedValue',
	37378: 'ApertureValue',
	37380: 'ExposureBiasValue',
	37383: 'MeteringMode',
	37385: 'Flash',
	37386: 'FocalLength',
	41986: 'ExposureMode',
	41991: 'GainControl',
}

/** Decoded tag value */
export type ExifValue = number | string | number[] | Uint8Array | null

/** Capture settings relevant to radiance estimation */
export interface ExifData {
	/** Exposure time in seconds */
	exposureTime?: number
	/** ISO speed rating */
	iso?: number

	/** All parsed tags by name, unknown tags as `Tag_0x....` */
	raw: Record<string, ExifValue>
}

/** EXIF entry */
export interface ExifEntry {
	tag: number
	type: number
	count: number
	value: ExifValue
}
