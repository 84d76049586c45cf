/**
 * TIFF format types and constants
 */

// TIFF signatures
export const TIFF_LITTLE_ENDIAN = 0x4949 // 'II'
export const TIFF_BIG_ENDIAN = 0x4d4d // 'MM'
export const TIFF_MAGIC = 42 // Classic TIFF

// Tag data types
export enum TagType {
	Byte = 1,
	Ascii = 2,
	Short = 3,
	Long = 4,
	Rational = 5,
	SByte = 6,
	Undefined = 7,
	SShort = 8,
	SLong = 9,
	SRational = 10,
	Float = 11,
	Double = 12,
}

// Baseline tags the decoder reads
export enum Tag {
	ImageWidth = 256,
	ImageLength = 257,
	BitsPerSample = 258,
	Compression = 259,
	PhotometricInterpretation = 262,
	StripOffsets = 273,
	SamplesPerPixel = 277,
	RowsPerStrip = 278,
	StripByteCounts = 279,
	PlanarConfiguration = 284,
	TileWidth = 322,
	ExtraSamples = 338,
	SampleFormat = 339,
}

// Compression types
export enum Compression {
	None = 1,
	LZW = 5,
	JPEG = 7,
	Deflate = 8,
	PackBits = 32773,
}

// Photometric interpretation
export enum Photometric {
	WhiteIsZero = 0,
	BlackIsZero = 1,
	RGB = 2,
	Palette = 3,
	TransparencyMask = 4,
	CMYK = 5,
	YCbCr = 6,
	CIELab = 8,
}

// Planar configuration
export enum PlanarConfig {
	Chunky = 1, // RGBRGBRGB
	Planar = 2, // RRRGGGBBB
}

// Sample format
export enum SampleFormat {
	Unsigned = 1,
	Signed = 2,
	Float = 3,
	Undefined = 4,
}

/**
 * IFD entry
 */
export interface IFDEntry {
	tag: number
	type: number
	count: number
	value: number | number[] | string
}

/**
 * Image File Directory
 */
export interface IFD {
	entries: Map<number, IFDEntry>
	nextIFDOffset: number
}

/**
 * Parsed TIFF structure
 */
export interface TiffImage {
	littleEndian: boolean
	ifds: IFD[]
}

/**
 * Type sizes in bytes
 */
export const TYPE_SIZES: Record<number, number> = {
	[TagType.Byte]: 1,
	[TagType.Ascii]: 1,
	[TagType.Short]: 2,
	[TagType.Long]: 4,
	[TagType.Rational]: 8,
	[TagType.SByte]: 1,
	[TagType.Undefined]: 1,
	[TagType.SShort]: 2,
	[TagType.SLong]: 4,
	[TagType.SRational]: 8,
	[TagType.Float]: 4,
	[TagType.Double]: 8,
}

/**
 * Human-readable photometric names for error messages
 */
export const PHOTOMETRIC_NAMES: Record<number, string> = {
	[Photometric.WhiteIsZero]: 'grayscale (WhiteIsZero)',
	[Photometric.BlackIsZero]: 'grayscale (BlackIsZero)',
	[Photometric.RGB]: 'RGB',
	[Photometric.Palette]: 'palette',
	[Photometric.TransparencyMask]: 'transparency mask',
	[Photometric.CMYK]: 'CMYK',
	[Photometric.YCbCr]: 'YCbCr',
	[Photometric.CIELab]: 'CIELab',
}
