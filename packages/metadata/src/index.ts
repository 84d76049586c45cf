/**
 * @poisson-hdr/metadata
 *
 * Exposure time and sensor gain for each image of a bracketed set
 *
 * Features:
 * - EXIF extraction from JPEG (APP1) and TIFF
 * - ISO to gain conversion against a base ISO
 * - Metadata providers backed by EXIF or a JSON sidecar
 */

export * from './exif'
export { type CaptureSettings, isoToGain, readCaptureSettings } from './exposure'
export * from './providers'
