/**
 * @poisson-hdr/core
 *
 * Shared types for HDR stack merging:
 * - Float RGB pixel buffers
 * - Channel coefficient triple
 * - Tagged error taxonomy
 * - Input format detection
 */

export * from './errors'
export * from './format'
export * from './types'
