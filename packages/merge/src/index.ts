/**
 * @poisson-hdr/merge
 *
 * HDR merge with the Poisson photon noise estimator:
 * - Radiance scaling by exposure, gain and channel coefficient
 * - Exposure-weighted accumulation
 * - Orchestration over metadata and decoder collaborators
 */

export { accumulateWeighted } from './accumulate'
export {
	calculatePoissonEstimate,
	type MergeCollaborators,
	type MergedRadiance,
	type MergeOptions,
	type MergeProgress,
	tryCalculatePoissonEstimate,
} from './estimate'
export { scaleRadiance } from './radiance'
