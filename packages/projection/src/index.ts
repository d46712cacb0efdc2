/**
 * @cortex-lens/projection
 */

export type { AnchorConcept, AnchorEmbedder } from './anchors.js';
export {
  DEFAULT_ANCHORS,
  HashingEmbedder,
  projectAnchors,
} from './anchors.js';
export type { PcaFitOptions, Projector } from './projector.js';
export { PcaProjector, RandomProjector } from './projector.js';
export type {
  ProjectionEngineOptions,
  ProjectionStats,
} from './projection-engine.js';
export { ProjectionEngine } from './projection-engine.js';
