/**
 * @cortex-lens/core
 *
 * Shared types, errors, and primitives for cortex-lens.
 * This package has no runtime dependencies on any other cortex-lens package.
 */

// Snapshots and point clouds
export type {
  ActorMetrics,
  ActorStatus,
  AnchorPoint,
  CognitiveMetrics,
  EmotionalMetrics,
  IdentityMetrics,
  PointCloud,
  ProjectionKind,
  Snapshot,
  ThoughtSummary,
  Vec3,
  VectorPoint,
} from './snapshots.js';
export { RECENT_THOUGHTS_LIMIT } from './snapshots.js';

// Errors
export type { LensErrorCode } from './errors.js';
export {
  ConfigurationError,
  errorMessage,
  LensError,
  MalformedSampleError,
  SessionWriteError,
  SourceUnavailableError,
  TimeoutError,
} from './errors.js';

// Latest-value cell
export type { CellListener } from './cell.js';
export { LatestValueCell } from './cell.js';

// Utilities
export type { Clock } from './utils.js';
export { clamp, deepFreeze, generateId, now, withTimeout } from './utils.js';
