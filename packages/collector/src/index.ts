/**
 * @cortex-lens/collector
 */

export type {
  CollectorOptions,
  CollectorStats,
  SourceHealth,
  SourceName,
} from './collector.js';
export { Collector } from './collector.js';
export type { SnapshotListener } from './snapshot-store.js';
export { SnapshotStore } from './snapshot-store.js';
export type { EmotionalPrimitives } from './derive.js';
export {
  deriveEmotional,
  NEUTRAL_EMOTION,
  primitivesFrom,
  resolveActors,
} from './derive.js';
export type { ThoughtRecord } from './thoughts.js';
export { entryTime, parseThought, PREVIEW_LENGTH, previewOf } from './thoughts.js';
