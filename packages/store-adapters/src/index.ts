/**
 * @cortex-lens/store-adapters
 */

export type {
  EmbeddingSample,
  IdentityRecord,
  StreamEntry,
  StreamStoreReader,
  VectorStoreReader,
} from './types.js';
export { COLLECTIONS, IDENTITY_POINT_ID } from './types.js';
export type { RedisStreamStoreOptions } from './redis-stream-store.js';
export { RedisStreamStore } from './redis-stream-store.js';
export type { QdrantVectorStoreOptions } from './qdrant-vector-store.js';
export { QdrantVectorStore } from './qdrant-vector-store.js';
export type { StoreMode } from './memory.js';
export { InMemoryStreamStore, InMemoryVectorStore } from './memory.js';
