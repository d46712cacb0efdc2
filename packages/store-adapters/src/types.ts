/**
 * @cortex-lens/store-adapters — Reader interfaces
 *
 * Read-only views of the two external stores. Implementations hold
 * connection handles and nothing else; callers own timeouts and retries.
 */

// ---------------------------------------------------------------------------
// Stream store
// ---------------------------------------------------------------------------

/** One raw stream entry: the entry id plus its field/value pairs. */
export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

export interface StreamStoreReader {
  /** Number of entries currently in the thought stream. */
  length(): Promise<number>;
  /** The newest `count` entries, newest first. */
  latest(count: number): Promise<StreamEntry[]>;
  /** Actor name → raw status value (JSON `{alive, restart_count}`). */
  actorStatuses(): Promise<Record<string, string>>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Vector store
// ---------------------------------------------------------------------------

export interface IdentityRecord {
  lifetimeThoughts: number;
  restartCount: number;
  lifetimeDreams: number;
}

export interface EmbeddingSample {
  id: string;
  vector: number[];
  salience: number;
  /** Epoch ms at which the memory was recorded, when the store reports it. */
  recordedAt: number | null;
}

export interface VectorStoreReader {
  countPoints(collection: string): Promise<number>;
  /** The persisted identity record, or `null` when none exists yet. */
  readIdentity(): Promise<IdentityRecord | null>;
  sampleEmbeddings(limit: number): Promise<EmbeddingSample[]>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Collection names
// ---------------------------------------------------------------------------

export const COLLECTIONS = {
  conscious: 'memories',
  unconscious: 'unconscious',
  identity: 'identity',
} as const;

export const IDENTITY_POINT_ID = '00000000-0000-0000-0000-000000000001';
