/**
 * @cortex-lens/store-adapters — In-memory stand-ins
 *
 * Same interfaces as the live readers, backed by plain arrays. Each store
 * can be switched to fail every call or to hang forever, which is how the
 * collector and projection tests simulate outages and slow sources.
 */

import {
  COLLECTIONS,
  type EmbeddingSample,
  type IdentityRecord,
  type StreamEntry,
  type StreamStoreReader,
  type VectorStoreReader,
} from './types.js';

export type StoreMode = 'ok' | 'fail' | 'hang';

abstract class SwitchableStore {
  mode: StoreMode = 'ok';
  calls = 0;

  protected respond<T>(value: () => T): Promise<T> {
    this.calls++;
    switch (this.mode) {
      case 'fail':
        return Promise.reject(new Error(`${this.constructor.name} unavailable`));
      case 'hang':
        return new Promise<T>(() => {});
      default:
        return Promise.resolve(value());
    }
  }
}

// ---------------------------------------------------------------------------
// Stream store
// ---------------------------------------------------------------------------

export class InMemoryStreamStore
  extends SwitchableStore
  implements StreamStoreReader
{
  /** Append order: oldest first */
  private entries: StreamEntry[] = [];
  private actors: Record<string, string> = {};
  private lastMs = 0;
  private seq = 0;

  /**
   * Append an entry. Ids follow the Redis `<ms>-<seq>` shape unless one is
   * given explicitly.
   */
  append(fields: Record<string, string>, id?: string): StreamEntry {
    const entry = { id: id ?? this.nextId(), fields: { ...fields } };
    this.entries.push(entry);
    return entry;
  }

  setActor(name: string, status: { alive: boolean; restart_count: number }) {
    this.actors[name] = JSON.stringify(status);
  }

  setRawActor(name: string, raw: string) {
    this.actors[name] = raw;
  }

  length(): Promise<number> {
    return this.respond(() => this.entries.length);
  }

  latest(count: number): Promise<StreamEntry[]> {
    return this.respond(() =>
      this.entries
        .slice(-count)
        .reverse()
        .map((e) => ({ id: e.id, fields: { ...e.fields } })),
    );
  }

  actorStatuses(): Promise<Record<string, string>> {
    return this.respond(() => ({ ...this.actors }));
  }

  async close(): Promise<void> {}

  private nextId(): string {
    const ms = Date.now();
    this.seq = ms === this.lastMs ? this.seq + 1 : 0;
    this.lastMs = ms;
    return `${ms}-${this.seq}`;
  }
}

// ---------------------------------------------------------------------------
// Vector store
// ---------------------------------------------------------------------------

export class InMemoryVectorStore
  extends SwitchableStore
  implements VectorStoreReader
{
  counts: Record<string, number> = {
    [COLLECTIONS.conscious]: 0,
    [COLLECTIONS.unconscious]: 0,
  };
  identity: IdentityRecord | null = null;
  samples: EmbeddingSample[] = [];

  countPoints(collection: string): Promise<number> {
    return this.respond(() => this.counts[collection] ?? 0);
  }

  readIdentity(): Promise<IdentityRecord | null> {
    return this.respond(() => (this.identity ? { ...this.identity } : null));
  }

  sampleEmbeddings(limit: number): Promise<EmbeddingSample[]> {
    return this.respond(() =>
      this.samples
        .slice(0, limit)
        .map((s) => ({ ...s, vector: [...s.vector] })),
    );
  }

  async close(): Promise<void> {}
}
