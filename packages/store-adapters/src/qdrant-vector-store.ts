/**
 * @cortex-lens/store-adapters — Qdrant reader
 *
 * Point counts per collection, the identity point's counters, and a scroll
 * over conscious memories with their dense vectors.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import {
  COLLECTIONS,
  type EmbeddingSample,
  IDENTITY_POINT_ID,
  type IdentityRecord,
  type VectorStoreReader,
} from './types.js';

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
}

export class QdrantVectorStore implements VectorStoreReader {
  private client: QdrantClient;

  constructor(opts: QdrantVectorStoreOptions) {
    this.client = new QdrantClient({
      url: opts.url,
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs ?? 1_000,
      checkCompatibility: false,
    });
  }

  async countPoints(collection: string): Promise<number> {
    const info = await this.client.getCollection(collection);
    return info.points_count ?? 0;
  }

  async readIdentity(): Promise<IdentityRecord | null> {
    const points = await this.client.retrieve(COLLECTIONS.identity, {
      ids: [IDENTITY_POINT_ID],
      with_payload: true,
      with_vector: false,
    });
    const payload = points[0]?.payload;
    if (!payload) return null;

    return {
      lifetimeThoughts: numberField(payload, 'lifetime_thought_count') ?? 0,
      restartCount: numberField(payload, 'restart_count') ?? 0,
      lifetimeDreams: numberField(payload, 'lifetime_dream_count') ?? 0,
    };
  }

  async sampleEmbeddings(limit: number): Promise<EmbeddingSample[]> {
    const page = await this.client.scroll(COLLECTIONS.conscious, {
      limit,
      with_payload: true,
      with_vector: true,
    });

    const samples: EmbeddingSample[] = [];
    for (const point of page.points) {
      const vector = toDenseVector(point.vector);
      // Named or sparse vectors carry no single embedding to project.
      if (!vector) continue;

      const payload = point.payload ?? {};
      const encodedAt = payload.encoded_at;
      const recordedAt =
        typeof encodedAt === 'string' ? Date.parse(encodedAt) : Number.NaN;

      samples.push({
        id: String(point.id),
        vector,
        salience: numberField(payload, 'semantic_salience') ?? 0.5,
        recordedAt: Number.isFinite(recordedAt) ? recordedAt : null,
      });
    }
    return samples;
  }

  async close(): Promise<void> {
    // The REST client keeps no persistent connection.
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function numberField(
  payload: Record<string, unknown>,
  key: string,
): number | undefined {
  const value = payload[key];
  return typeof value === 'number' && Number.isFinite(value)
    ? value
    : undefined;
}

function toDenseVector(raw: unknown): number[] | null {
  if (!Array.isArray(raw)) return null;
  const out: number[] = [];
  for (const x of raw) {
    if (typeof x !== 'number') return null;
    out.push(x);
  }
  return out;
}
