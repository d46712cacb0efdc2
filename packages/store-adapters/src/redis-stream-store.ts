/**
 * @cortex-lens/store-adapters — Redis stream reader
 *
 * Reads the thought stream with XLEN / XREVRANGE and actor liveness with
 * HGETALL. The offline queue is disabled so a lost connection fails calls
 * immediately instead of parking them until reconnect.
 */

import { Redis } from 'ioredis';
import type { StreamEntry, StreamStoreReader } from './types.js';

export interface RedisStreamStoreOptions {
  url: string;
  /** Stream holding thought entries */
  streamKey: string;
  /** Hash of actor name → status JSON */
  actorKey: string;
  connectTimeoutMs?: number;
  /** Per-command deadline; a command past it rejects */
  commandTimeoutMs?: number;
  /** Connection-level errors (ioredis emits them as events) */
  onError?: (err: Error) => void;
}

export class RedisStreamStore implements StreamStoreReader {
  private redis: Redis;
  private streamKey: string;
  private actorKey: string;

  constructor(opts: RedisStreamStoreOptions) {
    this.streamKey = opts.streamKey;
    this.actorKey = opts.actorKey;
    this.redis = new Redis(opts.url, {
      enableOfflineQueue: false,
      maxRetriesPerRequest: 0,
      connectTimeout: opts.connectTimeoutMs ?? 1_000,
      commandTimeout: opts.commandTimeoutMs ?? 1_000,
      retryStrategy: (times) => Math.min(times * 200, 2_000),
    });
    this.redis.on('error', (err: Error) => opts.onError?.(err));
  }

  length(): Promise<number> {
    return this.redis.xlen(this.streamKey);
  }

  async latest(count: number): Promise<StreamEntry[]> {
    const rows = await this.redis.xrevrange(
      this.streamKey,
      '+',
      '-',
      'COUNT',
      count,
    );
    return rows.map(([id, flat]) => ({ id, fields: pairsToRecord(flat) }));
  }

  actorStatuses(): Promise<Record<string, string>> {
    return this.redis.hgetall(this.actorKey);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

function pairsToRecord(flat: string[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    record[flat[i]] = flat[i + 1];
  }
  return record;
}
