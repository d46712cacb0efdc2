/**
 * @cortex-lens/store-adapters — Live client tests
 *
 * The Redis and Qdrant clients are replaced with stubs; these tests cover
 * how their replies are turned into stream entries, identity records and
 * embedding samples.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { Redis } from 'ioredis';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  COLLECTIONS,
  IDENTITY_POINT_ID,
  QdrantVectorStore,
  RedisStreamStore,
} from '../src/index.js';

const stubs = vi.hoisted(() => {
  const redis = {
    xlen: vi.fn(),
    xrevrange: vi.fn(),
    hgetall: vi.fn(),
    quit: vi.fn(),
    on: vi.fn((_event: string, _listener: (err: Error) => void) => {}),
  };
  const qdrant = {
    getCollection: vi.fn(),
    retrieve: vi.fn(),
    scroll: vi.fn(),
  };
  return { redis, qdrant };
});

vi.mock('ioredis', () => ({
  Redis: vi.fn(function () {
    return stubs.redis;
  }),
}));

vi.mock('@qdrant/js-client-rest', () => ({
  QdrantClient: vi.fn(function () {
    return stubs.qdrant;
  }),
}));

beforeEach(() => {
  vi.clearAllMocks();
});

// ---------------------------------------------------------------------------
// Redis
// ---------------------------------------------------------------------------

describe('RedisStreamStore', () => {
  const open = (onError?: (err: Error) => void) =>
    new RedisStreamStore({
      url: 'redis://localhost:6379',
      streamKey: 'daneel:stream:awake',
      actorKey: 'daneel:actors',
      connectTimeoutMs: 150,
      commandTimeoutMs: 150,
      onError,
    });

  it('fails fast instead of queueing while disconnected', () => {
    open();

    expect(Redis).toHaveBeenCalledWith(
      'redis://localhost:6379',
      expect.objectContaining({
        enableOfflineQueue: false,
        maxRetriesPerRequest: 0,
        connectTimeout: 150,
        commandTimeout: 150,
      }),
    );
  });

  it('pairs XREVRANGE field lists into records', async () => {
    stubs.redis.xrevrange.mockResolvedValue([
      ['2-0', ['content', 'second', 'salience', '0.4']],
      ['1-0', ['content', 'first', 'dangling']],
    ]);

    const entries = await open().latest(20);

    expect(stubs.redis.xrevrange).toHaveBeenCalledWith(
      'daneel:stream:awake',
      '+',
      '-',
      'COUNT',
      20,
    );
    expect(entries).toEqual([
      { id: '2-0', fields: { content: 'second', salience: '0.4' } },
      { id: '1-0', fields: { content: 'first' } },
    ]);
  });

  it('reads the stream length and actor hash from their keys', async () => {
    stubs.redis.xlen.mockResolvedValue(12);
    stubs.redis.hgetall.mockResolvedValue({ memory: '{"alive":true}' });
    const store = open();

    expect(await store.length()).toBe(12);
    expect(await store.actorStatuses()).toEqual({ memory: '{"alive":true}' });
    expect(stubs.redis.xlen).toHaveBeenCalledWith('daneel:stream:awake');
    expect(stubs.redis.hgetall).toHaveBeenCalledWith('daneel:actors');
  });

  it('reports connection errors to the callback', () => {
    const onError = vi.fn();
    open(onError);

    const [event, listener] = stubs.redis.on.mock.calls[0];
    listener(new Error('ECONNREFUSED'));

    expect(event).toBe('error');
    expect(onError).toHaveBeenCalledWith(new Error('ECONNREFUSED'));
  });

  it('quits on close', async () => {
    stubs.redis.quit.mockResolvedValue('OK');

    await open().close();

    expect(stubs.redis.quit).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Qdrant
// ---------------------------------------------------------------------------

describe('QdrantVectorStore', () => {
  const open = () =>
    new QdrantVectorStore({ url: 'http://localhost:6333', apiKey: 'test-key', timeoutMs: 150 });

  it('passes the timeout to the client', () => {
    open();

    expect(QdrantClient).toHaveBeenCalledWith({
      url: 'http://localhost:6333',
      apiKey: 'test-key',
      timeout: 150,
      checkCompatibility: false,
    });
  });

  it('counts points, treating a missing count as zero', async () => {
    stubs.qdrant.getCollection
      .mockResolvedValueOnce({ points_count: 7 })
      .mockResolvedValueOnce({});
    const store = open();

    expect(await store.countPoints(COLLECTIONS.conscious)).toBe(7);
    expect(await store.countPoints(COLLECTIONS.unconscious)).toBe(0);
    expect(stubs.qdrant.getCollection).toHaveBeenCalledWith('memories');
  });

  describe('readIdentity', () => {
    it('reads the counters of the identity point', async () => {
      stubs.qdrant.retrieve.mockResolvedValue([
        {
          id: IDENTITY_POINT_ID,
          payload: { lifetime_thought_count: 40, restart_count: 2, lifetime_dream_count: 5 },
        },
      ]);

      expect(await open().readIdentity()).toEqual({
        lifetimeThoughts: 40,
        restartCount: 2,
        lifetimeDreams: 5,
      });
      expect(stubs.qdrant.retrieve).toHaveBeenCalledWith('identity', {
        ids: [IDENTITY_POINT_ID],
        with_payload: true,
        with_vector: false,
      });
    });

    it('defaults missing or non-numeric counters to zero', async () => {
      stubs.qdrant.retrieve.mockResolvedValue([
        { id: IDENTITY_POINT_ID, payload: { restart_count: 'three' } },
      ]);

      expect(await open().readIdentity()).toEqual({
        lifetimeThoughts: 0,
        restartCount: 0,
        lifetimeDreams: 0,
      });
    });

    it('returns null when the identity point is absent', async () => {
      stubs.qdrant.retrieve.mockResolvedValue([]);

      expect(await open().readIdentity()).toBeNull();
    });
  });

  describe('sampleEmbeddings', () => {
    it('keeps dense vectors and reads salience and encoding time', async () => {
      stubs.qdrant.scroll.mockResolvedValue({
        points: [
          {
            id: 'a',
            vector: [0.1, 0.2, 0.3],
            payload: { semantic_salience: 0.8, encoded_at: '2026-01-01T00:00:00Z' },
          },
          { id: 7, vector: { dense: [1, 2, 3] }, payload: {} },
          { id: 8, vector: [1, 'x', 3], payload: {} },
          { id: 9, vector: [1, 2, 3], payload: { encoded_at: 'yesterday' } },
          { id: 10, vector: [4, 5, 6] },
        ],
      });

      const samples = await open().sampleEmbeddings(50);

      expect(stubs.qdrant.scroll).toHaveBeenCalledWith('memories', {
        limit: 50,
        with_payload: true,
        with_vector: true,
      });
      expect(samples).toEqual([
        {
          id: 'a',
          vector: [0.1, 0.2, 0.3],
          salience: 0.8,
          recordedAt: Date.parse('2026-01-01T00:00:00Z'),
        },
        { id: '9', vector: [1, 2, 3], salience: 0.5, recordedAt: null },
        { id: '10', vector: [4, 5, 6], salience: 0.5, recordedAt: null },
      ]);
    });
  });
});
