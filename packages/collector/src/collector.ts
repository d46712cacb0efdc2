/**
 * @cortex-lens/collector — Collector
 *
 * Polls the stream store and the vector store on a fixed tick and publishes
 * one new Snapshot per tick. Each source is read under its own timeout; a
 * source that fails keeps its fields from the previous tick and is marked
 * stale, and the tick is published anyway.
 */

import {
  type Clock,
  ConfigurationError,
  deepFreeze,
  errorMessage,
  now,
  RECENT_THOUGHTS_LIMIT,
  type Snapshot,
  SourceUnavailableError,
  type ThoughtSummary,
  withTimeout,
} from '@cortex-lens/core';
import { TickTracer } from '@cortex-lens/observability';
import {
  COLLECTIONS,
  type IdentityRecord,
  type StreamStoreReader,
  type VectorStoreReader,
} from '@cortex-lens/store-adapters';
import { type Logger, pino } from 'pino';
import {
  deadActors,
  deriveEmotional,
  type EmotionalPrimitives,
  NEUTRAL_EMOTION,
  primitivesFrom,
  resolveActors,
} from './derive.js';
import type { SnapshotStore } from './snapshot-store.js';
import { parseThought, type ThoughtRecord } from './thoughts.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SourceName = 'stream' | 'vector';

export interface CollectorOptions {
  streamStore: StreamStoreReader;
  vectorStore: VectorStoreReader;
  snapshotStore: SnapshotStore;
  /** Name reported in `identity.name` */
  identityName: string;
  /** Actors reported in `actors`, in order */
  actors: readonly string[];
  /** Default: 200 */
  tickIntervalMs?: number;
  /** Per-source read timeout. Must be below the tick interval. Default: 150 */
  sourceTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
  tracer?: TickTracer;
}

export interface SourceHealth {
  stale: boolean;
  consecutiveFailures: number;
  lastSuccessAt: number | null;
}

export interface CollectorStats {
  ticks: number;
  skippedTicks: number;
  malformedThoughts: number;
  sources: Record<SourceName, SourceHealth>;
}

/** Fields owned by the stream source */
interface StreamReading {
  thoughts: ThoughtSummary[];
  sessionThoughts: number;
  primitives: EmotionalPrimitives;
  actors: Snapshot['actors'];
}

/** Fields owned by the vector source */
interface VectorReading {
  consciousMemories: number;
  unconsciousMemories: number;
  identity: IdentityRecord;
}

// ---------------------------------------------------------------------------
// Collector
// ---------------------------------------------------------------------------

export class Collector {
  private readonly streamStore: StreamStoreReader;
  private readonly vectorStore: VectorStoreReader;
  private readonly snapshotStore: SnapshotStore;
  private readonly identityName: string;
  private readonly actors: readonly string[];
  private readonly tickIntervalMs: number;
  private readonly sourceTimeoutMs: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly tracer: TickTracer;
  private readonly startedAt: number;

  private stream: StreamReading;
  private vector: VectorReading;
  private lastTimestampMs = 0;

  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  private stats: CollectorStats = {
    ticks: 0,
    skippedTicks: 0,
    malformedThoughts: 0,
    sources: {
      stream: { stale: false, consecutiveFailures: 0, lastSuccessAt: null },
      vector: { stale: false, consecutiveFailures: 0, lastSuccessAt: null },
    },
  };

  constructor(opts: CollectorOptions) {
    this.streamStore = opts.streamStore;
    this.vectorStore = opts.vectorStore;
    this.snapshotStore = opts.snapshotStore;
    this.identityName = opts.identityName;
    this.actors = opts.actors;
    this.tickIntervalMs = opts.tickIntervalMs ?? 200;
    this.sourceTimeoutMs = opts.sourceTimeoutMs ?? 150;
    this.clock = opts.clock ?? now;
    this.log = opts.logger ?? pino({ level: 'silent' });
    this.tracer = opts.tracer ?? new TickTracer();

    if (this.tickIntervalMs <= 0) {
      throw new ConfigurationError('Tick interval must be positive');
    }
    if (this.sourceTimeoutMs <= 0 || this.sourceTimeoutMs >= this.tickIntervalMs) {
      throw new ConfigurationError(
        `Source timeout (${this.sourceTimeoutMs}ms) must be positive and below the tick interval (${this.tickIntervalMs}ms)`,
      );
    }

    this.startedAt = this.clock();
    this.stream = {
      thoughts: [],
      sessionThoughts: 0,
      primitives: NEUTRAL_EMOTION,
      actors: deadActors(this.actors),
    };
    this.vector = {
      consciousMemories: 0,
      unconsciousMemories: 0,
      identity: { lifetimeThoughts: 0, restartCount: 0, lifetimeDreams: 0 },
    };
  }

  // -------------------------------------------------------------------------
  // Scheduling
  // -------------------------------------------------------------------------

  /**
   * Run one tick immediately, then one per interval. A tick that is still
   * running when the next one is due causes that one to be skipped.
   */
  start(): void {
    if (this.timer) return;
    this.schedule();
    this.timer = setInterval(() => this.schedule(), this.tickIntervalMs);
    this.log.info(
      { tickIntervalMs: this.tickIntervalMs, sourceTimeoutMs: this.sourceTimeoutMs },
      'collector started',
    );
  }

  /** Stop ticking. In-flight ticks are allowed to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  private schedule(): void {
    if (this.inFlight) {
      this.stats.skippedTicks++;
      return;
    }
    this.inFlight = this.tick()
      .then(() => undefined)
      .catch((err: unknown) => {
        this.log.error({ err }, 'collector tick failed');
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  // -------------------------------------------------------------------------
  // Tick
  // -------------------------------------------------------------------------

  /**
   * Read both sources, build a new Snapshot and publish it. Never rejects
   * because of a source failure.
   */
  tick(): Promise<Snapshot> {
    return this.tracer.trace('collector.tick', async (span) => {
      const [stream, vector] = await Promise.allSettled([
        this.read('stream', () => this.readStream()),
        this.read('vector', () => this.readVector()),
      ]);

      if (stream.status === 'fulfilled') this.stream = stream.value;
      if (vector.status === 'fulfilled') this.vector = vector.value;

      const snapshot = this.buildSnapshot();
      this.snapshotStore.publish(snapshot);
      this.stats.ticks++;

      span.setAttributes({
        'lens.stream_stale': this.stats.sources.stream.stale,
        'lens.vector_stale': this.stats.sources.vector.stale,
        'lens.thoughts': snapshot.recent_thoughts.length,
      });
      return snapshot;
    });
  }

  /**
   * Run a source read under the source timeout and keep the source's
   * health record. Failures surface as SourceUnavailableError.
   */
  private async read<T>(source: SourceName, fn: () => Promise<T>): Promise<T> {
    const health = this.stats.sources[source];
    try {
      const value = await withTimeout(fn(), this.sourceTimeoutMs, source);
      if (health.stale) {
        this.log.info(
          { source, failures: health.consecutiveFailures },
          'source recovered',
        );
      }
      health.stale = false;
      health.consecutiveFailures = 0;
      health.lastSuccessAt = this.clock();
      return value;
    } catch (cause) {
      const err = new SourceUnavailableError(source, cause);
      health.stale = true;
      health.consecutiveFailures++;
      if (health.consecutiveFailures === 1) {
        this.log.warn({ source, reason: errorMessage(cause) }, err.message);
      } else {
        this.log.debug(
          { source, failures: health.consecutiveFailures },
          'source still unavailable',
        );
      }
      throw err;
    }
  }

  private async readStream(): Promise<StreamReading> {
    const [length, entries, rawActors] = await Promise.all([
      this.streamStore.length(),
      this.streamStore.latest(RECENT_THOUGHTS_LIMIT),
      this.streamStore.actorStatuses(),
    ]);

    const readAt = this.clock();
    const thoughts: ThoughtRecord[] = [];
    for (const entry of entries) {
      const parsed = parseThought(entry, readAt);
      if (parsed instanceof Error) {
        this.stats.malformedThoughts++;
        this.log.debug({ id: parsed.sampleId }, parsed.message);
        continue;
      }
      thoughts.push(parsed);
    }

    return {
      thoughts: thoughts
        .slice(0, RECENT_THOUGHTS_LIMIT)
        .map((t) => t.summary),
      sessionThoughts: length,
      primitives: primitivesFrom(thoughts),
      actors: resolveActors(this.actors, rawActors),
    };
  }

  private async readVector(): Promise<VectorReading> {
    const [consciousMemories, unconsciousMemories, identity] =
      await Promise.all([
        this.vectorStore.countPoints(COLLECTIONS.conscious),
        this.vectorStore.countPoints(COLLECTIONS.unconscious),
        this.vectorStore.readIdentity(),
      ]);

    return {
      consciousMemories,
      unconsciousMemories,
      identity: identity ?? this.vector.identity,
    };
  }

  // -------------------------------------------------------------------------
  // Snapshot assembly
  // -------------------------------------------------------------------------

  private buildSnapshot(): Snapshot {
    const nowMs = this.clock();
    // Wall clock may step backwards; timestamps must not.
    const timestampMs = Math.max(nowMs, this.lastTimestampMs);
    this.lastTimestampMs = timestampMs;

    const { stream, vector } = this;

    return deepFreeze({
      timestamp: new Date(timestampMs).toISOString(),
      identity: {
        name: this.identityName,
        uptime_seconds: Math.max(0, Math.floor((nowMs - this.startedAt) / 1000)),
        lifetime_thoughts: vector.identity.lifetimeThoughts,
        session_thoughts: stream.sessionThoughts,
        restart_count: vector.identity.restartCount,
      },
      cognitive: {
        conscious_memories: vector.consciousMemories,
        unconscious_memories: vector.unconsciousMemories,
        lifetime_dreams: vector.identity.lifetimeDreams,
        current_cycle: stream.sessionThoughts,
      },
      emotional: deriveEmotional(stream.primitives),
      actors: { ...stream.actors },
      recent_thoughts: stream.thoughts.map((t) => ({ ...t })),
    });
  }

  // -------------------------------------------------------------------------
  // Inspection
  // -------------------------------------------------------------------------

  /** A copy of the tick counters and per-source staleness. */
  getStats(): CollectorStats {
    return {
      ...this.stats,
      sources: {
        stream: { ...this.stats.sources.stream },
        vector: { ...this.stats.sources.vector },
      },
    };
  }

  isStale(source: SourceName): boolean {
    return this.stats.sources[source].stale;
  }
}
