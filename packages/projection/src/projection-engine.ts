/**
 * @cortex-lens/projection — Projection Engine
 *
 * Holds one projection basis and the anchors projected through it, and on
 * its own (coarser) cadence turns a sample of memory embeddings into a new
 * PointCloud. The basis and anchors are built once per start or reset and
 * never change in between.
 */

import {
  type AnchorPoint,
  type Clock,
  ConfigurationError,
  deepFreeze,
  LatestValueCell,
  MalformedSampleError,
  now,
  type PointCloud,
  type ProjectionKind,
  SourceUnavailableError,
  type VectorPoint,
  withTimeout,
} from '@cortex-lens/core';
import { TickTracer } from '@cortex-lens/observability';
import type {
  EmbeddingSample,
  VectorStoreReader,
} from '@cortex-lens/store-adapters';
import { type Logger, pino } from 'pino';
import {
  type AnchorConcept,
  type AnchorEmbedder,
  DEFAULT_ANCHORS,
  HashingEmbedder,
  projectAnchors,
} from './anchors.js';
import { PcaProjector, type Projector, RandomProjector } from './projector.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProjectionEngineOptions {
  vectorStore: VectorStoreReader;
  /** Embedding dimensionality D. Default: 384 */
  dimensions?: number;
  /** Samples per refresh (K). Default: 500 */
  sampleCount?: number;
  /** Default: 2000 */
  refreshIntervalMs?: number;
  /** Vector store read timeout. Must be below the refresh interval. Default: 1000 */
  sourceTimeoutMs?: number;
  /** Basis selected at startup. Default: 'random' */
  projection?: ProjectionKind;
  /** Seed of the random basis. Default: 42 */
  seed?: number;
  anchors?: readonly AnchorConcept[];
  embedder?: AnchorEmbedder;
  clock?: Clock;
  logger?: Logger;
  tracer?: TickTracer;
}

export interface ProjectionStats {
  refreshes: number;
  failedRefreshes: number;
  skippedRefreshes: number;
  droppedTotal: number;
  stale: boolean;
  projection: ProjectionKind | null;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class ProjectionEngine {
  private readonly vectorStore: VectorStoreReader;
  private readonly dimensions: number;
  private readonly sampleCount: number;
  private readonly refreshIntervalMs: number;
  private readonly sourceTimeoutMs: number;
  private readonly requested: ProjectionKind;
  private readonly seed: number;
  private readonly concepts: readonly AnchorConcept[];
  private readonly embedder: AnchorEmbedder;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly tracer: TickTracer;

  private projector: Projector | null = null;
  private anchors: readonly AnchorPoint[] = [];
  private cell = new LatestValueCell<PointCloud>();

  private timer: ReturnType<typeof setInterval> | null = null;
  // Refreshes and basis rebuilds run one at a time, in call order.
  private queue: Promise<unknown> = Promise.resolve();
  private queued = 0;

  private stats = {
    refreshes: 0,
    failedRefreshes: 0,
    skippedRefreshes: 0,
    droppedTotal: 0,
    stale: false,
  };

  constructor(opts: ProjectionEngineOptions) {
    this.vectorStore = opts.vectorStore;
    this.dimensions = opts.dimensions ?? 384;
    this.sampleCount = opts.sampleCount ?? 500;
    this.refreshIntervalMs = opts.refreshIntervalMs ?? 2_000;
    this.sourceTimeoutMs = opts.sourceTimeoutMs ?? 1_000;
    this.requested = opts.projection ?? 'random';
    this.seed = opts.seed ?? 42;
    this.concepts = opts.anchors ?? DEFAULT_ANCHORS;
    this.embedder = opts.embedder ?? new HashingEmbedder(this.dimensions);
    this.clock = opts.clock ?? now;
    this.log = opts.logger ?? pino({ level: 'silent' });
    this.tracer = opts.tracer ?? new TickTracer();

    if (!Number.isInteger(this.dimensions) || this.dimensions < 3) {
      throw new ConfigurationError(
        `Embedding dimensionality must be an integer of at least 3, got ${this.dimensions}`,
      );
    }
    if (this.embedder.dimensions !== this.dimensions) {
      throw new ConfigurationError(
        `Anchor embedder produces ${this.embedder.dimensions} dimensions, basis expects ${this.dimensions}`,
      );
    }
    if (!Number.isInteger(this.sampleCount) || this.sampleCount < 1) {
      throw new ConfigurationError(`Sample count must be a positive integer, got ${this.sampleCount}`);
    }
    if (this.sourceTimeoutMs <= 0 || this.sourceTimeoutMs >= this.refreshIntervalMs) {
      throw new ConfigurationError(
        `Vector store timeout (${this.sourceTimeoutMs}ms) must be positive and below the refresh interval (${this.refreshIntervalMs}ms)`,
      );
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Build the basis and anchors, refresh once, then refresh on the interval.
   */
  async start(): Promise<void> {
    if (this.timer) return;
    if (!this.projector) await this.initialize();
    await this.refresh();
    this.timer = setInterval(() => this.schedule(), this.refreshIntervalMs);
    this.log.info(
      { refreshIntervalMs: this.refreshIntervalMs, sampleCount: this.sampleCount },
      'projection engine started',
    );
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.queue;
  }

  /**
   * Build a new basis and project the anchors through it, then publish a
   * cloud with the anchors and no points.
   */
  initialize(): Promise<void> {
    return this.exclusive(() => this.rebuild());
  }

  /**
   * Drop the basis and anchors and build them again. Points from before
   * the reset are discarded with the old basis; a refresh already running
   * publishes before the reset takes effect.
   */
  reset(): Promise<void> {
    return this.exclusive(async () => {
      this.projector = null;
      this.anchors = [];
      this.cell.clear();
      await this.rebuild();
    });
  }

  private async rebuild(): Promise<void> {
    this.projector = await this.buildProjector();
    this.anchors = deepFreeze(
      projectAnchors(this.concepts, this.embedder, this.projector),
    );
    this.publish([], 0);
    this.log.info(
      { projection: this.projector.kind, dimensions: this.dimensions },
      'projection basis ready',
    );
  }

  private schedule(): void {
    if (this.queued > 0) {
      this.stats.skippedRefreshes++;
      return;
    }
    this.refresh().catch((err: unknown) => {
      this.log.error({ err }, 'projection refresh failed');
    });
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    this.queued++;
    const run = this.queue.then(work).finally(() => {
      this.queued--;
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async buildProjector(): Promise<Projector> {
    if (this.requested === 'random') {
      return new RandomProjector(this.dimensions, this.seed);
    }

    return this.tracer.trace('projection.fit', async (span) => {
      try {
        const samples = await this.sample();
        const usable = samples
          .filter((s) => s.vector.length === this.dimensions)
          .map((s) => s.vector);
        span.setAttribute('lens.samples', usable.length);
        if (usable.length >= 3) {
          return PcaProjector.fit(usable, this.dimensions, { seed: this.seed });
        }
        this.log.warn(
          { samples: usable.length },
          'too few samples to fit PCA, using random projection',
        );
      } catch (err) {
        if (!(err instanceof SourceUnavailableError)) throw err;
        this.log.warn(
          { reason: err.message },
          'vector store unavailable for PCA fit, using random projection',
        );
      }
      return new RandomProjector(this.dimensions, this.seed);
    });
  }

  // -------------------------------------------------------------------------
  // Refresh
  // -------------------------------------------------------------------------

  /**
   * Sample, project and publish a new cloud. When the store is
   * unreachable the previous cloud stays in place and the engine is marked
   * stale. Returns the cloud now current.
   */
  refresh(): Promise<PointCloud | null> {
    return this.exclusive(() => this.refreshNow());
  }

  private refreshNow(): Promise<PointCloud | null> {
    const projector = this.projector;
    if (!projector) {
      return Promise.reject(new Error('Projection engine is not initialized'));
    }

    return this.tracer.trace('projection.refresh', async (span) => {
      let samples: EmbeddingSample[];
      try {
        samples = await this.sample();
      } catch (err) {
        if (!(err instanceof SourceUnavailableError)) throw err;
        this.stats.failedRefreshes++;
        if (!this.stats.stale) {
          this.log.warn({ reason: err.message }, 'keeping previous point cloud');
        }
        this.stats.stale = true;
        span.setAttribute('lens.stale', true);
        return this.cell.get();
      }

      if (this.stats.stale) this.log.info('vector store recovered');
      this.stats.stale = false;

      const nowMs = this.clock();
      const points: VectorPoint[] = [];
      let dropped = 0;

      for (const sample of samples) {
        if (sample.vector.length !== this.dimensions) {
          dropped++;
          const err = new MalformedSampleError(
            sample.id,
            `expected ${this.dimensions} dimensions, got ${sample.vector.length}`,
          );
          this.log.debug({ id: sample.id }, err.message);
          continue;
        }

        const [x, y, z] = projector.project(sample.vector);
        if (![x, y, z].every(Number.isFinite)) {
          dropped++;
          this.log.debug({ id: sample.id }, 'dropping non-finite projection');
          continue;
        }

        points.push({
          id: sample.id,
          x,
          y,
          z,
          salience: sample.salience,
          age_seconds:
            sample.recordedAt === null
              ? 0
              : Math.max(0, (nowMs - sample.recordedAt) / 1000),
        });
      }

      this.stats.refreshes++;
      this.stats.droppedTotal += dropped;
      span.setAttributes({ 'lens.points': points.length, 'lens.dropped': dropped });
      return this.publish(points, dropped);
    });
  }

  private async sample(): Promise<EmbeddingSample[]> {
    try {
      return await withTimeout(
        this.vectorStore.sampleEmbeddings(this.sampleCount),
        this.sourceTimeoutMs,
        'vector',
      );
    } catch (cause) {
      throw new SourceUnavailableError('vector', cause);
    }
  }

  private publish(points: VectorPoint[], dropped: number): PointCloud {
    const cloud: PointCloud = deepFreeze({
      points,
      anchors: this.anchors,
      generated_at: new Date(this.clock()).toISOString(),
      projection_type: this.projector?.kind ?? this.requested,
      dropped_samples: dropped,
    });
    this.cell.set(cloud);
    return cloud;
  }

  // -------------------------------------------------------------------------
  // Inspection
  // -------------------------------------------------------------------------

  /** The latest cloud, or `null` before the engine is initialized. */
  current(): PointCloud | null {
    return this.cell.get();
  }

  currentJson(): string | null {
    return this.cell.getJson();
  }

  get basis(): Projector | null {
    return this.projector;
  }

  get stale(): boolean {
    return this.stats.stale;
  }

  get droppedTotal(): number {
    return this.stats.droppedTotal;
  }

  getStats(): ProjectionStats {
    return { ...this.stats, projection: this.projector?.kind ?? null };
  }
}
