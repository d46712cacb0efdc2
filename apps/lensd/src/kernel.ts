/**
 * @cortex-lens/lensd — Kernel Factory
 *
 * Creates the shared services behind the gateway: the two store readers,
 * the Snapshot Store, the Collector, the Broadcast Hub and the Projection
 * Engine.
 *
 * The kernel is the dependency-injection root. Modules receive it as an
 * argument and take only what they need.
 */

import { BroadcastHub } from '@cortex-lens/broadcast';
import { Collector, SnapshotStore } from '@cortex-lens/collector';
import { type Clock, now } from '@cortex-lens/core';
import {
  defaultTracer,
  setupTelemetry,
  shutdownTelemetry,
  TickTracer,
} from '@cortex-lens/observability';
import { ProjectionEngine } from '@cortex-lens/projection';
import {
  QdrantVectorStore,
  RedisStreamStore,
  type StreamStoreReader,
  type VectorStoreReader,
} from '@cortex-lens/store-adapters';
import type { Tracer } from '@opentelemetry/api';
import type { Logger } from 'pino';
import type { LensConfig } from './env.js';
import { createLogger } from './logger.js';

// ---------------------------------------------------------------------------
// Kernel type
// ---------------------------------------------------------------------------

export interface Kernel {
  config: LensConfig;
  logger: Logger;
  streamStore: StreamStoreReader;
  vectorStore: VectorStoreReader;
  snapshotStore: SnapshotStore;
  collector: Collector;
  hub: BroadcastHub;
  projection: ProjectionEngine;
  clock: Clock;
  startedAt: number;
  /** Start ticking and build the first point cloud. */
  start(): Promise<void>;
  /** Stop ticking, close every session and release the store clients. */
  stop(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Kernel factory
// ---------------------------------------------------------------------------

/** Replacements for the live clients, used by tests. */
export interface KernelDeps {
  streamStore?: StreamStoreReader;
  vectorStore?: VectorStoreReader;
  logger?: Logger;
  tracer?: Tracer;
  clock?: Clock;
}

export function createKernel(config: LensConfig, deps: KernelDeps = {}): Kernel {
  const logger = deps.logger ?? createLogger(config);
  const clock = deps.clock ?? now;

  // Spans are only kept when they have somewhere to go.
  const tracer = new TickTracer(
    deps.tracer ??
      (config.otlpEndpoint
        ? setupTelemetry({
            serviceName: 'cortex-lens',
            otlpEndpoint: config.otlpEndpoint,
          })
        : defaultTracer()),
  );

  const streamStore =
    deps.streamStore ??
    new RedisStreamStore({
      url: config.redisUrl,
      streamKey: config.streamKey,
      actorKey: config.actorKey,
      connectTimeoutMs: config.sourceTimeoutMs,
      commandTimeoutMs: config.sourceTimeoutMs,
      onError: (err) =>
        logger.debug({ component: 'redis', reason: err.message }, 'connection error'),
    });
  const vectorStore =
    deps.vectorStore ??
    new QdrantVectorStore({
      url: config.qdrantUrl,
      apiKey: config.qdrantApiKey,
      timeoutMs: config.sourceTimeoutMs,
    });

  const snapshotStore = new SnapshotStore();

  const collector = new Collector({
    streamStore,
    vectorStore,
    snapshotStore,
    identityName: config.identityName,
    actors: config.actors,
    tickIntervalMs: config.tickIntervalMs,
    sourceTimeoutMs: config.sourceTimeoutMs,
    clock,
    logger: logger.child({ component: 'collector' }),
    tracer,
  });

  const hub = new BroadcastHub({
    source: snapshotStore,
    queueDepth: config.queueDepth,
    writeTimeoutMs: config.writeTimeoutMs,
    logger: logger.child({ component: 'broadcast' }),
    tracer,
  });
  hub.attach();

  const projection = new ProjectionEngine({
    vectorStore,
    dimensions: config.embeddingDimensions,
    sampleCount: config.sampleCount,
    refreshIntervalMs: config.refreshIntervalMs,
    // The refresh runs on its own coarser cadence and may wait longer than a tick.
    sourceTimeoutMs: Math.min(config.refreshIntervalMs - 1, config.sourceTimeoutMs * 4),
    projection: config.projection,
    seed: config.projectionSeed,
    clock,
    logger: logger.child({ component: 'projection' }),
    tracer,
  });

  const startedAt = clock();

  return {
    config,
    logger,
    streamStore,
    vectorStore,
    snapshotStore,
    collector,
    hub,
    projection,
    clock,
    startedAt,

    async start() {
      collector.start();
      await projection.start();
    },

    async stop() {
      hub.close();
      await Promise.all([collector.stop(), projection.stop()]);

      const closed = await Promise.allSettled([
        streamStore.close(),
        vectorStore.close(),
      ]);
      for (const result of closed) {
        if (result.status === 'rejected') {
          logger.warn({ err: result.reason }, 'store client did not close cleanly');
        }
      }
      await shutdownTelemetry();
    },
  };
}
