/**
 * Health module — GET /health
 *
 * Answers whether or not the stores are reachable; staleness is reported,
 * never turned into an error status.
 */

import { Elysia } from 'elysia';
import type { Kernel } from '../../kernel.js';
import { HealthModel } from './model.js';

export const health = (kernel: Kernel) =>
  new Elysia({ prefix: '/health', tags: ['Health'] }).get(
    '/',
    () => {
      const ts = kernel.clock();
      return {
        status: 'ok' as const,
        service: 'cortex-lens',
        uptime_seconds: Math.floor((ts - kernel.startedAt) / 1000),
        sessions: kernel.hub.size,
        stale: {
          stream: kernel.collector.isStale('stream'),
          vector: kernel.collector.isStale('vector'),
          vectors: kernel.projection.stale,
        },
        ts,
      };
    },
    {
      response: HealthModel.response,
      detail: { summary: 'Health check' },
    },
  );
