/**
 * Metrics module — GET /metrics
 *
 * The latest Snapshot, exactly as published.
 */

import { Elysia } from 'elysia';
import type { Kernel } from '../../kernel.js';
import { jsonResponse } from '../latest.js';

export const metrics = (kernel: Kernel) =>
  new Elysia({ prefix: '/metrics', tags: ['Metrics'] }).get(
    '/',
    ({ status }) => {
      const json = kernel.snapshotStore.currentJson();
      if (json === null) {
        return status(503, { error: 'No snapshot has been collected yet' });
      }
      return jsonResponse(json);
    },
    {
      detail: {
        summary: 'Current snapshot',
        description:
          'Returns the latest Snapshot. Two reads between ticks return identical bodies. 503 until the first tick completes.',
      },
    },
  );
