/**
 * Vectors module — GET /vectors
 *
 * The latest PointCloud. Anchors and the basis stay fixed between
 * refreshes, so successive clouds are directly comparable.
 */

import { Elysia } from 'elysia';
import type { Kernel } from '../../kernel.js';
import { jsonResponse } from '../latest.js';

export const vectors = (kernel: Kernel) =>
  new Elysia({ prefix: '/vectors', tags: ['Vectors'] }).get(
    '/',
    ({ status }) => {
      const json = kernel.projection.currentJson();
      if (json === null) {
        return status(503, { error: 'Projection has not been initialized yet' });
      }
      return jsonResponse(json);
    },
    {
      detail: {
        summary: 'Current point cloud',
        description:
          'Returns sampled memory embeddings projected to 3-D, together with the fixed anchors. 503 until the projection engine has started.',
      },
    },
  );
