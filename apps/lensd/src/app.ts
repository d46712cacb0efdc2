/**
 * @cortex-lens/lensd — App Factory
 *
 * Composes all Elysia modules into a single app instance.
 * Each module is a self-contained Elysia instance with its own
 * prefix and routes, built around the shared kernel.
 */

import { openapi } from '@elysiajs/openapi';
import { Elysia } from 'elysia';
import type { Kernel } from './kernel.js';

// Modules
import { health } from './modules/health/index.js';
import { metrics } from './modules/metrics/index.js';
import { stream } from './modules/stream/index.js';
import { vectors } from './modules/vectors/index.js';

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

export function createApp(kernel: Kernel) {
  const log = kernel.logger.child({ component: 'gateway' });

  return new Elysia()
    .use(
      openapi({
        path: '/openapi',
        provider: 'scalar',
        documentation: {
          info: {
            title: 'cortex-lens',
            version: '0.1.0',
            description: 'Read-only observation gateway for a running cognitive process',
          },
          tags: [
            { name: 'Health', description: 'Liveness and source staleness' },
            { name: 'Metrics', description: 'Latest snapshot' },
            { name: 'Vectors', description: 'Projected memory point cloud' },
            { name: 'Stream', description: 'Live snapshot push' },
          ],
        },
      }),
    )
    .onRequest(({ request }) => {
      log.debug({ method: request.method, url: request.url }, 'request');
    })
    .use(health(kernel))
    .use(metrics(kernel))
    .use(vectors(kernel))
    .use(stream(kernel));
}
