/**
 * @cortex-lens/lensd — Entry point
 */

import { ConfigurationError } from '@cortex-lens/core';
import { node } from '@elysiajs/node';
import { Elysia } from 'elysia';
import { pino } from 'pino';
import { createApp } from './app.js';
import { type LensConfig, loadConfig } from './env.js';
import { createKernel } from './kernel.js';

let config: LensConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (!(err instanceof ConfigurationError)) throw err;
  pino({ name: 'lensd' }).fatal(err.message);
  process.exit(1);
}

const kernel = createKernel(config);
const { logger } = kernel;

const app = new Elysia({ adapter: node() }).use(createApp(kernel));

app.listen({ hostname: config.host, port: config.port }, () => {
  logger.info(`🔭 cortex-lens listening on http://${config.host}:${config.port}`);
  logger.info(`   Redis: ${config.redisUrl} (${config.streamKey})`);
  logger.info(`   Qdrant: ${config.qdrantUrl}`);
  logger.info(`   Projection: ${config.projection}, ${config.embeddingDimensions} dims`);
});

await kernel.start();

// ---------------------------------------------------------------------------
// Shutdown
// ---------------------------------------------------------------------------

let stopping = false;

async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, 'shutting down');
  await app.stop();
  await kernel.stop();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  });
}
