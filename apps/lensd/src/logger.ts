/**
 * @cortex-lens/lensd — Logger
 *
 * One root pino logger per process; components log through children
 * tagged with `component`.
 */

import { type Logger, pino } from 'pino';
import type { LensConfig } from './env.js';

export function createLogger(
  config: Pick<LensConfig, 'logLevel' | 'nodeEnv'>,
): Logger {
  return pino({
    name: 'lensd',
    level: config.nodeEnv === 'test' ? 'silent' : config.logLevel,
  });
}
