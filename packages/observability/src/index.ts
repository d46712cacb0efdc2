/**
 * @cortex-lens/observability
 */

export type { TickSpanName } from './tick-tracer.js';
export { TickTracer } from './tick-tracer.js';
export type { OTelConfig } from './otel-setup.js';
export {
  defaultTracer,
  getInMemoryExporter,
  setupTelemetry,
  shutdownTelemetry,
} from './otel-setup.js';
