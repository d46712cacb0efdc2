/**
 * @cortex-lens/observability — OTel Setup
 *
 * Configures OpenTelemetry tracing for cortex-lens.
 * Spans are exported over OTLP/HTTP when an endpoint is configured and kept
 * in memory otherwise.
 */

import { trace, type Tracer } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OTelConfig {
  /** Tracer name */
  serviceName?: string;
  /** Span exporters to register */
  exporters?: SpanExporter[];
  /** OTLP/HTTP endpoint (e.g., Jaeger, Honeycomb) */
  otlpEndpoint?: string;
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let _provider: BasicTracerProvider | null = null;
let _inMemoryExporter: InMemorySpanExporter | null = null;

/**
 * Initialize OTel tracing and return a Tracer bound to the new provider.
 */
export function setupTelemetry(config: OTelConfig = {}): Tracer {
  const serviceName = config.serviceName ?? 'cortex-lens';

  const provider = new BasicTracerProvider();
  _provider = provider;
  _inMemoryExporter = null;

  for (const exporter of config.exporters ?? []) {
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  }

  if (config.otlpEndpoint) {
    // Ticks run five times a second; batch rather than export per span.
    provider.addSpanProcessor(
      new BatchSpanProcessor(new OTLPTraceExporter({ url: config.otlpEndpoint })),
    );
  }

  // If no exporters configured, use in-memory for testing
  if (!config.otlpEndpoint && !config.exporters?.length) {
    _inMemoryExporter = new InMemorySpanExporter();
    provider.addSpanProcessor(new SimpleSpanProcessor(_inMemoryExporter));
  }

  // Return tracer directly from the provider instance, NOT from the
  // global trace singleton (which can only be set once and silently
  // ignores subsequent register() calls).
  return provider.getTracer(serviceName);
}

/**
 * A tracer from the global API. Records nothing unless a provider has been
 * registered globally.
 */
export function defaultTracer(): Tracer {
  return trace.getTracer('cortex-lens');
}

/**
 * Shutdown telemetry. Flushes all pending spans.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (_provider) {
    await _provider.shutdown();
    _provider = null;
  }
}

/**
 * Get the in-memory exporter for testing/inspection.
 */
export function getInMemoryExporter(): InMemorySpanExporter | null {
  return _inMemoryExporter;
}
