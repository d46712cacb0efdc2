/**
 * @cortex-lens/observability — Tests
 */

import { SpanStatusCode } from '@opentelemetry/api';
import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import { afterEach, describe, expect, it } from 'vitest';
import {
  getInMemoryExporter,
  setupTelemetry,
  shutdownTelemetry,
} from '../src/otel-setup.js';
import { TickTracer } from '../src/tick-tracer.js';

// =========================================================================
// OTel Setup
// =========================================================================

describe('setupTelemetry', () => {
  afterEach(async () => {
    await shutdownTelemetry();
  });

  it('creates in-memory exporter when no exporters configured', () => {
    setupTelemetry();
    expect(getInMemoryExporter()).not.toBeNull();
  });

  it('uses the given exporters instead of the in-memory one', () => {
    const exporter = new InMemorySpanExporter();
    const tracer = setupTelemetry({ exporters: [exporter] });
    tracer.startSpan('custom').end();

    expect(getInMemoryExporter()).toBeNull();
    expect(exporter.getFinishedSpans().map((s) => s.name)).toEqual(['custom']);
  });
});

// =========================================================================
// TickTracer
// =========================================================================

describe('TickTracer', () => {
  afterEach(async () => {
    await shutdownTelemetry();
  });

  it('records a span per traced tick with its attributes', async () => {
    const tickTracer = new TickTracer(setupTelemetry());

    const result = await tickTracer.trace(
      'collector.tick',
      async (span) => {
        span.setAttribute('lens.thoughts', 3);
        return 'done';
      },
      { 'lens.tick': 1 },
    );

    expect(result).toBe('done');
    const spans = getInMemoryExporter()?.getFinishedSpans() ?? [];
    expect(spans).toHaveLength(1);
    expect(spans[0].name).toBe('collector.tick');
    expect(spans[0].attributes).toEqual({ 'lens.tick': 1, 'lens.thoughts': 3 });
    expect(spans[0].status.code).toBe(SpanStatusCode.OK);
  });

  it('marks the span as failed and rethrows', async () => {
    const tickTracer = new TickTracer(setupTelemetry());

    await expect(
      tickTracer.trace('projection.refresh', async () => {
        throw new Error('store down');
      }),
    ).rejects.toThrow('store down');

    const [span] = getInMemoryExporter()?.getFinishedSpans() ?? [];
    expect(span.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: 'store down',
    });
  });

  it('ends synchronous spans', () => {
    const tickTracer = new TickTracer(setupTelemetry());
    const value = tickTracer.traceSync('broadcast.fanout', () => 4);

    expect(value).toBe(4);
    expect(getInMemoryExporter()?.getFinishedSpans()).toHaveLength(1);
  });
});
