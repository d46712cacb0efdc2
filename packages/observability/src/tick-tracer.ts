/**
 * @cortex-lens/observability — Tick Tracer
 *
 * Wraps the periodic units of work (collector ticks, projection refreshes,
 * broadcast fan-outs) in OTel spans.
 */

import {
  type Attributes,
  type Span,
  SpanKind,
  SpanStatusCode,
  type Tracer,
} from '@opentelemetry/api';
import { defaultTracer } from './otel-setup.js';

export type TickSpanName =
  | 'collector.tick'
  | 'projection.refresh'
  | 'projection.fit'
  | 'broadcast.fanout';

export class TickTracer {
  private tracer: Tracer;

  constructor(tracer?: Tracer) {
    this.tracer = tracer ?? defaultTracer();
  }

  /**
   * Run `work` inside a span that `work` may annotate. A rejection marks
   * the span as failed and is rethrown.
   */
  async trace<T>(
    name: TickSpanName,
    work: (span: Span) => Promise<T>,
    attributes: Attributes = {},
  ): Promise<T> {
    const span = this.tracer.startSpan(name, {
      kind: SpanKind.INTERNAL,
      attributes,
    });
    try {
      const result = await work(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      span.end();
    }
  }

  /**
   * Synchronous variant for work that never suspends.
   */
  traceSync<T>(
    name: TickSpanName,
    work: (span: Span) => T,
    attributes: Attributes = {},
  ): T {
    const span = this.tracer.startSpan(name, {
      kind: SpanKind.INTERNAL,
      attributes,
    });
    try {
      return work(span);
    } finally {
      span.end();
    }
  }
}
