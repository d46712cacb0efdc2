/**
 * @cortex-lens/collector — Thought record parsing
 *
 * A stream entry becomes a thought when it carries a usable salience. The
 * salience field is either a bare number or a JSON object whose
 * `importance` is the salience and whose other keys carry the emotional
 * coloring of the thought.
 */

import { clamp, MalformedSampleError, type ThoughtSummary } from '@cortex-lens/core';
import type { StreamEntry } from '@cortex-lens/store-adapters';

export const PREVIEW_LENGTH = 80;

export interface ThoughtRecord {
  summary: ThoughtSummary;
  valence: number | null;
  arousal: number | null;
  dominance: number | null;
  connectionRelevance: number | null;
}

/**
 * Parse one stream entry. Returns a MalformedSampleError instead of
 * throwing so callers can count and drop it inline.
 */
export function parseThought(
  entry: StreamEntry,
  readAtMs: number,
): ThoughtRecord | MalformedSampleError {
  const rawSalience = entry.fields.salience;
  if (rawSalience === undefined) {
    return new MalformedSampleError(entry.id, 'missing salience');
  }

  const parsed = parseJson(rawSalience);
  let importance: number | undefined;
  let detail: Record<string, unknown> = {};

  if (typeof parsed === 'number') {
    importance = parsed;
  } else if (isRecord(parsed)) {
    detail = parsed;
    importance = finite(parsed.importance) ?? undefined;
  }

  if (importance === undefined || !Number.isFinite(importance)) {
    return new MalformedSampleError(entry.id, 'salience is not a number');
  }

  return {
    summary: {
      id: entry.id,
      content_preview: previewOf(entry.fields.content),
      salience: clamp(importance, 0, 1),
      timestamp: new Date(entryTime(entry.id) ?? readAtMs).toISOString(),
    },
    valence: finite(detail.valence),
    arousal: finite(detail.arousal),
    dominance: finite(detail.dominance),
    connectionRelevance: finite(detail.connection_relevance),
  };
}

/**
 * Symbolic content (`{"Symbol":{"id":…}}`) previews as its symbol id;
 * anything else as its first {@link PREVIEW_LENGTH} characters.
 */
export function previewOf(content: string | undefined): string {
  if (!content) return '';

  const parsed = parseJson(content);
  if (isRecord(parsed) && isRecord(parsed.Symbol)) {
    const id = parsed.Symbol.id;
    if (typeof id === 'string') return id;
  }

  return Array.from(content).slice(0, PREVIEW_LENGTH).join('');
}

/** Millisecond part of a Redis stream id (`<ms>-<seq>`). */
export function entryTime(id: string): number | null {
  const match = /^(\d+)-\d+$/.exec(id);
  return match ? Number(match[1]) : null;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finite(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
