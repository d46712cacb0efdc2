/**
 * @cortex-lens/collector — Derived fields
 *
 * Pure functions from primitives read off the stream to the snapshot's
 * emotional and actor sections. They run on every tick, whether the
 * primitives are fresh or carried over from an earlier read.
 */

import {
  type ActorMetrics,
  type ActorStatus,
  clamp,
  type EmotionalMetrics,
} from '@cortex-lens/core';
import type { ThoughtRecord } from './thoughts.js';

// ---------------------------------------------------------------------------
// Emotional state
// ---------------------------------------------------------------------------

export interface EmotionalPrimitives {
  valence: number;
  arousal: number;
  dominance: number;
  /** Per-thought connection relevance, where reported */
  connectionRelevances: number[];
}

export const NEUTRAL_EMOTION: EmotionalPrimitives = {
  valence: 0,
  arousal: 0.5,
  dominance: 0.5,
  connectionRelevances: [],
};

/**
 * The newest thought sets valence, arousal and dominance; every thought
 * that reports a connection relevance contributes to the drive.
 */
export function primitivesFrom(thoughts: ThoughtRecord[]): EmotionalPrimitives {
  const newest = thoughts[0];
  return {
    valence: newest?.valence ?? NEUTRAL_EMOTION.valence,
    arousal: newest?.arousal ?? NEUTRAL_EMOTION.arousal,
    dominance: newest?.dominance ?? NEUTRAL_EMOTION.dominance,
    connectionRelevances: thoughts.flatMap((t) =>
      t.connectionRelevance === null ? [] : [t.connectionRelevance],
    ),
  };
}

export function deriveEmotional(p: EmotionalPrimitives): EmotionalMetrics {
  const valence = clamp(p.valence, -1, 1);
  const arousal = clamp(p.arousal, 0, 1);
  const dominance = clamp(p.dominance, 0, 1);

  const relevances = p.connectionRelevances;
  const connection =
    relevances.length === 0
      ? 0.5
      : relevances.reduce((sum, r) => sum + r, 0) / relevances.length;

  return {
    valence,
    arousal,
    dominance,
    connection_drive: clamp(connection, 0, 1),
    emotional_intensity: clamp(Math.abs(valence) * arousal, 0, 1),
  };
}

// ---------------------------------------------------------------------------
// Actors
// ---------------------------------------------------------------------------

const DEAD: ActorStatus = { alive: false, restart_count: 0 };

/**
 * One entry per known actor. Actors missing from the feed, or whose status
 * does not parse, are reported dead.
 */
export function resolveActors(
  known: readonly string[],
  raw: Record<string, string>,
): ActorMetrics {
  const actors: Record<string, ActorStatus> = {};
  for (const name of known) {
    actors[name] = parseActorStatus(raw[name]);
  }
  return actors;
}

export function deadActors(known: readonly string[]): ActorMetrics {
  return resolveActors(known, {});
}

function parseActorStatus(raw: string | undefined): ActorStatus {
  if (raw === undefined) return DEAD;

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return DEAD;
  }
  if (typeof value !== 'object' || value === null) return DEAD;

  const alive = 'alive' in value ? value.alive : undefined;
  const restarts = 'restart_count' in value ? value.restart_count : undefined;
  return {
    alive: alive === true,
    restart_count:
      typeof restarts === 'number' && Number.isInteger(restarts) && restarts >= 0
        ? restarts
        : 0,
  };
}
