/**
 * @cortex-lens/core — Snapshot types
 *
 * One immutable, point-in-time view of the observed process.
 * Field names are the wire schema served by `/metrics` and `/ws`.
 */

// ---------------------------------------------------------------------------
// Snapshot sections
// ---------------------------------------------------------------------------

export interface IdentityMetrics {
  readonly name: string;
  readonly uptime_seconds: number;
  readonly lifetime_thoughts: number;
  readonly session_thoughts: number;
  readonly restart_count: number;
}

export interface CognitiveMetrics {
  readonly conscious_memories: number;
  readonly unconscious_memories: number;
  readonly lifetime_dreams: number;
  readonly current_cycle: number;
}

/**
 * Valence is in [-1, 1]; every other field is in [0, 1].
 * `connection_drive` and `emotional_intensity` are derived.
 */
export interface EmotionalMetrics {
  readonly valence: number;
  readonly arousal: number;
  readonly dominance: number;
  readonly connection_drive: number;
  readonly emotional_intensity: number;
}

export interface ActorStatus {
  readonly alive: boolean;
  readonly restart_count: number;
}

export type ActorMetrics = Readonly<Record<string, ActorStatus>>;

export interface ThoughtSummary {
  readonly id: string;
  readonly content_preview: string;
  readonly salience: number;
  /** ISO-8601 */
  readonly timestamp: string;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface Snapshot {
  /** ISO-8601, non-decreasing across successive snapshots */
  readonly timestamp: string;
  readonly identity: IdentityMetrics;
  readonly cognitive: CognitiveMetrics;
  readonly emotional: EmotionalMetrics;
  readonly actors: ActorMetrics;
  /** Newest first, at most {@link RECENT_THOUGHTS_LIMIT} entries */
  readonly recent_thoughts: readonly ThoughtSummary[];
}

export const RECENT_THOUGHTS_LIMIT = 20;

// ---------------------------------------------------------------------------
// Point cloud
// ---------------------------------------------------------------------------

export type Vec3 = readonly [number, number, number];

export interface VectorPoint {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly salience: number;
  readonly age_seconds: number;
}

export interface AnchorPoint {
  readonly label: string;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export type ProjectionKind = 'random' | 'pca';

export interface PointCloud {
  readonly points: readonly VectorPoint[];
  readonly anchors: readonly AnchorPoint[];
  /** ISO-8601 */
  readonly generated_at: string;
  readonly projection_type: ProjectionKind;
  /** Samples dropped on the refresh that built this cloud */
  readonly dropped_samples: number;
}
