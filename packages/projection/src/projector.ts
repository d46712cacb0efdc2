/**
 * @cortex-lens/projection — Projectors
 *
 * Two interchangeable ways to map a D-dimensional embedding to 3-D. The
 * engine only sees the {@link Projector} interface, so the basis can be
 * swapped at startup without touching callers.
 */

import {
  ConfigurationError,
  type ProjectionKind,
  type Vec3,
} from '@cortex-lens/core';

export interface Projector {
  readonly kind: ProjectionKind;
  /** Input dimensionality D */
  readonly dimensions: number;
  /** Throws RangeError when `vector.length !== dimensions`. */
  project(vector: readonly number[]): Vec3;
}

type Basis = [Float64Array, Float64Array, Float64Array];

function assertDimensions(dimensions: number): void {
  if (!Number.isInteger(dimensions) || dimensions < 3) {
    throw new ConfigurationError(
      `Projection needs an integer dimensionality of at least 3, got ${dimensions}`,
    );
  }
}

function dot(a: Float64Array, b: readonly number[] | Float64Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

function normalize(v: Float64Array): number {
  const norm = Math.sqrt(dot(v, v));
  if (norm > 0) {
    for (let i = 0; i < v.length; i++) v[i] /= norm;
  }
  return norm;
}

// ---------------------------------------------------------------------------
// Seeded PRNG
// ---------------------------------------------------------------------------

/** mulberry32: a small 32-bit generator, uniform in [0, 1). */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Standard normal samples by Box–Muller. */
function gaussian(uniform: () => number): () => number {
  return () => {
    // 1 - u keeps the log argument in (0, 1].
    const u1 = 1 - uniform();
    const u2 = uniform();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };
}

// ---------------------------------------------------------------------------
// Random projection
// ---------------------------------------------------------------------------

/**
 * Gaussian random D×3 matrix with unit-length columns, fully determined by
 * the seed.
 */
export class RandomProjector implements Projector {
  readonly kind = 'random' as const;
  private basis: Basis;

  constructor(
    readonly dimensions: number,
    readonly seed = 42,
  ) {
    assertDimensions(dimensions);
    const next = gaussian(mulberry32(seed));
    const column = () => {
      const c = new Float64Array(dimensions);
      for (let i = 0; i < dimensions; i++) c[i] = next();
      normalize(c);
      return c;
    };
    this.basis = [column(), column(), column()];
  }

  project(vector: readonly number[]): Vec3 {
    if (vector.length !== this.dimensions) {
      throw new RangeError(
        `Expected ${this.dimensions} dimensions, got ${vector.length}`,
      );
    }
    const [a, b, c] = this.basis;
    return [dot(a, vector), dot(b, vector), dot(c, vector)];
  }
}

// ---------------------------------------------------------------------------
// PCA
// ---------------------------------------------------------------------------

export interface PcaFitOptions {
  /** Power-iteration steps per component. Default: 100 */
  iterations?: number;
  /** Seed for the starting vectors. Default: 7 */
  seed?: number;
}

/**
 * Projection onto the top three principal components of a sample, found
 * by power iteration with Gram–Schmidt deflation. The basis is fixed once
 * fitted; later vectors are centered on the sample mean and projected.
 */
export class PcaProjector implements Projector {
  readonly kind = 'pca' as const;

  private constructor(
    readonly dimensions: number,
    private mean: Float64Array,
    private basis: Basis,
  ) {}

  static fit(
    samples: readonly (readonly number[])[],
    dimensions: number,
    opts: PcaFitOptions = {},
  ): PcaProjector {
    assertDimensions(dimensions);
    if (samples.length < 3) {
      throw new ConfigurationError(
        `PCA needs at least 3 samples, got ${samples.length}`,
      );
    }
    for (const s of samples) {
      if (s.length !== dimensions) {
        throw new RangeError(`Expected ${dimensions} dimensions, got ${s.length}`);
      }
    }

    const mean = new Float64Array(dimensions);
    for (const s of samples) {
      for (let i = 0; i < dimensions; i++) mean[i] += s[i];
    }
    for (let i = 0; i < dimensions; i++) mean[i] /= samples.length;

    const centered = samples.map((s) => {
      const c = new Float64Array(dimensions);
      for (let i = 0; i < dimensions; i++) c[i] = s[i] - mean[i];
      return c;
    });

    const iterations = opts.iterations ?? 100;
    const next = gaussian(mulberry32(opts.seed ?? 7));
    const components: Float64Array[] = [];

    for (let k = 0; k < 3; k++) {
      let v: Float64Array = new Float64Array(dimensions);
      for (let i = 0; i < dimensions; i++) v[i] = next();
      orthogonalize(v, components);
      normalize(v);

      for (let step = 0; step < iterations; step++) {
        // w = Σ x (x·v), the covariance applied to v up to a constant
        const w = new Float64Array(dimensions);
        for (const x of centered) {
          const proj = dot(x, v);
          for (let i = 0; i < dimensions; i++) w[i] += x[i] * proj;
        }
        orthogonalize(w, components);
        if (normalize(w) === 0) break;
        v = w;
      }

      // A degenerate sample leaves v arbitrary; keep it orthonormal anyway.
      orthogonalize(v, components);
      if (normalize(v) === 0) v = canonicalComplement(dimensions, components);
      components.push(orientPositive(v));
    }

    const [a, b, c] = components;
    return new PcaProjector(dimensions, mean, [a, b, c]);
  }

  project(vector: readonly number[]): Vec3 {
    if (vector.length !== this.dimensions) {
      throw new RangeError(
        `Expected ${this.dimensions} dimensions, got ${vector.length}`,
      );
    }
    const centered = new Float64Array(this.dimensions);
    for (let i = 0; i < this.dimensions; i++) {
      centered[i] = vector[i] - this.mean[i];
    }
    const [a, b, c] = this.basis;
    return [dot(a, centered), dot(b, centered), dot(c, centered)];
  }
}

function orthogonalize(v: Float64Array, against: Float64Array[]): void {
  for (const u of against) {
    const proj = dot(u, v);
    for (let i = 0; i < v.length; i++) v[i] -= proj * u[i];
  }
}

/** Flip v so its largest-magnitude entry is positive. */
function orientPositive(v: Float64Array): Float64Array {
  let maxIndex = 0;
  for (let i = 1; i < v.length; i++) {
    if (Math.abs(v[i]) > Math.abs(v[maxIndex])) maxIndex = i;
  }
  if (v[maxIndex] < 0) {
    for (let i = 0; i < v.length; i++) v[i] = -v[i];
  }
  return v;
}

function canonicalComplement(
  dimensions: number,
  against: Float64Array[],
): Float64Array {
  for (let axis = 0; axis < dimensions; axis++) {
    const e = new Float64Array(dimensions);
    e[axis] = 1;
    orthogonalize(e, against);
    if (normalize(e) > 1e-9) return e;
  }
  throw new ConfigurationError('No orthogonal direction left for PCA basis');
}
