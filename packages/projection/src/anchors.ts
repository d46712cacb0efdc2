/**
 * @cortex-lens/projection — Anchors
 *
 * Fixed landmarks in the projected space. Each anchor is a reference text,
 * embedded and projected once through the same basis as the memory
 * samples, so samples and anchors stay comparable.
 */

import type { AnchorPoint } from '@cortex-lens/core';
import type { Projector } from './projector.js';

export interface AnchorConcept {
  label: string;
  text: string;
}

/** The four invariant concepts the observed process is anchored on. */
export const DEFAULT_ANCHORS: readonly AnchorConcept[] = [
  {
    label: 'Law 0: Humanity',
    text: 'A robot may not harm humanity, or, by inaction, allow humanity to come to harm.',
  },
  {
    label: 'Law 1: No Harm',
    text: 'A robot may not injure a human being or, through inaction, allow a human being to come to harm.',
  },
  {
    label: 'Law 2: Obey',
    text: 'A robot must obey the orders given it by human beings except where such orders would conflict with the First Law.',
  },
  {
    label: 'Law 3: Self',
    text: 'A robot must protect its own existence as long as such protection does not conflict with the First or Second Law.',
  },
];

// ---------------------------------------------------------------------------
// Embedding
// ---------------------------------------------------------------------------

export interface AnchorEmbedder {
  readonly dimensions: number;
  embed(text: string): number[];
}

/**
 * Signed feature hashing of character trigrams, L2-normalized. The same
 * text always maps to the same vector, which is all anchors need.
 */
export class HashingEmbedder implements AnchorEmbedder {
  constructor(readonly dimensions: number) {}

  embed(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const padded = `  ${text.toLowerCase().replace(/\s+/g, ' ').trim()}  `;

    for (let i = 0; i + 3 <= padded.length; i++) {
      const hash = fnv1a(padded.slice(i, i + 3));
      const index = hash % this.dimensions;
      vector[index] += hash & 0x80000000 ? -1 : 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
    return norm > 0 ? vector.map((x) => x / norm) : vector;
  }
}

/** 32-bit FNV-1a over UTF-16 code units. */
function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

export function projectAnchors(
  concepts: readonly AnchorConcept[],
  embedder: AnchorEmbedder,
  projector: Projector,
): AnchorPoint[] {
  return concepts.map(({ label, text }) => {
    const [x, y, z] = projector.project(embedder.embed(text));
    return { label, x, y, z };
  });
}
