/**
 * @cortex-lens/core — Utilities
 *
 * Shared utility functions used across packages.
 */

import { TimeoutError } from './errors.js';

/**
 * Generate a unique identifier.
 */
export function generateId(): string {
  return crypto.randomUUID();
}

/**
 * Current timestamp in milliseconds.
 */
export function now(): number {
  return Date.now();
}

export type Clock = () => number;

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * Race a promise against a timer. The timer is always cleared, so a settled
 * call never keeps the process alive.
 */
export function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Freeze a plain value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
