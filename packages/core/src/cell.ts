/**
 * @cortex-lens/core — LatestValueCell
 *
 * Single-writer, multi-reader holder of "the latest value". Each write
 * replaces the whole value and its serialized form in one assignment, so a
 * reader always sees a value and JSON that belong together.
 */

export type CellListener<T> = (value: T, json: string) => void;

interface Entry<T> {
  value: T;
  json: string;
}

export class LatestValueCell<T> {
  private entry: Entry<T> | null = null;
  private listeners = new Set<CellListener<T>>();

  /**
   * Replace the held value. Listeners run synchronously after the swap, in
   * registration order, and must not throw.
   */
  set(value: T): void {
    const entry = { value, json: JSON.stringify(value) };
    this.entry = entry;

    for (const listener of this.listeners) {
      listener(entry.value, entry.json);
    }
  }

  /** The latest value, or `null` before the first write. */
  get(): T | null {
    return this.entry?.value ?? null;
  }

  /** The latest value's JSON, or `null` before the first write. */
  getJson(): string | null {
    return this.entry?.json ?? null;
  }

  get initialized(): boolean {
    return this.entry !== null;
  }

  subscribe(listener: CellListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.entry = null;
  }
}
