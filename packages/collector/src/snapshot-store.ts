/**
 * @cortex-lens/collector — Snapshot Store
 *
 * Process-wide holder of the latest Snapshot. The Collector is the only
 * writer; the gateway and the broadcast hub read. No history is kept.
 */

import { LatestValueCell, type Snapshot } from '@cortex-lens/core';

export type SnapshotListener = (snapshot: Snapshot, json: string) => void;

export class SnapshotStore {
  private cell = new LatestValueCell<Snapshot>();

  /**
   * Replace the current snapshot (last write wins) and serialize it once.
   * Subscribers run after the swap.
   */
  publish(snapshot: Snapshot): void {
    this.cell.set(snapshot);
  }

  /** The latest snapshot, or `null` before the first tick. */
  current(): Snapshot | null {
    return this.cell.get();
  }

  /** JSON of the latest snapshot, serialized when it was published. */
  currentJson(): string | null {
    return this.cell.getJson();
  }

  get initialized(): boolean {
    return this.cell.initialized;
  }

  subscribe(listener: SnapshotListener): () => void {
    return this.cell.subscribe(listener);
  }
}
