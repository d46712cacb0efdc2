/**
 * @cortex-lens/broadcast — Session
 *
 * One connected observer: a bounded outbound queue and the send loop that
 * drains it into the observer's sink. Payloads are whole snapshots, so a
 * full queue drops its oldest pending payload and a slow observer skips
 * ahead to the newest state.
 */

import {
  generateId,
  SessionWriteError,
  withTimeout,
} from '@cortex-lens/core';

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

/**
 * Transport end of a session (a WebSocket, a test double, ...).
 * A thrown error, a rejection, or a write that outlives the write timeout
 * is a write failure.
 */
export interface SessionSink {
  send(payload: string): void | Promise<void>;
  close(code?: number, reason?: string): void;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export interface SessionOptions {
  sink: SessionSink;
  /** Maximum pending payloads, not counting the one being written */
  queueDepth: number;
  writeTimeoutMs: number;
  /** Called once, on the first failed write */
  onWriteFailure: (session: Session, err: SessionWriteError) => void;
  id?: string;
}

interface Pending {
  payload: string;
  timestamp: string;
}

export class Session {
  readonly id: string;
  readonly connectedAt = new Date().toISOString();
  lastSentTimestamp: string | null = null;
  sentCount = 0;
  replacedCount = 0;

  private sink: SessionSink;
  private queue: Pending[] = [];
  private queueDepth: number;
  private writeTimeoutMs: number;
  private onWriteFailure: SessionOptions['onWriteFailure'];
  private draining = false;
  private _alive = true;

  constructor(opts: SessionOptions) {
    this.id = opts.id ?? generateId();
    this.sink = opts.sink;
    this.queueDepth = opts.queueDepth;
    this.writeTimeoutMs = opts.writeTimeoutMs;
    this.onWriteFailure = opts.onWriteFailure;
  }

  get alive(): boolean {
    return this._alive;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Queue a snapshot payload and make sure the send loop is running.
   * Payloads older than the newest queued or sent one are ignored, so a
   * session only ever sees timestamps move forward.
   */
  enqueue(payload: string, timestamp: string): void {
    if (!this._alive) return;

    const newest = this.queue.at(-1)?.timestamp ?? this.lastSentTimestamp;
    if (newest !== null && timestamp < newest) return;

    this.queue.push({ payload, timestamp });
    while (this.queue.length > this.queueDepth) {
      this.queue.shift();
      this.replacedCount++;
    }

    if (!this.draining) {
      void this.drain();
    }
  }

  /**
   * Stop the session and close its sink. Idempotent.
   */
  close(code?: number, reason?: string): void {
    if (!this._alive) return;
    this._alive = false;
    this.queue = [];
    try {
      this.sink.close(code, reason);
    } catch {
      // The transport is already gone; nothing left to release.
    }
  }

  // -------------------------------------------------------------------------
  // Send loop
  // -------------------------------------------------------------------------

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      while (this._alive) {
        const next = this.queue.shift();
        if (!next) return;

        try {
          await withTimeout(
            Promise.resolve().then(() => this.sink.send(next.payload)),
            this.writeTimeoutMs,
            `session ${this.id} write`,
          );
        } catch (cause) {
          if (this._alive) {
            this.onWriteFailure(this, new SessionWriteError(this.id, cause));
          }
          return;
        }

        this.lastSentTimestamp = next.timestamp;
        this.sentCount++;
      }
    } finally {
      this.draining = false;
    }
  }
}
