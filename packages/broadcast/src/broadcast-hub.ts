/**
 * @cortex-lens/broadcast — Broadcast Hub
 *
 * Owns the set of live observer sessions. Every tick the current snapshot
 * is serialized once and handed to each session's queue; sessions write
 * independently, and a session whose write fails is removed without
 * touching the others.
 */

import {
  ConfigurationError,
  type Snapshot,
  type SessionWriteError,
} from '@cortex-lens/core';
import { TickTracer } from '@cortex-lens/observability';
import { type Logger, pino } from 'pino';
import { Session, type SessionSink } from './session.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Read side of the snapshot store, as far as the hub needs it. */
export interface SnapshotSource {
  current(): Snapshot | null;
  currentJson(): string | null;
  subscribe(listener: (snapshot: Snapshot, json: string) => void): () => void;
}

export interface BroadcastHubOptions {
  source: SnapshotSource;
  /** Pending payloads per session. Default: 1 */
  queueDepth?: number;
  /** Per-write timeout. Default: 100 */
  writeTimeoutMs?: number;
  logger?: Logger;
  tracer?: TickTracer;
}

export interface BroadcastStats {
  sessions: number;
  ticks: number;
  registered: number;
  removedOnFailure: number;
}

export interface SessionInfo {
  id: string;
  connectedAt: string;
  lastSentTimestamp: string | null;
  pending: number;
  sent: number;
  replaced: number;
}

// ---------------------------------------------------------------------------
// Hub
// ---------------------------------------------------------------------------

export class BroadcastHub {
  private sessions = new Map<string, Session>();
  private source: SnapshotSource;
  private queueDepth: number;
  private writeTimeoutMs: number;
  private log: Logger;
  private tracer: TickTracer;
  private detach: (() => void) | null = null;

  private stats = { ticks: 0, registered: 0, removedOnFailure: 0 };

  constructor(opts: BroadcastHubOptions) {
    this.source = opts.source;
    this.queueDepth = opts.queueDepth ?? 1;
    this.writeTimeoutMs = opts.writeTimeoutMs ?? 100;
    this.log = opts.logger ?? pino({ level: 'silent' });
    this.tracer = opts.tracer ?? new TickTracer();

    if (!Number.isInteger(this.queueDepth) || this.queueDepth < 1) {
      throw new ConfigurationError(
        `Queue depth must be a positive integer, got ${this.queueDepth}`,
      );
    }
    if (this.writeTimeoutMs <= 0) {
      throw new ConfigurationError('Write timeout must be positive');
    }
  }

  // -------------------------------------------------------------------------
  // Tick wiring
  // -------------------------------------------------------------------------

  /**
   * Fan out every snapshot the source publishes, right after it is
   * published. Returns a function that detaches the hub again.
   */
  attach(): () => void {
    if (!this.detach) {
      const unsubscribe = this.source.subscribe((snapshot, json) =>
        this.onTick(snapshot, json),
      );
      this.detach = () => {
        unsubscribe();
        this.detach = null;
      };
    }
    return this.detach;
  }

  /**
   * Enqueue one snapshot to every live session. `json` is the snapshot's
   * serialized form when the caller already has it; otherwise the snapshot
   * is serialized here, once for all sessions.
   */
  onTick(snapshot: Snapshot, json: string = JSON.stringify(snapshot)): void {
    this.stats.ticks++;
    if (this.sessions.size === 0) return;

    this.tracer.traceSync(
      'broadcast.fanout',
      (span) => {
        for (const session of this.sessions.values()) {
          session.enqueue(json, snapshot.timestamp);
        }
        span.setAttribute('lens.bytes', json.length);
      },
      { 'lens.sessions': this.sessions.size },
    );
  }

  // -------------------------------------------------------------------------
  // Session set
  // -------------------------------------------------------------------------

  /**
   * Add an observer and send it the current snapshot right away, without
   * waiting for the next tick.
   */
  register(sink: SessionSink, id?: string): Session {
    const session = new Session({
      sink,
      id,
      queueDepth: this.queueDepth,
      writeTimeoutMs: this.writeTimeoutMs,
      onWriteFailure: (s, err) => this.handleWriteFailure(s, err),
    });
    if (this.sessions.has(session.id)) {
      throw new Error(`Session ${session.id} is already registered`);
    }

    this.sessions.set(session.id, session);
    this.stats.registered++;
    this.log.info(
      { sessionId: session.id, sessions: this.sessions.size },
      'observer connected',
    );

    const snapshot = this.source.current();
    const json = this.source.currentJson();
    if (snapshot && json !== null) {
      session.enqueue(json, snapshot.timestamp);
    }
    return session;
  }

  /**
   * Remove a session and close its sink. Unknown or already removed ids
   * are ignored. Returns whether a session was removed.
   */
  unregister(sessionId: string, code = 1000, reason = 'closed'): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    this.sessions.delete(sessionId);
    session.close(code, reason);
    this.log.info(
      { sessionId, reason, sessions: this.sessions.size },
      'observer disconnected',
    );
    return true;
  }

  /** Close every session. Used on process shutdown. */
  close(): void {
    this.detach?.();
    for (const id of [...this.sessions.keys()]) {
      this.unregister(id, 1001, 'server shutting down');
    }
  }

  private handleWriteFailure(session: Session, err: SessionWriteError): void {
    this.stats.removedOnFailure++;
    this.log.info({ sessionId: session.id, reason: err.message }, 'dropping observer');
    this.unregister(session.id, 1011, 'write failed');
  }

  // -------------------------------------------------------------------------
  // Inspection
  // -------------------------------------------------------------------------

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  describeSessions(): SessionInfo[] {
    return [...this.sessions.values()].map((s) => ({
      id: s.id,
      connectedAt: s.connectedAt,
      lastSentTimestamp: s.lastSentTimestamp,
      pending: s.pendingCount,
      sent: s.sentCount,
      replaced: s.replacedCount,
    }));
  }

  getStats(): BroadcastStats {
    return { sessions: this.sessions.size, ...this.stats };
  }
}
