/**
 * @cortex-lens/broadcast — Tests
 */

import {
  ConfigurationError,
  LatestValueCell,
  type Snapshot,
} from '@cortex-lens/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BroadcastHub, type SnapshotSource } from '../src/broadcast-hub.js';
import type { SessionSink } from '../src/session.js';
import {
  type BufferedSocket,
  bufferedAmountOf,
  SocketSink,
} from '../src/socket-sink.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const T0 = Date.parse('2026-01-01T00:00:00.000Z');

function makeSnapshot(second: number): Snapshot {
  return {
    timestamp: new Date(T0 + second * 1000).toISOString(),
    identity: {
      name: 'Timmy',
      uptime_seconds: second,
      lifetime_thoughts: 0,
      session_thoughts: second,
      restart_count: 0,
    },
    cognitive: {
      conscious_memories: 0,
      unconscious_memories: 0,
      lifetime_dreams: 0,
      current_cycle: second,
    },
    emotional: {
      valence: 0,
      arousal: 0.5,
      dominance: 0.5,
      connection_drive: 0.5,
      emotional_intensity: 0,
    },
    actors: {},
    recent_thoughts: [],
  };
}

function makeSource() {
  const cell = new LatestValueCell<Snapshot>();
  const source: SnapshotSource = {
    current: () => cell.get(),
    currentJson: () => cell.getJson(),
    subscribe: (listener) => cell.subscribe(listener),
  };
  return { cell, source };
}

class RecordingSink implements SessionSink {
  received: string[] = [];
  closes: Array<{ code?: number; reason?: string }> = [];

  send(payload: string): void | Promise<void> {
    this.received.push(payload);
  }

  close(code?: number, reason?: string): void {
    this.closes.push({ code, reason });
  }

  uptimes(): number[] {
    return this.received.map(
      (p) => (JSON.parse(p) as Snapshot).identity.uptime_seconds,
    );
  }
}

/** Never completes a write. */
class BlockedSink extends RecordingSink {
  override send(payload: string): Promise<void> {
    this.received.push(payload);
    return new Promise<void>(() => {});
  }
}

/** Completes writes only when opened. */
class GatedSink extends RecordingSink {
  private waiting: Array<() => void> = [];

  override send(payload: string): Promise<void> {
    this.received.push(payload);
    return new Promise<void>((resolve) => this.waiting.push(resolve));
  }

  open(): void {
    for (const resolve of this.waiting.splice(0)) resolve();
  }
}

class ThrowingSink extends RecordingSink {
  override send(): void {
    throw new Error('socket reset');
  }
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));
const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('BroadcastHub', () => {
  let cell: LatestValueCell<Snapshot>;
  let hub: BroadcastHub;

  beforeEach(() => {
    const made = makeSource();
    cell = made.cell;
    hub = new BroadcastHub({ source: made.source, writeTimeoutMs: 50 });
    hub.attach();
  });

  afterEach(() => {
    hub.close();
    vi.restoreAllMocks();
  });

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  describe('register', () => {
    it('sends the current snapshot immediately', async () => {
      cell.set(makeSnapshot(1));
      const sink = new RecordingSink();

      hub.register(sink);
      await flush();

      expect(sink.received).toEqual([cell.getJson()]);
    });

    it('sends nothing before the first snapshot', async () => {
      const sink = new RecordingSink();
      hub.register(sink);
      await flush();

      expect(sink.received).toEqual([]);
      expect(hub.size).toBe(1);
    });

    it('lists sessions by id in registration order', () => {
      hub.register(new RecordingSink(), 'first');
      hub.register(new RecordingSink(), 'second');
      hub.unregister('first');

      expect(hub.sessionIds()).toEqual(['second']);
    });

    it('rejects a duplicate session id', () => {
      hub.register(new RecordingSink(), 'same');
      expect(() => hub.register(new RecordingSink(), 'same')).toThrow(
        'Session same is already registered',
      );
    });
  });

  describe('unregister', () => {
    it('is idempotent and closes the sink once', () => {
      const sink = new RecordingSink();
      const session = hub.register(sink);

      expect(hub.unregister(session.id)).toBe(true);
      expect(hub.unregister(session.id)).toBe(false);
      expect(sink.closes).toEqual([{ code: 1000, reason: 'closed' }]);
      expect(hub.size).toBe(0);
    });
  });

  // -----------------------------------------------------------------------
  // Fan-out
  // -----------------------------------------------------------------------

  describe('fan-out', () => {
    it('pushes every published snapshot to every session in order', async () => {
      const a = new RecordingSink();
      const b = new RecordingSink();
      hub.register(a);
      hub.register(b);

      cell.set(makeSnapshot(1));
      await flush();
      cell.set(makeSnapshot(2));
      await flush();

      expect(a.uptimes()).toEqual([1, 2]);
      expect(b.uptimes()).toEqual([1, 2]);
    });

    it('serializes a snapshot once for all sessions', () => {
      for (let i = 0; i < 3; i++) hub.register(new RecordingSink());
      const stringify = vi.spyOn(JSON, 'stringify');

      hub.onTick(makeSnapshot(1));

      expect(stringify).toHaveBeenCalledTimes(1);
    });

    it('ignores a snapshot older than one already delivered', async () => {
      const sink = new RecordingSink();
      hub.register(sink);

      hub.onTick(makeSnapshot(5));
      await flush();
      hub.onTick(makeSnapshot(3));
      await flush();

      expect(sink.uptimes()).toEqual([5]);
    });
  });

  // -----------------------------------------------------------------------
  // Fault isolation
  // -----------------------------------------------------------------------

  describe('fault isolation', () => {
    it('keeps delivering to healthy sessions while one write is blocked', async () => {
      const blocked = new BlockedSink();
      const healthyA = new RecordingSink();
      const healthyB = new RecordingSink();
      const blockedSession = hub.register(blocked);
      hub.register(healthyA);
      hub.register(healthyB);

      const started = Date.now();
      cell.set(makeSnapshot(1));
      await flush();

      expect(healthyA.uptimes()).toEqual([1]);
      expect(healthyB.uptimes()).toEqual([1]);
      expect(Date.now() - started).toBeLessThan(200);

      await sleep(80);
      expect(hub.has(blockedSession.id)).toBe(false);
      expect(blocked.closes).toEqual([{ code: 1011, reason: 'write failed' }]);

      cell.set(makeSnapshot(2));
      await flush();
      expect(healthyA.uptimes()).toEqual([1, 2]);
      expect(healthyB.uptimes()).toEqual([1, 2]);
      expect(hub.getStats().removedOnFailure).toBe(1);
      expect(hub.size).toBe(2);
    });

    it('removes a session whose sink throws', async () => {
      const broken = new ThrowingSink();
      const healthy = new RecordingSink();
      const session = hub.register(broken);
      hub.register(healthy);

      cell.set(makeSnapshot(1));
      await flush();

      expect(hub.has(session.id)).toBe(false);
      expect(healthy.uptimes()).toEqual([1]);
    });
  });

  // -----------------------------------------------------------------------
  // Backpressure
  // -----------------------------------------------------------------------

  describe('backpressure', () => {
    it('keeps only the newest pending snapshot for a slow session', async () => {
      const slowHub = new BroadcastHub({
        source: makeSource().source,
        writeTimeoutMs: 1_000,
      });
      const sink = new GatedSink();
      const session = slowHub.register(sink);

      slowHub.onTick(makeSnapshot(1));
      await flush();
      expect(sink.uptimes()).toEqual([1]);

      for (const second of [2, 3, 4]) {
        slowHub.onTick(makeSnapshot(second));
        expect(session.pendingCount).toBeLessThanOrEqual(1);
      }

      sink.open();
      await flush();
      sink.open();
      await flush();

      expect(sink.uptimes()).toEqual([1, 4]);
      expect(session.replacedCount).toBe(2);
      expect(session.lastSentTimestamp).toBe(makeSnapshot(4).timestamp);
      expect(session.pendingCount).toBe(0);
      slowHub.close();
    });

    it('honors a deeper queue', async () => {
      const deepHub = new BroadcastHub({
        source: makeSource().source,
        writeTimeoutMs: 1_000,
        queueDepth: 2,
      });
      const sink = new GatedSink();
      const session = deepHub.register(sink);

      deepHub.onTick(makeSnapshot(1));
      await flush();
      for (const second of [2, 3, 4]) deepHub.onTick(makeSnapshot(second));
      expect(session.pendingCount).toBe(2);

      for (let i = 0; i < 3; i++) {
        sink.open();
        await flush();
      }

      expect(sink.uptimes()).toEqual([1, 3, 4]);
      deepHub.close();
    });
  });

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  describe('close', () => {
    it('closes every session and stops listening', async () => {
      const a = new RecordingSink();
      const b = new RecordingSink();
      hub.register(a);
      hub.register(b);

      hub.close();
      cell.set(makeSnapshot(1));
      await flush();

      expect(hub.size).toBe(0);
      expect(a.closes).toEqual([{ code: 1001, reason: 'server shutting down' }]);
      expect(b.received).toEqual([]);
    });
  });

  it('rejects a queue depth below one', () => {
    expect(
      () => new BroadcastHub({ source: makeSource().source, queueDepth: 0 }),
    ).toThrow(ConfigurationError);
  });
});

// ---------------------------------------------------------------------------
// Socket sink
// ---------------------------------------------------------------------------

class BufferingSocket implements BufferedSocket {
  sent: string[] = [];
  closes: Array<{ code?: number; reason?: string }> = [];
  buffered = 0;

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closes.push({ code, reason });
  }

  bufferedAmount(): number {
    return this.buffered;
  }
}

describe('SocketSink', () => {
  it('completes a write at once when the buffer is under the high water mark', () => {
    const socket = new BufferingSocket();
    socket.buffered = 100;
    const sink = new SocketSink(socket, { highWaterMark: 100 });

    expect(sink.send('a')).toBeUndefined();
    expect(socket.sent).toEqual(['a']);
  });

  it('holds a write until the buffer drains', async () => {
    const socket = new BufferingSocket();
    socket.buffered = 500;
    const sink = new SocketSink(socket, { highWaterMark: 100, pollIntervalMs: 5 });
    let done = false;

    const write = Promise.resolve(sink.send('a')).then(() => {
      done = true;
    });
    await sleep(20);
    expect(done).toBe(false);

    socket.buffered = 0;
    await write;
    expect(done).toBe(true);
  });

  it('releases a held write when closed', async () => {
    const socket = new BufferingSocket();
    socket.buffered = 500;
    const sink = new SocketSink(socket, { highWaterMark: 100, pollIntervalMs: 5 });

    const write = sink.send('a');
    sink.close(1011, 'write failed');

    await expect(write).resolves.toBeUndefined();
    expect(socket.closes).toEqual([{ code: 1011, reason: 'write failed' }]);
  });

  it('lets the write timeout remove a session that never drains', async () => {
    const hub = new BroadcastHub({ source: makeSource().source, writeTimeoutMs: 20 });
    const socket = new BufferingSocket();
    socket.buffered = 1_000_000;
    const session = hub.register(new SocketSink(socket));

    hub.onTick(makeSnapshot(1));
    await sleep(60);

    expect(hub.has(session.id)).toBe(false);
    expect(socket.closes).toEqual([{ code: 1011, reason: 'write failed' }]);
    hub.close();
  });
});

describe('bufferedAmountOf', () => {
  it.each([
    ['a bufferedAmount property', { bufferedAmount: 42 }, 42],
    ['a getBufferedAmount method', { getBufferedAmount: () => 42 }, 42],
    ['a wrapped websocket', { websocket: { bufferedAmount: 42 } }, 42],
    ['an object without either', { readyState: 1 }, 0],
    ['a non-object', undefined, 0],
  ])('reads %s', (_label, raw, expected) => {
    expect(bufferedAmountOf(raw)).toBe(expected);
  });
});
