/**
 * @cortex-lens/broadcast — Socket sink
 *
 * Adapts a message socket whose `send` only queues bytes into a
 * SessionSink whose writes complete when the socket has flushed them. A
 * write resolves once the socket's outbound buffer is back under the high
 * water mark, so a reader that stops reading keeps the session's write
 * pending until the write timeout removes it.
 */

import type { SessionSink } from './session.js';

/** The parts of a WebSocket the sink needs. */
export interface BufferedSocket {
  send(data: string): unknown;
  close(code?: number, reason?: string): unknown;
  /** Bytes queued by `send` and not yet handed to the network */
  bufferedAmount(): number;
}

export interface SocketSinkOptions {
  /** Default: 64 KiB */
  highWaterMark?: number;
  /** Default: 10 */
  pollIntervalMs?: number;
}

export class SocketSink implements SessionSink {
  private readonly highWaterMark: number;
  private readonly pollIntervalMs: number;
  private poll: ReturnType<typeof setInterval> | null = null;
  private release: (() => void) | null = null;

  constructor(
    private readonly socket: BufferedSocket,
    opts: SocketSinkOptions = {},
  ) {
    this.highWaterMark = opts.highWaterMark ?? 64 * 1024;
    this.pollIntervalMs = opts.pollIntervalMs ?? 10;
  }

  send(payload: string): void | Promise<void> {
    this.socket.send(payload);
    if (this.drained()) return;

    return new Promise<void>((resolve) => {
      this.release = resolve;
      this.poll = setInterval(() => {
        if (this.drained()) this.stopPolling();
      }, this.pollIntervalMs);
    });
  }

  close(code?: number, reason?: string): void {
    this.stopPolling();
    this.socket.close(code, reason);
  }

  private drained(): boolean {
    return this.socket.bufferedAmount() <= this.highWaterMark;
  }

  private stopPolling(): void {
    if (this.poll) {
      clearInterval(this.poll);
      this.poll = null;
    }
    const release = this.release;
    this.release = null;
    release?.();
  }
}

/**
 * Outbound buffer size of a runtime socket object: `bufferedAmount`, or
 * `getBufferedAmount()`, looked up on the object and on the `websocket` it
 * wraps. A socket that reports neither reads as drained.
 */
export function bufferedAmountOf(raw: unknown, depth = 0): number {
  if (!isRecord(raw)) return 0;
  const buffered = raw.bufferedAmount;
  if (typeof buffered === 'number') return buffered;
  const getBuffered = raw.getBufferedAmount;
  if (typeof getBuffered === 'function') {
    const amount: unknown = getBuffered.call(raw);
    if (typeof amount === 'number') return amount;
  }
  return depth < 1 ? bufferedAmountOf(raw.websocket, depth + 1) : 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
