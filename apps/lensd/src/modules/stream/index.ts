/**
 * Stream module — WS /ws
 *
 * Each connection becomes a Broadcast Hub session and receives every
 * Snapshot as a text frame. Inbound messages are ignored.
 *
 * A write completes once the socket's outbound buffer drains, so an
 * observer that stops reading falls under the session's write timeout.
 */

import { bufferedAmountOf, SocketSink } from '@cortex-lens/broadcast';
import { Elysia } from 'elysia';
import type { Kernel } from '../../kernel.js';

/** The parts of an Elysia socket the handlers use. */
export interface ObserverSocket {
  id: string;
  raw: unknown;
  send(data: string): unknown;
  close(code?: number, reason?: string): unknown;
}

export const streamHandlers = (kernel: Kernel) => ({
  open(ws: ObserverSocket): void {
    const sink = new SocketSink({
      send: (data) => ws.send(data),
      close: (code, reason) => ws.close(code, reason),
      bufferedAmount: () => bufferedAmountOf(ws.raw),
    });
    kernel.hub.register(sink, ws.id);
  },

  message(): void {
    // observers are read-only
  },

  close(ws: Pick<ObserverSocket, 'id'>): void {
    kernel.hub.unregister(ws.id, 1000, 'client closed');
  },
});

export const stream = (kernel: Kernel) => {
  const handlers = streamHandlers(kernel);

  return new Elysia({ tags: ['Stream'] }).ws('/ws', {
    open: (ws) => handlers.open(ws),
    message: () => handlers.message(),
    close: (ws) => handlers.close(ws),
  });
};
