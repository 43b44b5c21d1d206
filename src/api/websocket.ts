/**
 * WebSocket live event feed.
 * Broadcasts committed ledger events (position.opened, interest.collected,
 * position.liquidated, etc.) to all connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import { eventBus, EventType } from '../infra/eventBus.js';
import { toPlain } from '../utils/json.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const clients = new Set<WSLike>();

/** Number of currently connected WebSocket clients. */
export function connectedClients(): number {
  return clients.size;
}

export const formatEventMessage = (event: EventType | 'connected', data: unknown): string => JSON.stringify({
  type: event,
  data: toPlain(data),
  ts: new Date().toISOString(),
});

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<() => void> {
  const unsubscribe = eventBus.on('*', (event: EventType, data: unknown) => {
    const message = formatEventMessage(event, data);

    for (const ws of clients) {
      if (ws.readyState === 1 /* OPEN */) {
        ws.send(message);
      }
    }
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(formatEventMessage('connected', { clients: clients.size }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });

  return unsubscribe;
}
