/**
 * WebSocket live event feed.
 * Broadcasts governance events (poll.created, poll.voted, income.deposited, etc.)
 * to all connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import { EventBus, EventType } from '../infra/eventBus.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const OPEN = 1;

export interface LiveFeed {
  connectedClients(): number;
  close(): void;
}

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 */
export async function registerWebSocket(app: FastifyInstance, bus: EventBus): Promise<LiveFeed> {
  const clients = new Set<WSLike>();

  const unsubscribe = bus.on('*', (event: EventType, data: unknown) => {
    const message = JSON.stringify({
      type: event,
      data,
      ts: new Date().toISOString(),
    });

    for (const ws of clients) {
      if (ws.readyState === OPEN) {
        ws.send(message);
      }
    }
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(JSON.stringify({
      type: 'connected',
      data: { clients: clients.size },
      ts: new Date().toISOString(),
    }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });

  app.addHook('onClose', async () => {
    unsubscribe();
    clients.clear();
  });

  return {
    connectedClients: () => clients.size,
    close: unsubscribe,
  };
}
