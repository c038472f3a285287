// src/lib/sse.ts

import type { FastifyReply } from 'fastify';

/**
 * Connected server-sent event clients of one server instance.
 */
export class SseHub {
  private readonly clients = new Set<FastifyReply>();

  addClient(client: FastifyReply) {
    this.clients.add(client);
  }

  removeClient(client: FastifyReply) {
    this.clients.delete(client);
  }

  get clientCount(): number {
    return this.clients.size;
  }

  broadcast(event: string, data: unknown) {
    const payload = JSON.stringify(data);
    for (const client of this.clients) {
      client.sse({ event, data: payload });
    }
  }
}
