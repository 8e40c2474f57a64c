import type { FastifyPluginAsync } from 'fastify';
import type { WebSocket } from '@fastify/websocket';
import type { WsMessage } from '@charm-fleet/shared';
import { isRecord, readString } from '../lib/guards';
import { eventBus, type EventBus, type EventBusPayload } from '../services/event-bus';

interface ClientState {
  subscriptions: Set<string>;
  unsubscribe?: () => void;
}

export interface WsRouteOptions {
  bus?: EventBus;
}

function send(socket: WebSocket, message: WsMessage): void {
  socket.send(JSON.stringify(message));
}

export const wsRoutes: FastifyPluginAsync<WsRouteOptions> = async (fastify, options) => {
  const bus = options.bus ?? eventBus;

  fastify.get('/ws', { websocket: true }, (socket: WebSocket) => {
    const clientState: ClientState = {
      subscriptions: new Set(),
    };

    clientState.unsubscribe = bus.subscribe(
      (payload: EventBusPayload) =>
        send(socket, { type: 'event', runId: payload.runId, event: payload.event }),
      clientState.subscriptions
    );

    send(socket, { type: 'connected' });

    socket.on('message', (data: Buffer | ArrayBuffer | Buffer[]) => {
      let message: unknown;
      try {
        message = JSON.parse(data.toString());
      } catch (error) {
        fastify.log.error({ error }, 'Failed to parse WebSocket message');
        send(socket, { type: 'error', error: 'Invalid message format' });
        return;
      }

      const type = isRecord(message) ? readString(message, 'type') : undefined;
      const runId = isRecord(message) ? readString(message, 'runId') : undefined;
      if (!runId) {
        send(socket, { type: 'error', error: 'runId is required' });
        return;
      }

      switch (type) {
        case 'subscribe':
          clientState.subscriptions.add(runId);
          fastify.log.info({ runId }, 'Client subscribed');
          send(socket, { type: 'subscribed', runId });
          break;
        case 'unsubscribe':
          clientState.subscriptions.delete(runId);
          fastify.log.info({ runId }, 'Client unsubscribed');
          send(socket, { type: 'unsubscribed', runId });
          break;
        default:
          send(socket, { type: 'error', error: `Unsupported message type: ${type ?? 'none'}` });
      }
    });

    socket.on('close', () => {
      clientState.unsubscribe?.();
      clientState.subscriptions.clear();
    });

    socket.on('error', (error: Error) => {
      fastify.log.error({ error }, 'WebSocket error');
      clientState.unsubscribe?.();
    });
  });
};
