import { EventEmitter } from 'events';
import type { RunEvent } from '@charm-fleet/shared';

const RUN_EVENT = 'run-event';

export interface EventBusPayload {
  runId: string;
  event: RunEvent;
}

export type EventBusListener = (payload: EventBusPayload) => void;

/**
 * In-process fan-out of run events. Listeners may restrict themselves to a
 * set of run ids; the set is read on every event, so it can change later.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor(maxListeners = 100) {
    this.emitter.setMaxListeners(maxListeners);
  }

  publish(event: RunEvent): void {
    const payload: EventBusPayload = { runId: event.runId, event };
    this.emitter.emit(RUN_EVENT, payload);
  }

  subscribe(listener: EventBusListener, runIds?: ReadonlySet<string>): () => void {
    const handler: EventBusListener = (payload) => {
      if (!runIds || runIds.has(payload.runId)) {
        listener(payload);
      }
    };
    this.emitter.on(RUN_EVENT, handler);
    return () => this.emitter.off(RUN_EVENT, handler);
  }

  subscribeToRun(runId: string, callback: (event: RunEvent) => void): () => void {
    return this.subscribe((payload) => callback(payload.event), new Set([runId]));
  }

  get listenerCount(): number {
    return this.emitter.listenerCount(RUN_EVENT);
  }
}

export const eventBus = new EventBus();
