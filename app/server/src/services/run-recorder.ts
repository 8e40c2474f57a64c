import type { RepositoryOutcome, RunEvent, RunKind } from '@charm-fleet/shared';
import { getErrorMessage } from '../lib/errors';
import { createRunCompletedEvent, createRunId, createRunStartedEvent, isRunEvent } from '../lib/events';
import { appendJsonl, readJsonl } from '../lib/jsonl';
import { createLogger } from '../lib/logger';
import { countOutcomes } from '../lib/outcome';
import { getRunEventsPath } from '../lib/paths';
import { eventBus, type EventBus } from './event-bus';

const log = createLogger('run-recorder');

// Receives the run id as soon as the run is journaled
export type RunStartListener = (runId: string) => void;

export interface RunStartOptions {
  branch?: string;
  repositories: number;
  onStart?: RunStartListener;
}

export interface RunHandle {
  readonly id: string;
  record(event: RunEvent): Promise<void>;
  complete(outcomes: readonly RepositoryOutcome<unknown>[]): Promise<void>;
}

/**
 * Journals run events to `{dataDir}/runs/{runId}/events.jsonl` and publishes
 * them on the event bus. Without a data directory events are kept in memory.
 */
export class RunRecorder {
  private readonly memory = new Map<string, RunEvent[]>();

  constructor(
    private readonly dataDir: string | null,
    private readonly bus: EventBus = eventBus
  ) {}

  async start(kind: RunKind, options: RunStartOptions): Promise<RunHandle> {
    const id = createRunId();
    const record = (event: RunEvent) => this.record(event);
    await record(createRunStartedEvent(id, kind, options.repositories, options.branch));
    options.onStart?.(id);

    return {
      id,
      record,
      complete: (outcomes) => record(createRunCompletedEvent(id, countOutcomes(outcomes))),
    };
  }

  async events(runId: string): Promise<RunEvent[]> {
    if (!this.dataDir) {
      return [...(this.memory.get(runId) ?? [])];
    }
    return readJsonl(getRunEventsPath(this.dataDir, runId), isRunEvent);
  }

  // Journal failures are logged only; a run never fails because of its journal
  private async record(event: RunEvent): Promise<void> {
    try {
      if (this.dataDir) {
        await appendJsonl(getRunEventsPath(this.dataDir, event.runId), event);
      } else {
        const events = this.memory.get(event.runId) ?? [];
        events.push(event);
        this.memory.set(event.runId, events);
      }
    } catch (error) {
      log.error({ runId: event.runId, type: event.type, error: getErrorMessage(error) }, 'Failed to journal event');
    }
    this.bus.publish(event);
  }
}
