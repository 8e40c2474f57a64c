import type { FastifyBaseLogger, FastifyReply } from 'fastify';
import { ConfigError, ParseError, getErrorMessage } from '../lib/errors';
import type { OrchestratorContext } from '../services/context';
import type { RunStartListener } from '../services/run-recorder';

export interface RouteOptions {
  context: OrchestratorContext;
}

export type RunLauncher = (onStart: RunStartListener) => Promise<unknown>;

export function statusForError(error: unknown): number {
  return error instanceof ParseError || error instanceof ConfigError ? 400 : 500;
}

export function sendError(reply: FastifyReply, error: unknown): void {
  reply.status(statusForError(error)).send({
    success: false,
    error: getErrorMessage(error),
  });
}

export function sendBadRequest(reply: FastifyReply, error: string): void {
  reply.status(400).send({ success: false, error });
}

/**
 * Replies 202 with the run id as soon as the run has started and lets it
 * finish in the background. Failures before the start become the reply.
 */
export function acceptRun(log: FastifyBaseLogger, reply: FastifyReply, launch: RunLauncher): Promise<void> {
  return new Promise((resolve) => {
    let runId: string | null = null;

    launch((id) => {
      runId = id;
      reply.status(202).send({ success: true, data: { runId: id } });
      resolve();
    })
      .then(() => {
        if (runId === null) {
          sendError(reply, new Error('Run finished without starting'));
          resolve();
        }
      })
      .catch((error: unknown) => {
        if (runId !== null) {
          log.error({ runId, error: getErrorMessage(error) }, 'Background run failed');
          return;
        }
        sendError(reply, error);
        resolve();
      });
  });
}
