import logger from '../utils/logger';
import { AbortedError, Clock, systemClock } from '../utils/clock';
import { TaskCancelledError, TimeoutError } from '../utils/errorHandler';
import { TaskHandle, TaskSnapshot, isTerminal } from '../types';

export const DEFAULT_POLL_INTERVAL_MS = 5000;
export const DEFAULT_POLL_TIMEOUT_MS = 300000;

export interface PollOptions {
  pollIntervalMs?: number;
  /** Wall-clock deadline measured from the first fetch. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type SnapshotFetcher = (taskId: string, signal?: AbortSignal) => Promise<TaskSnapshot>;

/**
 * Fetches snapshots one after another until the task reaches a terminal
 * state. The deadline is advisory: an in-flight fetch is allowed to finish,
 * but no new fetch starts once it has passed.
 */
export async function pollUntilTerminal(
  fetchSnapshot: SnapshotFetcher,
  handle: TaskHandle,
  options: PollOptions = {},
  clock: Clock = systemClock,
  context: { family?: string } = {}
): Promise<TaskSnapshot> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  const { signal } = options;
  const { taskId } = handle;

  let startedAt: number | undefined;
  let fetches = 0;

  try {
    for (;;) {
      if (signal?.aborted) {
        throw new AbortedError();
      }
      if (startedAt !== undefined && clock.now() - startedAt >= timeoutMs) {
        throw deadlineExceeded(taskId, timeoutMs, fetches);
      }

      if (startedAt === undefined) {
        startedAt = clock.now();
      }
      const snapshot = await fetchSnapshot(taskId, signal);
      fetches += 1;

      logger.debug('Polled task status', { ...context, taskId, status: snapshot.status, fetches });

      if (isTerminal(snapshot.status)) {
        logger.info('Task reached terminal state', {
          ...context,
          taskId,
          status: snapshot.status,
          elapsedMs: clock.now() - startedAt
        });
        return snapshot;
      }

      const elapsed = clock.now() - startedAt;
      if (elapsed >= timeoutMs) {
        throw deadlineExceeded(taskId, timeoutMs, fetches);
      }

      await clock.sleep(Math.min(pollIntervalMs, timeoutMs - elapsed), signal);
    }
  } catch (error) {
    if (error instanceof AbortedError) {
      throw new TaskCancelledError(taskId, 'aborted');
    }
    throw error;
  }
}

function deadlineExceeded(taskId: string, timeoutMs: number, fetches: number): TimeoutError {
  return new TimeoutError(`Task ${taskId} did not reach a terminal state within ${timeoutMs}ms`, {
    details: { taskId, timeoutMs, fetches }
  });
}
