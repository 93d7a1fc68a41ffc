import { AbortedError, Clock } from '../src/utils/clock';
import { FetchLike } from '../src/services/httpClient';
import { TaskSnapshot, TaskStatus } from '../src/types';

export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortedError();
    }
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export type FakeReply =
  | { status: number; body?: unknown; headers?: Record<string, string> }
  | { error: Error };

export interface RecordedCall {
  url: string;
  method: string;
  body: unknown;
  headers: Headers;
}

/**
 * In-memory stand-in for the upstream API: replays the given replies in
 * order and records every request.
 */
export function createFakeFetch(replies: Array<FakeReply | (() => FakeReply)>) {
  const calls: RecordedCall[] = [];
  const queue = [...replies];

  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({
      url,
      method: init.method ?? 'GET',
      body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
      headers: new Headers(init.headers)
    });

    const next = queue.shift();
    if (next === undefined) {
      throw new Error(`Unexpected request to ${url}`);
    }
    const reply = typeof next === 'function' ? next() : next;
    if ('error' in reply) {
      throw reply.error;
    }

    const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body ?? {});
    return new Response(text, { status: reply.status, headers: reply.headers });
  };

  return { fetch: fetchImpl, calls };
}

export function ok(data: unknown): FakeReply {
  return { status: 200, body: { code: 0, message: 'SUCCEED', request_id: 'req-1', data } };
}

export function wireTask(taskId: string, status: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    task_id: taskId,
    task_status: status,
    created_at: 1700000000000,
    updated_at: 1700000000000,
    task_info: {},
    ...extra
  };
}

export function snapshot(status: TaskStatus, extra: Partial<TaskSnapshot> = {}): TaskSnapshot {
  return {
    taskId: 't1',
    status,
    statusMessage: null,
    createdAt: 0,
    updatedAt: 0,
    externalTaskId: null,
    result: null,
    ...extra
  };
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
