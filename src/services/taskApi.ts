import { z } from 'zod';
import logger from '../utils/logger';
import { AbortedError } from '../utils/clock';
import { DecodeError, TaskCancelledError, ValidationError, logError, toKlingError } from '../utils/errorHandler';
import { fieldErrorsFromZod, parseRequest } from '../utils/validation';
import { toWirePayload } from '../utils/wire';
import {
  ResultFor,
  ResultKind,
  TaskHandle,
  TaskListQuery,
  TaskSnapshot,
  createdTaskSchema,
  taskListQuerySchema,
  taskSnapshotSchema
} from '../types';
import { KlingHttpClient } from './httpClient';
import { PollOptions, pollUntilTerminal } from './poller';
import { resolveSnapshot } from './resolver';

export interface FamilyDescriptor<S extends z.ZodTypeAny, K extends ResultKind> {
  name: string;
  path: string;
  requestSchema: S;
  resultKind: K;
  cancellable?: boolean;
}

export function decodeSnapshot(data: unknown): TaskSnapshot {
  const parsed = taskSnapshotSchema.safeParse(data);
  if (!parsed.success) {
    throw new DecodeError('Task data does not match the expected shape', {
      details: { fieldErrors: fieldErrorsFromZod(parsed.error) }
    });
  }
  return parsed.data;
}

/**
 * Task lifecycle for one endpoint family: submit, observe, wait, resolve.
 */
export class TaskApi<S extends z.ZodTypeAny, K extends ResultKind> {
  constructor(
    private readonly http: KlingHttpClient,
    readonly descriptor: FamilyDescriptor<S, K>
  ) {}

  private get family(): string {
    return this.descriptor.name;
  }

  private taskPath(taskId: string): string {
    if (taskId.trim() === '') {
      throw new ValidationError('taskId must not be empty', [{ path: 'taskId', message: 'must not be empty' }]);
    }
    return `${this.descriptor.path}/${encodeURIComponent(taskId)}`;
  }

  async submit(request: z.input<S>): Promise<TaskHandle> {
    const validated = parseRequest(this.descriptor.requestSchema, request, this.family);

    logger.info('Submitting task', { family: this.family });

    const data = await this.http.request(
      { method: 'POST', path: this.descriptor.path, body: toWirePayload(validated) },
      { family: this.family, operation: 'submit' }
    );

    const created = createdTaskSchema.safeParse(data);
    if (!created.success) {
      throw new DecodeError('Task creation response has no task_id', {
        details: { fieldErrors: fieldErrorsFromZod(created.error) }
      });
    }

    const handle: TaskHandle = Object.freeze({
      taskId: created.data.task_id,
      submittedAt: this.http.clock.now(),
      initialStatus: created.data.task_status ?? 'submitted'
    });

    logger.info('Task submitted', { family: this.family, taskId: handle.taskId, status: handle.initialStatus });
    return handle;
  }

  async getTask(taskId: string, signal?: AbortSignal): Promise<TaskSnapshot> {
    try {
      const data = await this.http.request(
        { method: 'GET', path: this.taskPath(taskId), signal },
        { family: this.family, taskId, operation: 'getTask' }
      );
      return decodeSnapshot(data);
    } catch (error) {
      if (error instanceof AbortedError) {
        throw new TaskCancelledError(taskId, 'aborted');
      }
      throw error;
    }
  }

  async listTasks(query: TaskListQuery = {}): Promise<TaskSnapshot[]> {
    const { pageNum, pageSize } = parseRequest(taskListQuerySchema, query, `${this.family} task list`);

    const data = await this.http.request(
      { method: 'GET', path: this.descriptor.path, query: { pageNum, pageSize } },
      { family: this.family, operation: 'listTasks' }
    );

    if (!Array.isArray(data)) {
      return [];
    }
    return data.map((item) => decodeSnapshot(item));
  }

  pollUntilTerminal(handle: TaskHandle, options: PollOptions = {}): Promise<TaskSnapshot> {
    return pollUntilTerminal(
      (taskId, signal) => this.getTask(taskId, signal),
      handle,
      options,
      this.http.clock,
      { family: this.family }
    );
  }

  resolve(snapshot: TaskSnapshot): ResultFor<K> {
    return resolveSnapshot(snapshot, this.descriptor.resultKind);
  }

  /**
   * Submits a task, waits for it to finish and returns its decoded result.
   */
  async generate(request: z.input<S>, options: PollOptions = {}): Promise<ResultFor<K>> {
    try {
      const handle = await this.submit(request);
      const snapshot = await this.pollUntilTerminal(handle, options);
      return this.resolve(snapshot);
    } catch (caught) {
      const error = toKlingError(caught, { family: this.family });
      logError(error, { family: this.family, operation: 'generate' });
      throw error;
    }
  }

  async cancel(taskId: string): Promise<TaskSnapshot> {
    if (!this.descriptor.cancellable) {
      throw new ValidationError(`${this.family} tasks cannot be cancelled`);
    }

    const data = await this.http.request(
      { method: 'POST', path: `${this.taskPath(taskId)}/cancel` },
      { family: this.family, taskId, operation: 'cancel' }
    );
    logger.info('Task cancellation requested', { family: this.family, taskId });
    return decodeSnapshot(data);
  }
}
