import { z } from 'zod';

export type TaskStatus = 'submitted' | 'processing' | 'succeeded' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['succeeded', 'failed', 'cancelled']);

const STATUS_ALIASES: Record<string, TaskStatus> = {
  submitted: 'submitted',
  pending: 'submitted',
  queued: 'submitted',
  processing: 'processing',
  running: 'processing',
  in_progress: 'processing',
  succeed: 'succeeded',
  succeeded: 'succeeded',
  success: 'succeeded',
  completed: 'succeeded',
  failed: 'failed',
  cancelled: 'cancelled',
  canceled: 'cancelled'
};

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface TaskHandle {
  readonly taskId: string;
  /** Epoch milliseconds at which the creation request returned. */
  readonly submittedAt: number;
  readonly initialStatus: TaskStatus;
}

export type ResultKind = 'images' | 'videos';

export interface ImageEntry {
  index: number;
  url: string;
}

export interface VideoEntry {
  id: string;
  url: string;
  duration: number;
}

export interface ImageListResult {
  kind: 'images';
  entries: ImageEntry[];
}

export interface VideoListResult {
  kind: 'videos';
  entries: VideoEntry[];
}

export type StructuredResult = ImageListResult | VideoListResult;

export type ResultFor<K extends ResultKind> = K extends 'images' ? ImageListResult : VideoListResult;

// Wire shapes

export const taskStatusSchema = z.string().transform((value, ctx) => {
  const status = STATUS_ALIASES[value.toLowerCase()];
  if (status === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown task status "${value}"` });
    return z.NEVER;
  }
  return status;
});

export const imageEntrySchema = z.object({
  index: z.coerce.number().int().min(0),
  url: z.string().url()
});

export const videoEntrySchema = z.object({
  id: z.coerce.string(),
  url: z.string().url(),
  duration: z.coerce.number().min(0)
});

export const taskResultSchema = z.object({
  images: z.array(imageEntrySchema).optional(),
  videos: z.array(videoEntrySchema).optional(),
  video: videoEntrySchema.optional()
});

export type TaskResultPayload = z.output<typeof taskResultSchema>;

/** Decoded task output; frozen together with its snapshot. */
export interface TaskResult {
  readonly images?: ReadonlyArray<Readonly<ImageEntry>>;
  readonly videos?: ReadonlyArray<Readonly<VideoEntry>>;
  readonly video?: Readonly<VideoEntry>;
}

function freezeResult(result: TaskResultPayload): TaskResult {
  const frozen: { -readonly [K in keyof TaskResult]: TaskResult[K] } = {};
  if (result.images) {
    frozen.images = Object.freeze(result.images.map((entry) => Object.freeze({ ...entry })));
  }
  if (result.videos) {
    frozen.videos = Object.freeze(result.videos.map((entry) => Object.freeze({ ...entry })));
  }
  if (result.video) {
    frozen.video = Object.freeze({ ...result.video });
  }
  return Object.freeze(frozen);
}

export interface TaskSnapshot {
  readonly taskId: string;
  readonly status: TaskStatus;
  readonly statusMessage: string | null;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly externalTaskId: string | null;
  readonly result: TaskResult | null;
}

const timestampSchema = z.union([
  z.number(),
  z.string().transform((value, ctx) => {
    const numeric = Number(value);
    const parsed = Number.isFinite(numeric) ? numeric : Date.parse(value);
    if (Number.isNaN(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp "${value}"` });
      return z.NEVER;
    }
    return parsed;
  })
]);

/**
 * One observation of a remote task. The invariants between status, message
 * and result are checked here so everything downstream can rely on them.
 */
export const taskSnapshotSchema = z
  .object({
    task_id: z.string().min(1),
    task_status: taskStatusSchema,
    task_status_msg: z.string().nullish(),
    created_at: timestampSchema,
    updated_at: timestampSchema.nullish(),
    task_info: z
      .object({ external_task_id: z.string().nullish() })
      .passthrough()
      .nullish(),
    task_result: taskResultSchema.nullish()
  })
  .superRefine((raw, ctx) => {
    if (raw.task_status === 'succeeded' && !raw.task_result) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['task_result'],
        message: 'A succeeded task must carry a result'
      });
    }
    if (raw.task_status === 'failed' && !raw.task_status_msg) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['task_status_msg'],
        message: 'A failed task must carry a status message'
      });
    }
  })
  .transform((raw): TaskSnapshot => Object.freeze({
    taskId: raw.task_id,
    status: raw.task_status,
    statusMessage: raw.task_status_msg ?? null,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at ?? raw.created_at,
    externalTaskId: raw.task_info?.external_task_id ?? null,
    result: raw.task_status === 'succeeded' && raw.task_result ? freezeResult(raw.task_result) : null
  }));

export const envelopeSchema = z.object({
  code: z.number(),
  message: z.string().nullish(),
  request_id: z.string().nullish(),
  data: z.unknown()
});

export type Envelope = z.output<typeof envelopeSchema>;

export const createdTaskSchema = z.object({
  task_id: z.string().min(1),
  task_status: taskStatusSchema.optional()
});

export interface TaskListQuery {
  pageNum?: number;
  pageSize?: number;
}

export const taskListQuerySchema = z.object({
  pageNum: z.number().int().min(1).max(1000).default(1),
  pageSize: z.number().int().min(1).max(500).default(30)
});
