import { KlingClient } from '../../src/services/klingClient';
import { RetryPolicy } from '../../src/utils/retry';
import {
  ApiError,
  AuthenticationError,
  DecodeError,
  KlingError,
  ServerError,
  TaskCancelledError,
  TaskFailedError,
  ValidationError
} from '../../src/utils/errorHandler';
import { FakeClock, FakeReply, captureError, createFakeFetch, ok, wireTask } from '../helpers';

const BASE_URL = 'https://api.klingai.com';

function setup(replies: Array<FakeReply | (() => FakeReply)>) {
  const clock = new FakeClock();
  const fake = createFakeFetch(replies);
  const client = new KlingClient({
    apiKey: 'test-api-key',
    baseUrl: BASE_URL,
    fetch: fake.fetch,
    clock,
    retryPolicy: new RetryPolicy({}, () => 0.5)
  });
  return { client, clock, calls: fake.calls };
}

describe('TaskApi.generate', () => {
  it('submits, polls and resolves an image task', async () => {
    const { client, clock, calls } = setup([
      ok({ task_id: 't1', task_status: 'submitted', created_at: 1000, updated_at: 1000 }),
      ok(wireTask('t1', 'processing')),
      ok(
        wireTask('t1', 'succeed', {
          task_result: { images: [{ index: 0, url: 'https://cdn.example.com/t1/0.png' }] }
        })
      )
    ]);

    const result = await client.imageGeneration.generate({ prompt: 'a red fox' }, { pollIntervalMs: 1000 });

    expect(result).toEqual({
      kind: 'images',
      entries: [{ index: 0, url: 'https://cdn.example.com/t1/0.png' }]
    });
    expect(calls).toHaveLength(3);
    expect(calls[0].method).toBe('POST');
    expect(calls[0].url).toBe(`${BASE_URL}/v1/images/generations`);
    expect(calls[0].body).toEqual({
      model_name: 'kling-v1',
      prompt: 'a red fox',
      image_fidelity: 0.5,
      n: 1,
      aspect_ratio: '16:9'
    });
    expect(calls[0].headers.get('authorization')).toBe('Bearer test-api-key');
    expect(calls[1].method).toBe('GET');
    expect(calls[1].url).toBe(`${BASE_URL}/v1/images/generations/t1`);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('raises the upstream failure of a failed task', async () => {
    const { client, calls } = setup([
      ok({ task_id: 't2' }),
      ok(wireTask('t2', 'failed', { task_status_msg: 'content policy violation' }))
    ]);

    const error = await captureError(client.textToVideo.generate({ prompt: 'a storm' }));

    expect(error).toBeInstanceOf(TaskFailedError);
    expect(error instanceof TaskFailedError && error.taskId).toBe('t2');
    expect(error instanceof TaskFailedError && error.statusMessage).toBe('content policy violation');
    expect(calls).toHaveLength(2);
  });

  it('rejects invalid requests before any network call', async () => {
    const { client, calls } = setup([]);

    const error = await captureError(client.imageGeneration.generate({ prompt: '' }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.fieldErrors.map((field) => field.path)).toEqual(['prompt']);
    expect(calls).toHaveLength(0);
  });
});

describe('TaskApi.pollUntilTerminal', () => {
  it('honours retry-after while polling', async () => {
    const rateLimited: FakeReply = {
      status: 429,
      headers: { 'Retry-After': '2' },
      body: { code: 1302, message: 'Rate limit exceeded' }
    };
    const { client, clock, calls } = setup([
      rateLimited,
      rateLimited,
      ok(
        wireTask('t3', 'succeed', {
          task_result: { videos: [{ id: 'v3', url: 'https://cdn.example.com/v3.mp4', duration: 5 }] }
        })
      )
    ]);

    const snapshot = await client.textToVideo.pollUntilTerminal({
      taskId: 't3',
      submittedAt: 0,
      initialStatus: 'submitted'
    });

    expect(snapshot.status).toBe('succeeded');
    expect(calls).toHaveLength(3);
    expect(clock.sleeps).toEqual([2000, 2000]);
    expect(clock.now()).toBe(4000);
  });
});

describe('TaskApi.submit', () => {
  it('returns a frozen handle stamped with the submission time', async () => {
    const { client, clock } = setup([ok({ task_id: 't4', task_status: 'submitted' })]);
    clock.current = 1234;

    const handle = await client.textToVideo.submit({ prompt: 'a cat surfing' });

    expect(handle).toEqual({ taskId: 't4', submittedAt: 1234, initialStatus: 'submitted' });
    expect(Object.isFrozen(handle)).toBe(true);
  });

  it('sends snake_case bodies and keeps camera control', async () => {
    const { client, calls } = setup([ok({ task_id: 't5' })]);

    await client.textToVideo.submit({
      prompt: 'a cat surfing',
      duration: 10,
      cameraControl: { type: 'simple', config: { zoom: 5 } }
    });

    expect(calls[0].url).toBe(`${BASE_URL}/v1/videos/text2video`);
    expect(calls[0].body).toEqual({
      model_name: 'kling-v1',
      prompt: 'a cat surfing',
      cfg_scale: 0.5,
      mode: 'std',
      camera_control: { type: 'simple', config: { zoom: 5 } },
      aspect_ratio: '16:9',
      duration: '10'
    });
  });

  it('passes metadata keys through untouched', async () => {
    const { client, calls } = setup([ok({ task_id: 'ls1' })]);

    await client.lipSync.submit({
      videoUrl: 'https://cdn.example.com/in.mp4',
      audioUrl: 'https://cdn.example.com/in.mp3',
      metadata: { userId: 'u-1' }
    });

    expect(calls[0].url).toBe(`${BASE_URL}/v1/lip-sync/tasks`);
    expect(calls[0].body).toEqual({
      video_url: 'https://cdn.example.com/in.mp4',
      audio_url: 'https://cdn.example.com/in.mp3',
      output_format: 'mp4',
      resolution: '720p',
      fps: 30,
      metadata: { userId: 'u-1' }
    });
  });

  it('fails when the creation response has no task id', async () => {
    const { client } = setup([ok({ task_status: 'submitted' })]);

    await expect(client.textToVideo.submit({ prompt: 'a cat' })).rejects.toBeInstanceOf(DecodeError);
  });

  it('raises envelope errors without retrying', async () => {
    const { client, calls } = setup([
      { status: 200, body: { code: 1201, message: 'Invalid params', request_id: 'req-9', data: null } }
    ]);

    const error = await captureError(client.textToVideo.submit({ prompt: 'a cat' }));

    expect(error).toBeInstanceOf(ApiError);
    expect(error instanceof ApiError && [error.code, error.requestId, error.message]).toEqual([
      1201,
      'req-9',
      'Invalid params'
    ]);
    expect(calls).toHaveLength(1);
  });

  it('retries server errors and then gives up', async () => {
    const unavailable: FakeReply = { status: 503, body: { message: 'Service unavailable' } };
    const { client, clock, calls } = setup([unavailable, unavailable, unavailable]);

    await expect(client.textToVideo.submit({ prompt: 'a cat' })).rejects.toBeInstanceOf(ServerError);
    expect(calls).toHaveLength(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('does not retry authentication failures', async () => {
    const { client, calls } = setup([{ status: 401, body: { message: 'Invalid API key' } }]);

    await expect(client.textToVideo.submit({ prompt: 'a cat' })).rejects.toBeInstanceOf(AuthenticationError);
    expect(calls).toHaveLength(1);
  });

  it('retries connection failures', async () => {
    const { client, clock } = setup([{ error: new TypeError('fetch failed') }, ok({ task_id: 't6' })]);

    const handle = await client.textToVideo.submit({ prompt: 'a cat' });

    expect(handle.taskId).toBe('t6');
    expect(clock.sleeps).toEqual([1000]);
  });
});

describe('TaskApi.getTask and listTasks', () => {
  it('encodes the task id in the path', async () => {
    const { client, calls } = setup([ok(wireTask('a/b', 'processing'))]);

    const snapshot = await client.imageToVideo.getTask('a/b');

    expect(snapshot.taskId).toBe('a/b');
    expect(calls[0].url).toBe(`${BASE_URL}/v1/videos/image2video/a%2Fb`);
  });

  it('reports an aborted lookup as a cancelled wait', async () => {
    const { client, calls } = setup([]);
    const controller = new AbortController();
    controller.abort();

    const error = await captureError(client.textToVideo.getTask('t1', controller.signal));

    expect(error).toBeInstanceOf(TaskCancelledError);
    expect(error).toBeInstanceOf(KlingError);
    expect(error instanceof TaskCancelledError && [error.taskId, error.reason]).toEqual(['t1', 'aborted']);
    expect(calls).toHaveLength(0);
  });

  it('stops retrying when aborted during the backoff', async () => {
    const controller = new AbortController();
    const { client, calls } = setup([
      () => {
        controller.abort();
        return { status: 503, body: { message: 'Service unavailable' } };
      }
    ]);

    const error = await captureError(client.textToVideo.getTask('t1', controller.signal));

    expect(error instanceof TaskCancelledError && error.reason).toBe('aborted');
    expect(calls).toHaveLength(1);
  });

  it('rejects an empty task id', async () => {
    const { client, calls } = setup([]);

    await expect(client.imageToVideo.getTask(' ')).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(0);
  });

  it('lists tasks with paging parameters', async () => {
    const { client, calls } = setup([ok([wireTask('t1', 'processing'), wireTask('t2', 'submitted')])]);

    const tasks = await client.textToVideo.listTasks({ pageNum: 2, pageSize: 10 });

    expect(tasks.map((task) => [task.taskId, task.status])).toEqual([
      ['t1', 'processing'],
      ['t2', 'submitted']
    ]);
    expect(calls[0].url).toBe(`${BASE_URL}/v1/videos/text2video?pageNum=2&pageSize=10`);
  });

  it('returns an empty list when there is no data', async () => {
    const { client } = setup([ok(null)]);

    await expect(client.textToVideo.listTasks()).resolves.toEqual([]);
  });

  it('rejects out-of-range page sizes', async () => {
    const { client } = setup([]);

    await expect(client.textToVideo.listTasks({ pageSize: 501 })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('TaskApi.cancel', () => {
  it('cancels video effect tasks', async () => {
    const { client, calls } = setup([ok(wireTask('fx1', 'cancelled'))]);

    const snapshot = await client.videoEffects.cancel('fx1');

    expect(calls[0].method).toBe('POST');
    expect(calls[0].url).toBe(`${BASE_URL}/v1/video-effects/tasks/fx1/cancel`);
    expect(snapshot.status).toBe('cancelled');
    expect(() => client.videoEffects.resolve(snapshot)).toThrow(TaskCancelledError);
  });

  it('refuses families without cancellation', async () => {
    const { client, calls } = setup([]);

    await expect(client.textToVideo.cancel('t1')).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(0);
  });
});
