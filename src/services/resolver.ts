import { DecodeError, TaskCancelledError, TaskFailedError } from '../utils/errorHandler';
import { ImageListResult, ResultFor, ResultKind, TaskSnapshot, VideoListResult } from '../types';

function resolveImages(snapshot: TaskSnapshot): ImageListResult {
  const images = snapshot.result?.images;
  if (!images || images.length === 0) {
    throw new DecodeError(`Task ${snapshot.taskId} succeeded without any images`);
  }
  return {
    kind: 'images',
    entries: images.map(({ index, url }) => ({ index, url }))
  };
}

function resolveVideos(snapshot: TaskSnapshot): VideoListResult {
  const single = snapshot.result?.video;
  const videos = snapshot.result?.videos ?? (single ? [single] : []);
  if (videos.length === 0) {
    throw new DecodeError(`Task ${snapshot.taskId} succeeded without any videos`);
  }
  return {
    kind: 'videos',
    entries: videos.map(({ id, url, duration }) => ({ id, url, duration }))
  };
}

/**
 * Turns a terminal snapshot into the family's result, or throws the typed
 * failure it describes. Performs no I/O.
 */
export function resolveSnapshot<K extends ResultKind>(snapshot: TaskSnapshot, kind: K): ResultFor<K>;
export function resolveSnapshot(snapshot: TaskSnapshot, kind: ResultKind): ImageListResult | VideoListResult {
  switch (snapshot.status) {
    case 'succeeded':
      return kind === 'images' ? resolveImages(snapshot) : resolveVideos(snapshot);
    case 'failed':
      throw new TaskFailedError(snapshot.taskId, snapshot.statusMessage ?? 'unknown reason');
    case 'cancelled':
      throw new TaskCancelledError(snapshot.taskId, 'remote');
    default:
      throw new DecodeError(`Task ${snapshot.taskId} is not finished (status: ${snapshot.status})`);
  }
}
