import fs from 'fs-extra';
import path from 'path';
import logger from '../utils/logger';
import { ApiError, DecodeError } from '../utils/errorHandler';
import { StructuredResult } from '../types';
import { FetchLike } from './httpClient';

function imageExtension(url: string): string {
  const ext = path.extname(new URL(url).pathname).toLowerCase();
  return ['.png', '.jpg', '.jpeg', '.webp'].includes(ext) ? ext : '.png';
}

export function mediaFileName(result: StructuredResult, position: number): string {
  if (result.kind === 'images') {
    const entry = result.entries[position];
    return `image-${entry.index}${imageExtension(entry.url)}`;
  }
  const safeId = result.entries[position].id.replace(/[^A-Za-z0-9_-]/g, '_');
  return `video-${safeId}.mp4`;
}

/**
 * Saves every media entry of a resolved result into `directory` and returns
 * the written file paths in result order. Entries that would share a file
 * name are rejected before anything is downloaded.
 */
export async function downloadResult(
  result: StructuredResult,
  directory: string,
  fetchImpl: FetchLike = (url, init) => fetch(url, init)
): Promise<string[]> {
  const fileNames: string[] = [];
  for (let i = 0; i < result.entries.length; i++) {
    fileNames.push(mediaFileName(result, i));
  }
  const duplicate = fileNames.find((name, position) => fileNames.indexOf(name) !== position);
  if (duplicate !== undefined) {
    throw new DecodeError(`Result has more than one entry named ${duplicate}`);
  }

  await fs.ensureDir(directory);

  const written: string[] = [];
  for (let i = 0; i < result.entries.length; i++) {
    const { url } = result.entries[i];
    const outputPath = path.join(directory, fileNames[i]);

    logger.info('Downloading media', { url, outputPath });

    const response = await fetchImpl(url, { method: 'GET' });
    if (!response.ok) {
      throw new ApiError(`Failed to download media: ${response.status} ${response.statusText}`, {
        statusCode: response.status
      });
    }

    const buffer = await response.arrayBuffer();
    await fs.writeFile(outputPath, Buffer.from(buffer));
    written.push(outputPath);

    logger.info('Media downloaded', { outputPath, fileSizeBytes: buffer.byteLength });
  }

  return written;
}
