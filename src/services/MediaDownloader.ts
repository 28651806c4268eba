import { promises as fs } from 'fs';
import path from 'path';
import type { ChatSource, ChatSummary, MediaKind, MediaMessage, NormalizedMessage } from '../types';
import { sanitizeFileName } from '../core/fileNamer';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const DEFAULT_MEDIA_CONCURRENCY = 4;

const EXTENSIONS: Partial<Record<MediaKind, string>> = {
  photo: 'jpg',
  voice: 'ogg',
  video: 'mp4',
  sticker: 'webp',
  audio: 'mp3',
};

// Kinds with nothing to download
const NO_FILE: ReadonlySet<MediaKind> = new Set<MediaKind>(['link', 'location', 'contact', 'poll']);

export interface MediaDownloadOptions {
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

export interface MediaDownloadResult {
  /** Paths of written files */
  downloaded: string[];
  /** Ids the source had no file for, or that were never started after an abort */
  skipped: number[];
  failed: Array<{ messageId: number; error: string }>;
}

function hasFile(message: NormalizedMessage): message is Readonly<MediaMessage> {
  return message.kind !== 'text' && message.kind !== 'service' && !NO_FILE.has(message.kind);
}

/**
 * `<id>_<file name>` when the source named the file, else `<id>_<kind>.<ext>`
 */
export function mediaFileName(message: Readonly<MediaMessage>): string {
  if (message.media.fileName) {
    return `${message.id}_${sanitizeFileName(message.media.fileName)}`;
  }
  return `${message.id}_${message.kind}.${EXTENSIONS[message.kind] ?? 'bin'}`;
}

export class MediaDownloader {
  constructor(private readonly source: ChatSource) {}

  /**
   * Downloads the files of media messages into `targetDir`. Failures of
   * single files are collected, never thrown.
   */
  async download(
    chat: ChatSummary,
    messages: readonly NormalizedMessage[],
    targetDir: string,
    options: MediaDownloadOptions = {}
  ): Promise<MediaDownloadResult> {
    const queue = messages.filter(hasFile);
    const result: MediaDownloadResult = { downloaded: [], skipped: [], failed: [] };
    if (queue.length === 0) {
      return result;
    }

    await fs.mkdir(targetDir, { recursive: true });
    const concurrency = Math.max(1, options.concurrency ?? DEFAULT_MEDIA_CONCURRENCY);
    let next = 0;
    let done = 0;

    const worker = async (): Promise<void> => {
      while (next < queue.length) {
        const message = queue[next++];
        if (options.signal?.aborted) {
          result.skipped.push(message.id);
          continue;
        }

        try {
          const data = await this.source.fetchMedia(chat, message.id);
          if (!data) {
            result.skipped.push(message.id);
          } else {
            const filePath = path.join(targetDir, mediaFileName(message));
            await fs.writeFile(filePath, data);
            result.downloaded.push(filePath);
            logger.debug(`Saved media of message ${message.id} to ${filePath}`);
          }
        } catch (error) {
          result.failed.push({ messageId: message.id, error: errorMessage(error) });
          logger.warn(`Media of message ${message.id} failed: ${errorMessage(error)}`);
        }

        done++;
        options.onProgress?.(done, queue.length);
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, queue.length) }, () => worker()));
    return result;
  }
}
