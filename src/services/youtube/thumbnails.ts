import fs from 'fs';
import https from 'https';
import path from 'path';
import PQueue from 'p-queue';
import { logger } from '../../utils/logger.js';
import type { PlaylistEntry } from '../../types/index.js';

export type ThumbnailQuality = 'maxresdefault' | 'hqdefault' | 'mqdefault' | 'default';

export interface ThumbnailFetcher {
  fetchThumbnail(videoId: string): Promise<Buffer | null>;
}

export function thumbnailUrl(videoId: string, quality: ThumbnailQuality = 'maxresdefault'): string {
  return `https://i.ytimg.com/vi/${videoId}/${quality}.jpg`;
}

/**
 * Fetches thumbnails from YouTube's image host. Best effort: anything
 * other than a 200 resolves to null.
 */
export class HttpThumbnailFetcher implements ThumbnailFetcher {
  constructor(
    private readonly quality: ThumbnailQuality = 'maxresdefault',
    private readonly timeoutMs = 10_000,
  ) {}

  fetchThumbnail(videoId: string): Promise<Buffer | null> {
    return new Promise((resolve) => {
      const req = https.get(thumbnailUrl(videoId, this.quality), { timeout: this.timeoutMs }, (response) => {
        if (response.statusCode !== 200) {
          response.resume();
          resolve(null);
          return;
        }
        const chunks: Buffer[] = [];
        response.on('data', (chunk: Buffer) => chunks.push(chunk));
        response.on('end', () => resolve(Buffer.concat(chunks)));
        response.on('error', () => resolve(null));
      });

      req.on('timeout', () => {
        req.destroy();
        resolve(null);
      });
      req.on('error', () => resolve(null));
    });
  }
}

export interface ThumbnailReport {
  saved: string[];
  missing: PlaylistEntry[];
}

export function thumbnailFilename(entry: PlaylistEntry): string {
  return `${String(entry.index + 1).padStart(2, '0')} - ${entry.id}.jpg`;
}

/**
 * Writes every available thumbnail into a directory
 */
export async function saveThumbnails(
  entries: PlaylistEntry[],
  outputDir: string,
  fetcher: ThumbnailFetcher,
  concurrency = 4,
  onSaved?: (entry: PlaylistEntry, done: number) => void,
): Promise<ThumbnailReport> {
  fs.mkdirSync(outputDir, { recursive: true });

  const queue = new PQueue({ concurrency });
  const saved = new Map<number, string>();
  const missing: PlaylistEntry[] = [];
  let done = 0;

  await Promise.all(
    entries.map((entry) =>
      queue.add(async () => {
        const image = await fetcher.fetchThumbnail(entry.id);
        if (image) {
          const filePath = path.join(outputDir, thumbnailFilename(entry));
          fs.writeFileSync(filePath, image);
          saved.set(entry.index, filePath);
        } else {
          missing.push(entry);
        }
        done++;
        onSaved?.(entry, done);
      })
    )
  );

  logger.debug(`Thumbnails: ${saved.size} saved, ${missing.length} missing`);

  return {
    saved: [...saved.entries()].sort(([a], [b]) => a - b).map(([, filePath]) => filePath),
    missing: missing.sort((a, b) => a.index - b.index),
  };
}
