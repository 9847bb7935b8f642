import fs from 'fs';
import path from 'path';
import NodeID3 from 'node-id3';
import type { Playlist, PlaylistEntry } from '../../types/index.js';
import type { ThumbnailFetcher } from '../youtube/thumbnails.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

export interface Tagger {
  tag(filePath: string, entry: PlaylistEntry, playlist: Pick<Playlist, 'title' | 'uploader'>): Promise<boolean>;
}

/**
 * Builds the ID3 frames for one downloaded entry
 */
export function buildTags(
  entry: PlaylistEntry,
  playlist: Pick<Playlist, 'title' | 'uploader'>,
  cover: Buffer | null,
): NodeID3.Tags {
  const tags: NodeID3.Tags = {
    title: entry.title,
    album: playlist.title,
    trackNumber: String(entry.index + 1),
  };

  if (playlist.uploader) {
    tags.artist = playlist.uploader;
  }

  if (cover) {
    tags.image = {
      mime: 'image/jpeg',
      type: {
        id: 3,
        name: 'front cover',
      },
      description: 'Cover',
      imageBuffer: cover,
    };
  }

  return tags;
}

/**
 * Writes ID3 tags to MP3 results; other containers are left untouched
 */
export class Id3Tagger implements Tagger {
  constructor(private readonly thumbnails: ThumbnailFetcher) {}

  async tag(filePath: string, entry: PlaylistEntry, playlist: Pick<Playlist, 'title' | 'uploader'>): Promise<boolean> {
    if (path.extname(filePath).toLowerCase() !== '.mp3' || !fs.existsSync(filePath)) {
      return false;
    }

    try {
      const cover = await this.thumbnails.fetchThumbnail(entry.id);
      const result = NodeID3.write(buildTags(entry, playlist, cover), filePath);

      if (result !== true) {
        logger.warn(`Failed to write metadata for: ${entry.title}`);
        return false;
      }

      return true;
    } catch (error) {
      logger.warn(`Error adding metadata to "${entry.title}": ${errorMessage(error)}`);
      return false;
    }
  }
}
