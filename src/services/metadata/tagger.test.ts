import fs from 'fs';
import os from 'os';
import path from 'path';
import NodeID3 from 'node-id3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Id3Tagger, buildTags } from './tagger.js';
import type { ThumbnailFetcher } from '../youtube/thumbnails.js';
import type { PlaylistEntry } from '../../types/index.js';

const entry: PlaylistEntry = {
  index: 2,
  id: 'abc',
  title: 'Night Drive',
  durationSeconds: 200,
  url: 'https://www.youtube.com/watch?v=abc',
};
const playlist = { title: 'Road Trip', uploader: 'Someone' };

describe('buildTags', () => {
  it('fills title, album, artist and a 1-based track number', () => {
    expect(buildTags(entry, playlist, null)).toEqual({
      title: 'Night Drive',
      album: 'Road Trip',
      artist: 'Someone',
      trackNumber: '3',
    });
  });

  it('leaves out the artist when the uploader is unknown', () => {
    expect(buildTags(entry, { title: 'Road Trip' }, null)).not.toHaveProperty('artist');
  });

  it('attaches the cover as the front cover picture', () => {
    const cover = Buffer.from('jpeg-bytes');
    expect(buildTags(entry, playlist, cover).image).toEqual({
      mime: 'image/jpeg',
      type: { id: 3, name: 'front cover' },
      description: 'Cover',
      imageBuffer: cover,
    });
  });
});

describe('Id3Tagger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tagger-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('skips files that are not mp3', async () => {
    const fetcher: ThumbnailFetcher = { fetchThumbnail: vi.fn(async () => null) };
    const file = path.join(dir, 'song.m4a');
    fs.writeFileSync(file, 'audio');

    expect(await new Id3Tagger(fetcher).tag(file, entry, playlist)).toBe(false);
    expect(fetcher.fetchThumbnail).not.toHaveBeenCalled();
  });

  it('writes tags into an mp3 file', async () => {
    const fetcher: ThumbnailFetcher = { fetchThumbnail: vi.fn(async () => null) };
    const file = path.join(dir, 'song.mp3');
    fs.writeFileSync(file, Buffer.alloc(256));

    expect(await new Id3Tagger(fetcher).tag(file, entry, playlist)).toBe(true);
    expect(fetcher.fetchThumbnail).toHaveBeenCalledWith('abc');

    const tags = NodeID3.read(file);
    expect(tags.title).toBe('Night Drive');
    expect(tags.album).toBe('Road Trip');
    expect(tags.trackNumber).toBe('3');
  });
});
