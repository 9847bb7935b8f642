import { spawn } from 'child_process';
import path from 'path';
import { createInterface } from 'readline';
import { isValidPlaylistUrl, videoUrl } from '../../utils/validator.js';
import { ExtractionError, PerItemDownloadError, ValidationError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { PROGRESS_TEMPLATE, parseProgressLine } from '../downloader/progress.js';
import type { Playlist, PlaylistEntry, ProgressUpdate } from '../../types/index.js';

export interface DownloadRequest {
  url: string;
  format: string;
  outputDirectory: string;
  signal?: AbortSignal;
}

export interface DownloadedFile {
  localFilePath: string;
}

export interface ExtractorService {
  resolvePlaylist(url: string): Promise<Playlist>;
  downloadOne(request: DownloadRequest, onProgress: (update: ProgressUpdate) => void): Promise<DownloadedFile>;
}

export interface YtDlpOptions {
  binary?: string;
  cookiesFile?: string;
}

const FILEPATH_MARKER = '[filepath] ';
const STDERR_TAIL_LINES = 3;

/**
 * Validates URL before any extraction is attempted
 */
export function assertPlaylistUrl(url: string): string {
  const trimmed = url.trim();
  if (!isValidPlaylistUrl(trimmed)) {
    throw new ValidationError(`Invalid YouTube playlist URL: ${url}`);
  }
  return trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parses the JSON yt-dlp prints for `-J --flat-playlist`
 */
export function parsePlaylistJson(jsonText: string): Playlist {
  let data: unknown;
  try {
    data = JSON.parse(jsonText);
  } catch (error) {
    throw new ExtractionError(`yt-dlp returned invalid JSON: ${errorMessage(error)}`, { cause: error });
  }

  if (!isRecord(data)) {
    throw new ExtractionError('yt-dlp returned an unexpected payload');
  }

  const rawEntries = Array.isArray(data.entries) ? data.entries : [];
  const entries: PlaylistEntry[] = [];

  for (const raw of rawEntries) {
    if (!isRecord(raw)) continue;
    const id = stringField(raw, 'id');
    if (!id) continue;

    const duration = raw.duration;
    entries.push({
      index: entries.length,
      id,
      title: stringField(raw, 'title') ?? 'Unknown Title',
      durationSeconds: typeof duration === 'number' && Number.isFinite(duration) ? Math.round(duration) : null,
      url: videoUrl(id),
    });
  }

  if (entries.length === 0) {
    throw new ExtractionError('No videos found in playlist. It may be private or empty.');
  }

  const playlist: Playlist = {
    title: stringField(data, 'title', 'playlist') ?? 'Unknown Playlist',
    entries,
  };

  const uploader = stringField(data, 'uploader', 'channel');
  if (uploader) {
    playlist.uploader = uploader;
  }

  return playlist;
}

function tail(text: string, lines: number): string {
  return text.trim().split('\n').slice(-lines).join(' ').trim();
}

/**
 * Extractor backed by the yt-dlp executable
 */
export class YtDlpExtractor implements ExtractorService {
  private readonly binary: string;
  private readonly cookiesFile?: string;

  constructor(options: YtDlpOptions = {}) {
    this.binary = options.binary ?? process.env.YT_DLP_PATH ?? 'yt-dlp';
    this.cookiesFile = options.cookiesFile;
  }

  private cookieArgs(): string[] {
    return this.cookiesFile ? ['--cookies', this.cookiesFile] : [];
  }

  async resolvePlaylist(url: string): Promise<Playlist> {
    const playlistUrl = assertPlaylistUrl(url);
    const args = ['-J', '--flat-playlist', '--no-warnings', ...this.cookieArgs(), playlistUrl];

    logger.debug(`${this.binary} ${args.join(' ')}`);

    const stdout = await new Promise<string>((resolve, reject) => {
      const proc = spawn(this.binary, args);
      let out = '';
      let err = '';

      proc.stdout.on('data', (data: Buffer) => {
        out += data.toString();
      });
      proc.stderr.on('data', (data: Buffer) => {
        err += data.toString();
      });

      proc.on('error', (error) => {
        reject(new ExtractionError(`Could not run ${this.binary}: ${error.message}`, { cause: error }));
      });

      proc.on('close', (code) => {
        if (code === 0) {
          resolve(out);
          return;
        }
        if (err.includes('This playlist does not exist')) {
          reject(new ExtractionError('Playlist not found or is private.'));
        } else if (err.includes('Private video') || err.includes('Sign in')) {
          reject(new ExtractionError('Playlist requires authentication. Try using --cookies option.'));
        } else {
          reject(new ExtractionError(`Failed to fetch playlist: ${tail(err, STDERR_TAIL_LINES) || `exit code ${code}`}`));
        }
      });
    });

    return parsePlaylistJson(stdout);
  }

  downloadOne(request: DownloadRequest, onProgress: (update: ProgressUpdate) => void): Promise<DownloadedFile> {
    const args = [
      request.url,
      '-f', request.format,
      '-o', path.join(request.outputDirectory, '%(title)s.%(ext)s'),
      '--no-playlist',
      '--force-overwrites',
      '--newline',
      '--no-warnings',
      '--retries', '10',
      '--fragment-retries', '10',
      '--file-access-retries', '3',
      '--socket-timeout', '30',
      // --print implies --quiet, which hides progress unless forced back on
      '--progress',
      '--progress-template', PROGRESS_TEMPLATE,
      '--print', `after_move:${FILEPATH_MARKER}%(filepath)s`,
      '--no-simulate',
      ...this.cookieArgs(),
    ];

    logger.debug(`${this.binary} ${args.join(' ')}`);

    return new Promise<DownloadedFile>((resolve, reject) => {
      if (request.signal?.aborted) {
        reject(new PerItemDownloadError('Cancelled'));
        return;
      }

      const proc = spawn(this.binary, args, { signal: request.signal });
      let stderr = '';
      let localFilePath: string | null = null;

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      const rl = createInterface({ input: proc.stdout, crlfDelay: Infinity });
      rl.on('line', (line) => {
        if (line.startsWith(FILEPATH_MARKER)) {
          localFilePath = line.slice(FILEPATH_MARKER.length).trim();
          return;
        }
        const update = parseProgressLine(line);
        if (update) {
          onProgress(update);
        }
      });

      proc.on('error', (error) => {
        if (request.signal?.aborted) {
          reject(new PerItemDownloadError('Cancelled', { cause: error }));
        } else {
          reject(new PerItemDownloadError(`Could not run ${this.binary}: ${error.message}`, { cause: error }));
        }
      });

      proc.on('close', (code) => {
        if (code !== 0) {
          onProgress({ phase: 'error' });
          reject(new PerItemDownloadError(tail(stderr, STDERR_TAIL_LINES) || `${this.binary} exited with code ${code}`));
          return;
        }
        if (!localFilePath) {
          reject(new PerItemDownloadError(`${this.binary} did not report an output file`));
          return;
        }
        resolve({ localFilePath });
      });
    });
  }
}
