import fs from 'fs';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { EventChannel } from '../../utils/channel.js';
import { FilesystemError, ValidationError, errorMessage } from '../../utils/errors.js';
import { buildFormatSelection, describeFormat } from './format.js';
import { describeProgress, shortTitle } from './progress.js';
import type { ExtractorService } from '../youtube/fetcher.js';
import type { Transcoder } from './transcoder.js';
import type { Tagger } from '../metadata/tagger.js';
import type {
  BatchClassification,
  BatchSummary,
  DownloadOptions,
  DownloadOutcome,
  FormatSelection,
  Playlist,
  PlaylistEntry,
  ProgressUpdate,
} from '../../types/index.js';

export const CANCELLED_BEFORE_START = 'Cancelled before start';

export type BatchEvent =
  | { type: 'started'; total: number; outputDirectory: string; format: FormatSelection; formatLabel: string }
  | { type: 'item-started'; position: number; total: number; entry: PlaylistEntry }
  | { type: 'status'; position: number; entry: PlaylistEntry; line: string; update?: ProgressUpdate }
  | { type: 'item-finished'; position: number; total: number; outcome: DownloadOutcome }
  | { type: 'progress'; completed: number; total: number }
  | { type: 'finished'; summary: BatchSummary }
  | { type: 'aborted'; error: Error };

export interface BatchObserver {
  onStarted?(event: Extract<BatchEvent, { type: 'started' }>): void;
  onItemStarted?(event: Extract<BatchEvent, { type: 'item-started' }>): void;
  onStatus?(event: Extract<BatchEvent, { type: 'status' }>): void;
  onItemFinished?(event: Extract<BatchEvent, { type: 'item-finished' }>): void;
  onProgress?(event: Extract<BatchEvent, { type: 'progress' }>): void;
  onFinished?(summary: BatchSummary): void;
  onError?(error: Error): void;
}

export interface BatchDependencies {
  extractor: ExtractorService;
  transcoder?: Transcoder;
  metadata?: {
    tagger: Tagger;
    playlist: Pick<Playlist, 'title' | 'uploader'>;
  };
  // Pause between items so a live feed stays readable; 0 disables it
  pacingMs?: number;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

// Result of one item; the loop proceeds on either variant
export type ItemResult =
  | { ok: true; filePath: string; bytesWritten: number }
  | { ok: false; error: string };

type Emit = (event: BatchEvent) => void;

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function classify(total: number, succeeded: number): BatchClassification {
  if (succeeded === total) return 'full-success';
  if (succeeded > 0) return 'partial-success';
  return 'total-failure';
}

export function summarize(outcomes: DownloadOutcome[], outputDirectory: string, cancelled: boolean): BatchSummary {
  const succeeded = outcomes.filter((o) => o.status === 'success').length;
  return {
    total: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
    cancelled,
    classification: classify(outcomes.length, succeeded),
    outputDirectory,
    outcomes,
  };
}

/**
 * Checks that run before any item is touched. Validation comes first so a
 * bad selection leaves the filesystem alone.
 */
export function preflight(
  entries: readonly PlaylistEntry[],
  selection: ReadonlySet<number>,
  outputDirectory: string,
): Error | null {
  if (selection.size === 0) {
    return new ValidationError('No videos selected');
  }
  for (const index of selection) {
    if (!Number.isInteger(index) || index < 0 || index >= entries.length) {
      return new ValidationError(`Selected index ${index} is outside the playlist (${entries.length} videos)`);
    }
  }

  try {
    fs.mkdirSync(outputDirectory, { recursive: true });
    fs.accessSync(outputDirectory, fs.constants.W_OK);
  } catch (error) {
    return new FilesystemError(`Output directory is not writable: ${outputDirectory} (${errorMessage(error)})`, {
      cause: error,
    });
  }

  return null;
}

/**
 * Downloads one entry and post-processes it. Never throws: every failure
 * becomes the error variant.
 */
export async function attemptItem(
  entry: PlaylistEntry,
  format: FormatSelection,
  options: DownloadOptions,
  deps: BatchDependencies,
  onStatus: (line: string, update?: ProgressUpdate) => void,
): Promise<ItemResult> {
  try {
    const { localFilePath } = await deps.extractor.downloadOne(
      { url: entry.url, format: format.format, outputDirectory: options.outputDirectory, signal: deps.signal },
      (update) => {
        const line = describeProgress(update, entry.title);
        if (line) {
          onStatus(line, update);
        }
      }
    );

    let filePath = path.resolve(options.outputDirectory, localFilePath);
    if (!fs.existsSync(filePath)) {
      return { ok: false, error: 'File not created' };
    }

    if (format.transcode && deps.transcoder) {
      onStatus(`🎵 ${shortTitle(entry.title)} | Converting to ${format.transcode.codec.toUpperCase()}`);
      filePath = await deps.transcoder.toMp3(filePath, format.transcode.bitrateKbps);
      if (!fs.existsSync(filePath)) {
        return { ok: false, error: 'Converted file not created' };
      }
    }

    if (deps.metadata) {
      await deps.metadata.tagger.tag(filePath, entry, deps.metadata.playlist);
    }

    return { ok: true, filePath, bytesWritten: fs.statSync(filePath).size };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

function toOutcome(entry: PlaylistEntry, result: ItemResult): DownloadOutcome {
  if (result.ok) {
    return {
      entryIndex: entry.index,
      title: entry.title,
      status: 'success',
      filePath: result.filePath,
      bytesWritten: result.bytesWritten,
    };
  }
  return { entryIndex: entry.index, title: entry.title, status: 'failed', errorMessage: result.error };
}

/**
 * Sequential pass over the selection in ascending index order
 */
export async function runBatch(
  entries: readonly PlaylistEntry[],
  selection: ReadonlySet<number>,
  options: DownloadOptions,
  deps: BatchDependencies,
  emit: Emit,
): Promise<void> {
  const frozen: DownloadOptions = Object.freeze({ ...options });
  const failure = preflight(entries, selection, frozen.outputDirectory);
  if (failure) {
    emit({ type: 'aborted', error: failure });
    return;
  }

  const canTranscode = frozen.mode === 'audio' && deps.transcoder ? await deps.transcoder.isAvailable() : false;
  const format = buildFormatSelection(frozen, canTranscode);
  const order = [...selection].sort((a, b) => a - b);
  const total = order.length;
  const sleep = deps.sleep ?? delay;
  const pacingMs = deps.pacingMs ?? 0;
  const outcomes: DownloadOutcome[] = [];
  let cancelled = false;

  logger.debug(`Batch of ${total} using format ${format.format}`);
  emit({
    type: 'started',
    total,
    outputDirectory: frozen.outputDirectory,
    format,
    formatLabel: describeFormat(frozen, format),
  });

  for (const [i, index] of order.entries()) {
    const entry = entries[index];
    const position = i + 1;

    if (deps.signal?.aborted) {
      cancelled = true;
      const outcome = toOutcome(entry, { ok: false, error: CANCELLED_BEFORE_START });
      outcomes.push(outcome);
      emit({ type: 'item-finished', position, total, outcome });
      emit({ type: 'progress', completed: position, total });
      continue;
    }

    emit({ type: 'item-started', position, total, entry });

    const result = await attemptItem(entry, format, frozen, deps, (line, update) => {
      emit({ type: 'status', position, entry, line, update });
    });
    const outcome = toOutcome(entry, result);
    outcomes.push(outcome);

    emit({ type: 'item-finished', position, total, outcome });
    emit({ type: 'progress', completed: position, total });

    if (position < total && pacingMs > 0 && !deps.signal?.aborted) {
      await sleep(pacingMs);
    }
  }

  const summary = summarize(outcomes, frozen.outputDirectory, cancelled);
  logger.debug(`Batch finished: ${summary.succeeded} successful, ${summary.failed} failed`);
  emit({ type: 'finished', summary });
}

/**
 * Lazy, single-use stream of batch events. The batch starts on first
 * iteration and the stream ends after `finished` or `aborted`.
 */
export class BatchRun implements AsyncIterable<BatchEvent> {
  private readonly channel = new EventChannel<BatchEvent>();
  private started = false;

  constructor(private readonly execute: (emit: Emit) => Promise<void>) {}

  [Symbol.asyncIterator](): AsyncIterator<BatchEvent, undefined> {
    if (this.started) {
      throw new Error('A batch run can only be consumed once');
    }
    this.started = true;

    const iterator = this.channel[Symbol.asyncIterator]();
    void this.execute((event) => this.channel.push(event)).then(
      () => this.channel.close(),
      (error: unknown) => {
        this.channel.push({ type: 'aborted', error: error instanceof Error ? error : new Error(errorMessage(error)) });
        this.channel.close();
      }
    );
    return iterator;
  }
}

export function startBatch(
  entries: readonly PlaylistEntry[],
  selection: ReadonlySet<number>,
  options: DownloadOptions,
  deps: BatchDependencies,
): BatchRun {
  return new BatchRun((emit) => runBatch(entries, selection, options, deps, emit));
}

/**
 * Drains a run, forwarding each event to the observer. Resolves with the
 * summary, rejects with the pre-flight error when the batch was aborted.
 */
export async function collectBatch(run: BatchRun, observer: BatchObserver = {}): Promise<BatchSummary> {
  for await (const event of run) {
    switch (event.type) {
      case 'started':
        observer.onStarted?.(event);
        break;
      case 'item-started':
        observer.onItemStarted?.(event);
        break;
      case 'status':
        observer.onStatus?.(event);
        break;
      case 'item-finished':
        observer.onItemFinished?.(event);
        break;
      case 'progress':
        observer.onProgress?.(event);
        break;
      case 'finished':
        observer.onFinished?.(event.summary);
        return event.summary;
      case 'aborted':
        observer.onError?.(event.error);
        throw event.error;
    }
  }
  throw new Error('Batch ended without a summary');
}
