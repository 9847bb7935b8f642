import path from 'path';
import type { ProgressUpdate } from '../../types/index.js';

const PROGRESS_PREFIX = '[progress]';
const FIELD_SEPARATOR = '|';
const TITLE_WIDTH = 50;

/**
 * Handed to yt-dlp's --progress-template so each update arrives as one
 * pipe-separated line: status, percent, speed, eta, filename.
 */
export const PROGRESS_TEMPLATE = `download:${PROGRESS_PREFIX}${[
  '%(progress.status)s',
  '%(progress._percent_str)s',
  '%(progress._speed_str)s',
  '%(progress._eta_str)s',
  '%(progress.filename)s',
].join(FIELD_SEPARATOR)}`;

function field(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  // yt-dlp prints NA for fields it does not know yet
  return trimmed && trimmed !== 'NA' ? trimmed : undefined;
}

export function parseProgressLine(line: string): ProgressUpdate | null {
  const start = line.indexOf(PROGRESS_PREFIX);
  if (start === -1) {
    return null;
  }

  const [status, percent, speed, eta, ...rest] = line.slice(start + PROGRESS_PREFIX.length).split(FIELD_SEPARATOR);
  const phase = field(status);
  if (phase !== 'downloading' && phase !== 'finished' && phase !== 'error') {
    return null;
  }

  const update: ProgressUpdate = { phase };
  const percentText = field(percent);
  const speedText = field(speed);
  const etaText = field(eta);
  // file names may themselves contain the separator
  const filename = field(rest.join(FIELD_SEPARATOR));

  if (percentText) update.percent = percentText;
  if (speedText) update.speed = speedText;
  if (etaText) update.eta = etaText;
  if (filename) update.outputFilename = filename;
  return update;
}

export function shortTitle(title: string): string {
  return `${title.slice(0, TITLE_WIDTH)}...`;
}

/**
 * Human-readable status line for one update, or null when the update
 * carries nothing worth showing yet.
 */
export function describeProgress(update: ProgressUpdate, title: string): string | null {
  const label = shortTitle(title);

  switch (update.phase) {
    case 'downloading':
      if (!update.percent || !update.speed) {
        return null;
      }
      return `📥 ${label} | ${update.percent} | ${update.speed} | ETA: ${update.eta ?? '--'}`;
    case 'finished': {
      const ext = update.outputFilename ? path.extname(update.outputFilename).slice(1) : '';
      return `✅ ${label} | Download completed (.${ext || 'file'})`;
    }
    case 'error':
      return `❌ ${label} | Download failed`;
  }
}
