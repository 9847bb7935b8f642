import { ValidationError } from '../utils/errors.js';
import { isLocationMode, resolveOutputDirectory, LOCATION_MODES } from '../services/output/location.js';
import type { LocationContext, LocationMode } from '../services/output/location.js';
import { QUALITY_TIERS } from '../types/index.js';
import type { DownloadMode, QualityTier } from '../types/index.js';

// Raw values as commander hands them over
export interface RawDownloadOptions {
  select?: string;
  all?: boolean;
  mode: string;
  quality: string;
  location?: string;
  output?: string;
  delay: string;
  metadata: boolean;
  cookies?: string;
  ytDlp?: string;
}

export interface DownloadSettings {
  readonly selection: string;
  readonly mode: DownloadMode;
  readonly quality: QualityTier;
  readonly location: LocationMode;
  readonly outputDirectory: string;
  readonly pacingMs: number;
  readonly metadata: boolean;
  readonly cookiesFile?: string;
  readonly ytDlpPath?: string;
}

export const DEFAULT_QUALITY: QualityTier = '1080p';
export const DEFAULT_PACING_MS = 1000;

function isQualityTier(value: string): value is QualityTier {
  return QUALITY_TIERS.some((tier) => tier === value);
}

function parseMode(value: string): DownloadMode {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'video') return 'video';
  if (normalized === 'audio' || normalized === 'audio-only') return 'audio';
  throw new ValidationError(`Unknown mode "${value}" (expected video or audio)`);
}

/**
 * Turns CLI options into validated, frozen download settings.
 * `--output` without `--location` means a custom folder.
 */
export function parseDownloadSettings(raw: RawDownloadOptions, context: LocationContext = {}): DownloadSettings {
  if (raw.all && raw.select) {
    throw new ValidationError('Use either --all or --select, not both');
  }
  if (!raw.all && !raw.select) {
    throw new ValidationError('Nothing selected: pass --select <list> or --all');
  }

  const quality = raw.quality.trim().toLowerCase();
  if (!isQualityTier(quality)) {
    throw new ValidationError(`Unknown quality "${raw.quality}" (expected ${QUALITY_TIERS.join(', ')})`);
  }

  const location = raw.location ?? (raw.output ? 'custom' : 'downloads');
  if (!isLocationMode(location)) {
    throw new ValidationError(`Unknown location "${raw.location}" (expected ${LOCATION_MODES.join(', ')})`);
  }

  const delayText = raw.delay.trim();
  const pacingMs = delayText === '' ? Number.NaN : Number(delayText);
  if (!Number.isInteger(pacingMs) || pacingMs < 0) {
    throw new ValidationError(`Delay must be a non-negative whole number of milliseconds, got "${raw.delay}"`);
  }

  const settings: DownloadSettings = {
    selection: raw.all ? 'all' : (raw.select ?? ''),
    mode: parseMode(raw.mode),
    quality,
    location,
    outputDirectory: resolveOutputDirectory(location, { ...context, customPath: raw.output ?? context.customPath }),
    pacingMs,
    metadata: raw.metadata,
    cookiesFile: raw.cookies,
    ytDlpPath: raw.ytDlp,
  };

  return Object.freeze(settings);
}
