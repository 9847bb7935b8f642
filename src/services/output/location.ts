import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { ValidationError } from '../../utils/errors.js';

export const LOCATION_MODES = ['downloads', 'app', 'custom'] as const;
export type LocationMode = (typeof LOCATION_MODES)[number];

export interface LocationContext {
  customPath?: string;
  homeDir?: string;
  appDir?: string;
}

const USER_DOWNLOADS_SUBFOLDER = 'YouTubePlaylistDownloads';
const CUSTOM_SUBFOLDER = 'YouTubeDownloads';

// Package root: dist/services/output or src/services/output, three levels up
function defaultAppDir(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', '..');
}

export function isLocationMode(value: string): value is LocationMode {
  return LOCATION_MODES.some((mode) => mode === value);
}

/**
 * Picks the output directory for a location mode. Only computes the path;
 * the directory is created by the batch pre-flight.
 */
export function resolveOutputDirectory(mode: LocationMode, context: LocationContext = {}): string {
  const appFolder = path.join(context.appDir ?? defaultAppDir(), 'downloads');

  switch (mode) {
    case 'downloads': {
      const userDownloads = path.join(context.homeDir ?? os.homedir(), 'Downloads');
      return fs.existsSync(userDownloads) ? path.join(userDownloads, USER_DOWNLOADS_SUBFOLDER) : appFolder;
    }
    case 'app':
      return appFolder;
    case 'custom':
      if (!context.customPath) {
        throw new ValidationError('A custom location needs a folder (--output <dir>)');
      }
      return path.join(path.resolve(context.customPath), CUSTOM_SUBFOLDER);
  }
}
