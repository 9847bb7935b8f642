#!/usr/bin/env node

import { Command } from 'commander';
import ora from 'ora';
import path from 'path';
import { YtDlpExtractor, assertPlaylistUrl } from './services/youtube/fetcher.js';
import { HttpThumbnailFetcher, saveThumbnails } from './services/youtube/thumbnails.js';
import { collectBatch, startBatch } from './services/downloader/downloader.js';
import { FfmpegTranscoder } from './services/downloader/transcoder.js';
import { Id3Tagger } from './services/metadata/tagger.js';
import { PlaylistSession, parseSelection } from './state/session.js';
import { DEFAULT_PACING_MS, DEFAULT_QUALITY, parseDownloadSettings } from './config/settings.js';
import type { RawDownloadOptions } from './config/settings.js';
import { createConsoleObserver, stdoutSink } from './cli/console.js';
import { createInterruptHandler } from './cli/interrupt.js';
import { formatDuration } from './utils/format.js';
import { extractPlaylistId } from './utils/validator.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import type { BatchClassification } from './types/index.js';

interface InfoOptions {
  thumbnails?: string;
  cookies?: string;
  ytDlp?: string;
}

const EXIT_CODES: Record<BatchClassification, number> = {
  'full-success': 0,
  'partial-success': 2,
  'total-failure': 1,
};

const program = new Command();

program
  .name('yt-playlist-batch')
  .description('Browse a YouTube playlist, pick videos, and download them one by one')
  .version('1.0.0');

program
  .command('info')
  .description('List the videos of a playlist')
  .argument('<url>', 'YouTube playlist URL')
  .option('-t, --thumbnails <dir>', 'Save video thumbnails into this folder')
  .option('--cookies <file>', 'Path to cookies.txt file for private/age-restricted content')
  .option('--yt-dlp <path>', 'yt-dlp executable to use')
  .action(async (url: string, options: InfoOptions) => {
    const spinner = ora('Validating URL...').start();
    logger.setSpinner(spinner);

    try {
      const playlistUrl = assertPlaylistUrl(url);
      spinner.succeed(`Valid playlist ID: ${extractPlaylistId(playlistUrl) ?? 'unknown'}`);
      const extractor = new YtDlpExtractor({ binary: options.ytDlp, cookiesFile: options.cookies });

      spinner.start('🔍 Fetching playlist information...');
      const playlist = await extractor.resolvePlaylist(playlistUrl);
      spinner.succeed(`Found playlist: "${playlist.title}" with ${playlist.entries.length} videos`);

      console.log(`\n📋 ${playlist.title}`);
      console.log(`   Channel: ${playlist.uploader ?? 'Unknown'}`);
      console.log(`   Videos:  ${playlist.entries.length}\n`);
      for (const entry of playlist.entries) {
        console.log(`[${String(entry.index + 1).padStart(3)}] ${formatDuration(entry.durationSeconds).padStart(8)}  ${entry.title}`);
      }

      if (options.thumbnails) {
        const dir = path.resolve(options.thumbnails);
        spinner.start('Loading thumbnails...');
        const report = await saveThumbnails(playlist.entries, dir, new HttpThumbnailFetcher(), 4, (_entry, done) => {
          spinner.text = `Loading thumbnails... (${done}/${playlist.entries.length})`;
        });
        spinner.succeed(`Saved ${report.saved.length} thumbnails to ${dir}`);
        if (report.missing.length > 0) {
          logger.warn(`No thumbnail available for ${report.missing.length} videos`);
        }
      }
    } catch (error) {
      spinner.fail('Could not fetch playlist information');
      logger.error(errorMessage(error));
      process.exitCode = 1;
    } finally {
      logger.clearSpinner();
    }
  });

program
  .command('download')
  .description('Download selected videos of a playlist, one at a time')
  .argument('<url>', 'YouTube playlist URL')
  .option('-s, --select <list>', 'Videos to download, 1-based (e.g. 1,3,5-7)')
  .option('-a, --all', 'Download every video in the playlist')
  .option('-m, --mode <mode>', 'video or audio', 'video')
  .option('-q, --quality <tier>', 'best, 1080p, 720p, 480p or 360p', DEFAULT_QUALITY)
  .option('-l, --location <mode>', 'downloads, app or custom')
  .option('-o, --output <dir>', 'Folder for the custom location')
  .option('--delay <ms>', 'Pause between videos in milliseconds', String(DEFAULT_PACING_MS))
  .option('--no-metadata', 'Skip adding metadata tags to MP3 files')
  .option('--cookies <file>', 'Path to cookies.txt file for private/age-restricted content')
  .option('--yt-dlp <path>', 'yt-dlp executable to use')
  .action(async (url: string, options: RawDownloadOptions) => {
    const spinner = ora('Validating options...').start();
    logger.setSpinner(spinner);

    const controller = new AbortController();
    const onInterrupt = createInterruptHandler(controller, {
      warn: (message) => logger.warn(message),
      exit: (code) => process.exit(code),
    });

    try {
      const settings = parseDownloadSettings(options);
      const playlistUrl = assertPlaylistUrl(url);
      const extractor = new YtDlpExtractor({ binary: settings.ytDlpPath, cookiesFile: settings.cookiesFile });

      spinner.text = '🔍 Fetching playlist information...';
      const session = new PlaylistSession();
      session.load(await extractor.resolvePlaylist(playlistUrl));
      session.setSelection(parseSelection(settings.selection, session.entries.length));

      const playlist = session.playlist;
      if (!playlist) {
        throw new Error('Playlist was not loaded');
      }
      spinner.succeed(`Found playlist: "${playlist.title}" (${session.selection.size}/${session.entries.length} videos selected)`);
      logger.clearSpinner();

      const thumbnails = new HttpThumbnailFetcher('hqdefault');
      process.on('SIGINT', onInterrupt);

      const run = startBatch(
        session.entries,
        session.selection,
        { mode: settings.mode, quality: settings.quality, outputDirectory: settings.outputDirectory },
        {
          extractor,
          transcoder: new FfmpegTranscoder(),
          metadata: settings.metadata ? { tagger: new Id3Tagger(thumbnails), playlist } : undefined,
          pacingMs: settings.pacingMs,
          signal: controller.signal,
        }
      );

      const summary = await collectBatch(run, createConsoleObserver(stdoutSink));
      process.exitCode = EXIT_CODES[summary.classification];
    } catch (error) {
      if (spinner.isSpinning) {
        spinner.fail('Download failed');
      }
      logger.error(errorMessage(error));
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', onInterrupt);
      logger.clearSpinner();
    }
  });

await program.parseAsync();
