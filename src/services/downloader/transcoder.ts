import fs from 'fs';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import { logger } from '../../utils/logger.js';

export interface Transcoder {
  isAvailable(): Promise<boolean>;
  toMp3(inputPath: string, bitrateKbps: number): Promise<string>;
}

export function mp3PathFor(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.mp3`);
}

/**
 * Transcodes through the ffmpeg binary found on PATH (or FFMPEG_PATH)
 */
export class FfmpegTranscoder implements Transcoder {
  private available: Promise<boolean> | null = null;

  isAvailable(): Promise<boolean> {
    if (!this.available) {
      this.available = new Promise<boolean>((resolve) => {
        ffmpeg.getAvailableCodecs((error) => {
          if (error) {
            logger.debug(`ffmpeg not available: ${error.message}`);
          }
          resolve(!error);
        });
      });
    }
    return this.available;
  }

  async toMp3(inputPath: string, bitrateKbps: number): Promise<string> {
    const outputPath = mp3PathFor(inputPath);
    if (outputPath === inputPath) {
      return inputPath;
    }

    await new Promise<void>((resolve, reject) => {
      ffmpeg(inputPath)
        .audioBitrate(bitrateKbps)
        .audioCodec('libmp3lame')
        .format('mp3')
        .on('end', () => resolve())
        .on('error', (err: Error) => reject(err))
        .save(outputPath);
    });

    // Clean up source file
    if (fs.existsSync(inputPath)) {
      fs.unlinkSync(inputPath);
    }

    return outputPath;
  }
}
