import type { DownloadOptions, FormatSelection, QualityTier } from '../../types/index.js';

export const AUDIO_BITRATE_KBPS = 192;

const VIDEO_FORMATS: Record<QualityTier, string> = {
  best: 'best[height<=1080]/best[height<=720]/best',
  '1080p': 'best[height<=1080]/best',
  '720p': 'best[height<=720]/best',
  '480p': 'best[height<=480]/best',
  '360p': 'best[height<=360]/best',
};

/**
 * Maps batch options onto a yt-dlp format expression. Audio is transcoded
 * to MP3 only when a transcoder is present; otherwise the m4a stream is kept.
 */
export function buildFormatSelection(options: DownloadOptions, transcoderAvailable: boolean): FormatSelection {
  if (options.mode === 'audio') {
    if (transcoderAvailable) {
      return {
        format: 'bestaudio/best',
        transcode: { codec: 'mp3', bitrateKbps: AUDIO_BITRATE_KBPS },
      };
    }
    return { format: 'bestaudio[ext=m4a]/bestaudio/best' };
  }

  return { format: VIDEO_FORMATS[options.quality] };
}

export function describeFormat(options: DownloadOptions, selection: FormatSelection): string {
  if (options.mode === 'audio') {
    return `🎵 Format: Audio (${selection.transcode ? 'MP3' : 'M4A'})`;
  }
  return `🎬 Format: Video (${options.quality})`;
}
