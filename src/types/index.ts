// One playlist item as resolved from the playlist page
export interface PlaylistEntry {
    index: number;
    id: string;
    title: string;
    durationSeconds: number | null;
    url: string;
}

// Playlist structure
export interface Playlist {
    title: string;
    uploader?: string;
    entries: PlaylistEntry[];
}

export type DownloadMode = 'video' | 'audio';

export const QUALITY_TIERS = ['best', '1080p', '720p', '480p', '360p'] as const;
export type QualityTier = (typeof QUALITY_TIERS)[number];

// Options fixed for the whole batch
export interface DownloadOptions {
    readonly mode: DownloadMode;
    readonly quality: QualityTier;
    readonly outputDirectory: string;
}

export interface TranscodeStep {
    codec: 'mp3';
    bitrateKbps: number;
}

// What gets handed to yt-dlp's -f, plus an optional post-download transcode
export interface FormatSelection {
    format: string;
    transcode?: TranscodeStep;
}

// Streaming update from a single transfer
export interface ProgressUpdate {
    phase: 'downloading' | 'finished' | 'error';
    percent?: string;
    speed?: string;
    eta?: string;
    outputFilename?: string;
}

export type OutcomeStatus = 'success' | 'failed';

// Per-entry result
export interface DownloadOutcome {
    entryIndex: number;
    title: string;
    status: OutcomeStatus;
    filePath?: string;
    bytesWritten?: number;
    errorMessage?: string;
}

export type BatchClassification = 'full-success' | 'partial-success' | 'total-failure';

// Final download result
export interface BatchSummary {
    total: number;
    succeeded: number;
    failed: number;
    cancelled: boolean;
    classification: BatchClassification;
    outputDirectory: string;
    outcomes: DownloadOutcome[];
}
