export type ErrorKind = 'validation' | 'extraction' | 'download' | 'filesystem';

export abstract class AppError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Bad playlist URL, empty or out-of-range selection, bad option value
export class ValidationError extends AppError {
    readonly kind = 'validation';
}

// Playlist metadata could not be fetched or understood
export class ExtractionError extends AppError {
    readonly kind = 'extraction';
}

// A single video failed; the batch carries on
export class PerItemDownloadError extends AppError {
    readonly kind = 'download';
}

// Output directory cannot be created or written; the batch never starts
export class FilesystemError extends AppError {
    readonly kind = 'filesystem';
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
