const pad = (n: number) => String(n).padStart(2, '0');

// mm:ss, or hh:mm:ss past an hour
export function formatDuration(seconds: number | null): string {
    if (seconds === null || seconds <= 0) {
        return 'Unknown';
    }
    const total = Math.round(seconds);
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor((total % 3600) / 60);
    const secs = total % 60;
    return hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(secs)}` : `${pad(minutes)}:${pad(secs)}`;
}

export function formatMegabytes(bytes: number): string {
    return `${(bytes / 1024 / 1024).toFixed(1)}MB`;
}
