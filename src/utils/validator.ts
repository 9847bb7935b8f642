const PLAYLIST_URL_PATTERN = /^(https?:\/\/)?(www\.)?(youtube\.com|youtu\.?be)\/playlist\?list=[a-zA-Z0-9_-]+/i;

// Validates if the given string is a YouTube playlist URL.
export function isValidPlaylistUrl(url: string): boolean {
    return PLAYLIST_URL_PATTERN.test(url.trim());
}


// Extracts playslist ID from a valid YouTube playlist URL.
export function extractPlaylistId(url: string): string | null {
    const match = url.match(/[?&]list=([a-zA-Z0-9_-]+)/);
    return match?.[1] ?? null;
}


export function videoUrl(videoId: string): string {
    return `https://www.youtube.com/watch?v=${videoId}`;
}
