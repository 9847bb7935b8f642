import { describe, expect, it } from 'vitest';
import { formatDuration, formatMegabytes } from './format.js';

describe('formatDuration', () => {
  it('uses mm:ss under an hour', () => {
    expect(formatDuration(65)).toBe('01:05');
  });

  it('uses hh:mm:ss from an hour', () => {
    expect(formatDuration(3725)).toBe('01:02:05');
  });

  it('reports unknown durations', () => {
    expect(formatDuration(null)).toBe('Unknown');
    expect(formatDuration(0)).toBe('Unknown');
  });
});

describe('formatMegabytes', () => {
  it('prints one decimal', () => {
    expect(formatMegabytes(3 * 1024 * 1024 + 512 * 1024)).toBe('3.5MB');
  });
});
