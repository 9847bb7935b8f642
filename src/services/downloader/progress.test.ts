import { describe, expect, it } from 'vitest';
import { PROGRESS_TEMPLATE, describeProgress, parseProgressLine } from './progress.js';

describe('PROGRESS_TEMPLATE', () => {
  it('is a download-stage template with five fields', () => {
    expect(PROGRESS_TEMPLATE).toBe(
      'download:[progress]%(progress.status)s|%(progress._percent_str)s|%(progress._speed_str)s|%(progress._eta_str)s|%(progress.filename)s'
    );
  });
});

describe('parseProgressLine', () => {
  it('reads a downloading update', () => {
    expect(parseProgressLine('[progress]downloading|  42.0%|  1.50MiB/s|00:12|/tmp/out/Song.webm')).toEqual({
      phase: 'downloading',
      percent: '42.0%',
      speed: '1.50MiB/s',
      eta: '00:12',
      outputFilename: '/tmp/out/Song.webm',
    });
  });

  it('drops NA fields', () => {
    expect(parseProgressLine('[progress]finished|100%|NA|NA|/tmp/out/Song.webm')).toEqual({
      phase: 'finished',
      percent: '100%',
      outputFilename: '/tmp/out/Song.webm',
    });
  });

  it('keeps separators inside file names', () => {
    expect(parseProgressLine('[progress]finished|NA|NA|NA|/tmp/A | B.mp4')?.outputFilename).toBe('/tmp/A | B.mp4');
  });

  it('ignores other output', () => {
    expect(parseProgressLine('[youtube] abc: Downloading webpage')).toBeNull();
    expect(parseProgressLine('[progress]paused|1%|NA|NA|x')).toBeNull();
  });
});

describe('describeProgress', () => {
  const title = 'A'.repeat(60);
  const label = `${'A'.repeat(50)}...`;

  it('shows percent, speed and eta while downloading', () => {
    expect(describeProgress({ phase: 'downloading', percent: '10.0%', speed: '2MiB/s', eta: '00:05' }, 'Song')).toBe(
      '📥 Song... | 10.0% | 2MiB/s | ETA: 00:05'
    );
  });

  it('waits for percent and speed', () => {
    expect(describeProgress({ phase: 'downloading', percent: '10.0%' }, 'Song')).toBeNull();
  });

  it('truncates titles to fifty characters', () => {
    expect(describeProgress({ phase: 'error' }, title)).toBe(`❌ ${label} | Download failed`);
  });

  it('names the extension once finished', () => {
    expect(describeProgress({ phase: 'finished', outputFilename: '/x/Song.m4a' }, 'Song')).toBe(
      '✅ Song... | Download completed (.m4a)'
    );
    expect(describeProgress({ phase: 'finished' }, 'Song')).toBe('✅ Song... | Download completed (.file)');
  });
});
