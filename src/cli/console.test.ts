import { describe, expect, it } from 'vitest';
import { createConsoleObserver, summaryLines } from './console.js';
import type { ConsoleSink } from './console.js';
import type { BatchSummary, PlaylistEntry } from '../types/index.js';

const RULE = '─'.repeat(50);

function summary(overrides: Partial<BatchSummary>): BatchSummary {
  return {
    total: 3,
    succeeded: 3,
    failed: 0,
    cancelled: false,
    classification: 'full-success',
    outputDirectory: '/out',
    outcomes: [],
    ...overrides,
  };
}

function recordingSink() {
  const lines: string[] = [];
  const statuses: string[] = [];
  const sink: ConsoleSink = {
    line: (text) => lines.push(text),
    status: (text) => statuses.push(text),
  };
  return { sink, lines, statuses };
}

const entry: PlaylistEntry = {
  index: 4,
  id: 'abc',
  title: 'Night Drive',
  durationSeconds: 200,
  url: 'https://www.youtube.com/watch?v=abc',
};

describe('summaryLines', () => {
  it('celebrates a full success', () => {
    expect(summaryLines(summary({}))).toEqual([
      RULE,
      '🎉 ALL DOWNLOADS COMPLETED SUCCESSFULLY! (3/3)',
      '📁 Files saved to: /out',
    ]);
  });

  it('names the failure count on partial success', () => {
    expect(summaryLines(summary({ succeeded: 2, failed: 1, classification: 'partial-success' }))).toEqual([
      RULE,
      '⚠️ PARTIAL SUCCESS: 2/3 downloads completed',
      '❌ 1 downloads failed',
      '📁 Files saved to: /out',
    ]);
  });

  it('reports total failure and cancellation', () => {
    expect(summaryLines(summary({ succeeded: 0, failed: 3, classification: 'total-failure', cancelled: true }))).toEqual([
      RULE,
      '💥 ALL DOWNLOADS FAILED! (0/3)',
      '🛑 Batch cancelled; remaining videos were not attempted',
      '📁 Files saved to: /out',
    ]);
  });
});

describe('createConsoleObserver', () => {
  it('prints item lines and routes status updates to the status line', () => {
    const { sink, lines, statuses } = recordingSink();
    const observer = createConsoleObserver(sink);

    observer.onItemStarted?.({ type: 'item-started', position: 2, total: 5, entry });
    observer.onStatus?.({ type: 'status', position: 2, entry, line: '📥 Night Drive... | 10% | 1MiB/s | ETA: 00:09' });
    observer.onItemFinished?.({
      type: 'item-finished',
      position: 2,
      total: 5,
      outcome: { entryIndex: 4, title: 'Night Drive', status: 'success', bytesWritten: 2 * 1024 * 1024 },
    });
    observer.onItemFinished?.({
      type: 'item-finished',
      position: 3,
      total: 5,
      outcome: { entryIndex: 5, title: 'Gone', status: 'failed', errorMessage: 'Video unavailable' },
    });

    expect(lines).toEqual([
      '📥 [2/5] Starting: Night Drive',
      '🔗 [2/5] Connecting to: https://www.youtube.com/watch?v=abc',
      '✅ [2/5] SUCCESS: Night Drive (2.0MB)',
      '❌ [3/5] FAILED: Gone',
      '   Details: Video unavailable',
    ]);
    expect(statuses).toEqual(['📥 Night Drive... | 10% | 1MiB/s | ETA: 00:09']);
  });

  it('prints a header when the batch starts', () => {
    const { sink, lines } = recordingSink();
    createConsoleObserver(sink).onStarted?.({
      type: 'started',
      total: 2,
      outputDirectory: '/out',
      format: { format: 'best[height<=720]/best' },
      formatLabel: '🎬 Format: Video (720p)',
    });

    expect(lines).toEqual([
      '🚀 Starting download process...',
      '📁 Downloading 2 videos to: /out',
      '🎬 Format: Video (720p)',
      RULE,
    ]);
  });
});
