import type { BatchObserver } from '../services/downloader/downloader.js';
import type { BatchSummary } from '../types/index.js';
import { formatMegabytes } from '../utils/format.js';

const RULE = '─'.repeat(50);
const STATUS_WIDTH = 100;

export interface ConsoleSink {
  line(text: string): void;
  // Overwrites the current status line in place
  status(text: string): void;
}

export const stdoutSink: ConsoleSink = {
  line(text) {
    process.stdout.write(`\r${' '.repeat(STATUS_WIDTH)}\r${text}\n`);
  },
  status(text) {
    process.stdout.write(`\r${text.slice(0, STATUS_WIDTH).padEnd(STATUS_WIDTH)}`);
  },
};

export function summaryLines(summary: BatchSummary): string[] {
  const lines = [RULE];
  const { succeeded, total } = summary;

  switch (summary.classification) {
    case 'full-success':
      lines.push(`🎉 ALL DOWNLOADS COMPLETED SUCCESSFULLY! (${succeeded}/${total})`);
      break;
    case 'partial-success':
      lines.push(`⚠️ PARTIAL SUCCESS: ${succeeded}/${total} downloads completed`);
      lines.push(`❌ ${summary.failed} downloads failed`);
      break;
    case 'total-failure':
      lines.push(`💥 ALL DOWNLOADS FAILED! (0/${total})`);
      break;
  }

  if (summary.cancelled) {
    lines.push('🛑 Batch cancelled; remaining videos were not attempted');
  }
  lines.push(`📁 Files saved to: ${summary.outputDirectory}`);
  return lines;
}

/**
 * Renders batch events as a scrolling download console
 */
export function createConsoleObserver(sink: ConsoleSink): BatchObserver {
  return {
    onStarted(event) {
      sink.line('🚀 Starting download process...');
      sink.line(`📁 Downloading ${event.total} videos to: ${event.outputDirectory}`);
      sink.line(event.formatLabel);
      sink.line(RULE);
    },
    onItemStarted({ position, total, entry }) {
      sink.line(`📥 [${position}/${total}] Starting: ${entry.title}`);
      sink.line(`🔗 [${position}/${total}] Connecting to: ${entry.url}`);
    },
    onStatus(event) {
      sink.status(event.line);
    },
    onItemFinished({ position, total, outcome }) {
      if (outcome.status === 'success') {
        const size = outcome.bytesWritten === undefined ? '' : ` (${formatMegabytes(outcome.bytesWritten)})`;
        sink.line(`✅ [${position}/${total}] SUCCESS: ${outcome.title}${size}`);
      } else {
        sink.line(`❌ [${position}/${total}] FAILED: ${outcome.title}`);
        sink.line(`   Details: ${outcome.errorMessage ?? 'Unknown error'}`);
      }
    },
    onFinished(summary) {
      for (const line of summaryLines(summary)) {
        sink.line(line);
      }
    },
  };
}
