import { ValidationError } from '../utils/errors.js';
import type { Playlist, PlaylistEntry } from '../types/index.js';

/**
 * Application state for one playlist: the resolved entries and the set of
 * indices the user picked. Replacing the entries always clears the selection.
 */
export class PlaylistSession {
  private current: Playlist | null = null;
  private selected = new Set<number>();

  get playlist(): Playlist | null {
    return this.current;
  }

  get entries(): readonly PlaylistEntry[] {
    return this.current?.entries ?? [];
  }

  get selection(): ReadonlySet<number> {
    return this.selected;
  }

  load(playlist: Playlist): void {
    this.current = playlist;
    this.selected = new Set();
  }

  reset(): void {
    this.current = null;
    this.selected = new Set();
  }

  selectAll(): void {
    this.selected = new Set(this.entries.map((_, i) => i));
  }

  clearAll(): void {
    this.selected = new Set();
  }

  toggle(index: number): void {
    this.assertInRange(index);
    const next = new Set(this.selected);
    if (next.has(index)) {
      next.delete(index);
    } else {
      next.add(index);
    }
    this.selected = next;
  }

  setSelection(indices: Iterable<number>): void {
    const next = new Set<number>();
    for (const index of indices) {
      this.assertInRange(index);
      next.add(index);
    }
    this.selected = next;
  }

  selectedIndices(): number[] {
    return [...this.selected].sort((a, b) => a - b);
  }

  private assertInRange(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new ValidationError(`Index ${index} is outside the playlist (0..${this.entries.length - 1})`);
    }
  }
}

/**
 * Parses a 1-based selection such as "1,3,5-7" or "all" into 0-based indices
 */
export function parseSelection(expression: string, count: number): number[] {
  const trimmed = expression.trim().toLowerCase();
  if (trimmed === 'all') {
    return Array.from({ length: count }, (_, i) => i);
  }

  const indices = new Set<number>();
  for (const part of trimmed.split(',')) {
    const token = part.trim();
    if (!token) continue;

    const match = token.match(/^(\d+)(?:\s*-\s*(\d+))?$/);
    if (!match) {
      throw new ValidationError(`Invalid selection "${token}" (use e.g. 1,3,5-7)`);
    }

    const from = Number(match[1]);
    const to = match[2] === undefined ? from : Number(match[2]);
    if (from > to) {
      throw new ValidationError(`Invalid range "${token}"`);
    }
    if (from < 1 || to > count) {
      throw new ValidationError(`Selection "${token}" is outside 1..${count}`);
    }

    for (let n = from; n <= to; n++) {
      indices.add(n - 1);
    }
  }

  if (indices.size === 0) {
    throw new ValidationError('Nothing selected');
  }

  return [...indices].sort((a, b) => a - b);
}
