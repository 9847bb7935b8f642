import { beforeEach, describe, expect, it } from 'vitest';
import { PlaylistSession, parseSelection } from './session.js';
import { ValidationError } from '../utils/errors.js';
import type { Playlist } from '../types/index.js';

function playlistOf(count: number, title = 'Mix'): Playlist {
  return {
    title,
    entries: Array.from({ length: count }, (_, i) => ({
      index: i,
      id: `vid${i}`,
      title: `Video ${i}`,
      durationSeconds: 60,
      url: `https://www.youtube.com/watch?v=vid${i}`,
    })),
  };
}

describe('PlaylistSession', () => {
  let session: PlaylistSession;

  beforeEach(() => {
    session = new PlaylistSession();
    session.load(playlistOf(4));
  });

  it('starts with nothing selected', () => {
    expect(session.selectedIndices()).toEqual([]);
  });

  it('selectAll then clearAll leaves an empty selection', () => {
    session.selectAll();
    session.clearAll();
    expect(session.selection.size).toBe(0);
  });

  it('clearAll then selectAll selects the full range', () => {
    session.clearAll();
    session.selectAll();
    expect(session.selectedIndices()).toEqual([0, 1, 2, 3]);
  });

  it('toggle adds and removes a single index', () => {
    session.toggle(2);
    expect(session.selectedIndices()).toEqual([2]);
    session.toggle(2);
    expect(session.selectedIndices()).toEqual([]);
  });

  it('setSelection replaces the set and reports indices ascending', () => {
    session.toggle(0);
    session.setSelection([3, 1, 1]);
    expect(session.selectedIndices()).toEqual([1, 3]);
  });

  it('rejects indices outside the playlist', () => {
    expect(() => session.setSelection([4])).toThrow(ValidationError);
    expect(() => session.toggle(-1)).toThrow(ValidationError);
    expect(session.selectedIndices()).toEqual([]);
  });

  it('loading new entries resets the selection', () => {
    session.selectAll();
    session.load(playlistOf(2, 'Other'));
    expect(session.selection.size).toBe(0);
    expect(session.entries).toHaveLength(2);
  });

  it('reset drops the playlist', () => {
    session.selectAll();
    session.reset();
    expect(session.playlist).toBeNull();
    expect(session.entries).toEqual([]);
    expect(session.selection.size).toBe(0);
  });

  it('hands out a selection the caller cannot mutate through later operations', () => {
    session.setSelection([1]);
    const snapshot = session.selection;
    session.selectAll();
    expect([...snapshot]).toEqual([1]);
  });
});

describe('parseSelection', () => {
  it('converts 1-based lists and ranges to sorted 0-based indices', () => {
    expect(parseSelection('6, 1,3-4', 10)).toEqual([0, 2, 3, 5]);
  });

  it('accepts all', () => {
    expect(parseSelection('ALL', 3)).toEqual([0, 1, 2]);
  });

  it('ignores duplicates and empty parts', () => {
    expect(parseSelection('2,,2,1-2', 5)).toEqual([0, 1]);
  });

  it.each([
    ['0', 'Selection "0" is outside 1..5'],
    ['4-6', 'Selection "4-6" is outside 1..5'],
    ['3-1', 'Invalid range "3-1"'],
    ['x', 'Invalid selection "x" (use e.g. 1,3,5-7)'],
    [' , ', 'Nothing selected'],
  ])('rejects %j', (expression, message) => {
    expect(() => parseSelection(expression, 5)).toThrow(message);
  });
});
