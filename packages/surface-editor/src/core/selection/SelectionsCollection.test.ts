import { describe, expect, it } from 'vitest';
import { StepMap } from 'prosemirror-transform';
import { isSurfaceError } from '../errors.js';
import { SelectionsCollection, mergeOverlapping } from './SelectionsCollection.js';

const DOC_SIZE = 32;

const createCollection = (initial = 1) => new SelectionsCollection(() => DOC_SIZE, initial);

const ranges = (collection: SelectionsCollection) => collection.disjoint.map((s) => [s.start, s.end]);

describe('SelectionsCollection', () => {
  it('starts with a single cursor', () => {
    const collection = createCollection(5);

    expect(ranges(collection)).toEqual([[5, 5]]);
    expect(collection.pending).toBeNull();
  });

  it('normalizes reversed ranges', () => {
    const collection = createCollection();
    collection.change((s) => s.select([[10, 4]]));

    expect(collection.disjoint[0]).toMatchObject({ start: 4, end: 10, reversed: true });
  });

  it('sorts and merges overlapping ranges but keeps touching ones apart', () => {
    const collection = createCollection();
    collection.change((s) =>
      s.select([
        [20, 20],
        [4, 10],
        [2, 6],
        [12, 12],
        [10, 11],
      ]),
    );

    expect(ranges(collection)).toEqual([
      [2, 10],
      [10, 11],
      [12, 12],
      [20, 20],
    ]);
  });

  it('collapses duplicate cursors', () => {
    const merged = mergeOverlapping([
      { id: 1, start: 3, end: 3, reversed: false },
      { id: 4, start: 3, end: 3, reversed: false },
    ]);

    expect(merged).toEqual([{ id: 4, start: 3, end: 3, reversed: false }]);
  });

  it('sets a pending anchor range alongside cleared disjoint selections', () => {
    const collection = createCollection();
    collection.change((s) => {
      s.clearDisjoint();
      s.setPendingAnchorRange(7, 7, 'character');
    });

    expect(collection.disjoint).toEqual([]);
    expect(collection.pending).toMatchObject({ mode: 'character', selection: { start: 7, end: 7 } });
    expect(collection.all().map((s) => s.start)).toEqual([7]);
  });

  it('prefers the pending selection as the newest one', () => {
    const collection = createCollection();
    collection.change((s) => s.select([[2, 4], [8, 9]]));
    expect(collection.newest()).toMatchObject({ start: 8, end: 9 });

    collection.change((s) => s.setPendingAnchorRange(1, 1, 'word'));
    expect(collection.newest()).toMatchObject({ start: 1, end: 1 });
  });

  it('reports whether a change did anything', () => {
    const collection = createCollection();

    expect(collection.change(() => undefined)).toBe(false);
    expect(collection.change((s) => s.clearPending())).toBe(false);
    expect(collection.change((s) => s.clearDisjoint())).toBe(true);
  });

  it('rejects positions outside the document', () => {
    const collection = createCollection();
    let error: unknown = null;
    try {
      collection.change((s) => s.select([[40, 40]]));
    } catch (caught) {
      error = caught;
    }

    expect(isSurfaceError(error)).toBe(true);
    expect(error).toMatchObject({ code: 'INVALID_POSITION', details: { pos: 40, size: DOC_SIZE } });
    expect(ranges(collection)).toEqual([[1, 1]]);
  });

  it('maps selections through a document change', () => {
    const collection = createCollection();
    collection.change((s) => s.select([[4, 8], [22, 22]]));
    collection.change((s) => s.setPendingAnchorRange(30, 30, 'character'));

    // Two characters inserted at position 14
    collection.map(new StepMap([14, 0, 2]));

    expect(ranges(collection)).toEqual([
      [4, 8],
      [24, 24],
    ]);
    expect(collection.pending?.selection).toMatchObject({ start: 32, end: 32 });
  });
});
