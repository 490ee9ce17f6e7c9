import { describe, expect, it } from 'vitest';
import { createSurfaceDoc, createSurfaceState } from './schema.js';

describe('surface schema', () => {
  it('creates one paragraph per line, including empty lines', () => {
    const doc = createSurfaceDoc('one\n\nthree');

    expect(doc.childCount).toBe(3);
    expect(doc.child(1).content.size).toBe(0);
    expect(doc.textBetween(0, doc.content.size, '\n')).toBe('one\n\nthree');
  });

  it('places the cursor at the start of the first line', () => {
    const state = createSurfaceState('hello');

    expect(state.selection.head).toBe(1);
    expect(state.selection.empty).toBe(true);
  });
});
