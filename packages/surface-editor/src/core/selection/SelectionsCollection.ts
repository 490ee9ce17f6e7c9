import type { Mappable } from 'prosemirror-transform';
import { SurfaceError } from '../errors.js';

/** Granularity used while a pending selection is extended. */
export type SelectMode = 'character' | 'word' | 'line' | 'all';

export type SurfaceSelection = {
  readonly id: number;
  /** Document position; always `<= end` */
  readonly start: number;
  readonly end: number;
  /** True when the head sits at `start` */
  readonly reversed: boolean;
};

export type PendingSelection = {
  readonly selection: SurfaceSelection;
  readonly mode: SelectMode;
};

/**
 * Committed, non-overlapping selections plus an optional pending one (a drag in
 * progress or a freshly placed cursor).
 */
export class SelectionsCollection {
  #disjoint: SurfaceSelection[] = [];
  #pending: PendingSelection | null = null;
  #nextId = 0;
  #getDocSize: () => number;

  constructor(getDocSize: () => number, initial: number) {
    this.#getDocSize = getDocSize;
    this.#disjoint = [this.createSelection(initial, initial)];
  }

  get disjoint(): readonly SurfaceSelection[] {
    return this.#disjoint;
  }

  get pending(): PendingSelection | null {
    return this.#pending;
  }

  /**
   * Disjoint and pending selections ordered by start position.
   */
  all(): SurfaceSelection[] {
    const selections = [...this.#disjoint];
    if (this.#pending) selections.push(this.#pending.selection);
    return selections.sort((a, b) => a.start - b.start || a.end - b.end);
  }

  /**
   * The most recently created selection; a pending selection always wins.
   */
  newest(): SurfaceSelection | null {
    if (this.#pending) return this.#pending.selection;
    let newest: SurfaceSelection | null = null;
    for (const selection of this.#disjoint) {
      if (!newest || selection.id > newest.id) newest = selection;
    }
    return newest;
  }

  /**
   * Runs `fn` against a mutator and reports whether anything changed.
   */
  change(fn: (mutator: SelectionsMutator) => void): boolean {
    const before = this.#signature();
    fn(new SelectionsMutator(this));
    return this.#signature() !== before;
  }

  /**
   * Maps every selection through a document change.
   */
  map(mapping: Mappable): void {
    const mapSelection = (selection: SurfaceSelection): SurfaceSelection => ({
      ...selection,
      start: mapping.map(selection.start, -1),
      end: mapping.map(selection.end, 1),
    });
    this.#disjoint = mergeOverlapping(this.#disjoint.map(mapSelection));
    if (this.#pending) {
      this.#pending = { ...this.#pending, selection: mapSelection(this.#pending.selection) };
    }
  }

  /** @internal */
  createSelection(anchor: number, head: number): SurfaceSelection {
    this.#assertPosition(anchor);
    this.#assertPosition(head);
    return {
      id: this.#nextId++,
      start: Math.min(anchor, head),
      end: Math.max(anchor, head),
      reversed: head < anchor,
    };
  }

  /** @internal */
  setDisjoint(selections: SurfaceSelection[]): void {
    this.#disjoint = mergeOverlapping(selections);
  }

  /** @internal */
  setPending(pending: PendingSelection | null): void {
    this.#pending = pending;
  }

  #assertPosition(pos: number): void {
    const size = this.#getDocSize();
    if (!Number.isInteger(pos) || pos < 0 || pos > size) {
      throw new SurfaceError('INVALID_POSITION', `Position ${pos} is outside the document (0-${size})`, {
        pos,
        size,
      });
    }
  }

  #signature(): string {
    const encode = (s: SurfaceSelection) => `${s.id}:${s.start}:${s.end}:${s.reversed ? 1 : 0}`;
    const pending = this.#pending ? `${encode(this.#pending.selection)}/${this.#pending.mode}` : '-';
    return `${this.#disjoint.map(encode).join(',')}|${pending}`;
  }
}

/**
 * Mutation API handed out by {@link SelectionsCollection.change}.
 */
export class SelectionsMutator {
  #collection: SelectionsCollection;

  constructor(collection: SelectionsCollection) {
    this.#collection = collection;
  }

  clearDisjoint(): void {
    this.#collection.setDisjoint([]);
  }

  clearPending(): void {
    this.#collection.setPending(null);
  }

  setPendingAnchorRange(anchor: number, head: number, mode: SelectMode): void {
    this.#collection.setPending({ selection: this.#collection.createSelection(anchor, head), mode });
  }

  /**
   * Replaces every selection with `ranges` (`[anchor, head]` pairs), merging overlaps.
   */
  select(ranges: ReadonlyArray<readonly [anchor: number, head: number]>): void {
    this.#collection.setPending(null);
    this.#collection.setDisjoint(ranges.map(([anchor, head]) => this.#collection.createSelection(anchor, head)));
  }
}

/**
 * Sorts selections and merges ranges that overlap. Touching ranges stay separate;
 * duplicates collapse into one.
 */
export function mergeOverlapping(selections: SurfaceSelection[]): SurfaceSelection[] {
  const sorted = [...selections].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: SurfaceSelection[] = [];
  for (const selection of sorted) {
    const previous = merged[merged.length - 1];
    if (previous && overlaps(previous, selection)) {
      merged[merged.length - 1] = {
        id: Math.max(previous.id, selection.id),
        start: previous.start,
        end: Math.max(previous.end, selection.end),
        reversed: previous.reversed,
      };
    } else {
      merged.push(selection);
    }
  }
  return merged;
}

function overlaps(previous: SurfaceSelection, next: SurfaceSelection): boolean {
  if (previous.start === next.start && previous.end === next.end) return true;
  return next.start < previous.end;
}
