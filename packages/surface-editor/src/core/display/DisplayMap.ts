import type { Node as ProseMirrorNode } from 'prosemirror-model';

/**
 * A document location in display space: `row` is the index of a textblock, `column`
 * the offset into its text content.
 */
export type DisplayPoint = {
  row: number;
  column: number;
};

export type DisplayRange = {
  start: DisplayPoint;
  end: DisplayPoint;
};

type DisplayRow = {
  /** Document position of the first character slot in the textblock */
  start: number;
  /** Document position after the last character slot */
  end: number;
};

export function compareDisplayPoints(a: DisplayPoint, b: DisplayPoint): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.column - b.column;
}

/**
 * Half-open containment: `start <= point < end`. A zero-width range contains nothing.
 */
export function displayRangeContains(range: DisplayRange, point: DisplayPoint): boolean {
  return compareDisplayPoints(range.start, point) <= 0 && compareDisplayPoints(point, range.end) < 0;
}

/**
 * Snapshot mapping between ProseMirror document positions and display points.
 * Built from one document; rebuild it after the document changes.
 */
export class DisplayMap {
  #rows: DisplayRow[];

  private constructor(rows: DisplayRow[]) {
    this.#rows = rows;
  }

  static fromDoc(doc: ProseMirrorNode): DisplayMap {
    const rows: DisplayRow[] = [];
    doc.descendants((node, pos) => {
      if (node.isTextblock) {
        rows.push({ start: pos + 1, end: pos + 1 + node.content.size });
        return false;
      }
      return true;
    });
    return new DisplayMap(rows);
  }

  get rowCount(): number {
    return this.#rows.length;
  }

  rowLength(row: number): number {
    const entry = this.#rows[row];
    return entry ? entry.end - entry.start : 0;
  }

  maxPoint(): DisplayPoint {
    const last = this.#rows.length - 1;
    if (last < 0) return { row: 0, column: 0 };
    return { row: last, column: this.rowLength(last) };
  }

  /**
   * Positions between textblocks snap to the end of the preceding row; positions
   * before the first textblock snap to its start.
   */
  toDisplayPoint(pos: number): DisplayPoint {
    let row = -1;
    for (let i = 0; i < this.#rows.length; i += 1) {
      if (this.#rows[i].start > pos) break;
      row = i;
    }
    if (row < 0) return { row: 0, column: 0 };
    const entry = this.#rows[row];
    return { row, column: Math.min(pos, entry.end) - entry.start };
  }

  /**
   * Clamps out-of-range rows and columns to the nearest valid display point.
   */
  toDocumentPosition(point: DisplayPoint): number {
    if (this.#rows.length === 0) return 0;
    const row = Math.min(Math.max(point.row, 0), this.#rows.length - 1);
    const entry = this.#rows[row];
    const column = Math.min(Math.max(point.column, 0), entry.end - entry.start);
    return entry.start + column;
  }

  clipPoint(point: DisplayPoint): DisplayPoint {
    return this.toDisplayPoint(this.toDocumentPosition(point));
  }
}
