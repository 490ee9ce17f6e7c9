import type { DisplayMap, DisplayPoint, DisplayRange } from '../display/DisplayMap.js';
import { displayRangeContains } from '../display/DisplayMap.js';
import type { SelectionsCollection } from '../selection/SelectionsCollection.js';

/**
 * Projects the committed selections, followed by the pending one, into display space.
 */
export function displayRanges(displayMap: DisplayMap, selections: SelectionsCollection): DisplayRange[] {
  const ranges = selections.disjoint.map((selection) => ({
    start: displayMap.toDisplayPoint(selection.start),
    end: displayMap.toDisplayPoint(selection.end),
  }));
  const pending = selections.pending?.selection;
  if (pending) {
    ranges.push({
      start: displayMap.toDisplayPoint(pending.start),
      end: displayMap.toDisplayPoint(pending.end),
    });
  }
  return ranges;
}

export function isPointInSelections(
  displayMap: DisplayMap,
  selections: SelectionsCollection,
  point: DisplayPoint,
): boolean {
  return displayRanges(displayMap, selections).some((range) => displayRangeContains(range, point));
}
