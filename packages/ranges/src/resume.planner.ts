// src/resume.planner.ts

import type { ByteRange } from "./range.set.js";

/**
 * Complement of `received` within `[0, totalSize)`.
 *
 * Input may be unsorted or overlapping; overlaps are absorbed by always
 * advancing the cursor to the furthest end seen so far.
 */
export function computeMissingRanges(
  received: readonly ByteRange[],
  totalSize: number
): ByteRange[] {
  if (totalSize <= 0) return [];
  if (received.length === 0) return [[0, totalSize - 1]];

  const sorted = [...received].sort((a, b) => a[0] - b[0]);
  const missing: ByteRange[] = [];
  let pos = 0;

  for (const [start, end] of sorted) {
    if (pos >= totalSize) break;
    if (pos < start) {
      missing.push([pos, Math.min(start, totalSize) - 1]);
    }
    pos = Math.max(pos, end + 1);
  }

  if (pos < totalSize) {
    missing.push([pos, totalSize - 1]);
  }

  return missing;
}
