// src/range.set.ts

/**
 * Inclusive byte interval `[start, end]`.
 */
export type ByteRange = readonly [start: number, end: number];

export function rangeLength([start, end]: ByteRange): number {
  return end - start + 1;
}

export function isValidRange(range: ByteRange, totalSize: number): boolean {
  const [start, end] = range;
  return (
    Number.isSafeInteger(start) &&
    Number.isSafeInteger(end) &&
    start >= 0 &&
    start <= end &&
    end < totalSize
  );
}

/**
 * Sorts and coalesces overlapping or adjacent ranges.
 * Returns a new array; the input is left as-is.
 */
export function normalizeRanges(ranges: readonly ByteRange[]): ByteRange[] {
  if (ranges.length === 0) return [];

  const sorted = [...ranges].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  const merged: [number, number][] = [[sorted[0][0], sorted[0][1]]];

  for (let i = 1; i < sorted.length; i++) {
    const [start, end] = sorted[i];
    const last = merged[merged.length - 1];

    if (start <= last[1] + 1) {
      last[1] = Math.max(last[1], end);
    } else {
      merged.push([start, end]);
    }
  }

  return merged;
}

/**
 * Merges a single range into an already normalized set.
 */
export function insertRange(
  ranges: readonly ByteRange[],
  range: ByteRange
): ByteRange[] {
  const [start, end] = range;
  const out: ByteRange[] = [];
  let mergedStart = start;
  let mergedEnd = end;
  let placed = false;

  for (const current of ranges) {
    const [s, e] = current;

    if (e + 1 < mergedStart) {
      out.push(current);
      continue;
    }

    if (s > mergedEnd + 1) {
      if (!placed) {
        out.push([mergedStart, mergedEnd]);
        placed = true;
      }
      out.push(current);
      continue;
    }

    // Overlapping or adjacent: absorb.
    mergedStart = Math.min(mergedStart, s);
    mergedEnd = Math.max(mergedEnd, e);
  }

  if (!placed) out.push([mergedStart, mergedEnd]);
  return out;
}

export function coveredBytes(ranges: readonly ByteRange[]): number {
  let total = 0;
  for (const range of ranges) total += rangeLength(range);
  return total;
}

export function isRangeCovered(
  ranges: readonly ByteRange[],
  start: number,
  end: number
): boolean {
  return ranges.some(([s, e]) => s <= start && end <= e);
}

export function isFullyCovered(
  ranges: readonly ByteRange[],
  totalSize: number
): boolean {
  return (
    totalSize > 0 &&
    ranges.length === 1 &&
    ranges[0][0] === 0 &&
    ranges[0][1] === totalSize - 1
  );
}

/**
 * Cuts `range` into consecutive pieces of at most `maxLength` bytes.
 */
export function splitRange(range: ByteRange, maxLength: number): ByteRange[] {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new Error("maxLength must be a positive integer");
  }

  const [start, end] = range;
  const pieces: ByteRange[] = [];
  for (let pos = start; pos <= end; pos += maxLength) {
    pieces.push([pos, Math.min(pos + maxLength - 1, end)]);
  }
  return pieces;
}
