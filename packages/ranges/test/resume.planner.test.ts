import { describe, it, expect } from "vitest";

import {
  computeMissingRanges,
  coveredBytes,
  normalizeRanges,
  type ByteRange,
} from "../src/index.js";

describe("computeMissingRanges", () => {
  it("returns the whole file when nothing was received", () => {
    expect(computeMissingRanges([], 1000)).toEqual([[0, 999]]);
  });

  it("returns nothing for a fully covered file", () => {
    expect(computeMissingRanges([[0, 999]], 1000)).toEqual([]);
  });

  it("returns the tail after a received prefix", () => {
    expect(computeMissingRanges([[0, 499]], 1000)).toEqual([[500, 999]]);
  });

  it("emits leading, inner and trailing gaps", () => {
    expect(
      computeMissingRanges(
        [
          [100, 199],
          [300, 399],
        ],
        500
      )
    ).toEqual([
      [0, 99],
      [200, 299],
      [400, 499],
    ]);
  });

  it("handles unsorted and overlapping input", () => {
    const received: ByteRange[] = [
      [300, 450],
      [0, 120],
      [100, 199],
      [350, 400],
    ];
    expect(computeMissingRanges(received, 500)).toEqual([
      [200, 299],
      [451, 499],
    ]);
    expect(received[0]).toEqual([300, 450]);
  });

  it("returns nothing for an empty file", () => {
    expect(computeMissingRanges([], 0)).toEqual([]);
  });

  it("complements received ranges to exactly [0, N)", () => {
    const total = 1000;
    const received: ByteRange[] = [
      [10, 19],
      [500, 749],
      [990, 999],
    ];
    const missing = computeMissingRanges(received, total);
    const union = normalizeRanges([...received, ...missing]);

    expect(union).toEqual([[0, total - 1]]);
    expect(coveredBytes(received) + coveredBytes(missing)).toBe(total);
  });
});
