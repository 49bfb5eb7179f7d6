import { splitRange, type ByteRange } from "@rangeload/ranges";

import type { ChunkSpec } from "./types.js";

const MiB = 1024 * 1024;

/**
 * Size-tiered chunk policy: small files get small chunks so a retry is
 * cheap, big files get big ones to bound per-request overhead.
 */
export function getOptimalChunkSize(fileSize: number): number {
  if (fileSize < 50 * MiB) return 2 * MiB;
  if (fileSize < 200 * MiB) return 5 * MiB;
  if (fileSize < 1024 * MiB) return 10 * MiB;
  return 20 * MiB;
}

function assertChunkSize(chunkSize: number) {
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError("chunkSize must be a positive integer");
  }
}

/**
 * Chunk `i` covers [i * chunkSize, min((i + 1) * chunkSize, size) - 1].
 */
export function planChunks(size: number, chunkSize: number): ChunkSpec[] {
  assertChunkSize(chunkSize);

  const chunks: ChunkSpec[] = [];
  for (let start = 0, index = 0; start < size; start += chunkSize, index++) {
    chunks.push({ index, start, end: Math.min(start + chunkSize, size) - 1 });
  }
  return chunks;
}

/**
 * Chunks covering only the given ranges, none longer than `chunkSize`.
 */
export function planRanges(ranges: readonly ByteRange[], chunkSize: number): ChunkSpec[] {
  assertChunkSize(chunkSize);

  return ranges
    .flatMap((range) => splitRange(range, chunkSize))
    .map(([start, end], index) => ({ index, start, end }));
}
