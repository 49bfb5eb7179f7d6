// src/store/chunk.store.ts

import type { Readable } from "stream";

export type ChunkWriteFailure = "too_large" | "too_short" | "source" | "storage";

export class ChunkWriteError extends Error {
  constructor(
    readonly reason: ChunkWriteFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ChunkWriteError";
  }
}

export interface PartFileInfo {
  uploadId: string;
  mtimeMs: number;
}

/**
 * Positional staging area: one pre-sized part file per upload.
 * Writes to disjoint offsets may run concurrently.
 */
export interface ChunkStore {
  allocate(uploadId: string, totalSize: number): Promise<void>;

  writeAt(
    uploadId: string,
    start: number,
    stream: Readable,
    expectedLength: number
  ): Promise<number>;

  finalize(uploadId: string, destinationPath: string): Promise<string>;

  discard(uploadId: string): Promise<void>;

  listParts(): Promise<PartFileInfo[]>;
}
