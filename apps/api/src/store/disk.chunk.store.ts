// src/store/disk.chunk.store.ts

import fs from "fs/promises";
import { constants, createWriteStream } from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import { Transform } from "stream";
import type { Readable } from "stream";

import { ChunkWriteError, type ChunkStore, type PartFileInfo } from "./chunk.store.js";

const PART_SUFFIX = ".part";

function errorCode(err: unknown): string | undefined {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
}

function createLengthGuard(expectedLength: number, onBytes: (n: number) => void) {
  let written = 0;

  return new Transform({
    transform(chunk: Buffer, _enc, cb) {
      written += chunk.length;

      if (written > expectedLength) {
        cb(
          new ChunkWriteError(
            "too_large",
            `Payload exceeds range length (${expectedLength} bytes)`
          )
        );
        return;
      }

      onBytes(chunk.length);
      cb(null, chunk);
    },
  });
}

export class DiskChunkStore implements ChunkStore {
  constructor(private readonly tmpDir: string) {}

  private partPath(uploadId: string) {
    return path.join(this.tmpDir, `${uploadId}${PART_SUFFIX}`);
  }

  async allocate(uploadId: string, totalSize: number): Promise<void> {
    await fs.mkdir(this.tmpDir, { recursive: true });

    // Pre-size the file so every range can be written in place.
    const fh = await fs.open(this.partPath(uploadId), "wx");
    try {
      await fh.truncate(totalSize);
    } finally {
      await fh.close();
    }
  }

  async writeAt(
    uploadId: string,
    start: number,
    stream: Readable,
    expectedLength: number
  ): Promise<number> {
    let written = 0;
    // pipeline destroys every stream with the first error; remember which side raised it.
    const failure: { first?: "source" | "storage" } = {};
    const onSourceError = () => {
      failure.first ??= "source";
    };
    stream.once("error", onSourceError);

    try {
      const sink = createWriteStream(this.partPath(uploadId), {
        flags: "r+",
        start,
      });
      sink.once("error", () => {
        failure.first ??= "storage";
      });

      await pipeline(
        stream,
        createLengthGuard(expectedLength, (n) => {
          written += n;
        }),
        sink
      );
    } catch (err) {
      if (err instanceof ChunkWriteError) throw err;

      const sourceFailed =
        failure.first === "source" || errorCode(err) === "ERR_STREAM_PREMATURE_CLOSE";
      throw new ChunkWriteError(
        sourceFailed ? "source" : "storage",
        sourceFailed
          ? "Request stream failed"
          : `Write failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    } finally {
      stream.off("error", onSourceError);
    }

    if (written !== expectedLength) {
      throw new ChunkWriteError(
        "too_short",
        `Payload is ${written} bytes, range expects ${expectedLength}`
      );
    }

    return written;
  }

  async finalize(uploadId: string, destinationPath: string): Promise<string> {
    const part = this.partPath(uploadId);

    const fh = await fs.open(part, "r+");
    try {
      await fh.sync();
    } finally {
      await fh.close();
    }

    await fs.chmod(part, 0o444);
    await fs.mkdir(path.dirname(destinationPath), { recursive: true });

    try {
      await fs.rename(part, destinationPath);
    } catch (err) {
      if (errorCode(err) !== "EXDEV") throw err;

      // Different filesystem: copy, then drop the part.
      await fs.copyFile(part, destinationPath, constants.COPYFILE_EXCL);
      await fs.rm(part, { force: true });
    }

    return destinationPath;
  }

  async discard(uploadId: string): Promise<void> {
    await fs.rm(this.partPath(uploadId), { force: true });
  }

  async listParts(): Promise<PartFileInfo[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.tmpDir);
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw err;
    }

    const parts: PartFileInfo[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(PART_SUFFIX)) continue;

      try {
        const st = await fs.lstat(path.join(this.tmpDir, entry));
        if (!st.isFile()) continue;
        parts.push({ uploadId: entry.slice(0, -PART_SUFFIX.length), mtimeMs: st.mtimeMs });
      } catch (err) {
        // Removed between readdir and stat.
        if (errorCode(err) !== "ENOENT") throw err;
      }
    }

    return parts;
  }
}
