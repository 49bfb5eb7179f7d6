import fs from "fs/promises";
import os from "os";
import path from "path";
import { Readable } from "stream";
import Fastify from "fastify";

import type { AnalysisConfig } from "../src/config/analysis.config.js";
import type { UploadsConfig } from "../src/config/uploads.config.js";

export const silentLog = Fastify({ logger: false }).log;

export interface TempDirs {
  root: string;
  tmpDir: string;
  uploadDir: string;
}

export async function makeTempDirs(): Promise<TempDirs> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "rangeload-test-"));
  return {
    root,
    tmpDir: path.join(root, "tmp"),
    uploadDir: path.join(root, "uploads"),
  };
}

export async function removeTempDirs(dirs: TempDirs) {
  // Finalized files are read-only; rm with force still unlinks them.
  await fs.rm(dirs.root, { recursive: true, force: true });
}

export function testUploadsConfig(
  dirs: TempDirs,
  overrides: { upload?: Partial<UploadsConfig["upload"]>; chunk?: Partial<UploadsConfig["chunk"]> } = {}
): UploadsConfig {
  return {
    upload: {
      tmpDir: dirs.tmpDir,
      uploadDir: dirs.uploadDir,
      maxFileSizeBytes: 10 * 1024 * 1024,
      maxActiveUploads: 10,
      sessionTtlMs: 60_000,
      retentionMs: 120_000,
      allowedExtensions: ["mp4", "avi", "mov", "webm", "mkv"],
      ...overrides.upload,
    },
    chunk: {
      minBytes: 1,
      maxBytes: 1024 * 1024,
      defaultBytes: 100,
      maxParallel: 4,
      ...overrides.chunk,
    },
    gc: {
      intervalMs: 60_000,
      graceMs: 0,
    },
  };
}

export const noAnalysis: AnalysisConfig = {
  webhookUrl: null,
  timeoutMs: 1000,
  maxRetries: 3,
  baseRetryDelayMs: 1,
  concurrency: 3,
  intervalCap: 5,
  intervalMs: 1000,
};

export function patternBuffer(size: number): Buffer {
  const buf = Buffer.alloc(size);
  for (let i = 0; i < size; i++) buf[i] = (i * 31 + 7) % 256;
  return buf;
}

export function bodyOf(bytes: Buffer): Readable {
  return Readable.from([bytes]);
}

export async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
