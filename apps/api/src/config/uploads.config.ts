// src/config/uploads.config.ts
import path from "path";

import { parseListEnv, parsePositiveIntEnv, type Env } from "./env.js";

export interface UploadConfig {
  /** Part files live here until finalize. */
  tmpDir: string;
  /** Finalized files are handed off from here. */
  uploadDir: string;
  maxFileSizeBytes: number;
  maxActiveUploads: number;
  /** Idle time after which a non-terminal session expires. */
  sessionTtlMs: number;
  /** How long terminal sessions stay queryable. */
  retentionMs: number;
  allowedExtensions: string[];
}

export interface ChunkConfig {
  minBytes: number;
  maxBytes: number;
  defaultBytes: number;
  maxParallel: number;
}

export interface GcConfig {
  intervalMs: number;
  graceMs: number;
}

export interface UploadsConfig {
  upload: UploadConfig;
  chunk: ChunkConfig;
  gc: GcConfig;
}

const DEFAULT_ALLOWED_EXTENSIONS = ["mp4", "avi", "mov", "webm", "mkv"];

function requireAbsoluteDir(env: Env, name: string): string {
  const raw = env[name];
  if (!raw) {
    throw new Error(`Missing required env: ${name}`);
  }
  if (!path.isAbsolute(raw)) {
    throw new Error(`${name} must be an absolute path`);
  }
  return path.resolve(raw);
}

export function loadUploadsConfig(env: Env = process.env): UploadsConfig {
  const chunk: ChunkConfig = {
    minBytes: 256 * 1024,                                              // 256 KB
    maxBytes: 64 * 1024 * 1024,                                        // 64 MB
    defaultBytes: parsePositiveIntEnv(env, "UPLOAD_CHUNK_BYTES", 16 * 1024 * 1024),
    maxParallel: parsePositiveIntEnv(env, "UPLOAD_MAX_PARALLEL", 4),
  };

  if (chunk.defaultBytes < chunk.minBytes || chunk.defaultBytes > chunk.maxBytes) {
    throw new Error(
      `UPLOAD_CHUNK_BYTES must be between ${chunk.minBytes} and ${chunk.maxBytes}`
    );
  }

  return {
    upload: {
      tmpDir: requireAbsoluteDir(env, "UPLOAD_TMP_DIR"),
      uploadDir: requireAbsoluteDir(env, "UPLOAD_DIR"),
      maxFileSizeBytes: parsePositiveIntEnv(
        env,
        "UPLOAD_MAX_FILE_BYTES",
        200 * 1024 * 1024 * 1024 // 200 GB
      ),
      maxActiveUploads: parsePositiveIntEnv(env, "UPLOAD_MAX_ACTIVE", 100),
      sessionTtlMs: parsePositiveIntEnv(env, "UPLOAD_SESSION_TTL_MS", 6 * 60 * 60 * 1000), // 6 hours
      retentionMs: parsePositiveIntEnv(env, "UPLOAD_RETENTION_MS", 24 * 60 * 60 * 1000), // 24 hours
      allowedExtensions: parseListEnv(
        env,
        "UPLOAD_ALLOWED_EXTENSIONS",
        DEFAULT_ALLOWED_EXTENSIONS
      ).map((ext) => ext.replace(/^\./, "").toLowerCase()),
    },
    chunk,
    gc: {
      intervalMs: parsePositiveIntEnv(env, "UPLOAD_GC_INTERVAL_MS", 5 * 60 * 1000), // 5 minutes
      graceMs: parsePositiveIntEnv(env, "UPLOAD_GC_GRACE_MS", 15 * 60 * 1000),     // 15 minutes
    },
  };
}
