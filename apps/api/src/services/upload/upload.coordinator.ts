// src/services/upload/upload.coordinator.ts

import crypto from "crypto";
import path from "path";
import { finished } from "stream/promises";
import type { Readable } from "stream";
import type { FastifyBaseLogger } from "fastify";
import {
  computeMissingRanges,
  coveredBytes,
  insertRange,
  isFullyCovered,
  isRangeCovered,
  isValidRange,
} from "@rangeload/ranges";

import type { ChunkConfig, UploadConfig } from "../../config/uploads.config.js";
import type { ChunkStore } from "../../store/index.js";
import { ChunkWriteError } from "../../store/index.js";
import type { SessionRegistry } from "../../state/session.registry.js";
import {
  isTerminal,
  type AcceptRangeResult,
  type CompleteUploadResult,
  type InitializedUpload,
  type UploadSession,
  type UploadStatusSnapshot,
} from "../../types/upload.js";
import { fileExtension, sanitizeFilename, splitExtension } from "../../utils/filename.js";
import {
  UploadError,
  invalidRequest,
  rangeError,
  storageFailure,
  uploadConflict,
  uploadIncomplete,
  uploadNotFound,
} from "../../utils/uploadError.js";
import { InflightWrites, UploadLocks } from "./upload.locks.js";
import type { UploadEvents } from "./upload.events.js";

export interface UploadCoordinatorDeps {
  registry: SessionRegistry;
  store: ChunkStore;
  upload: UploadConfig;
  chunk: ChunkConfig;
  log: FastifyBaseLogger;
  events?: UploadEvents;
  /** Hand-off to the analysis pipeline; runs after the response path. */
  onCompleted?: (result: CompleteUploadResult) => Promise<void>;
  now?: () => number;
}

export interface InitializeUploadInput {
  filename: string;
  size: number;
  sessionId?: string;
  chunkSize?: number;
}

export interface ByteRangeRequest {
  start: number;
  end: number;
  /** Total size echoed by the client, when it sent one. */
  total?: number;
}

const SESSION_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;
// uploadIds are UUIDs, so this key never names an upload.
const INIT_LOCK_KEY = ":init";

function progressOf(bytesReceived: number, totalSize: number): number {
  return totalSize > 0 ? (bytesReceived / totalSize) * 100 : 0;
}

function completeResult(session: UploadSession): CompleteUploadResult {
  return {
    uploadId: session.uploadId,
    sessionId: session.sessionId,
    filename: session.filename,
    path: session.destinationPath,
    sizeBytes: session.sizeBytes,
  };
}

/**
 * Authoritative state machine for every upload session and the single
 * writer of `receivedRanges`.
 *
 * Byte payloads are written outside any lock (positional writes to
 * disjoint offsets are independent); the range merge and every state
 * transition run under a per-upload lock.
 */
export class UploadCoordinator {
  private readonly locks = new UploadLocks();
  private readonly inflight = new InflightWrites();
  private readonly now: () => number;

  constructor(private readonly deps: UploadCoordinatorDeps) {
    this.now = deps.now ?? Date.now;
  }

  async initialize(input: InitializeUploadInput): Promise<InitializedUpload> {
    const { registry, store, upload, chunk, log } = this.deps;

    const filename = sanitizeFilename(input.filename);
    if (!filename) {
      throw invalidRequest("INVALID_FILENAME", "filename is required");
    }
    if (filename.length > 255) {
      throw invalidRequest("INVALID_FILENAME", "filename must be <= 255 chars");
    }

    const ext = fileExtension(filename);
    if (!upload.allowedExtensions.includes(ext)) {
      throw invalidRequest(
        "INVALID_FILE_TYPE",
        ext ? `File type .${ext} not supported` : "File type not supported"
      );
    }

    const size = input.size;
    if (!Number.isSafeInteger(size) || size <= 0) {
      throw invalidRequest("INVALID_FILE_SIZE", "size must be a positive integer");
    }
    if (size > upload.maxFileSizeBytes) {
      throw invalidRequest(
        "FILE_TOO_LARGE",
        `File too large. Max size: ${upload.maxFileSizeBytes} bytes`,
        413
      );
    }

    if (input.sessionId !== undefined && !SESSION_ID_RE.test(input.sessionId)) {
      throw invalidRequest("INVALID_SESSION_ID", "session_id must match [A-Za-z0-9_-]{1,64}");
    }

    let chunkSize = chunk.defaultBytes;
    if (input.chunkSize !== undefined) {
      if (!Number.isSafeInteger(input.chunkSize) || input.chunkSize <= 0) {
        throw invalidRequest("INVALID_REQUEST_BODY", "chunk_size must be a positive integer");
      }
      chunkSize = Math.min(chunk.maxBytes, Math.max(chunk.minBytes, input.chunkSize));
    }

    const uploadId = crypto.randomUUID();
    const sessionId = input.sessionId ?? crypto.randomUUID().replace(/-/g, "");
    const { stem, ext: dotExt } = splitExtension(filename);
    const uniqueName = `${sessionId}_${stem}_${crypto.randomBytes(4).toString("hex")}${dotExt}`;
    const now = this.now();

    const session: UploadSession = {
      uploadId,
      sessionId,
      filename,
      sizeBytes: size,
      chunkSize,
      receivedRanges: [],
      bytesReceived: 0,
      state: "receiving",
      destinationPath: path.join(upload.uploadDir, uniqueName),
      createdAt: now,
      updatedAt: now,
      expiresAt: now + upload.sessionTtlMs,
    };

    // Capacity check and create must not interleave across inits.
    await this.locks.run(INIT_LOCK_KEY, async () => {
      const active = await registry.countActive();
      if (active >= upload.maxActiveUploads) {
        throw invalidRequest("UPLOAD_CAPACITY_REACHED", "Too many active uploads", 429, true);
      }

      try {
        await store.allocate(uploadId, size);
      } catch (err) {
        log.error({ err, uploadId }, "Part file allocation failed");
        throw storageFailure("Failed to allocate upload storage", err);
      }

      try {
        await registry.create(session);
      } catch (err) {
        await store.discard(uploadId).catch((discardErr: unknown) => {
          log.warn({ err: discardErr, uploadId }, "Part cleanup after failed create");
        });
        throw err;
      }
    });

    log.info({ uploadId, sessionId, filename, size, chunkSize }, "Upload session created");

    return {
      uploadId,
      sessionId,
      filename,
      chunkSize,
      maxParallel: chunk.maxParallel,
      expiresAt: session.expiresAt,
    };
  }

  async acceptRange(
    uploadId: string,
    range: ByteRangeRequest,
    body: Readable
  ): Promise<AcceptRangeResult> {
    const { store, log } = this.deps;
    const { start, end } = range;

    let session: UploadSession;
    try {
      session = await this.requireSession(uploadId);

      if (range.total !== undefined && range.total !== session.sizeBytes) {
        throw uploadConflict(
          "SIZE_MISMATCH",
          `Size mismatch: declared ${session.sizeBytes}, got ${range.total}`
        );
      }

      if (!isValidRange([start, end], session.sizeBytes)) {
        throw rangeError(
          "RANGE_OUT_OF_BOUNDS",
          `Range ${start}-${end} is outside 0-${session.sizeBytes - 1}`
        );
      }
    } catch (err) {
      body.resume();
      throw err;
    }

    // Retries of an already stored range are acknowledged without rewriting.
    if (isRangeCovered(session.receivedRanges, start, end)) {
      await finished(body.resume());
      return {
        bytesReceived: session.bytesReceived,
        progress: progressOf(session.bytesReceived, session.sizeBytes),
        duplicate: true,
      };
    }

    if (session.state !== "receiving" || this.inflight.isSealed(uploadId)) {
      body.resume();
      throw session.state === "completing" || this.inflight.isSealed(uploadId)
        ? uploadConflict(
            "UPLOAD_FINALIZATION_IN_PROGRESS",
            "Upload is currently finalizing",
            true
          )
        : uploadConflict("UPLOAD_NOT_ACTIVE", `Upload is ${session.state}`);
    }

    const expectedLength = end - start + 1;

    try {
      await this.inflight.track(
        uploadId,
        store.writeAt(uploadId, start, body, expectedLength)
      );
    } catch (err) {
      if (err instanceof ChunkWriteError) {
        if (err.reason === "too_large" || err.reason === "too_short") {
          throw rangeError("PAYLOAD_LENGTH_MISMATCH", err.message, 400);
        }
        if (err.reason === "source") {
          throw new UploadError("InvalidRequest", "CHUNK_STREAM_ERROR", "Failed to read chunk stream", 400, {
            retryable: true,
            cause: err,
          });
        }
      }

      const failed = await this.fail(uploadId, "Storage write failed");
      if (!failed) {
        // Storage was released by a cancel or expiry mid-write.
        throw uploadConflict("UPLOAD_NOT_ACTIVE", "Upload is no longer active");
      }

      log.error({ err, uploadId, start, end }, "Positional write failed");
      throw storageFailure("Storage write failed", err);
    }

    return this.locks.run(uploadId, async () => {
      const current = await this.requireSession(uploadId);

      if (isRangeCovered(current.receivedRanges, start, end)) {
        return {
          bytesReceived: current.bytesReceived,
          progress: progressOf(current.bytesReceived, current.sizeBytes),
          duplicate: true,
        };
      }

      // Cancelled, expired or failed while the bytes were in flight.
      if (isTerminal(current.state)) {
        throw uploadConflict("UPLOAD_NOT_ACTIVE", `Upload is ${current.state}`);
      }

      const now = this.now();
      current.receivedRanges = insertRange(current.receivedRanges, [start, end]);
      current.bytesReceived = coveredBytes(current.receivedRanges);
      current.updatedAt = now;
      current.expiresAt = now + this.deps.upload.sessionTtlMs;
      await this.deps.registry.save(current);

      const progress = progressOf(current.bytesReceived, current.sizeBytes);
      log.debug({ uploadId, start, end, progress }, "Range received");

      this.deps.events?.emit({
        type: "progress",
        uploadId,
        bytesReceived: current.bytesReceived,
        totalSize: current.sizeBytes,
        progress,
      });

      return {
        bytesReceived: current.bytesReceived,
        progress,
        duplicate: false,
      };
    });
  }

  async status(uploadId: string): Promise<UploadStatusSnapshot> {
    const session = await this.requireSession(uploadId);

    return {
      uploadId,
      filename: session.filename,
      state: session.state,
      bytesReceived: session.bytesReceived,
      totalSize: session.sizeBytes,
      chunkSize: session.chunkSize,
      progress: progressOf(session.bytesReceived, session.sizeBytes),
      receivedRanges: session.receivedRanges,
      isComplete: session.bytesReceived === session.sizeBytes,
      expiresAt: session.expiresAt,
      ...(session.error ? { error: session.error } : {}),
    };
  }

  async complete(uploadId: string): Promise<CompleteUploadResult> {
    const { registry, store, log } = this.deps;

    const result = await this.locks.run(uploadId, async () => {
      const session = await this.requireSession(uploadId);

      // Idempotent: a second complete returns the stored result.
      if (session.state === "completed") {
        return { result: completeResult(session), fresh: false };
      }

      if (session.state !== "receiving" && session.state !== "completing") {
        throw uploadConflict("UPLOAD_NOT_ACTIVE", `Upload is ${session.state}`);
      }

      try {
        session.state = "completing";
        session.updatedAt = this.now();
        await registry.save(session);

        await this.inflight.seal(uploadId);

        if (!isFullyCovered(session.receivedRanges, session.sizeBytes)) {
          session.state = "receiving";
          await registry.save(session);
          throw uploadIncomplete(
            session.bytesReceived,
            session.sizeBytes,
            computeMissingRanges(session.receivedRanges, session.sizeBytes)
          );
        }

        try {
          await store.finalize(uploadId, session.destinationPath);
        } catch (err) {
          log.error({ err, uploadId }, "Upload finalization failed");
          session.state = "failed";
          session.error = "Finalize failed";
          session.updatedAt = this.now();
          await registry.save(session);
          await this.discardQuietly(uploadId);
          this.deps.events?.emit({ type: "failed", uploadId, error: session.error });
          throw storageFailure("Failed to finalize upload", err);
        }

        const now = this.now();
        session.state = "completed";
        session.completedAt = now;
        session.updatedAt = now;
        await registry.save(session);

        return { result: completeResult(session), fresh: true };
      } finally {
        this.inflight.unseal(uploadId);
      }
    });

    if (result.fresh) {
      log.info(
        { uploadId, path: result.result.path, sizeBytes: result.result.sizeBytes },
        "Upload finalized"
      );

      this.deps.events?.emit({
        type: "completed",
        uploadId,
        path: result.result.path,
        sizeBytes: result.result.sizeBytes,
      });

      if (this.deps.onCompleted) {
        void this.deps.onCompleted(result.result).catch((err: unknown) => {
          log.error({ err, uploadId }, "Completion hand-off failed");
        });
      }
    }

    return result.result;
  }

  /**
   * Never a hard error for a terminal session; unknown ids are reported.
   */
  async cancel(uploadId: string): Promise<{ cancelled: boolean }> {
    const { registry, log } = this.deps;

    const cancelled = await this.locks.run(uploadId, async () => {
      const session = await this.requireSession(uploadId);
      if (isTerminal(session.state)) return false;

      session.state = "cancelled";
      session.updatedAt = this.now();
      await registry.save(session);
      return true;
    });

    if (cancelled) {
      await this.discardQuietly(uploadId);
      log.info({ uploadId }, "Upload cancelled");
      this.deps.events?.emit({ type: "cancelled", uploadId });
    }

    return { cancelled };
  }

  /**
   * Cancels every live upload owned by one browser/user session.
   */
  async cleanupSession(sessionId: string): Promise<number> {
    const sessions = await this.deps.registry.list();
    let count = 0;

    for (const s of sessions) {
      if (s.sessionId !== sessionId || isTerminal(s.state)) continue;
      const { cancelled } = await this.cancel(s.uploadId);
      if (cancelled) count++;
    }

    return count;
  }

  /**
   * Moves an idle session past its deadline to `expired` and drops its bytes.
   * Sessions in `completing` are left alone.
   */
  async expire(uploadId: string, now = this.now()): Promise<boolean> {
    const expired = await this.locks.run(uploadId, async () => {
      const session = await this.deps.registry.get(uploadId);
      if (!session || session.state !== "receiving" || session.expiresAt > now) {
        return false;
      }

      session.state = "expired";
      session.updatedAt = now;
      await this.deps.registry.save(session);
      return true;
    });

    if (expired) {
      await this.discardQuietly(uploadId);
      this.deps.events?.emit({ type: "expired", uploadId });
    }

    return expired;
  }

  private async requireSession(uploadId: string): Promise<UploadSession> {
    const session = await this.deps.registry.get(uploadId);
    if (!session) throw uploadNotFound(uploadId);
    return session;
  }

  private async fail(uploadId: string, message: string): Promise<boolean> {
    const failed = await this.locks.run(uploadId, async () => {
      const session = await this.deps.registry.get(uploadId);
      if (!session || isTerminal(session.state)) return false;

      session.state = "failed";
      session.error = message;
      session.updatedAt = this.now();
      await this.deps.registry.save(session);
      return true;
    });

    if (failed) {
      await this.discardQuietly(uploadId);
      this.deps.events?.emit({ type: "failed", uploadId, error: message });
    }

    return failed;
  }

  private async discardQuietly(uploadId: string) {
    try {
      await this.deps.store.discard(uploadId);
    } catch (err) {
      // GC reconcile picks up leftovers.
      this.deps.log.warn({ err, uploadId }, "Part discard failed");
    }
  }
}
