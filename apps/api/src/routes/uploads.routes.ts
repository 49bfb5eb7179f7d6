// src/routes/uploads.routes.ts

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { Readable } from "stream";

import type { UploadCoordinator } from "../services/upload/upload.coordinator.js";
import type { AcceptRangeResult, UploadStatusSnapshot } from "../types/upload.js";
import { sendApiError, sendUploadError } from "../utils/apiError.js";
import { parseContentRange } from "../utils/contentRange.js";
import { UploadError } from "../utils/uploadError.js";

export interface UploadRoutesOptions {
  coordinator: UploadCoordinator;
}

type UploadParams = { uploadId: string };

function isUploadId(value: unknown): value is string {
  return typeof value === "string" && /^[0-9a-f-]{36}$/i.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalInteger(value: unknown): number | undefined | null {
  if (value === undefined || value === null) return undefined;
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof n === "number" && Number.isSafeInteger(n) ? n : null;
}

function rangeAck(result: AcceptRangeResult) {
  return {
    bytes_received: result.bytesReceived,
    progress: result.progress,
    duplicate: result.duplicate,
  };
}

/**
 * Unknown ids and other domain errors map to their HTTP status;
 * anything else goes to the app error handler.
 */
function handleError(req: FastifyRequest, reply: FastifyReply, err: unknown) {
  if (err instanceof UploadError) {
    if (err.statusCode >= 500) {
      req.log.error({ err }, "Upload request failed");
    }
    return sendUploadError(reply, err);
  }
  throw err;
}

export default async function uploadRoutes(
  app: FastifyInstance,
  opts: UploadRoutesOptions
) {
  const { coordinator } = opts;

  // Range bodies are raw bytes; hand the request stream straight through.
  app.addContentTypeParser("*", (_req, payload, done) => {
    done(null, payload);
  });

  app.post("/upload/init", async (req, reply) => {
    const body = req.body;

    if (!isRecord(body)) {
      return sendApiError(reply, 400, "INVALID_REQUEST_BODY", "Request body must be JSON");
    }

    const { filename, size, session_id: sessionId, chunk_size: chunkSize } = body;

    if (typeof filename !== "string" || filename.length > 512) {
      return sendApiError(reply, 400, "INVALID_FILENAME", "filename must be a string <= 512 chars");
    }

    const sizeNum = optionalInteger(size);
    if (sizeNum === undefined || sizeNum === null) {
      return sendApiError(reply, 400, "INVALID_FILE_SIZE", "size must be a positive integer");
    }

    if (sessionId !== undefined && typeof sessionId !== "string") {
      return sendApiError(reply, 400, "INVALID_SESSION_ID", "session_id must be a string");
    }

    const chunkSizeNum = optionalInteger(chunkSize);
    if (chunkSizeNum === null) {
      return sendApiError(reply, 400, "INVALID_REQUEST_BODY", "chunk_size must be an integer");
    }

    try {
      const upload = await coordinator.initialize({
        filename,
        size: sizeNum,
        sessionId,
        chunkSize: chunkSizeNum,
      });

      return reply.code(200).send({
        upload_id: upload.uploadId,
        filename: upload.filename,
        session_id: upload.sessionId,
        chunk_size: upload.chunkSize,
        max_parallel: upload.maxParallel,
        expires_at: upload.expiresAt,
      });
    } catch (err) {
      return handleError(req, reply, err);
    }
  });

  app.post<{ Body: unknown }>("/upload/cleanup", async (req, reply) => {
    const body = req.body;
    const sessionId = isRecord(body) ? body.session_id : undefined;

    if (typeof sessionId !== "string" || sessionId === "") {
      return sendApiError(reply, 400, "INVALID_SESSION_ID", "session_id is required");
    }

    const cancelled = await coordinator.cleanupSession(sessionId);
    req.log.info({ sessionId, cancelled }, "Session uploads cleaned up");
    return { cancelled };
  });

  app.put<{ Params: UploadParams }>("/upload/:uploadId", async (req, reply) => {
    const { uploadId } = req.params;

    // JSON and text bodies were already consumed by Fastify's own parsers.
    const raw = req.body;
    if (raw !== undefined && !(raw instanceof Readable)) {
      return sendApiError(
        reply,
        400,
        "INVALID_REQUEST_BODY",
        "Range body must be raw bytes (application/octet-stream)"
      );
    }
    const body = raw instanceof Readable ? raw : Readable.from([]);

    if (!isUploadId(uploadId)) {
      body.resume();
      return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid upload_id");
    }

    const parsed = parseContentRange(req.headers["content-range"]);
    if ("error" in parsed) {
      body.resume();
      return parsed.error === "MISSING"
        ? sendApiError(reply, 411, "CONTENT_RANGE_REQUIRED", "Content-Range header required")
        : sendApiError(reply, 400, "INVALID_CONTENT_RANGE", "Invalid Content-Range format");
    }

    // Reject a mismatched body before reading it.
    const declaredLength = req.headers["content-length"];
    if (
      declaredLength !== undefined &&
      parsed.start <= parsed.end &&
      Number(declaredLength) !== parsed.end - parsed.start + 1
    ) {
      body.resume();
      return sendApiError(
        reply,
        400,
        "PAYLOAD_LENGTH_MISMATCH",
        `Content-Length ${declaredLength} does not match range length ${parsed.end - parsed.start + 1}`
      );
    }

    try {
      const result = await coordinator.acceptRange(uploadId, parsed, body);
      return rangeAck(result);
    } catch (err) {
      return handleError(req, reply, err);
    }
  });

  // Index-addressed multipart variant: chunk `i` covers
  // [i * chunk_size, min((i + 1) * chunk_size, size) - 1].
  app.post<{ Params: UploadParams & { index: string } }>(
    "/upload/:uploadId/chunk/:index",
    async (req, reply) => {
      const { uploadId, index } = req.params;

      if (!isUploadId(uploadId)) {
        return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid upload_id");
      }

      const idx = Number(index);
      if (!Number.isSafeInteger(idx) || idx < 0) {
        return sendApiError(reply, 400, "INVALID_CHUNK", "Invalid chunk index");
      }

      let status: UploadStatusSnapshot;
      try {
        status = await coordinator.status(uploadId);
      } catch (err) {
        return handleError(req, reply, err);
      }

      const { chunkSize } = status;
      const start = idx * chunkSize;
      if (start >= status.totalSize) {
        return sendApiError(reply, 416, "RANGE_OUT_OF_BOUNDS", "Chunk index beyond end of file");
      }
      const end = Math.min(start + chunkSize, status.totalSize) - 1;

      let part;
      try {
        part = await req.file();
      } catch {
        return sendApiError(reply, 400, "CHUNK_STREAM_ERROR", "Failed to read chunk stream", {
          retryable: true,
        });
      }

      if (!part || part.type !== "file") {
        return sendApiError(reply, 400, "INVALID_CHUNK", "Multipart file field required");
      }

      try {
        const result = await coordinator.acceptRange(uploadId, { start, end }, part.file);
        return { chunk_index: idx, ...rangeAck(result) };
      } catch (err) {
        return handleError(req, reply, err);
      }
    }
  );

  app.get<{ Params: UploadParams }>("/upload/:uploadId/status", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isUploadId(uploadId)) {
      return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid upload_id");
    }

    try {
      const status = await coordinator.status(uploadId);

      return {
        upload_id: status.uploadId,
        filename: status.filename,
        state: status.state,
        bytes_received: status.bytesReceived,
        total_size: status.totalSize,
        chunk_size: status.chunkSize,
        progress: status.progress,
        received_ranges: status.receivedRanges,
        is_complete: status.isComplete,
        expires_at: status.expiresAt,
        ...(status.error ? { error: status.error } : {}),
      };
    } catch (err) {
      return handleError(req, reply, err);
    }
  });

  app.post<{ Params: UploadParams }>("/upload/:uploadId/complete", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isUploadId(uploadId)) {
      return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid upload_id");
    }

    try {
      const result = await coordinator.complete(uploadId);

      return reply.code(200).send({
        filename: result.filename,
        path: result.path,
        size: result.sizeBytes,
        session_id: result.sessionId,
      });
    } catch (err) {
      return handleError(req, reply, err);
    }
  });

  // Idempotent: cancelling a terminal upload is a 200 no-op.
  app.delete<{ Params: UploadParams }>("/upload/:uploadId/cancel", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isUploadId(uploadId)) {
      return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid upload_id");
    }

    try {
      await coordinator.cancel(uploadId);
      return reply.code(200).send({});
    } catch (err) {
      return handleError(req, reply, err);
    }
  });
}
