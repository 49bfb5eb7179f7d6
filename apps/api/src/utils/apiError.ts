// src/utils/apiError.ts

import type { FastifyReply } from "fastify";

import type { UploadError } from "./uploadError.js";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and services.
 */
export type ApiErrorCode =
  | "INVALID_REQUEST_BODY"
  | "INVALID_FILENAME"
  | "INVALID_FILE_TYPE"
  | "INVALID_FILE_SIZE"
  | "FILE_TOO_LARGE"
  | "INVALID_SESSION_ID"
  | "UPLOAD_CAPACITY_REACHED"
  | "UPLOAD_NOT_FOUND"
  | "UPLOAD_NOT_ACTIVE"
  | "UPLOAD_FINALIZATION_IN_PROGRESS"
  | "UPLOAD_INCOMPLETE"
  | "CONTENT_RANGE_REQUIRED"
  | "INVALID_CONTENT_RANGE"
  | "SIZE_MISMATCH"
  | "RANGE_OUT_OF_BOUNDS"
  | "PAYLOAD_LENGTH_MISMATCH"
  | "INVALID_CHUNK"
  | "CHUNK_STREAM_ERROR"
  | "STORAGE_FAILURE"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: string;
  code: ApiErrorCode;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: message,
    code,
    retryable: options?.retryable ?? false,
    ...(options?.details && { details: options.details }),
  };

  return reply.code(safeStatus).send(response);
}

export function sendUploadError(reply: FastifyReply, err: UploadError) {
  return sendApiError(reply, err.statusCode, err.code, err.message, {
    retryable: err.retryable,
    details: err.details,
  });
}
