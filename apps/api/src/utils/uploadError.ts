// src/utils/uploadError.ts

import type { ByteRange } from "@rangeload/ranges";

import type { ApiErrorCode } from "./apiError.js";

export type UploadErrorKind =
  | "InvalidRequest"
  | "NotFound"
  | "RangeError"
  | "Incomplete"
  | "Conflict"
  | "StorageFailure";

export class UploadError extends Error {
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    readonly kind: UploadErrorKind,
    readonly code: ApiErrorCode,
    message: string,
    readonly statusCode: number,
    options?: {
      retryable?: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "UploadError";
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
  }
}

export function invalidRequest(
  code: ApiErrorCode,
  message: string,
  statusCode = 400,
  retryable = false
) {
  return new UploadError("InvalidRequest", code, message, statusCode, { retryable });
}

export function uploadNotFound(uploadId: string) {
  return new UploadError("NotFound", "UPLOAD_NOT_FOUND", "Invalid upload_id", 404, {
    details: { uploadId },
  });
}

export function rangeError(code: ApiErrorCode, message: string, statusCode = 416) {
  return new UploadError("RangeError", code, message, statusCode);
}

export function uploadIncomplete(
  bytesReceived: number,
  totalSize: number,
  missingRanges: ByteRange[]
) {
  return new UploadError(
    "Incomplete",
    "UPLOAD_INCOMPLETE",
    `Upload incomplete: ${bytesReceived}/${totalSize} bytes received`,
    409,
    {
      retryable: true,
      details: { bytes_received: bytesReceived, total_size: totalSize, missing_ranges: missingRanges },
    }
  );
}

export function uploadConflict(code: ApiErrorCode, message: string, retryable = false) {
  return new UploadError("Conflict", code, message, 409, { retryable });
}

export function storageFailure(message: string, cause: unknown) {
  return new UploadError("StorageFailure", "STORAGE_FAILURE", message, 500, { cause });
}
