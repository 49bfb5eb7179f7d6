export type UploadClientErrorKind =
  | "NetworkFailure"
  | "HttpError"
  | "InvalidResponse"
  | "InvalidSource"
  | "InvalidState";

const RETRYABLE_STATUSES = new Set([408, 429]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status) || status >= 500;
}

/**
 * Client error. `NetworkFailure` means the request never produced a
 * response; `HttpError` carries the server's status and error code.
 */
export class UploadClientError extends Error {
  readonly kind: UploadClientErrorKind;
  readonly status?: number;
  readonly code?: string;
  readonly retryable: boolean;
  readonly details?: unknown;

  constructor(
    message: string,
    options: {
      kind: UploadClientErrorKind;
      status?: number;
      code?: string;
      retryable?: boolean;
      details?: unknown;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = "UploadClientError";
    this.kind = options.kind;
    this.status = options.status;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }
}

export class UploadCancelledError extends Error {
  constructor(readonly uploadId: string | null) {
    super(uploadId ? `Upload ${uploadId} was cancelled` : "Upload was cancelled");
    this.name = "UploadCancelledError";
  }
}
