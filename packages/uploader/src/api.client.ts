import type { ByteRange } from "@rangeload/ranges";

import { UploadClientError, isRetryableStatus } from "./errors.js";
import type {
  CleanupSessionResponse,
  CompleteUploadResponse,
  HealthCheckResponse,
  InitUploadRequest,
  InitUploadResponse,
  RangeAckResponse,
  UploadState,
  UploadStatusResponse,
} from "./types.js";

const DEFAULT_TIMEOUT_MS = 30_000;

const UPLOAD_STATES: readonly UploadState[] = [
  "receiving",
  "completing",
  "completed",
  "cancelled",
  "failed",
  "expired",
];

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(what: string): UploadClientError {
  return new UploadClientError(`Malformed response: ${what}`, { kind: "InvalidResponse" });
}

function asJson(value: unknown): Json {
  if (!isJson(value)) throw invalid("expected a JSON object");
  return value;
}

function num(body: Json, key: string): number {
  const value = body[key];
  if (typeof value !== "number" || !Number.isFinite(value)) throw invalid(`${key} is not a number`);
  return value;
}

function str(body: Json, key: string): string {
  const value = body[key];
  if (typeof value !== "string") throw invalid(`${key} is not a string`);
  return value;
}

function bool(body: Json, key: string): boolean {
  const value = body[key];
  if (typeof value !== "boolean") throw invalid(`${key} is not a boolean`);
  return value;
}

function isUploadState(value: unknown): value is UploadState {
  return UPLOAD_STATES.some((state) => state === value);
}

function ranges(body: Json, key: string): ByteRange[] {
  const value = body[key];
  if (!Array.isArray(value)) throw invalid(`${key} is not an array`);

  return value.map((item: unknown): ByteRange => {
    if (
      !Array.isArray(item) ||
      item.length !== 2 ||
      typeof item[0] !== "number" ||
      typeof item[1] !== "number"
    ) {
      throw invalid(`${key} holds a malformed range`);
    }
    return [item[0], item[1]];
  });
}

async function readErrorBody(
  response: Response
): Promise<{ error?: string; code?: string; retryable?: boolean; details?: unknown }> {
  try {
    const body: unknown = await response.json();
    if (!isJson(body)) return {};
    return {
      error: typeof body.error === "string" ? body.error : undefined,
      code: typeof body.code === "string" ? body.code : undefined,
      retryable: typeof body.retryable === "boolean" ? body.retryable : undefined,
      details: body.details,
    };
  } catch {
    return { error: response.statusText };
  }
}

/**
 * Thin typed wrapper over the upload API. One method per route; no retries.
 */
export class UploadApiClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: { baseUrl: string; timeout?: number; fetch?: typeof fetch }) {
    if (!config.baseUrl) {
      throw new UploadClientError("baseUrl is required", { kind: "InvalidState" });
    }
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async init(request: InitUploadRequest): Promise<InitUploadResponse> {
    const body = asJson(
      await this.request("POST", "/upload/init", {
        json: {
          filename: request.filename,
          size: request.size,
          ...(request.sessionId !== undefined ? { session_id: request.sessionId } : {}),
          ...(request.chunkSize !== undefined ? { chunk_size: request.chunkSize } : {}),
        },
      })
    );

    return {
      upload_id: str(body, "upload_id"),
      filename: str(body, "filename"),
      session_id: str(body, "session_id"),
      chunk_size: num(body, "chunk_size"),
      max_parallel: num(body, "max_parallel"),
      expires_at: num(body, "expires_at"),
    };
  }

  /**
   * Sends bytes [start, end] of a `total`-byte file.
   */
  async sendRange(
    uploadId: string,
    start: number,
    end: number,
    total: number,
    data: Blob
  ): Promise<RangeAckResponse> {
    const body = asJson(
      await this.request("PUT", `/upload/${encodeURIComponent(uploadId)}`, {
        body: data,
        headers: {
          "Content-Type": "application/octet-stream",
          "Content-Range": `bytes ${start}-${end}/${total}`,
        },
      })
    );

    return {
      bytes_received: num(body, "bytes_received"),
      progress: num(body, "progress"),
      duplicate: bool(body, "duplicate"),
    };
  }

  async status(uploadId: string): Promise<UploadStatusResponse> {
    const body = asJson(
      await this.request("GET", `/upload/${encodeURIComponent(uploadId)}/status`)
    );

    const state = body.state;
    if (!isUploadState(state)) throw invalid("state is not a known upload state");

    return {
      upload_id: str(body, "upload_id"),
      filename: str(body, "filename"),
      state,
      bytes_received: num(body, "bytes_received"),
      total_size: num(body, "total_size"),
      chunk_size: num(body, "chunk_size"),
      progress: num(body, "progress"),
      received_ranges: ranges(body, "received_ranges"),
      is_complete: bool(body, "is_complete"),
      expires_at: num(body, "expires_at"),
      ...(typeof body.error === "string" ? { error: body.error } : {}),
    };
  }

  async complete(uploadId: string): Promise<CompleteUploadResponse> {
    const body = asJson(
      await this.request("POST", `/upload/${encodeURIComponent(uploadId)}/complete`)
    );

    return {
      filename: str(body, "filename"),
      path: str(body, "path"),
      size: num(body, "size"),
      session_id: str(body, "session_id"),
    };
  }

  async cancel(uploadId: string): Promise<void> {
    await this.request("DELETE", `/upload/${encodeURIComponent(uploadId)}/cancel`);
  }

  async cleanupSession(sessionId: string): Promise<CleanupSessionResponse> {
    const body = asJson(
      await this.request("POST", "/upload/cleanup", { json: { session_id: sessionId } })
    );
    return { cancelled: num(body, "cancelled") };
  }

  async health(): Promise<HealthCheckResponse> {
    const body = asJson(await this.request("GET", "/health"));
    return { ...body, status: str(body, "status"), ready: bool(body, "ready") };
  }

  private async request(
    method: string,
    path: string,
    init: { json?: unknown; body?: Blob; headers?: Record<string, string> } = {}
  ): Promise<unknown> {
    const headers: Record<string, string> = { ...init.headers };
    let body: Blob | string | undefined = init.body;

    if (init.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(init.json);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      let response: Response;
      try {
        response = await this.fetchFn(`${this.baseUrl}${path}`, {
          method,
          headers,
          body,
          signal: controller.signal,
        });
      } catch (err) {
        throw new UploadClientError(
          controller.signal.aborted
            ? `${method} ${path} timed out after ${this.timeout}ms`
            : `${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
          { kind: "NetworkFailure", retryable: true, cause: err }
        );
      }

      if (!response.ok) {
        const errorBody = await readErrorBody(response);
        throw new UploadClientError(
          errorBody.error || `Request failed: ${response.status} ${response.statusText}`,
          {
            kind: "HttpError",
            status: response.status,
            code: errorBody.code,
            retryable: errorBody.retryable === true || isRetryableStatus(response.status),
            details: errorBody.details,
          }
        );
      }

      try {
        const parsed: unknown = await response.json();
        return parsed;
      } catch (err) {
        throw new UploadClientError(`${method} ${path} returned invalid JSON`, {
          kind: "InvalidResponse",
          cause: err,
        });
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
