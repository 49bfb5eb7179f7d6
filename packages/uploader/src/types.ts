import type { ByteRange } from "@rangeload/ranges";

/**
 * Configuration options for the RangeUploader client
 */
export interface RangeUploaderConfig {
  /** Base URL of the upload API, without a trailing slash */
  baseUrl: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Chunks in flight at once (default: 4) */
  concurrency?: number;
  /** Attempts per chunk, first one included (default: 3) */
  maxRetries?: number;
  /** Backoff base; attempt n waits retryDelayMs * 2^(n-1) (default: 1000) */
  retryDelayMs?: number;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
}

export type UploadState =
  | "receiving"
  | "completing"
  | "completed"
  | "cancelled"
  | "failed"
  | "expired";

export interface InitUploadRequest {
  filename: string;
  size: number;
  sessionId?: string;
  chunkSize?: number;
}

export interface InitUploadResponse {
  upload_id: string;
  filename: string;
  session_id: string;
  /** Server-clamped chunk size; chunk boundaries follow it */
  chunk_size: number;
  max_parallel: number;
  expires_at: number;
}

export interface RangeAckResponse {
  bytes_received: number;
  progress: number;
  /** The range was already stored; nothing was written */
  duplicate: boolean;
}

export interface UploadStatusResponse {
  upload_id: string;
  filename: string;
  state: UploadState;
  bytes_received: number;
  total_size: number;
  chunk_size: number;
  progress: number;
  received_ranges: ByteRange[];
  is_complete: boolean;
  expires_at: number;
  error?: string;
}

export interface CompleteUploadResponse {
  filename: string;
  path: string;
  size: number;
  session_id: string;
}

export interface CleanupSessionResponse {
  cancelled: number;
}

export interface HealthCheckResponse {
  status: string;
  ready: boolean;
  [key: string]: unknown;
}

/**
 * Bytes to upload: a Blob (or File) in the browser, a Buffer or Uint8Array in Node.js
 */
export type UploadSource = Blob | Uint8Array;

export interface ChunkSpec {
  index: number;
  start: number;
  /** Inclusive */
  end: number;
}

export interface UploadProgress {
  bytesUploaded: number;
  totalBytes: number;
  percent: number;
  /** Throughput since the previous report; 0 on the first one */
  bytesPerSecond: number;
  chunksUploaded: number;
  totalChunks: number;
  elapsedMs: number;
}

export interface UploadOptions {
  /** Required when the source carries no name */
  filename?: string;
  /** Correlation id of the user/browser session */
  sessionId?: string;
  /** Proposed chunk size; defaults to the size-tiered policy */
  chunkSize?: number;
  /** Override default concurrency for this upload */
  concurrency?: number;
  onProgress?: (progress: UploadProgress) => void;
  /** Called when a chunk attempt fails and will be retried */
  onChunkError?: (chunk: ChunkSpec, error: Error, attempt: number) => void;
  /** Called with the upload id as soon as the session exists */
  onInitialized?: (uploadId: string) => void;
}

export type ResumeOptions = Omit<UploadOptions, "filename" | "sessionId" | "chunkSize" | "onInitialized">;

export interface UploadResult {
  uploadId: string;
  sessionId: string;
  filename: string;
  path: string;
  size: number;
  durationMs: number;
}
