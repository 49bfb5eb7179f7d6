/**
 * Range upload client
 *
 * - Size-tiered chunking with reproducible boundaries
 * - Bounded parallel uploads pulling from a shared chunk cursor
 * - Per-chunk retry with exponential backoff
 * - Resume from the server's received ranges
 *
 * @packageDocumentation
 */

export { RangeUploader } from "./uploader.js";
export { UploadApiClient } from "./api.client.js";
export { getOptimalChunkSize, planChunks, planRanges } from "./chunk.plan.js";
export { ProgressTracker } from "./progress.js";
export {
  UploadCancelledError,
  UploadClientError,
  isRetryableStatus,
  type UploadClientErrorKind,
} from "./errors.js";

export type {
  RangeUploaderConfig,
  UploadState,
  InitUploadRequest,
  InitUploadResponse,
  RangeAckResponse,
  UploadStatusResponse,
  CompleteUploadResponse,
  CleanupSessionResponse,
  HealthCheckResponse,
  UploadSource,
  ChunkSpec,
  UploadProgress,
  UploadOptions,
  ResumeOptions,
  UploadResult,
} from "./types.js";
