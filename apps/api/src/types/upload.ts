// src/types/upload.ts

import type { ByteRange } from "@rangeload/ranges";

export type UploadState =
  | "receiving"
  | "completing"
  | "completed"
  | "cancelled"
  | "failed"
  | "expired";

export const TERMINAL_STATES: ReadonlySet<UploadState> = new Set([
  "completed",
  "cancelled",
  "failed",
  "expired",
]);

export function isTerminal(state: UploadState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface UploadSession {
  uploadId: string;
  /** Correlation id of the browser/user session that owns the upload. */
  sessionId: string;
  filename: string;
  sizeBytes: number;
  chunkSize: number;
  receivedRanges: ByteRange[];
  bytesReceived: number;
  state: UploadState;
  destinationPath: string;
  createdAt: number;
  updatedAt: number;
  expiresAt: number;
  completedAt?: number;
  error?: string;
}

export interface InitializedUpload {
  uploadId: string;
  sessionId: string;
  filename: string;
  chunkSize: number;
  maxParallel: number;
  expiresAt: number;
}

export interface AcceptRangeResult {
  bytesReceived: number;
  progress: number;
  duplicate: boolean;
}

export interface UploadStatusSnapshot {
  uploadId: string;
  filename: string;
  state: UploadState;
  bytesReceived: number;
  totalSize: number;
  chunkSize: number;
  progress: number;
  receivedRanges: ByteRange[];
  isComplete: boolean;
  expiresAt: number;
  error?: string;
}

export interface CompleteUploadResult {
  uploadId: string;
  sessionId: string;
  filename: string;
  path: string;
  sizeBytes: number;
}
