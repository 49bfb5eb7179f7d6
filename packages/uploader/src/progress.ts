import type { UploadProgress } from "./types.js";

export class ProgressTracker {
  private bytesUploaded: number;
  private chunksUploaded = 0;
  private readonly startedAt: number;
  private lastReportAt: number | null = null;
  private lastReportBytes: number;

  constructor(
    private readonly totalBytes: number,
    private readonly totalChunks: number,
    initialBytes = 0,
    private readonly now: () => number = Date.now
  ) {
    this.bytesUploaded = initialBytes;
    this.lastReportBytes = initialBytes;
    this.startedAt = now();
  }

  record(chunkBytes: number): UploadProgress {
    const at = this.now();
    this.bytesUploaded += chunkBytes;
    this.chunksUploaded++;

    let bytesPerSecond = 0;
    if (this.lastReportAt !== null && at > this.lastReportAt) {
      bytesPerSecond =
        ((this.bytesUploaded - this.lastReportBytes) * 1000) / (at - this.lastReportAt);
    }

    this.lastReportAt = at;
    this.lastReportBytes = this.bytesUploaded;

    return {
      bytesUploaded: this.bytesUploaded,
      totalBytes: this.totalBytes,
      percent: this.totalBytes > 0 ? (this.bytesUploaded / this.totalBytes) * 100 : 100,
      bytesPerSecond,
      chunksUploaded: this.chunksUploaded,
      totalChunks: this.totalChunks,
      elapsedMs: at - this.startedAt,
    };
  }
}
