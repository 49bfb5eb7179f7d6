import { computeMissingRanges } from "@rangeload/ranges";

import { UploadApiClient } from "./api.client.js";
import { getOptimalChunkSize, planChunks, planRanges } from "./chunk.plan.js";
import { UploadCancelledError, UploadClientError } from "./errors.js";
import { ProgressTracker } from "./progress.js";
import type {
  ChunkSpec,
  RangeUploaderConfig,
  ResumeOptions,
  UploadOptions,
  UploadResult,
  UploadSource,
} from "./types.js";

const DEFAULT_CONFIG = {
  timeout: 30_000,
  concurrency: 4,
  maxRetries: 3,
  retryDelayMs: 1000,
} as const;

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function sourceSize(source: UploadSource): number {
  return source instanceof Blob ? source.size : source.byteLength;
}

function sourceName(source: UploadSource): string | undefined {
  return "name" in source && typeof source.name === "string" && source.name
    ? source.name
    : undefined;
}

/**
 * Bytes [start, end] of the source as a Blob. Node buffers are copied so the
 * Blob never aliases pooled or shared memory.
 */
function sliceSource(source: UploadSource, start: number, end: number): Blob {
  if (source instanceof Blob) {
    return source.slice(start, end + 1);
  }

  const view = source.subarray(start, end + 1);
  const copy = new ArrayBuffer(view.byteLength);
  new Uint8Array(copy).set(view);
  return new Blob([copy]);
}

interface ChunkRun {
  uploadId: string;
  source: UploadSource;
  chunks: ChunkSpec[];
  tracker: ProgressTracker;
  concurrency: number;
  options: ResumeOptions;
}

/**
 * Drives one upload at a time against the range upload API.
 *
 * @example
 * ```typescript
 * const uploader = new RangeUploader({ baseUrl: "http://localhost:3000" });
 *
 * const result = await uploader.upload(file, {
 *   onProgress: (p) => console.log(`${p.percent.toFixed(1)}%`),
 * });
 * ```
 */
export class RangeUploader {
  readonly api: UploadApiClient;

  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  private running = false;
  private cancelled = false;
  private currentUploadId: string | null = null;

  constructor(config: RangeUploaderConfig) {
    this.api = new UploadApiClient({
      baseUrl: config.baseUrl,
      timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
      fetch: config.fetch,
    });
    this.concurrency = config.concurrency ?? DEFAULT_CONFIG.concurrency;
    this.maxRetries = config.maxRetries ?? DEFAULT_CONFIG.maxRetries;
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_CONFIG.retryDelayMs;

    if (!Number.isSafeInteger(this.concurrency) || this.concurrency < 1) {
      throw new UploadClientError("concurrency must be a positive integer", { kind: "InvalidState" });
    }
    if (!Number.isSafeInteger(this.maxRetries) || this.maxRetries < 1) {
      throw new UploadClientError("maxRetries must be a positive integer", { kind: "InvalidState" });
    }
  }

  get uploadId(): string | null {
    return this.currentUploadId;
  }

  /**
   * init, every chunk through the worker pool, then complete.
   */
  async upload(source: UploadSource, options: UploadOptions = {}): Promise<UploadResult> {
    const startedAt = Date.now();
    const filename = options.filename ?? sourceName(source);
    if (!filename) {
      throw new UploadClientError("filename is required for unnamed sources", {
        kind: "InvalidSource",
      });
    }

    const size = sourceSize(source);

    return this.exclusive(async () => {
      const init = await this.api.init({
        filename,
        size,
        sessionId: options.sessionId,
        chunkSize: options.chunkSize ?? getOptimalChunkSize(size),
      });

      this.currentUploadId = init.upload_id;
      options.onInitialized?.(init.upload_id);

      // cancel() ran before the id was known.
      if (this.cancelled) {
        await this.api.cancel(init.upload_id);
        throw new UploadCancelledError(init.upload_id);
      }

      const chunks = planChunks(size, init.chunk_size);

      await this.runChunks({
        uploadId: init.upload_id,
        source,
        chunks,
        tracker: new ProgressTracker(size, chunks.length),
        // The server's advertised limit wins over a larger local setting.
        concurrency: Math.min(options.concurrency ?? this.concurrency, init.max_parallel),
        options,
      });

      const done = await this.api.complete(init.upload_id);

      return {
        uploadId: init.upload_id,
        sessionId: done.session_id,
        filename: done.filename,
        path: done.path,
        size: done.size,
        durationMs: Date.now() - startedAt,
      };
    });
  }

  /**
   * Uploads only the ranges the server is missing, then completes.
   * `source` must be the same bytes the upload was started with.
   */
  async resume(
    uploadId: string,
    source: UploadSource,
    options: ResumeOptions = {}
  ): Promise<UploadResult> {
    const startedAt = Date.now();

    return this.exclusive(async () => {
      this.currentUploadId = uploadId;

      const status = await this.api.status(uploadId);

      if (sourceSize(source) !== status.total_size) {
        throw new UploadClientError(
          `File size mismatch: expected ${status.total_size}, got ${sourceSize(source)}`,
          { kind: "InvalidSource" }
        );
      }

      if (status.state !== "receiving" && status.state !== "completing" && status.state !== "completed") {
        throw new UploadClientError(`Upload ${uploadId} is ${status.state}`, {
          kind: "InvalidState",
        });
      }

      if (status.state === "receiving") {
        const missing = computeMissingRanges(status.received_ranges, status.total_size);
        const chunks = planRanges(missing, status.chunk_size);

        await this.runChunks({
          uploadId,
          source,
          chunks,
          tracker: new ProgressTracker(status.total_size, chunks.length, status.bytes_received),
          concurrency: options.concurrency ?? this.concurrency,
          options,
        });
      }

      const done = await this.api.complete(uploadId);

      return {
        uploadId,
        sessionId: done.session_id,
        filename: done.filename,
        path: done.path,
        size: done.size,
        durationMs: Date.now() - startedAt,
      };
    });
  }

  /**
   * Stops claiming chunks and asks the server to drop the upload.
   * In-flight chunk requests are not awaited.
   */
  async cancel(): Promise<void> {
    if (!this.running) return;
    this.cancelled = true;

    const uploadId = this.currentUploadId;
    if (uploadId) {
      await this.api.cancel(uploadId);
    }
  }

  private async exclusive(task: () => Promise<UploadResult>): Promise<UploadResult> {
    if (this.running) {
      throw new UploadClientError("Upload already in progress", { kind: "InvalidState" });
    }

    this.running = true;
    this.cancelled = false;

    try {
      return await task();
    } finally {
      this.running = false;
      this.currentUploadId = null;
    }
  }

  /**
   * Pull-based pool: each worker claims the next index from a shared cursor
   * until the cursor passes the last chunk, a chunk fails, or the upload is
   * cancelled.
   */
  private async runChunks(run: ChunkRun): Promise<void> {
    const { chunks, tracker, options } = run;
    const failures: unknown[] = [];
    let cursor = 0;

    const worker = async () => {
      while (!this.cancelled && failures.length === 0) {
        const index = cursor++;
        if (index >= chunks.length) return;

        const chunk = chunks[index];

        try {
          await this.sendChunk(run, chunk);
        } catch (err) {
          failures.push(err);
          return;
        }

        options.onProgress?.(tracker.record(chunk.end - chunk.start + 1));
      }
    };

    const workers = Math.min(run.concurrency, chunks.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    if (this.cancelled) throw new UploadCancelledError(run.uploadId);
    if (failures.length > 0) throw failures[0];
  }

  private async sendChunk(run: ChunkRun, chunk: ChunkSpec): Promise<void> {
    const total = sourceSize(run.source);

    for (let attempt = 1; ; attempt++) {
      try {
        await this.api.sendRange(
          run.uploadId,
          chunk.start,
          chunk.end,
          total,
          sliceSource(run.source, chunk.start, chunk.end)
        );
        return;
      } catch (err) {
        if (
          !(err instanceof UploadClientError) ||
          !err.retryable ||
          attempt >= this.maxRetries ||
          this.cancelled
        ) {
          throw err;
        }

        run.options.onChunkError?.(chunk, err, attempt);
        await delay(this.retryDelayMs * 2 ** (attempt - 1));

        if (this.cancelled) throw new UploadCancelledError(run.uploadId);
      }
    }
  }
}
