// src/services/analysis/analysis.dispatch.ts

import PQueue from "p-queue";
import type { FastifyBaseLogger } from "fastify";

import type { AnalysisConfig } from "../../config/analysis.config.js";
import type { CompleteUploadResult } from "../../types/upload.js";
import {
  classifyDispatchError,
  extractDispatchHttpStatus,
  recordAnalysisDispatchMetric,
} from "../../types/analysis.metrics.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/**
 * Hands finalized uploads to the analysis pipeline. Ownership of the file
 * moves with the hand-off; a failed dispatch never reverts the upload.
 */
export class AnalysisDispatcher {
  private readonly queue: PQueue;
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly config: AnalysisConfig,
    private readonly log: FastifyBaseLogger,
    fetchFn?: typeof fetch
  ) {
    this.fetchFn = fetchFn ?? globalThis.fetch.bind(globalThis);
    this.queue = new PQueue({
      concurrency: config.concurrency,
      intervalCap: config.intervalCap,
      interval: config.intervalMs,
      carryoverConcurrencyCount: true,
    });
  }

  async dispatch(upload: CompleteUploadResult): Promise<void> {
    const start = Date.now();
    const { webhookUrl } = this.config;

    if (!webhookUrl) {
      this.log.info(
        { uploadId: upload.uploadId, path: upload.path },
        "No analysis pipeline configured; upload left in place"
      );
      recordAnalysisDispatchMetric(this.log, {
        uploadId: upload.uploadId,
        sizeBytes: upload.sizeBytes,
        attempt: 0,
        durationMs: 0,
        outcome: "skipped",
        timestamp: Date.now(),
      });
      return;
    }

    let lastError: unknown;

    try {
      await this.queue.add(
        async () => {
          for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
            try {
              await this.postOnce(webhookUrl, upload);

              recordAnalysisDispatchMetric(this.log, {
                uploadId: upload.uploadId,
                sizeBytes: upload.sizeBytes,
                attempt,
                durationMs: Date.now() - start,
                outcome: "success",
                timestamp: Date.now(),
              });
              return;
            } catch (err) {
              lastError = err;
              const status = extractDispatchHttpStatus(err);
              // 4xx other than 408/429 will not improve on retry.
              if (status !== undefined && status < 500 && status !== 408 && status !== 429) break;
              if (attempt === this.config.maxRetries) break;
              await sleep(this.config.baseRetryDelayMs * attempt);
            }
          }

          throw lastError ?? new Error("ANALYSIS_RETRIES_EXHAUSTED");
        },
        { throwOnTimeout: true }
      );
    } catch (err) {
      recordAnalysisDispatchMetric(this.log, {
        uploadId: upload.uploadId,
        sizeBytes: upload.sizeBytes,
        attempt: this.config.maxRetries,
        durationMs: Date.now() - start,
        outcome: classifyDispatchError(err),
        error: err instanceof Error ? err.message : "unknown",
        httpStatus: extractDispatchHttpStatus(err),
        timestamp: Date.now(),
      });

      throw err;
    }
  }

  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  private async postOnce(url: string, upload: CompleteUploadResult) {
    const res = await this.fetchFn(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        upload_id: upload.uploadId,
        session_id: upload.sessionId,
        filename: upload.filename,
        path: upload.path,
        size: upload.sizeBytes,
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Error(`ANALYSIS_DISPATCH_FAILED:${res.status} ${text.slice(0, 200)}`);
    }
  }
}
