// src/state/gc/upload.gc.scheduler.ts

import type { FastifyBaseLogger } from "fastify";

let timer: NodeJS.Timeout | null = null;
let running: Promise<void> | null = null;
let skippedTicks = 0;

export function startUploadGc(
  sweep: () => Promise<unknown>,
  intervalMs: number,
  log: FastifyBaseLogger
) {
  if (timer) return;

  log.info({ intervalMs }, "Upload GC started");

  timer = setInterval(() => {
    if (running) {
      skippedTicks++;
      return;
    }

    const startedAt = Date.now();

    running = sweep()
      .then(() => {
        const durationMs = Date.now() - startedAt;
        if (durationMs > intervalMs) {
          log.warn({ durationMs, intervalMs, skippedTicks }, "Upload GC sweep overran its interval");
        } else {
          log.debug({ durationMs }, "Upload GC sweep timed");
        }
      })
      .catch((err: unknown) => {
        log.error({ err, durationMs: Date.now() - startedAt }, "Upload GC failed");
      })
      .finally(() => {
        running = null;
        skippedTicks = 0;
      });
  }, intervalMs);

  timer.unref();
}

export async function stopUploadGc(): Promise<void> {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }

  if (running) {
    await running;
    running = null;
  }
  skippedTicks = 0;
}
