// src/state/gc/upload.gc.worker.ts

import type { FastifyBaseLogger } from "fastify";

import type { SessionRegistry } from "../session.registry.js";
import type { UploadCoordinator } from "../../services/upload/upload.coordinator.js";
import { isTerminal } from "../../types/upload.js";

export interface UploadGcDeps {
  registry: SessionRegistry;
  coordinator: UploadCoordinator;
  retentionMs: number;
  now?: () => number;
}

export interface UploadGcReport {
  expired: number;
  purged: number;
}

/**
 * One sweep over the registry:
 * - idle `receiving` sessions past `expiresAt` become `expired` (storage dropped)
 * - terminal sessions older than the retention window are forgotten
 *
 * `completing` sessions are never touched.
 */
export async function runUploadGc(
  deps: UploadGcDeps,
  log: FastifyBaseLogger
): Promise<UploadGcReport> {
  const now = deps.now?.() ?? Date.now();
  const report: UploadGcReport = { expired: 0, purged: 0 };

  const sessions = await deps.registry.list();
  if (sessions.length === 0) return report;

  for (const session of sessions) {
    const { uploadId, state } = session;

    if (state === "receiving") {
      if (session.expiresAt <= now && (await deps.coordinator.expire(uploadId, now))) {
        log.warn({ uploadId, expiresAt: session.expiresAt }, "GC expired idle upload");
        report.expired++;
      }
      continue;
    }

    if (isTerminal(state) && now - session.updatedAt >= deps.retentionMs) {
      await deps.registry.delete(uploadId);
      log.debug({ uploadId, state }, "GC purged upload record");
      report.purged++;
    }

    // Yield so a large backlog does not starve request handling.
    await new Promise((r) => setImmediate(r));
  }

  return report;
}
