import type { FastifyBaseLogger } from "fastify";

import type { ChunkStore } from "../../store/index.js";
import type { SessionRegistry } from "../session.registry.js";
import { isTerminal } from "../../types/upload.js";

function isUuid(value: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(
    value
  );
}

/**
 * Drop part files that no live session owns: unknown to the registry
 * (lost on restart with the memory registry) or left behind by a
 * terminal session whose discard failed.
 */
export async function reconcileOrphanParts(
  deps: { registry: SessionRegistry; store: ChunkStore; graceMs: number; now?: () => number },
  log: FastifyBaseLogger
): Promise<number> {
  const now = deps.now?.() ?? Date.now();
  const parts = await deps.store.listParts();
  let removed = 0;

  for (const part of parts) {
    if (!isUuid(part.uploadId)) continue;

    const session = await deps.registry.get(part.uploadId);
    if (session && !isTerminal(session.state)) continue;

    // Respect grace period.
    if (now - part.mtimeMs < deps.graceMs) continue;

    log.warn(
      { uploadId: part.uploadId, state: session?.state ?? null },
      "Removing orphan part file"
    );

    await deps.store.discard(part.uploadId);
    removed++;
  }

  return removed;
}
