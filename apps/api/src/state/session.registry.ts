// src/state/session.registry.ts

import type { UploadSession } from "../types/upload.js";

/**
 * Process-wide map from uploadId to session, owned by the server bootstrap.
 * Implementations return copies: callers mutate and `save` explicitly.
 */
export interface SessionRegistry {
  create(session: UploadSession): Promise<void>;
  get(uploadId: string): Promise<UploadSession | null>;
  save(session: UploadSession): Promise<void>;
  delete(uploadId: string): Promise<void>;
  list(): Promise<UploadSession[]>;
  countActive(): Promise<number>;
  ping(): Promise<void>;
}
