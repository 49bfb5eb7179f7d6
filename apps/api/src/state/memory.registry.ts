// src/state/memory.registry.ts

import { isTerminal, type UploadSession } from "../types/upload.js";
import type { SessionRegistry } from "./session.registry.js";

export class MemorySessionRegistry implements SessionRegistry {
  private readonly sessions = new Map<string, UploadSession>();

  async create(session: UploadSession): Promise<void> {
    if (this.sessions.has(session.uploadId)) {
      throw new Error("UPLOAD_ID_COLLISION");
    }
    this.sessions.set(session.uploadId, structuredClone(session));
  }

  async get(uploadId: string): Promise<UploadSession | null> {
    const session = this.sessions.get(uploadId);
    return session ? structuredClone(session) : null;
  }

  async save(session: UploadSession): Promise<void> {
    this.sessions.set(session.uploadId, structuredClone(session));
  }

  async delete(uploadId: string): Promise<void> {
    this.sessions.delete(uploadId);
  }

  async list(): Promise<UploadSession[]> {
    return [...this.sessions.values()].map((s) => structuredClone(s));
  }

  async countActive(): Promise<number> {
    let n = 0;
    for (const s of this.sessions.values()) {
      if (!isTerminal(s.state)) n++;
    }
    return n;
  }

  async ping(): Promise<void> {}
}
