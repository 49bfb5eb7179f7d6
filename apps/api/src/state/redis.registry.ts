// src/state/redis.registry.ts

import type { Redis } from "@upstash/redis";
import type { ByteRange } from "@rangeload/ranges";

import { isTerminal, type UploadSession, type UploadState } from "../types/upload.js";
import type { SessionRegistry } from "./session.registry.js";
import { uploadKeys } from "./keys.js";

const UPLOAD_STATES: readonly UploadState[] = [
  "receiving",
  "completing",
  "completed",
  "cancelled",
  "failed",
  "expired",
];

function isUploadState(value: string): value is UploadState {
  return UPLOAD_STATES.some((s) => s === value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

function parseRanges(raw: string | undefined): ByteRange[] {
  const parsed: unknown = JSON.parse(raw || "[]");
  if (!Array.isArray(parsed)) throw new Error("CORRUPT_UPLOAD_SESSION");

  return parsed.map((entry: unknown): ByteRange => {
    if (
      !Array.isArray(entry) ||
      entry.length !== 2 ||
      !Number.isSafeInteger(entry[0]) ||
      !Number.isSafeInteger(entry[1])
    ) {
      throw new Error("CORRUPT_UPLOAD_SESSION");
    }
    return [Number(entry[0]), Number(entry[1])];
  });
}

export function toHash(session: UploadSession): Record<string, string> {
  return {
    uploadId: session.uploadId,
    sessionId: session.sessionId,
    filename: session.filename,
    sizeBytes: String(session.sizeBytes),
    chunkSize: String(session.chunkSize),
    receivedRanges: JSON.stringify(session.receivedRanges),
    bytesReceived: String(session.bytesReceived),
    state: session.state,
    destinationPath: session.destinationPath,
    createdAt: String(session.createdAt),
    updatedAt: String(session.updatedAt),
    expiresAt: String(session.expiresAt),
    completedAt: session.completedAt === undefined ? "" : String(session.completedAt),
    error: session.error ?? "",
  };
}

export function fromHash(uploadId: string, data: Record<string, string>): UploadSession {
  const sizeBytes = Number(data.sizeBytes);
  const chunkSize = Number(data.chunkSize);
  const bytesReceived = Number(data.bytesReceived);
  const createdAt = Number(data.createdAt);
  const updatedAt = Number(data.updatedAt);
  const expiresAt = Number(data.expiresAt);
  const state = data.state ?? "";

  if (
    !Number.isSafeInteger(sizeBytes) ||
    !Number.isSafeInteger(chunkSize) ||
    !Number.isSafeInteger(bytesReceived) ||
    !Number.isFinite(createdAt) ||
    !Number.isFinite(updatedAt) ||
    !Number.isFinite(expiresAt) ||
    !isUploadState(state)
  ) {
    throw new Error("CORRUPT_UPLOAD_SESSION");
  }

  return {
    uploadId,
    sessionId: data.sessionId ?? "",
    filename: data.filename ?? "",
    sizeBytes,
    chunkSize,
    receivedRanges: parseRanges(data.receivedRanges),
    bytesReceived,
    state,
    destinationPath: data.destinationPath ?? "",
    createdAt,
    updatedAt,
    expiresAt,
    ...(data.completedAt ? { completedAt: Number(data.completedAt) } : {}),
    ...(data.error ? { error: data.error } : {}),
  };
}

/**
 * Session hashes in Upstash Redis so in-flight uploads survive an API restart.
 * Every write refreshes the key TTL to cover idle expiry plus retention.
 */
export class RedisSessionRegistry implements SessionRegistry {
  private readonly keyTtlSeconds: number;

  constructor(
    private readonly redis: Redis,
    options: { sessionTtlMs: number; retentionMs: number }
  ) {
    this.keyTtlSeconds = Math.ceil(
      (options.sessionTtlMs + options.retentionMs) / 1000
    );
  }

  async create(session: UploadSession): Promise<void> {
    const exists = await this.redis.exists(uploadKeys.session(session.uploadId));
    if (exists) {
      throw new Error("UPLOAD_ID_COLLISION");
    }
    await this.save(session);
  }

  async get(uploadId: string): Promise<UploadSession | null> {
    const data = await this.redis.hgetall<Record<string, string>>(
      uploadKeys.session(uploadId)
    );

    if (!data || Object.keys(data).length === 0) {
      return null;
    }

    return fromHash(uploadId, data);
  }

  async save(session: UploadSession): Promise<void> {
    const key = uploadKeys.session(session.uploadId);

    const results = await this.redis
      .multi()
      .hset(key, toHash(session))
      .expire(key, this.keyTtlSeconds)
      .sadd(uploadKeys.gcIndex(), session.uploadId)
      .exec();

    if (!results) {
      throw new Error("REDIS_TRANSACTION_FAILED");
    }
  }

  async delete(uploadId: string): Promise<void> {
    await this.redis
      .multi()
      .del(uploadKeys.session(uploadId))
      .srem(uploadKeys.gcIndex(), uploadId)
      .exec();
  }

  async list(): Promise<UploadSession[]> {
    const ids = await this.redis.smembers(uploadKeys.gcIndex());
    if (!ids.length) return [];

    const pipeline = this.redis.pipeline();
    for (const id of ids) {
      pipeline.hgetall(uploadKeys.session(id));
    }

    const res = await pipeline.exec();
    const sessions: UploadSession[] = [];
    const stale: string[] = [];

    res.forEach((data: unknown, i) => {
      const id = ids[i];
      if (!isStringRecord(data) || Object.keys(data).length === 0) {
        stale.push(id);
        return;
      }
      sessions.push(fromHash(id, data));
    });

    // Key TTL elapsed; drop the index entry too.
    if (stale.length) {
      await this.redis.srem(uploadKeys.gcIndex(), ...stale);
    }

    return sessions;
  }

  async countActive(): Promise<number> {
    const sessions = await this.list();
    return sessions.filter((s) => !isTerminal(s.state)).length;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }
}
