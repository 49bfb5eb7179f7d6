import { describe, expect, it } from "vitest";

import { MemorySessionRegistry } from "../src/state/memory.registry.js";
import { fromHash, toHash } from "../src/state/redis.registry.js";
import type { UploadSession } from "../src/types/upload.js";

function session(overrides: Partial<UploadSession> = {}): UploadSession {
  return {
    uploadId: "00000000-0000-4000-8000-000000000001",
    sessionId: "sess_1",
    filename: "clip.mp4",
    sizeBytes: 1000,
    chunkSize: 100,
    receivedRanges: [
      [0, 99],
      [200, 299],
    ],
    bytesReceived: 200,
    state: "receiving",
    destinationPath: "/data/uploads/sess_1_clip_0a1b2c3d.mp4",
    createdAt: 1000,
    updatedAt: 2000,
    expiresAt: 62_000,
    ...overrides,
  };
}

describe("MemorySessionRegistry", () => {
  it("returns copies so callers must save explicitly", async () => {
    const registry = new MemorySessionRegistry();
    await registry.create(session());

    const copy = await registry.get("00000000-0000-4000-8000-000000000001");
    copy?.receivedRanges.push([500, 599]);

    expect((await registry.get("00000000-0000-4000-8000-000000000001"))?.receivedRanges).toEqual([
      [0, 99],
      [200, 299],
    ]);
  });

  it("refuses a duplicate id", async () => {
    const registry = new MemorySessionRegistry();
    await registry.create(session());

    await expect(registry.create(session())).rejects.toThrow("UPLOAD_ID_COLLISION");
  });

  it("counts only non-terminal sessions as active", async () => {
    const registry = new MemorySessionRegistry();
    await registry.create(session({ uploadId: "a" }));
    await registry.create(session({ uploadId: "b", state: "completing" }));
    await registry.create(session({ uploadId: "c", state: "completed" }));
    await registry.create(session({ uploadId: "d", state: "expired" }));

    expect(await registry.countActive()).toBe(2);
    expect(await registry.list()).toHaveLength(4);

    await registry.delete("a");
    expect(await registry.get("a")).toBeNull();
    expect(await registry.countActive()).toBe(1);
  });
});

describe("redis session hash", () => {
  it("stores every field as a string", () => {
    expect(toHash(session({ state: "failed", error: "Finalize failed" }))).toEqual({
      uploadId: "00000000-0000-4000-8000-000000000001",
      sessionId: "sess_1",
      filename: "clip.mp4",
      sizeBytes: "1000",
      chunkSize: "100",
      receivedRanges: "[[0,99],[200,299]]",
      bytesReceived: "200",
      state: "failed",
      destinationPath: "/data/uploads/sess_1_clip_0a1b2c3d.mp4",
      createdAt: "1000",
      updatedAt: "2000",
      expiresAt: "62000",
      completedAt: "",
      error: "Finalize failed",
    });
  });

  it("reads back what it stored", () => {
    const completed = session({ state: "completed", completedAt: 3000 });

    expect(fromHash(completed.uploadId, toHash(completed))).toEqual(completed);
    expect(fromHash(completed.uploadId, toHash(session()))).toEqual(session());
  });

  it.each<[string, Record<string, string>]>([
    ["an unknown state", { state: "paused" }],
    ["a non-numeric size", { sizeBytes: "big" }],
    ["malformed ranges", { receivedRanges: "[[0]]" }],
  ])("rejects %s", (_label, patch) => {
    expect(() => fromHash("u", { ...toHash(session()), ...patch })).toThrow("CORRUPT_UPLOAD_SESSION");
  });
});
