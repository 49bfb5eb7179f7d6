import fs from "fs/promises";
import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildApp } from "../src/app.js";
import { MemorySessionRegistry } from "../src/state/memory.registry.js";
import {
  exists,
  makeTempDirs,
  noAnalysis,
  patternBuffer,
  removeTempDirs,
  testUploadsConfig,
  type TempDirs,
} from "./helpers.js";

class DownRegistry extends MemorySessionRegistry {
  override async ping(): Promise<void> {
    throw new Error("connection refused");
  }
}

let dirs: TempDirs;
let app: FastifyInstance;

async function start(registry = new MemorySessionRegistry()) {
  const built = await buildApp({
    uploads: testUploadsConfig(dirs),
    analysis: noAnalysis,
    registry,
    logger: false,
    now: () => 1_000,
  });
  app = built.app;
}

async function init(body: Record<string, unknown> = { filename: "clip.mp4", size: 100 }) {
  const res = await app.inject({ method: "POST", url: "/upload/init", payload: body });
  expect(res.statusCode).toBe(200);
  const parsed: { upload_id: string; session_id: string } = res.json();
  return parsed;
}

function putRange(uploadId: string, contentRange: string | undefined, payload: Buffer) {
  return app.inject({
    method: "PUT",
    url: `/upload/${uploadId}`,
    headers: {
      "content-type": "application/octet-stream",
      ...(contentRange === undefined ? {} : { "content-range": contentRange }),
    },
    payload,
  });
}

function multipartBody(bytes: Buffer) {
  const boundary = "----rangeload-test-boundary";
  const payload = Buffer.concat([
    Buffer.from(
      `--${boundary}\r\n` +
        'Content-Disposition: form-data; name="chunk"; filename="blob"\r\n' +
        "Content-Type: application/octet-stream\r\n\r\n"
    ),
    bytes,
    Buffer.from(`\r\n--${boundary}--\r\n`),
  ]);
  return { payload, headers: { "content-type": `multipart/form-data; boundary=${boundary}` } };
}

beforeEach(async () => {
  dirs = await makeTempDirs();
});

afterEach(async () => {
  await app.close();
  await removeTempDirs(dirs);
});

describe("POST /upload/init", () => {
  beforeEach(() => start());

  it("creates an upload", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/upload/init",
      payload: { filename: "clip.mp4", size: 100, session_id: "browser_1" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      upload_id: expect.stringMatching(/^[0-9a-f-]{36}$/),
      filename: "clip.mp4",
      session_id: "browser_1",
      chunk_size: 100,
      max_parallel: 4,
      expires_at: 61_000,
    });
  });

  it.each([
    [{ filename: 5, size: 100 }, "INVALID_FILENAME"],
    [{ filename: "clip.mp4", size: "lots" }, "INVALID_FILE_SIZE"],
    [{ filename: "clip.mp4" }, "INVALID_FILE_SIZE"],
    [{ filename: "clip.mp4", size: 100, session_id: 7 }, "INVALID_SESSION_ID"],
    [{ filename: "clip.mp4", size: 100, chunk_size: "x" }, "INVALID_REQUEST_BODY"],
    [{ filename: "notes.txt", size: 100 }, "INVALID_FILE_TYPE"],
  ])("rejects %o with %s", async (payload, code) => {
    const res = await app.inject({ method: "POST", url: "/upload/init", payload });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code, retryable: false });
  });

  it("reports an oversized file as 413", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/upload/init",
      payload: { filename: "clip.mp4", size: 11 * 1024 * 1024 },
    });

    expect(res.statusCode).toBe(413);
    expect(res.json()).toEqual({
      error: "File too large. Max size: 10485760 bytes",
      code: "FILE_TOO_LARGE",
      retryable: false,
    });
  });

  it("maps malformed JSON to INVALID_REQUEST_BODY", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/upload/init",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: "INVALID_REQUEST_BODY", retryable: false });
  });
});

describe("PUT /upload/:uploadId", () => {
  beforeEach(() => start());

  it("acknowledges a range", async () => {
    const { upload_id } = await init();

    const res = await putRange(upload_id, "bytes 0-9/100", patternBuffer(10));

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ bytes_received: 10, progress: 10, duplicate: false });
  });

  it("requires Content-Range", async () => {
    const { upload_id } = await init();

    const res = await putRange(upload_id, undefined, patternBuffer(10));

    expect(res.statusCode).toBe(411);
    expect(res.json()).toEqual({
      error: "Content-Range header required",
      code: "CONTENT_RANGE_REQUIRED",
      retryable: false,
    });
  });

  it("rejects a malformed Content-Range", async () => {
    const { upload_id } = await init();

    const res = await putRange(upload_id, "bytes 0-9", patternBuffer(10));

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: "INVALID_CONTENT_RANGE" });
  });

  it("rejects a body whose length does not match the range", async () => {
    const { upload_id } = await init();

    const res = await putRange(upload_id, "bytes 0-9/100", patternBuffer(5));

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "Content-Length 5 does not match range length 10",
      code: "PAYLOAD_LENGTH_MISMATCH",
      retryable: false,
    });
  });

  it("rejects a total that differs from the declared size", async () => {
    const { upload_id } = await init();

    const res = await putRange(upload_id, "bytes 0-9/99", patternBuffer(10));

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ code: "SIZE_MISMATCH" });
  });

  it("rejects a range past the end of the file", async () => {
    const { upload_id } = await init();

    const res = await putRange(upload_id, "bytes 95-104/100", patternBuffer(10));

    expect(res.statusCode).toBe(416);
    expect(res.json()).toEqual({
      error: "Range 95-104 is outside 0-99",
      code: "RANGE_OUT_OF_BOUNDS",
      retryable: false,
    });
  });

  it("rejects a JSON or text body instead of writing it", async () => {
    const { upload_id } = await init();

    for (const [contentType, payload] of [
      ["application/json", '{"a":1}'],
      ["text/plain", "0123456789"],
    ] as const) {
      const res = await app.inject({
        method: "PUT",
        url: `/upload/${upload_id}`,
        headers: { "content-type": contentType, "content-range": "bytes 0-9/100" },
        payload,
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: "Range body must be raw bytes (application/octet-stream)",
        code: "INVALID_REQUEST_BODY",
        retryable: false,
      });
    }

    const status = await app.inject({ method: "GET", url: `/upload/${upload_id}/status` });
    expect(status.json()).toMatchObject({ bytes_received: 0, received_ranges: [] });
  });

  it("reports unknown and malformed ids as not found", async () => {
    const unknown = await putRange("00000000-0000-4000-8000-000000000000", "bytes 0-9/100", patternBuffer(10));
    const malformed = await putRange("not-an-id", "bytes 0-9/100", patternBuffer(10));

    for (const res of [unknown, malformed]) {
      expect(res.statusCode).toBe(404);
      expect(res.json()).toMatchObject({ error: "Invalid upload_id", code: "UPLOAD_NOT_FOUND", retryable: false });
    }
  });
});

describe("POST /upload/:uploadId/chunk/:index", () => {
  beforeEach(() => start());

  it("stores a chunk addressed by index", async () => {
    const { upload_id } = await init({ filename: "clip.mp4", size: 250 });
    const { payload, headers } = multipartBody(patternBuffer(250).subarray(100, 200));

    const res = await app.inject({ method: "POST", url: `/upload/${upload_id}/chunk/1`, headers, payload });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ chunk_index: 1, bytes_received: 100, progress: 40, duplicate: false });

    const status = await app.inject({ method: "GET", url: `/upload/${upload_id}/status` });
    expect(status.json()).toMatchObject({ received_ranges: [[100, 199]] });
  });

  it("accepts a short final chunk", async () => {
    const { upload_id } = await init({ filename: "clip.mp4", size: 250 });
    const { payload, headers } = multipartBody(patternBuffer(250).subarray(200));

    const res = await app.inject({ method: "POST", url: `/upload/${upload_id}/chunk/2`, headers, payload });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ chunk_index: 2, bytes_received: 50 });
  });

  it("rejects an index beyond the end of the file", async () => {
    const { upload_id } = await init({ filename: "clip.mp4", size: 250 });
    const { payload, headers } = multipartBody(patternBuffer(10));

    const res = await app.inject({ method: "POST", url: `/upload/${upload_id}/chunk/3`, headers, payload });

    expect(res.statusCode).toBe(416);
    expect(res.json()).toMatchObject({ code: "RANGE_OUT_OF_BOUNDS" });
  });

  it("rejects a chunk of the wrong length", async () => {
    const { upload_id } = await init({ filename: "clip.mp4", size: 250 });
    const { payload, headers } = multipartBody(patternBuffer(60));

    const res = await app.inject({ method: "POST", url: `/upload/${upload_id}/chunk/0`, headers, payload });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "Payload is 60 bytes, range expects 100",
      code: "PAYLOAD_LENGTH_MISMATCH",
      retryable: false,
    });
  });
});

describe("status, complete and cancel", () => {
  beforeEach(() => start());

  it("reports status", async () => {
    const { upload_id } = await init();
    await putRange(upload_id, "bytes 0-49/100", patternBuffer(50));

    const res = await app.inject({ method: "GET", url: `/upload/${upload_id}/status` });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      upload_id,
      filename: "clip.mp4",
      state: "receiving",
      bytes_received: 50,
      total_size: 100,
      chunk_size: 100,
      progress: 50,
      received_ranges: [[0, 49]],
      is_complete: false,
      expires_at: 61_000,
    });
  });

  it("lists missing ranges when completing too early", async () => {
    const { upload_id } = await init();
    await putRange(upload_id, "bytes 0-9/100", patternBuffer(10));

    const res = await app.inject({ method: "POST", url: `/upload/${upload_id}/complete` });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      error: "Upload incomplete: 10/100 bytes received",
      code: "UPLOAD_INCOMPLETE",
      retryable: true,
      details: { bytes_received: 10, total_size: 100, missing_ranges: [[10, 99]] },
    });
  });

  it("completes a fully received upload", async () => {
    const source = patternBuffer(100);
    const { upload_id, session_id } = await init();
    await putRange(upload_id, "bytes 0-99/100", source);

    const res = await app.inject({ method: "POST", url: `/upload/${upload_id}/complete` });

    expect(res.statusCode).toBe(200);
    const body: { filename: string; path: string; size: number; session_id: string } = res.json();
    expect(body).toMatchObject({ filename: "clip.mp4", size: 100, session_id });
    expect(await fs.readFile(body.path)).toEqual(source);
  });

  it("cancels an upload and is idempotent", async () => {
    const { upload_id } = await init();

    const first = await app.inject({ method: "DELETE", url: `/upload/${upload_id}/cancel` });
    const second = await app.inject({ method: "DELETE", url: `/upload/${upload_id}/cancel` });

    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({});
    expect(second.statusCode).toBe(200);

    const status = await app.inject({ method: "GET", url: `/upload/${upload_id}/status` });
    expect(status.json()).toMatchObject({ state: "cancelled" });
    expect(await exists(`${dirs.tmpDir}/${upload_id}.part`)).toBe(false);
  });

  it("cancels every upload of a session", async () => {
    await init({ filename: "a.mp4", size: 100, session_id: "sess_a" });
    await init({ filename: "b.mp4", size: 100, session_id: "sess_a" });

    const res = await app.inject({ method: "POST", url: "/upload/cleanup", payload: { session_id: "sess_a" } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ cancelled: 2 });
  });

  it("requires a session id for cleanup", async () => {
    const res = await app.inject({ method: "POST", url: "/upload/cleanup", payload: {} });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: "INVALID_SESSION_ID" });
  });
});

describe("GET /health", () => {
  it("reports ready when the registry answers", async () => {
    await start();

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: "UP",
      service: "rangeload-api-v1",
      ready: true,
      checks: { registry: { ok: true } },
    });
  });

  it("reports 503 when the registry is down", async () => {
    await start(new DownRegistry());

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({
      status: "DOWN",
      ready: false,
      checks: { registry: { ok: false, latencyMs: null } },
    });
  });
});
