import { describe, expect, it } from "vitest";

import { loadAnalysisConfig } from "../src/config/analysis.config.js";
import { parseListEnv, parsePositiveIntEnv } from "../src/config/env.js";
import { loadServerConfig } from "../src/config/server.config.js";
import { loadUploadsConfig } from "../src/config/uploads.config.js";

const dirs = { UPLOAD_TMP_DIR: "/var/rangeload/tmp", UPLOAD_DIR: "/var/rangeload/uploads" };

describe("env helpers", () => {
  it("falls back when a variable is unset or empty", () => {
    expect(parsePositiveIntEnv({}, "N", 7)).toBe(7);
    expect(parsePositiveIntEnv({ N: "" }, "N", 7)).toBe(7);
    expect(parsePositiveIntEnv({ N: "42" }, "N", 7)).toBe(42);
  });

  it("rejects values that are not integers above the minimum", () => {
    expect(() => parsePositiveIntEnv({ N: "0" }, "N", 7)).toThrow("N must be an integer >= 1");
    expect(() => parsePositiveIntEnv({ N: "2.5" }, "N", 7)).toThrow("N must be an integer >= 1");
    expect(() => parsePositiveIntEnv({ N: "abc" }, "N", 7)).toThrow("N must be an integer >= 1");
  });

  it("splits comma separated lists", () => {
    expect(parseListEnv({ L: " mp4, .MOV ,," }, "L", [])).toEqual(["mp4", ".MOV"]);
    expect(parseListEnv({}, "L", ["x"])).toEqual(["x"]);
  });
});

describe("loadUploadsConfig", () => {
  it("applies defaults", () => {
    const config = loadUploadsConfig(dirs);

    expect(config.upload).toEqual({
      tmpDir: "/var/rangeload/tmp",
      uploadDir: "/var/rangeload/uploads",
      maxFileSizeBytes: 200 * 1024 * 1024 * 1024,
      maxActiveUploads: 100,
      sessionTtlMs: 6 * 60 * 60 * 1000,
      retentionMs: 24 * 60 * 60 * 1000,
      allowedExtensions: ["mp4", "avi", "mov", "webm", "mkv"],
    });
    expect(config.chunk).toEqual({
      minBytes: 256 * 1024,
      maxBytes: 64 * 1024 * 1024,
      defaultBytes: 16 * 1024 * 1024,
      maxParallel: 4,
    });
    expect(config.gc).toEqual({ intervalMs: 5 * 60 * 1000, graceMs: 15 * 60 * 1000 });
  });

  it("normalizes configured extensions", () => {
    const config = loadUploadsConfig({ ...dirs, UPLOAD_ALLOWED_EXTENSIONS: ".MP4,mkv" });

    expect(config.upload.allowedExtensions).toEqual(["mp4", "mkv"]);
  });

  it("requires absolute directories", () => {
    expect(() => loadUploadsConfig({ UPLOAD_DIR: "/x" })).toThrow("Missing required env: UPLOAD_TMP_DIR");
    expect(() => loadUploadsConfig({ ...dirs, UPLOAD_DIR: "uploads" })).toThrow(
      "UPLOAD_DIR must be an absolute path"
    );
  });

  it("keeps the default chunk size within bounds", () => {
    expect(() => loadUploadsConfig({ ...dirs, UPLOAD_CHUNK_BYTES: "1024" })).toThrow(
      "UPLOAD_CHUNK_BYTES must be between 262144 and 67108864"
    );
  });
});

describe("loadAnalysisConfig", () => {
  it("treats a blank webhook as unset", () => {
    expect(loadAnalysisConfig({ ANALYSIS_WEBHOOK_URL: "  " }).webhookUrl).toBeNull();
  });

  it("requires an http(s) webhook", () => {
    expect(() => loadAnalysisConfig({ ANALYSIS_WEBHOOK_URL: "ftp://pipeline" })).toThrow(
      "ANALYSIS_WEBHOOK_URL must start with http:// or https://"
    );
  });

  it("reads retry settings", () => {
    expect(
      loadAnalysisConfig({
        ANALYSIS_WEBHOOK_URL: "https://pipeline.test/hook",
        ANALYSIS_MAX_RETRIES: "5",
        ANALYSIS_RETRY_DELAY_MS: "10",
      })
    ).toMatchObject({ webhookUrl: "https://pipeline.test/hook", maxRetries: 5, baseRetryDelayMs: 10 });
  });
});

describe("loadServerConfig", () => {
  it("runs without Redis by default", () => {
    expect(loadServerConfig({ NODE_ENV: "production" })).toEqual({
      port: 3000,
      host: "0.0.0.0",
      logLevel: "info",
      redis: null,
    });
  });

  it("reads the Redis credentials together", () => {
    const config = loadServerConfig({
      UPSTASH_REDIS_REST_URL: "https://redis.test",
      UPSTASH_REDIS_REST_TOKEN: "test-token",
    });

    expect(config.redis).toEqual({ url: "https://redis.test", token: "test-token" });
    expect(config.logLevel).toBe("debug");
  });

  it("rejects half of the Redis credentials", () => {
    expect(() => loadServerConfig({ UPSTASH_REDIS_REST_URL: "https://redis.test" })).toThrow(
      "UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together"
    );
  });
});
