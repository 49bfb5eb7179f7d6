// src/server.ts

import fs from "fs/promises";
import os from "os";
import path from "path";

import { buildApp } from "./app.js";
import { loadAnalysisConfig } from "./config/analysis.config.js";
import { loadServerConfig } from "./config/server.config.js";
import { loadUploadsConfig } from "./config/uploads.config.js";
import { initRedis } from "./state/client.js";
import { reconcileOrphanParts } from "./state/gc/upload.gc.reconcile.js";
import { startUploadGc, stopUploadGc } from "./state/gc/upload.gc.scheduler.js";
import { runUploadGc } from "./state/gc/upload.gc.worker.js";
import { MemorySessionRegistry } from "./state/memory.registry.js";
import { RedisSessionRegistry } from "./state/redis.registry.js";
import type { SessionRegistry } from "./state/session.registry.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

const serverConfig = loadServerConfig();
const uploadsConfig = loadUploadsConfig();
const analysisConfig = loadAnalysisConfig();

async function validateDir(name: string, dir: string) {
  const home = os.homedir();

  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`${name} is unsafe: ${dir}`);
  }

  await fs.mkdir(dir, { recursive: true });

  // Fail at boot rather than on the first chunk.
  const probe = path.join(dir, `.rangeload_write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(probe, "ok");
  await fs.unlink(probe);
}

let registry: SessionRegistry;

if (serverConfig.redis) {
  const redis = await initRedis(serverConfig.redis);
  registry = new RedisSessionRegistry(redis, {
    sessionTtlMs: uploadsConfig.upload.sessionTtlMs,
    retentionMs: uploadsConfig.upload.retentionMs,
  });
} else {
  registry = new MemorySessionRegistry();
}

const { app, coordinator, store } = await buildApp({
  uploads: uploadsConfig,
  analysis: analysisConfig,
  registry,
  logger: {
    level: serverConfig.logLevel,
    redact: {
      paths: ["req.headers.authorization"],
      remove: true,
    },
  },
});

if (!serverConfig.redis) {
  app.log.warn("UPSTASH_REDIS_REST_URL not set; sessions are kept in memory only");
}

try {
  await validateDir("UPLOAD_TMP_DIR", uploadsConfig.upload.tmpDir);
  await validateDir("UPLOAD_DIR", uploadsConfig.upload.uploadDir);
} catch (err) {
  app.log.error(err, "Upload directories are not usable");
  process.exit(1);
}

const gcDeps = {
  registry,
  store,
  coordinator,
  retentionMs: uploadsConfig.upload.retentionMs,
  graceMs: uploadsConfig.gc.graceMs,
};

const orphans = await reconcileOrphanParts(gcDeps, app.log);
if (orphans > 0) {
  app.log.info({ removed: orphans }, "Startup reconcile removed orphan parts");
}

startUploadGc(
  async () => {
    const report = await runUploadGc(gcDeps, app.log);
    const removed = await reconcileOrphanParts(gcDeps, app.log);
    if (report.expired + report.purged + removed > 0) {
      app.log.info({ ...report, orphansRemoved: removed }, "Upload GC sweep finished");
    }
  },
  uploadsConfig.gc.intervalMs,
  app.log
);

try {
  await app.listen({
    port: serverConfig.port,
    host: serverConfig.host,
  });

  app.log.info(
    { port: serverConfig.port, env: process.env.NODE_ENV ?? "development" },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await stopUploadGc();
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
