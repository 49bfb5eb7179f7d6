// src/app.ts

import Fastify, { type FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";

import type { AnalysisConfig } from "./config/analysis.config.js";
import type { UploadsConfig } from "./config/uploads.config.js";
import eventRoutes from "./routes/events.routes.js";
import healthRoute from "./routes/health.js";
import uploadRoutes from "./routes/uploads.routes.js";
import { AnalysisDispatcher } from "./services/analysis/analysis.dispatch.js";
import { UploadCoordinator } from "./services/upload/upload.coordinator.js";
import { UploadEvents } from "./services/upload/upload.events.js";
import type { SessionRegistry } from "./state/session.registry.js";
import { DiskChunkStore, type ChunkStore } from "./store/index.js";
import { sendApiError } from "./utils/apiError.js";

export interface BuildAppOptions {
  uploads: UploadsConfig;
  analysis: AnalysisConfig;
  registry: SessionRegistry;
  store?: ChunkStore;
  logger?: FastifyServerOptions["logger"];
  fetchFn?: typeof fetch;
  now?: () => number;
}

export async function buildApp(opts: BuildAppOptions) {
  const { uploads, registry } = opts;

  const app = Fastify({
    logger: opts.logger ?? {
      level: "info",
      redact: {
        paths: ["req.headers.authorization"],
        remove: true,
      },
    },
    // Range bodies are streamed; this only bounds JSON and multipart framing.
    bodyLimit: uploads.chunk.maxBytes + 1024 * 1024,
  });

  await app.register(multipart, {
    attachFieldsToBody: false,
    throwFileSizeLimit: false,
    limits: {
      // One chunk per request.
      fileSize: uploads.chunk.maxBytes,
      files: 1,
    },
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode =
      typeof err.statusCode === "number" &&
      Number.isInteger(err.statusCode) &&
      err.statusCode >= 400
        ? err.statusCode
        : 500;

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return statusCode < 500
      ? sendApiError(reply, statusCode, "INVALID_REQUEST_BODY", err.message)
      : sendApiError(reply, statusCode, "INTERNAL_ERROR", "Unexpected server error");
  });

  const store = opts.store ?? new DiskChunkStore(uploads.upload.tmpDir);
  const events = new UploadEvents((err) => {
    app.log.warn({ err }, "Upload event listener failed");
  });
  const dispatcher = new AnalysisDispatcher(opts.analysis, app.log, opts.fetchFn);

  const coordinator = new UploadCoordinator({
    registry,
    store,
    upload: uploads.upload,
    chunk: uploads.chunk,
    log: app.log,
    events,
    onCompleted: (result) => dispatcher.dispatch(result),
    now: opts.now,
  });

  await app.register(uploadRoutes, { coordinator });
  await app.register(eventRoutes, { coordinator, events });
  await app.register(healthRoute, { registry });

  app.addHook("onClose", async () => {
    await dispatcher.onIdle();
  });

  return { app, coordinator, events, store, dispatcher };
}
