// src/routes/events.routes.ts

import type { FastifyInstance } from "fastify";

import type { UploadCoordinator } from "../services/upload/upload.coordinator.js";
import { isTerminalEvent, type UploadEvent, type UploadEvents } from "../services/upload/upload.events.js";
import { isTerminal, type UploadStatusSnapshot } from "../types/upload.js";
import { sendApiError } from "../utils/apiError.js";
import { UploadError } from "../utils/uploadError.js";

export interface EventRoutesOptions {
  coordinator: UploadCoordinator;
  events: UploadEvents;
  heartbeatMs?: number;
}

function frame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Server-sent progress for one upload. The first frame is a status
 * snapshot; the stream ends after the first terminal event.
 */
export default async function eventRoutes(app: FastifyInstance, opts: EventRoutesOptions) {
  const { coordinator, events } = opts;
  const heartbeatMs = opts.heartbeatMs ?? 15_000;

  app.get<{ Params: { uploadId: string } }>("/upload/:uploadId/events", async (req, reply) => {
    const { uploadId } = req.params;
    const res = reply.raw;

    let closed = false;
    let heartbeat: NodeJS.Timeout | undefined;
    // Events seen while the status snapshot is being read.
    let backlog: UploadEvent[] | null = [];

    const close = () => {
      if (closed) return;
      closed = true;
      clearInterval(heartbeat);
      unsubscribe();
      res.end();
    };

    const write = (event: UploadEvent) => {
      switch (event.type) {
        case "progress":
          res.write(
            frame("progress", {
              bytes_received: event.bytesReceived,
              total_size: event.totalSize,
              progress: event.progress,
            })
          );
          break;
        case "completed":
          res.write(frame("completed", { path: event.path, size: event.sizeBytes }));
          break;
        case "failed":
          res.write(frame("failed", { error: event.error }));
          break;
        default:
          res.write(frame(event.type, {}));
      }

      if (isTerminalEvent(event)) close();
    };

    // Subscribe before the status read so a transition in between is not lost.
    const unsubscribe = events.subscribe(uploadId, (event) => {
      if (closed) return;
      if (backlog) {
        backlog.push(event);
        return;
      }
      write(event);
    });

    let status: UploadStatusSnapshot;
    try {
      status = await coordinator.status(uploadId);
    } catch (err) {
      unsubscribe();
      if (err instanceof UploadError) {
        return sendApiError(reply, err.statusCode, err.code, err.message);
      }
      throw err;
    }

    reply.hijack();

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    res.write(
      frame("status", {
        upload_id: status.uploadId,
        state: status.state,
        bytes_received: status.bytesReceived,
        total_size: status.totalSize,
        progress: status.progress,
      })
    );

    if (isTerminal(status.state)) {
      close();
      return;
    }

    heartbeat = setInterval(() => {
      res.write(": ping\n\n");
    }, heartbeatMs);
    heartbeat.unref();

    res.on("close", close);

    const missed = backlog;
    backlog = null;
    for (const event of missed) {
      if (closed) break;
      // Already reflected in the snapshot.
      if (event.type === "progress" && event.bytesReceived <= status.bytesReceived) continue;
      write(event);
    }
  });
}
