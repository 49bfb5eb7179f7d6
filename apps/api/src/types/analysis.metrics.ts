// src/types/analysis.metrics.ts

import type { FastifyBaseLogger } from "fastify";

export type AnalysisDispatchOutcome =
  | "success"
  | "skipped"
  | "client_error"
  | "server_error"
  | "network_error"
  | "timeout"
  | "unknown_error";

export interface AnalysisDispatchMetric {
  uploadId: string;
  sizeBytes: number;
  attempt: number;
  durationMs: number;
  outcome: AnalysisDispatchOutcome;
  error?: string;
  httpStatus?: number;
  timestamp: number;
}

export function recordAnalysisDispatchMetric(
  log: FastifyBaseLogger,
  metric: AnalysisDispatchMetric
) {
  log.info({ metric }, "analysis.dispatch.metric");
}

export function extractDispatchHttpStatus(err: unknown): number | undefined {
  const msg = err instanceof Error ? err.message : String(err);
  const m = msg.match(/ANALYSIS_DISPATCH_FAILED:(\d{3})\b/);
  if (!m) return undefined;
  const status = Number(m[1]);
  return Number.isFinite(status) ? status : undefined;
}

export function classifyDispatchError(err: unknown): AnalysisDispatchOutcome {
  if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
    return "timeout";
  }

  const status = extractDispatchHttpStatus(err);
  if (status !== undefined) {
    if (status >= 400 && status <= 499) return "client_error";
    if (status >= 500 && status <= 599) return "server_error";
  }

  const msg = (err instanceof Error ? err.message : String(err)).toUpperCase();
  if (
    msg.includes("ECONN") ||
    msg.includes("ENOTFOUND") ||
    msg.includes("EAI_AGAIN") ||
    msg.includes("ETIMEDOUT") ||
    msg.includes("FETCH FAILED")
  )
    return "network_error";

  return "unknown_error";
}
