// src/config/analysis.config.ts

import { assertHttpUrl, parsePositiveIntEnv, type Env } from "./env.js";

export interface AnalysisConfig {
  /**
   * Pipeline endpoint that receives completed uploads.
   * Unset means hand-offs are only logged.
   */
  webhookUrl: string | null;
  timeoutMs: number;
  maxRetries: number;
  baseRetryDelayMs: number;

  /**
   * Max concurrent hand-off requests.
   */
  concurrency: number;

  /**
   * Max hand-offs per interval window.
   */
  intervalCap: number;

  /**
   * Interval window in ms.
   */
  intervalMs: number;
}

export function loadAnalysisConfig(env: Env = process.env): AnalysisConfig {
  const webhookUrl = env.ANALYSIS_WEBHOOK_URL?.trim() || null;
  if (webhookUrl) assertHttpUrl("ANALYSIS_WEBHOOK_URL", webhookUrl);

  return {
    webhookUrl,
    timeoutMs: parsePositiveIntEnv(env, "ANALYSIS_TIMEOUT_MS", 30_000),
    maxRetries: parsePositiveIntEnv(env, "ANALYSIS_MAX_RETRIES", 3),
    baseRetryDelayMs: parsePositiveIntEnv(env, "ANALYSIS_RETRY_DELAY_MS", 2000),
    concurrency: 3,
    intervalCap: 5,
    intervalMs: 1000,
  };
}
