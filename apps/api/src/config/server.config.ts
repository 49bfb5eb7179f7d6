// src/config/server.config.ts

import { parsePositiveIntEnv, type Env } from "./env.js";

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  redis: { url: string; token: string } | null;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const url = env.UPSTASH_REDIS_REST_URL;
  const token = env.UPSTASH_REDIS_REST_TOKEN;

  if (Boolean(url) !== Boolean(token)) {
    throw new Error(
      "UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together"
    );
  }

  return {
    port: parsePositiveIntEnv(env, "PORT", 3000),
    host: env.HOST ?? "0.0.0.0",
    logLevel:
      env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    redis: url && token ? { url, token } : null,
  };
}
