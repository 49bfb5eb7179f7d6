// src/state/client.ts

import { Redis } from "@upstash/redis";

let redis: Redis | null = null;

export async function initRedis(config: { url: string; token: string }): Promise<Redis> {
  if (redis) return redis;

  const client = new Redis({
    url: config.url,
    token: config.token,
    // Session hashes are parsed explicitly; keep values as stored strings.
    automaticDeserialization: false,
    retry: {
      retries: 3,
      backoff: (attempt) => Math.min(100 * 2 ** attempt, 1000),
    },
  });

  await client.ping();

  redis = client;
  return redis;
}
