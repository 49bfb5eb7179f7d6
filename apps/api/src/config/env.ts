// src/config/env.ts

export type Env = Record<string, string | undefined>;

export function parsePositiveIntEnv(
  env: Env,
  name: string,
  fallback: number,
  min = 1
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

export function parseListEnv(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (!raw) return fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function assertHttpUrl(name: string, url: string) {
  if (!/^https?:\/\//.test(url)) {
    throw new Error(`${name} must start with http:// or https://`);
  }
}
