// src/utils/contentRange.ts

export type ParsedContentRange = {
  start: number;
  end: number;
  total: number;
};

export function parseContentRange(
  header: string | undefined
): ParsedContentRange | { error: "MISSING" | "INVALID" } {
  if (header === undefined || header.trim() === "") return { error: "MISSING" };

  const m = header.trim().match(/^bytes (\d+)-(\d+)\/(\d+)$/i);
  if (!m) return { error: "INVALID" };

  const start = Number(m[1]);
  const end = Number(m[2]);
  const total = Number(m[3]);

  if (![start, end, total].every(Number.isSafeInteger)) {
    return { error: "INVALID" };
  }

  return { start, end, total };
}
