export function sanitizeWhitespace(value: string | undefined | null) {
  if (!value) return "";
  return value.replace(/\s+/g, " ").trim();
}

function round2(value: number) {
  return Math.round(value * 100) / 100;
}

/** `2048` -> `"2 MB"`, `3145728` -> `"3 GB"`, `500` -> `"500 KB"`. Empty for 0 or non-numbers. */
export function formatSizeKB(sizeKB: unknown): string {
  if (typeof sizeKB !== "number" || !Number.isFinite(sizeKB) || sizeKB <= 0) return "";
  if (sizeKB >= 1024 * 1024) return `${round2(sizeKB / 1024 / 1024)} GB`;
  if (sizeKB >= 1024) return `${round2(sizeKB / 1024)} MB`;
  return `${Math.trunc(sizeKB)} KB`;
}

/** The `YYYY-MM-DD` part of a date or datetime string, whatever separates the time. */
export function datePart(value: unknown) {
  if (typeof value !== "string") return "";
  return /\d{4}-\d{2}-\d{2}/.exec(value)?.[0] ?? "";
}

export function toAbsoluteUrl(relative: string | undefined, base: string) {
  if (!relative) return "";
  try {
    return new URL(relative, base).toString();
  } catch {
    return relative;
  }
}

export function unescapeAmp(url: string) {
  return url.replace(/&amp;/g, "&").trim();
}

export function dedupe(values: Iterable<string>) {
  return Array.from(new Set(values));
}

export function modelIdFromUrl(url: string) {
  return /\/models\/(\d+)/.exec(url)?.[1];
}

export function versionIdFromUrl(url: string) {
  return /[?&]modelVersionId=(\d+)/.exec(url)?.[1];
}
