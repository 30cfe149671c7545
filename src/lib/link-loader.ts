import fs from "node:fs/promises";
import { LoadError } from "./errors";
import type { LinkEntry } from "./types";

const UNNAMED = "unnamed";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function splitUrls(value: unknown): string[] {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean);
  }
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return [];
}

function isUsableUrl(url: string) {
  return !url.startsWith("#") && url.includes("http");
}

function nameFromUrl(url: string) {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const segments = pathname.split("/").filter(Boolean);
  return segments[segments.length - 1] ?? UNNAMED;
}

/**
 * Flattens a `name -> url | "url, url" | url[]` mapping into ordered link entries.
 * Values without a usable URL are skipped; a blank name derives one per URL.
 */
export function parseLinks(data: unknown): LinkEntry[] {
  if (!isPlainObject(data)) {
    throw new LoadError("links must be a JSON object of name -> url(s)");
  }

  const entries: LinkEntry[] = [];
  for (const [key, value] of Object.entries(data)) {
    const urls = splitUrls(value).filter(isUsableUrl);
    if (urls.length === 0) continue;

    const name = key.trim();
    for (const url of urls) {
      entries.push({ name: name || nameFromUrl(url), url });
    }
  }
  return entries;
}

export async function loadLinks(filePath: string): Promise<LinkEntry[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === "ENOENT") {
      throw new LoadError(`Link file not found: ${filePath}`);
    }
    throw new LoadError(`Cannot read ${filePath}: ${err.message}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new LoadError(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseLinks(data);
}
