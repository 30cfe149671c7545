import path from "node:path";
import { LoadError } from "./errors";

export interface ScraperConfig {
  linksPath: string;
  outputPath: string;
  thumbnailDir: string;
  siteBaseUrl: string;
  apiBaseUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  thumbnailTimeoutMs: number;
  maxAttempts: number;
  backoffRangeMs: readonly [number, number];
  rateLimitCooldownMs: number;
  politeDelayRangeMs: readonly [number, number];
  minRequestIntervalMs: number;
  maxThumbnails: number;
  concurrency: number;
  limit: number;
  pageFallback: boolean;
}

export const DEFAULT_CONFIG: ScraperConfig = {
  linksPath: "link.json",
  outputPath: path.join("scraped_data", "models.json"),
  thumbnailDir: path.join("scraped_data", "thumbnails"),
  siteBaseUrl: "https://civitai.com",
  apiBaseUrl: "https://civitai.com/api/v1",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  requestTimeoutMs: 15_000,
  thumbnailTimeoutMs: 8_000,
  maxAttempts: 3,
  backoffRangeMs: [800, 1800],
  rateLimitCooldownMs: 30_000,
  politeDelayRangeMs: [600, 1200],
  minRequestIntervalMs: 0,
  maxThumbnails: 5,
  concurrency: 1,
  limit: 0,
  pageFallback: true,
};

function parseCount(flag: string, raw: string, min: number) {
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value < min) {
    throw new LoadError(`${flag} expects an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Builds the run configuration from command-line arguments.
 *
 * Positional arguments fill `linksPath`, `outputPath` and `thumbnailDir` in that
 * order; relative paths resolve against `cwd`.
 */
export function resolveConfig(argv: readonly string[], cwd: string = process.cwd()): ScraperConfig {
  const config: ScraperConfig = { ...DEFAULT_CONFIG };
  const positional: string[] = [];

  for (const arg of argv) {
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const [flag, raw = ""] = arg.split("=", 2);
    switch (flag) {
      case "--limit":
        config.limit = parseCount(flag, raw, 0);
        break;
      case "--concurrency":
        config.concurrency = parseCount(flag, raw, 1);
        break;
      case "--min-interval":
        config.minRequestIntervalMs = parseCount(flag, raw, 0);
        break;
      case "--no-page-fallback":
        config.pageFallback = false;
        break;
      default:
        throw new LoadError(`Unknown option ${flag}`);
    }
  }

  const [linksPath, outputPath, thumbnailDir] = positional;
  config.linksPath = path.resolve(cwd, linksPath ?? config.linksPath);
  config.outputPath = path.resolve(cwd, outputPath ?? config.outputPath);
  config.thumbnailDir = path.resolve(cwd, thumbnailDir ?? config.thumbnailDir);
  return config;
}
