import iconv from "iconv-lite";
import { DEFAULT_CONFIG } from "./config";
import { FetchError, describeError } from "./errors";
import { consoleLogger, type Logger } from "./logger";
import type { FetchResult } from "./types";

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal; redirect: "follow" }
) => Promise<Response>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface HttpClientOptions {
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
  userAgent?: string;
  maxAttempts?: number;
  backoffRangeMs?: readonly [number, number];
  rateLimitCooldownMs?: number;
  minRequestIntervalMs?: number;
}

function hostOf(url: string) {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * Per-host request gate shared by every caller of one client. A rate-limit
 * cooldown registered here holds back all later requests to that host.
 */
export class HostGate {
  private readonly openAt = new Map<string, number>();

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number,
    private readonly sleep: Sleep
  ) {}

  async wait(host: string): Promise<void> {
    const remaining = (this.openAt.get(host) ?? 0) - this.now();
    if (remaining > 0) {
      // Reserve the slot before sleeping so concurrent waiters queue behind it.
      this.openAt.set(host, this.now() + remaining + this.minIntervalMs);
      await this.sleep(remaining);
      return;
    }
    this.openAt.set(host, this.now() + this.minIntervalMs);
  }

  /** Closes the host for `ms` without waiting; later `wait` calls absorb it. */
  block(host: string, ms: number): void {
    const until = this.now() + ms;
    this.openAt.set(host, Math.max(this.openAt.get(host) ?? 0, until));
  }

  async cooldown(host: string, ms: number): Promise<void> {
    this.block(host, ms);
    await this.sleep(ms);
  }
}

function classify(response: Response): FetchResult {
  if (response.status === 200) return { status: "success", response, httpStatus: 200 };
  if (response.status === 429) return { status: "rate_limited", httpStatus: 429 };
  if (response.status >= 400 && response.status < 500) return { status: "client_error", httpStatus: response.status };
  return { status: "server_error", httpStatus: response.status };
}

function isTimeout(error: unknown) {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function timeoutError(ms: number) {
  return Object.assign(new Error(`No response within ${ms}ms`), { name: "TimeoutError" });
}

function withDeadline<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Yields the chunks of a response body. `idleTimeoutMs` bounds the wait for
 * each chunk, not the whole transfer. A consumer that stops early, or a
 * stall, cancels the body so the connection is released.
 */
export async function* streamBody(body: ReadableStream<Uint8Array>, idleTimeoutMs: number, url: string) {
  const reader = body.getReader();
  let open = true;
  try {
    for (;;) {
      const result = await withDeadline(
        reader.read(),
        idleTimeoutMs,
        () => new FetchError({ url, kind: "timeout", attempts: 1, cause: timeoutError(idleTimeoutMs) })
      ).catch((error: unknown) => {
        // A failed read leaves the stream errored; only a stall still needs cancelling.
        open = error instanceof FetchError;
        throw error;
      });
      if (result.done) {
        open = false;
        return;
      }
      yield result.value;
    }
  } finally {
    if (open) await reader.cancel();
    reader.releaseLock();
  }
}

export function charsetOf(contentType: string | null) {
  const match = /charset\s*=\s*"?([\w.:-]+)"?/i.exec(contentType ?? "");
  return match ? match[1].toLowerCase() : "utf-8";
}

export function decodeBody(buffer: Buffer, contentType: string | null) {
  const charset = charsetOf(contentType);
  if (charset === "utf-8" || charset === "utf8" || !iconv.encodingExists(charset)) {
    return buffer.toString("utf8");
  }
  return iconv.decode(buffer, charset);
}

export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly maxAttempts: number;
  private readonly backoffRangeMs: readonly [number, number];
  private readonly rateLimitCooldownMs: number;
  private readonly gate: HostGate;

  constructor(options: HttpClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? consoleLogger;
    this.userAgent = options.userAgent ?? DEFAULT_CONFIG.userAgent;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_CONFIG.maxAttempts);
    this.backoffRangeMs = options.backoffRangeMs ?? DEFAULT_CONFIG.backoffRangeMs;
    this.rateLimitCooldownMs = options.rateLimitCooldownMs ?? DEFAULT_CONFIG.rateLimitCooldownMs;
    this.gate = new HostGate(
      options.minRequestIntervalMs ?? DEFAULT_CONFIG.minRequestIntervalMs,
      options.now ?? Date.now,
      this.sleep
    );
  }

  private backoffMs() {
    const [min, max] = this.backoffRangeMs;
    return min + this.random() * (max - min);
  }

  // The timeout covers the wait for response headers; bodies are bounded per chunk by streamBody.
  private async attempt(url: string, timeoutMs: number, accept: string): Promise<FetchResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(timeoutError(timeoutMs)), timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        headers: { "User-Agent": this.userAgent, Accept: accept },
        signal: controller.signal,
        redirect: "follow",
      });
      const result = classify(response);
      if (result.status !== "success") {
        await response.body?.cancel();
      }
      return result;
    } catch (error) {
      return { status: isTimeout(error) ? "timeout" : "network_error", error };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * GET with up to `maxAttempts` tries. Returns the 200 response with its body
   * unread; throws {@link FetchError} describing the last failed attempt.
   */
  async fetch(url: string, timeoutMs: number, accept = "*/*"): Promise<Response> {
    const host = hostOf(url);
    let last: FetchResult = { status: "network_error" };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      await this.gate.wait(host);
      last = await this.attempt(url, timeoutMs, accept);
      const final = attempt === this.maxAttempts;

      switch (last.status) {
        case "success":
          if (last.response) return last.response;
          break;
        case "rate_limited":
          this.logger.warn(`  Rate limited (429) on ${host}.${final ? "" : ` Pausing ${this.rateLimitCooldownMs / 1000}s...`}`);
          if (final) {
            this.gate.block(host, this.rateLimitCooldownMs);
          } else {
            await this.gate.cooldown(host, this.rateLimitCooldownMs);
          }
          break;
        case "timeout":
          this.logger.warn(`  Timeout after ${timeoutMs / 1000}s on ${url}`);
          if (!final) await this.sleep(this.backoffMs());
          break;
        case "network_error":
          this.logger.warn(`  Network error: ${describeError(last.error)}`);
          if (!final) await this.sleep(this.backoffMs());
          break;
        default:
          this.logger.warn(`  HTTP ${last.httpStatus} for ${url}`);
          if (!final) await this.sleep(this.backoffMs());
      }
    }

    throw new FetchError({
      url,
      kind: last.status === "success" ? "network_error" : last.status,
      attempts: this.maxAttempts,
      httpStatus: last.httpStatus,
      cause: last.error,
    });
  }

  private async readText(response: Response, url: string, timeoutMs: number) {
    const chunks: Uint8Array[] = [];
    if (response.body) {
      for await (const chunk of streamBody(response.body, timeoutMs, url)) {
        chunks.push(chunk);
      }
    }
    return decodeBody(Buffer.concat(chunks), response.headers.get("content-type"));
  }

  async getText(url: string, timeoutMs: number): Promise<string> {
    const response = await this.fetch(url, timeoutMs, "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8");
    return this.readText(response, url, timeoutMs);
  }

  async getJson(url: string, timeoutMs: number): Promise<unknown> {
    const response = await this.fetch(url, timeoutMs, "application/json");
    const text = await this.readText(response, url, timeoutMs);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new FetchError({ url, kind: "invalid_body", attempts: 1, httpStatus: 200, cause: error });
    }
  }
}
