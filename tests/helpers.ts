import { jest } from "@jest/globals";
import { HttpClient, type FetchLike } from "../src/lib/http";
import { silentLogger } from "../src/lib/logger";

export type Route = () => Response;

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function htmlResponse(html: string) {
  return new Response(html, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } });
}

/** Answers each URL from `routes`; anything else is a 404. */
export function routedFetch(routes: Record<string, Route>) {
  return jest.fn<FetchLike>(async (url) => {
    const route = routes[url];
    return route ? route() : new Response("not found", { status: 404 });
  });
}

/** A clock that only moves when the code under test sleeps. */
export function fakeClock() {
  let now = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
  };
}

export function singleAttemptClient(fetchImpl: FetchLike) {
  return new HttpClient({
    fetchImpl,
    logger: silentLogger,
    maxAttempts: 1,
    sleep: async () => undefined,
  });
}

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** A body that yields one chunk every `gapMs`, then closes. */
export function drip(chunks: readonly string[], gapMs: number, cancel?: (reason?: unknown) => void) {
  let index = 0;
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      await new Promise((done) => setTimeout(done, gapMs));
      if (index < chunks.length) {
        controller.enqueue(encoder.encode(chunks[index]));
        index += 1;
      } else {
        controller.close();
      }
    },
    cancel,
  });
}
