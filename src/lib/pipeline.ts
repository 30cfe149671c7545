import { DEFAULT_CONFIG } from "./config";
import { PersistenceError, describeError } from "./errors";
import { sleep as defaultSleep, type Sleep } from "./http";
import { IdAllocator } from "./id-allocator";
import type { Logger } from "./logger";
import { saveRegistry } from "./registry";
import type { Resolver } from "./resolver";
import type { ThumbnailSet } from "./thumbnails";
import type { BatchSummary, LinkEntry, ModelRecord, ModelRegistry, ResolvedModel } from "./types";

export interface ThumbnailSource {
  acquireAll(urls: readonly string[], id: string): Promise<ThumbnailSet>;
}

export interface BatchOptions {
  resolve: Resolver;
  thumbnails: ThumbnailSource;
  logger: Logger;
  /** Registry destination. When omitted the batch only returns the records. */
  outputPath?: string;
  allocator?: IdAllocator;
  concurrency?: number;
  limit?: number;
  politeDelayRangeMs?: readonly [number, number];
  sleep?: Sleep;
  random?: () => number;
  save?: (filePath: string, registry: ModelRegistry) => Promise<void>;
}

interface BatchState {
  registry: ModelRegistry;
  success: number;
  failure: number;
  cursor: number;
}

/**
 * Resolves every link, downloads thumbnails under the allocated id and writes
 * the registry once at the end. A failing link is counted and skipped; a
 * failing save is logged and reported through `saved: false`.
 */
export async function runBatch(links: readonly LinkEntry[], options: BatchOptions): Promise<BatchSummary> {
  const {
    resolve,
    thumbnails,
    logger,
    outputPath,
    allocator = new IdAllocator(),
    politeDelayRangeMs = DEFAULT_CONFIG.politeDelayRangeMs,
    sleep = defaultSleep,
    random = Math.random,
    save = saveRegistry,
  } = options;

  const entries = options.limit && options.limit > 0 ? links.slice(0, options.limit) : links;
  if (entries.length < links.length) {
    logger.log(`Limiting to the first ${entries.length} of ${links.length} links`);
  }
  const state: BatchState = { registry: {}, success: 0, failure: 0, cursor: 0 };
  const total = entries.length;

  const processEntry = async (entry: LinkEntry, position: number) => {
    logger.log(`-> [${position}/${total}] ${entry.name}`);
    const started = Date.now();

    let resolved: ResolvedModel;
    try {
      resolved = await resolve(entry);
    } catch (error) {
      logger.warn(`  Failed: ${describeError(error)}`);
      state.failure += 1;
      return;
    }

    const id = allocator.next();
    const images = await thumbnails.acquireAll(resolved.imageUrls, id);
    const record: ModelRecord = { ...resolved.fields, ...images };
    state.registry[id] = record;
    state.success += 1;

    const seconds = ((Date.now() - started) / 1000).toFixed(1);
    logger.log(`  ${id} parsed in ${seconds}s: ${record.type} / ${record.base_model} / ${record.size}`);

    const [min, max] = politeDelayRangeMs;
    await sleep(min + random() * (max - min));
  };

  // Workers pull from a shared cursor; all registry writes happen on this
  // single event loop, so no two successes can claim the same id.
  const worker = async () => {
    while (state.cursor < entries.length) {
      const index = state.cursor;
      state.cursor += 1;
      await processEntry(entries[index], index + 1);
    }
  };

  logger.log(`\n=== Starting scrape: ${total} links ===\n`);
  const workers = Math.max(1, Math.min(options.concurrency ?? 1, total || 1));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  let saved = false;
  if (outputPath) {
    try {
      await save(outputPath, state.registry);
      saved = true;
      logger.log(`\nJSON saved: ${outputPath}`);
    } catch (error) {
      const failure = error instanceof PersistenceError ? error : new PersistenceError(describeError(error));
      logger.error(failure.message);
    }
  }

  logger.log("\n=== Summary ===");
  logger.log(`Successful: ${state.success}`);
  logger.log(`Failed: ${state.failure}`);
  logger.log(`Output: ${Object.keys(state.registry).length} entries\n`);

  return {
    success: state.success,
    failure: state.failure,
    total,
    registry: state.registry,
    saved,
  };
}
