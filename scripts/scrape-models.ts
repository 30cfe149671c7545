import { resolveConfig } from "../src/lib/config";
import { LoadError } from "../src/lib/errors";
import { HttpClient } from "../src/lib/http";
import { loadLinks } from "../src/lib/link-loader";
import { consoleLogger as logger } from "../src/lib/logger";
import { runBatch } from "../src/lib/pipeline";
import { createResolver } from "../src/lib/resolver";
import { ThumbnailAcquirer } from "../src/lib/thumbnails";

// Usage: npx tsx scripts/scrape-models.ts [links.json] [models.json] [thumbnails-dir]
//   [--limit=N] [--concurrency=N] [--min-interval=MS] [--no-page-fallback]
async function main() {
  const config = resolveConfig(process.argv.slice(2));
  logger.log(`Links file: ${config.linksPath}`);

  const links = await loadLinks(config.linksPath);
  if (links.length === 0) {
    logger.warn("No valid links found in file.");
    return;
  }

  const http = new HttpClient({
    logger,
    userAgent: config.userAgent,
    maxAttempts: config.maxAttempts,
    backoffRangeMs: config.backoffRangeMs,
    rateLimitCooldownMs: config.rateLimitCooldownMs,
    minRequestIntervalMs: config.minRequestIntervalMs,
  });

  const summary = await runBatch(links, {
    resolve: createResolver({ http, config, logger, pageFallback: config.pageFallback }),
    thumbnails: new ThumbnailAcquirer({
      http,
      dir: config.thumbnailDir,
      timeoutMs: config.thumbnailTimeoutMs,
      maxThumbnails: config.maxThumbnails,
      logger,
    }),
    logger,
    outputPath: config.outputPath,
    concurrency: config.concurrency,
    limit: config.limit,
    politeDelayRangeMs: config.politeDelayRangeMs,
  });

  if (!summary.saved) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  if (error instanceof LoadError) {
    logger.error(`Error loading link file: ${error.message}`);
  } else {
    logger.error(error);
  }
  process.exitCode = 1;
});
