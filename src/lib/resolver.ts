import { resolveFromApi, type ResolverDeps } from "./api-resolver";
import { ResolutionError, describeError } from "./errors";
import type { Logger } from "./logger";
import { resolveFromPage } from "./page-extractor";
import type { LinkEntry, ResolvedModel } from "./types";

export type Resolver = (entry: LinkEntry) => Promise<ResolvedModel>;

export interface ResolverOptions extends ResolverDeps {
  logger: Logger;
  pageFallback: boolean;
}

export function createResolver(options: ResolverOptions): Resolver {
  const { logger, pageFallback, ...deps } = options;

  return async ({ name, url }) => {
    let apiError: unknown;
    try {
      return await resolveFromApi(name, url, deps);
    } catch (error) {
      if (!pageFallback) {
        throw error instanceof ResolutionError ? error : new ResolutionError(describeError(error), { url, cause: error });
      }
      apiError = error;
    }

    logger.warn(`  API lookup failed (${describeError(apiError)}); scraping page instead.`);
    try {
      return await resolveFromPage(name, url, deps);
    } catch (pageError) {
      throw new ResolutionError(`${describeError(apiError)} | page fallback: ${describeError(pageError)}`, {
        url,
        apiError,
        pageError,
      });
    }
  };
}
