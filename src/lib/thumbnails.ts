import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { ThumbnailError, describeError } from "./errors";
import { streamBody, type HttpClient } from "./http";
import type { Logger } from "./logger";
import type { ModelRecord, ThumbnailAsset } from "./types";

const IMAGE_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".webp"]);
const VIDEO_EXTENSIONS = new Set([".mp4", ".webm"]);
const FALLBACK_EXTENSION = ".dat";

function urlExtension(url: string) {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  return path.extname(pathname).toLowerCase();
}

/**
 * A recognized image extension on the URL wins; otherwise the content type
 * decides (`.jpg` for images, `.mp4` unless the URL already says `.webm` for
 * video), and anything else is stored as `.dat`.
 */
export function pickExtension(url: string, contentType: string | null) {
  const ext = urlExtension(url);
  if (IMAGE_EXTENSIONS.has(ext)) return ext;

  const type = (contentType ?? "").toLowerCase();
  if (type.includes("image")) return ".jpg";
  if (type.includes("video")) return VIDEO_EXTENSIONS.has(ext) ? ext : ".mp4";
  return FALLBACK_EXTENSION;
}

export type ThumbnailSet = Pick<ModelRecord, "thumbnail" | "thumbnail_local" | "thumbnails_all" | "thumbnails_local">;

export interface ThumbnailAcquirerOptions {
  http: HttpClient;
  dir: string;
  timeoutMs: number;
  maxThumbnails: number;
  logger: Logger;
}

export class ThumbnailAcquirer {
  constructor(private readonly options: ThumbnailAcquirerOptions) {}

  private async download(assetUrl: string, idBase: string) {
    const response = await this.options.http.fetch(assetUrl, this.options.timeoutMs, "image/*,video/*,*/*;q=0.8");
    const body = response.body;
    if (!body) {
      throw new ThumbnailError("response has no body", { url: assetUrl });
    }
    const extension = pickExtension(assetUrl, response.headers.get("content-type"));
    const localPath = path.join(this.options.dir, `${idBase}${extension}`);
    let created = false;
    try {
      await fs.mkdir(this.options.dir, { recursive: true });
      created = true;
      await pipeline(
        Readable.from(streamBody(body, this.options.timeoutMs, assetUrl)),
        createWriteStream(localPath)
      );
      return localPath;
    } catch (error) {
      // streamBody cancels what it started reading; a body it never touched is cancelled here.
      if (!body.locked) await body.cancel();
      if (created) await fs.rm(localPath, { force: true });
      throw error;
    }
  }

  /** Never throws: a failed download keeps the remote URL with an empty local path. */
  async acquire(assetUrl: string, idBase: string): Promise<ThumbnailAsset> {
    if (!assetUrl) return { remote_url: "", local_path: "" };
    try {
      const localPath = await this.download(assetUrl, idBase);
      this.options.logger.log(`  Saved thumbnail -> ${path.basename(localPath)}`);
      return { remote_url: assetUrl, local_path: localPath };
    } catch (error) {
      const failure = error instanceof ThumbnailError ? error : new ThumbnailError(describeError(error), { url: assetUrl });
      this.options.logger.warn(`  ${failure.message}`);
      return { remote_url: assetUrl, local_path: "" };
    }
  }

  async acquireAll(urls: readonly string[], id: string): Promise<ThumbnailSet> {
    const remote: string[] = [];
    const local: string[] = [];
    let primary: ThumbnailAsset | undefined;

    const selected = urls.slice(0, this.options.maxThumbnails);
    for (const [index, url] of selected.entries()) {
      const asset = await this.acquire(url, `${id}_T${index + 1}`);
      if (asset.remote_url) remote.push(asset.remote_url);
      if (asset.local_path) {
        local.push(asset.local_path);
        primary ??= asset;
      }
    }

    return {
      thumbnail: primary?.remote_url ?? remote[0] ?? "",
      thumbnail_local: local[0] ?? "",
      thumbnails_all: remote,
      thumbnails_local: local,
    };
  }
}
