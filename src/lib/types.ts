export interface LinkEntry {
  readonly name: string;
  readonly url: string;
}

export type FetchStatus =
  | "success"
  | "client_error"
  | "server_error"
  | "rate_limited"
  | "timeout"
  | "network_error";

export interface FetchResult {
  status: FetchStatus;
  response?: Response;
  httpStatus?: number;
  error?: unknown;
}

export interface ModelMetadata {
  trained_words: string;
  hashes: Record<string, string>;
  description: string;
  download_link: string;
  published_on: string;
}

export interface ModelRecord {
  filename: string;
  title: string;
  type: string;
  base_model: string;
  base_model_type: string;
  size: string;
  thumbnail: string;
  thumbnail_local: string;
  thumbnails_all: string[];
  thumbnails_local: string[];
  model_link: string;
  metadata: ModelMetadata;
}

export type ModelRegistry = Record<string, ModelRecord>;

export interface ThumbnailAsset {
  remote_url: string;
  local_path: string;
}

// Everything a resolver knows before an identifier exists. Thumbnails are
// attached afterwards because their filenames derive from the identifier.
export interface ResolvedModel {
  fields: Omit<ModelRecord, "thumbnail" | "thumbnail_local" | "thumbnails_all" | "thumbnails_local">;
  imageUrls: string[];
}

export interface PageFields {
  title: string;
  type: string;
  base_model: string;
  published_on: string;
  version: string;
  about_version: string;
  description: string;
  trigger_words: string;
  size: string;
  thumbnail_url: string;
  video_url: string;
  download_link: string;
}

export interface BatchSummary {
  success: number;
  failure: number;
  total: number;
  registry: ModelRegistry;
  saved: boolean;
}

export function emptyRecord(filename: string): ModelRecord {
  return {
    filename,
    title: "",
    type: "",
    base_model: "",
    base_model_type: "",
    size: "",
    thumbnail: "",
    thumbnail_local: "",
    thumbnails_all: [],
    thumbnails_local: [],
    model_link: "",
    metadata: {
      trained_words: "",
      hashes: {},
      description: "",
      download_link: "",
      published_on: "",
    },
  };
}
