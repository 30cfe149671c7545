import type { ScraperConfig } from "./config";
import { ResolutionError } from "./errors";
import { datePart, formatSizeKB, modelIdFromUrl, versionIdFromUrl } from "./format";
import type { HttpClient } from "./http";
import { ajv, formatErrors } from "./schema";
import type { ResolvedModel } from "./types";

export interface ResolverDeps {
  http: HttpClient;
  config: Pick<ScraperConfig, "siteBaseUrl" | "apiBaseUrl" | "requestTimeoutMs" | "maxThumbnails">;
}

interface ApiModel {
  modelVersions?: { id: number | string }[];
}

interface ApiFile {
  sizeKB?: number;
  downloadUrl?: string;
  hashes?: Record<string, string>;
}

interface ApiVersion {
  id?: number;
  modelId?: number;
  name?: string;
  baseModel?: string | null;
  baseModelType?: string | null;
  trainedWords?: string[];
  description?: string | null;
  createdAt?: string;
  model?: { name?: string; type?: string };
  files?: ApiFile[];
  images?: { url?: string | null }[];
}

const nullableString = { type: ["string", "null"] } as const;

const validateModel = ajv.compile<ApiModel>({
  type: "object",
  properties: {
    modelVersions: {
      type: "array",
      items: {
        type: "object",
        required: ["id"],
        properties: { id: { type: ["integer", "string"] } },
      },
    },
  },
});

const validateVersion = ajv.compile<ApiVersion>({
  type: "object",
  properties: {
    id: { type: "integer" },
    modelId: { type: "integer" },
    name: { type: "string" },
    baseModel: nullableString,
    baseModelType: nullableString,
    trainedWords: { type: "array", items: { type: "string" } },
    description: nullableString,
    createdAt: { type: "string" },
    model: {
      type: "object",
      properties: { name: { type: "string" }, type: { type: "string" } },
    },
    files: {
      type: "array",
      items: {
        type: "object",
        properties: {
          sizeKB: { type: "number" },
          downloadUrl: { type: "string" },
          hashes: { type: "object", additionalProperties: { type: "string" } },
        },
      },
    },
    images: {
      type: "array",
      items: { type: "object", properties: { url: nullableString } },
    },
  },
});

function trimTitle(value: string) {
  return value.replace(/^[\s-]+|[\s-]+$/g, "");
}

async function latestVersionId(modelId: string, deps: ResolverDeps) {
  const body = await deps.http.getJson(`${deps.config.apiBaseUrl}/models/${modelId}`, deps.config.requestTimeoutMs);
  if (!validateModel(body)) {
    throw new ResolutionError(`Unexpected model payload for ${modelId}: ${formatErrors(validateModel.errors)}`);
  }
  const first = body.modelVersions?.[0];
  if (!first) {
    throw new ResolutionError(`Model ${modelId} has no versions`);
  }
  return String(first.id);
}

/**
 * Resolves a model page URL through the public REST API: the version record is
 * the single source for every field. Links without `modelVersionId` use the
 * model's newest version.
 */
export async function resolveFromApi(name: string, url: string, deps: ResolverDeps): Promise<ResolvedModel> {
  const modelId = modelIdFromUrl(url);
  if (!modelId) {
    throw new ResolutionError(`No model ID found in URL: ${url}`);
  }
  const versionId = versionIdFromUrl(url) ?? (await latestVersionId(modelId, deps));

  const version = await deps.http.getJson(
    `${deps.config.apiBaseUrl}/model-versions/${versionId}`,
    deps.config.requestTimeoutMs
  );
  if (!validateVersion(version)) {
    throw new ResolutionError(`Unexpected version payload for ${versionId}: ${formatErrors(validateVersion.errors)}`);
  }

  const file = version.files?.[0] ?? {};
  const imageUrls = (version.images ?? [])
    .map((image) => image.url ?? "")
    .filter(Boolean)
    .slice(0, deps.config.maxThumbnails);

  return {
    fields: {
      filename: name,
      title: trimTitle(`${version.model?.name ?? ""} - ${version.name ?? ""}`),
      type: (version.model?.type ?? "").toLowerCase(),
      base_model: version.baseModel ?? "",
      base_model_type: version.baseModelType ?? "",
      size: formatSizeKB(file.sizeKB),
      model_link: `${deps.config.siteBaseUrl}/models/${version.modelId ?? modelId}`,
      metadata: {
        trained_words: (version.trainedWords ?? []).join(", "),
        hashes: { ...file.hashes },
        description: version.description ?? "",
        download_link: file.downloadUrl || url,
        published_on: datePart(version.createdAt),
      },
    },
    imageUrls,
  };
}
