import fs from "node:fs/promises";
import path from "node:path";
import { PersistenceError, RegistryValidationError, describeError } from "./errors";
import { ajv, formatErrors } from "./schema";
import type { ModelRecord, ModelRegistry } from "./types";

const optionalUri = { anyOf: [{ const: "" }, { type: "string", format: "uri" }] } as const;
const optionalDate = { anyOf: [{ const: "" }, { type: "string", format: "date" }] } as const;

export const recordSchema = {
  type: "object",
  additionalProperties: false,
  required: [
    "filename",
    "title",
    "type",
    "base_model",
    "base_model_type",
    "size",
    "thumbnail",
    "thumbnail_local",
    "thumbnails_all",
    "thumbnails_local",
    "model_link",
    "metadata",
  ],
  properties: {
    filename: { type: "string", minLength: 1 },
    title: { type: "string" },
    type: { type: "string" },
    base_model: { type: "string" },
    base_model_type: { type: "string" },
    size: { type: "string" },
    thumbnail: optionalUri,
    thumbnail_local: { type: "string" },
    thumbnails_all: { type: "array", maxItems: 5, items: { type: "string", minLength: 1 } },
    thumbnails_local: { type: "array", maxItems: 5, items: { type: "string", minLength: 1 } },
    model_link: optionalUri,
    metadata: {
      type: "object",
      additionalProperties: false,
      required: ["trained_words", "hashes", "description", "download_link", "published_on"],
      properties: {
        trained_words: { type: "string" },
        hashes: { type: "object", additionalProperties: { type: "string" } },
        description: { type: "string" },
        download_link: optionalUri,
        published_on: optionalDate,
      },
    },
  },
} as const;

const validateRecord = ajv.compile<ModelRecord>(recordSchema);

/** Returns one line per invalid record; empty when the registry is valid. */
export function validateRegistry(data: unknown): string[] {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return ["registry must be a JSON object of id -> record"];
  }
  const problems: string[] = [];
  for (const [id, record] of Object.entries(data)) {
    if (!validateRecord(record)) {
      problems.push(`${id}: ${formatErrors(validateRecord.errors)}`);
    }
  }
  return problems;
}

export function isRegistry(data: unknown): data is ModelRegistry {
  return validateRegistry(data).length === 0;
}

export function serializeRegistry(registry: ModelRegistry) {
  return `${JSON.stringify(registry, null, 2)}\n`;
}

export async function saveRegistry(filePath: string, registry: ModelRegistry): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, serializeRegistry(registry), "utf8");
  } catch (error) {
    throw new PersistenceError(`cannot write ${filePath}: ${describeError(error)}`, { path: filePath, cause: error });
  }
}

export async function loadRegistry(filePath: string): Promise<ModelRegistry> {
  const raw = await fs.readFile(filePath, "utf8");
  const data: unknown = JSON.parse(raw);
  if (!isRegistry(data)) {
    throw new RegistryValidationError(filePath, validateRegistry(data));
  }
  return data;
}
