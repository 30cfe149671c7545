import { load, type Cheerio, type CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { ResolverDeps } from "./api-resolver";
import { ResolutionError } from "./errors";
import {
  datePart,
  dedupe,
  formatSizeKB,
  modelIdFromUrl,
  sanitizeWhitespace,
  toAbsoluteUrl,
  unescapeAmp,
} from "./format";
import type { PageFields, ResolvedModel } from "./types";

type JsonObject = Record<string, unknown>;

export interface ParsedPage {
  $: CheerioAPI;
  url: string;
  ld: JsonObject;
  modelVersion: JsonObject;
  model: JsonObject;
}

export type FieldRule = (page: ParsedPage) => string;

const IMAGE_URL = /\.(jpe?g|png|webp)(?:$|[?#])/i;
const MAX_BADGE_LENGTH = 40;
const MIN_DESCRIPTION_LENGTH = 50;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): unknown {
  return isObject(value) ? value[key] : undefined;
}

function objectAt(value: unknown, ...keys: string[]): JsonObject {
  const found = keys.reduce<unknown>((acc, key) => child(acc, key), value);
  return isObject(found) ? found : {};
}

function stringAt(value: unknown, key: string) {
  const found = child(value, key);
  return typeof found === "string" ? found.trim() : "";
}

function parseJsonScript($: CheerioAPI, selector: string): unknown {
  const raw = $(selector).first().html();
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export function parsePage(html: string, url: string): ParsedPage {
  const $ = load(html);
  const nextData = parseJsonScript($, "script#__NEXT_DATA__");
  const ldRaw = parseJsonScript($, 'script[type="application/ld+json"]');
  const ld = Array.isArray(ldRaw) ? ldRaw.find(isObject) : ldRaw;
  const pageProps = objectAt(nextData, "props", "pageProps");
  return {
    $,
    url,
    ld: isObject(ld) ? ld : {},
    modelVersion: objectAt(pageProps, "modelVersion"),
    model: objectAt(pageProps, "model"),
  };
}

/** Runs the rules in order and returns the first non-empty result. */
export function firstNonEmpty(page: ParsedPage, rules: readonly FieldRule[]): string {
  for (const rule of rules) {
    const value = rule(page).trim();
    if (value) return value;
  }
  return "";
}

// --- table rows ------------------------------------------------------------

function findRowCells(page: ParsedPage, matches: (label: string) => boolean) {
  const { $ } = page;
  for (const row of $("tr").toArray()) {
    const cells = $(row).find("td");
    if (cells.length < 2) continue;
    const label = cells.eq(0).find("p").first();
    if (label.length === 0) continue;
    if (matches(sanitizeWhitespace(label.text()))) return cells;
  }
  return undefined;
}

function cellValue(cells: Cheerio<Element>) {
  const valueCell = cells.eq(1);
  const p = valueCell.find("p").first();
  return sanitizeWhitespace(p.length > 0 ? p.text() : valueCell.text());
}

function rowValue(label: string | RegExp): FieldRule {
  return (page) => {
    const cells = findRowCells(page, (text) => (typeof label === "string" ? text === label : label.test(text)));
    return cells ? cellValue(cells) : "";
  };
}

function collectBadges($: CheerioAPI, cell: Cheerio<Element>) {
  const words: string[] = [];
  cell.find('div[class*="Badge-root"]').each((_, el) => {
    const text = sanitizeWhitespace($(el).text());
    if (text && text.length < MAX_BADGE_LENGTH) words.push(text);
  });
  cell.find("code, kbd").each((_, el) => {
    const text = $(el).text().trim();
    if (text && text.length < MAX_BADGE_LENGTH) words.push(text);
  });
  return dedupe(words).join(", ");
}

// --- rules -----------------------------------------------------------------

const titleRules: FieldRule[] = [
  ({ $ }) => sanitizeWhitespace($("h1").first().text()),
  ({ $ }) => $('meta[property="og:title"]').attr("content") ?? "",
];

const typeRules: FieldRule[] = [
  ({ model, modelVersion }) => stringAt(model, "type") || stringAt(modelVersion, "baseModelType"),
  rowValue("Type"),
];

const baseModelRules: FieldRule[] = [
  ({ modelVersion }) => stringAt(modelVersion, "baseModel"),
  rowValue(/\bBase\s*Model\b/i),
];

const publishedRules: FieldRule[] = [
  ({ ld }) => datePart(ld.datePublished),
  ({ $ }) => {
    const abbr = $("abbr[title]")
      .filter((_, el) => /\d{4}-\d{2}-\d{2}/.test($(el).attr("title") ?? ""))
      .first();
    return datePart(abbr.attr("title"));
  },
];

const activeVersionRule: FieldRule = ({ $ }) => {
  const button = $('button[data-variant="filled"]')
    .filter((_, el) => /mantine-(active|Button-root)/.test($(el).attr("class") ?? ""))
    .first();
  const text = sanitizeWhitespace(button.text());
  if (!text) return "";
  const tokens = text.split(" ");
  return tokens.length <= 3 ? text : tokens[tokens.length - 1];
};

function versionRules(title: string): FieldRule[] {
  return [
    ({ modelVersion }) => stringAt(modelVersion, "name"),
    activeVersionRule,
    () => /\bv[\d.]+|v\d+/i.exec(title)?.[0] ?? "",
  ];
}

const descriptionRules: FieldRule[] = [
  ({ modelVersion, model, ld }) => {
    const candidates: string[] = [];
    for (const source of [modelVersion, model, ld]) {
      for (const key of ["descriptionHtml", "description", "details"]) {
        const value = stringAt(source, key);
        if (value.length >= MIN_DESCRIPTION_LENGTH) candidates.push(value);
      }
    }
    return candidates.find((value) => value.includes("<") && value.includes(">")) ?? candidates[0] ?? "";
  },
  ({ $ }) => {
    const spoiler = $('div[class*="mantine-Spoiler-content"]').first();
    if (spoiler.length === 0) return "";
    const inner = spoiler.find('div[class*="RenderHtml_htmlRenderer"]').first();
    return $.html(inner.length > 0 ? inner : spoiler);
  },
  ({ $ }) => {
    const legacy = $('div[data-testid="model-description"]').first();
    return legacy.length > 0 ? $.html(legacy) : "";
  },
];

const aboutVersionRules: FieldRule[] = [
  ({ modelVersion }) =>
    ["description", "descriptionHtml", "notes", "changelog"]
      .map((key) => stringAt(modelVersion, key))
      .find(Boolean) ?? "",
  ({ $ }) => {
    const button = $("button")
      .filter((_, el) => /About\s+this\s+version/i.test($(el).text()))
      .first();
    if (button.length === 0) return "";
    const panel = button.nextAll('div[class*="Accordion-panel"]').first();
    if (panel.length === 0) return "";
    const spoiler = panel.find('div[class*="Spoiler-content"]').first();
    return $.html(spoiler.length > 0 ? spoiler : panel);
  },
  ({ $ }) => {
    const panel = $('div[class*="Accordion-panel"]').first();
    return panel.length > 0 ? $.html(panel) : "";
  },
];

const triggerWordRules: FieldRule[] = [
  ({ modelVersion }) => {
    const trained = modelVersion.trainedWords;
    if (!Array.isArray(trained)) return "";
    return trained
      .map((word) => String(word).trim())
      .filter(Boolean)
      .join(", ");
  },
  (page) => {
    const cells = findRowCells(page, (label) => label === "Trigger Words");
    return cells ? collectBadges(page.$, cells.eq(1)) : "";
  },
  // Unlabelled row directly below "Base Model".
  ({ $ }) => {
    const rows = $("tr").toArray();
    const index = rows.findIndex((row) => sanitizeWhitespace($(row).find("td").first().text()).includes("Base Model"));
    if (index < 0 || index + 1 >= rows.length) return "";
    const cells = $(rows[index + 1]).find("td");
    if (cells.length < 2 || sanitizeWhitespace(cells.eq(0).text())) return "";
    return collectBadges($, cells.eq(1));
  },
];

const sizeRules: FieldRule[] = [
  ({ modelVersion }) => {
    const files = modelVersion.files;
    return Array.isArray(files) ? formatSizeKB(child(files[0], "sizeKB")) : "";
  },
  rowValue("File Size"),
];

function mediaContainer($: CheerioAPI) {
  return $('div[class*="EdgeMedia_container"], div[class*="mantine-AspectRatio-root"]').first();
}

function absolute(page: ParsedPage, value: string | undefined) {
  return value ? toAbsoluteUrl(unescapeAmp(value), page.url) : "";
}

const thumbnailRules: FieldRule[] = [
  (page) => {
    const og = absolute(page, page.$('meta[property="og:image"]').attr("content"));
    // An og:image pointing at a non-image defers to the container's <img>, but still beats the poster.
    return IMAGE_URL.test(og) ? og : "";
  },
  (page) => absolute(page, mediaContainer(page.$).find('img[class*="EdgeImage_image"]').attr("src")),
  (page) => absolute(page, page.$('meta[property="og:image"]').attr("content")),
  (page) => absolute(page, mediaContainer(page.$).find('video[class*="EdgeMedia_responsive"]').attr("poster")),
  (page) => {
    const image = page.ld.image;
    if (typeof image === "string") return absolute(page, image);
    if (Array.isArray(image) && typeof image[0] === "string") return absolute(page, image[0]);
    return "";
  },
];

function extractVideoUrl(page: ParsedPage) {
  const { $ } = page;
  const video = mediaContainer($).find('video[class*="EdgeMedia_responsive"]').first();
  const sources = video
    .find("source")
    .toArray()
    .map((el) => ({ src: $(el).attr("src") ?? "", type: $(el).attr("type") ?? "" }))
    .filter((source) => source.src);
  const mp4 = sources.find((source) => source.type === "video/mp4" || /\.mp4(?:$|[?#])/i.test(source.src));
  return absolute(page, (mp4 ?? sources[0])?.src);
}

function normalizeType(value: string) {
  const lowered = value.trim().toLowerCase();
  if (lowered === "lora" || lowered === "loras") return "lora";
  if (lowered === "checkpoint" || lowered === "checkpoints") return "checkpoint";
  return lowered;
}

export function extractPageFields(html: string, url: string): PageFields {
  const page = parsePage(html, url);
  const title = firstNonEmpty(page, titleRules);

  return {
    title,
    type: normalizeType(firstNonEmpty(page, typeRules)),
    base_model: sanitizeWhitespace(firstNonEmpty(page, baseModelRules)),
    published_on: firstNonEmpty(page, publishedRules),
    version: firstNonEmpty(page, versionRules(title)),
    about_version: firstNonEmpty(page, aboutVersionRules).replace(/\n\s+/g, "\n"),
    description: firstNonEmpty(page, descriptionRules),
    trigger_words: firstNonEmpty(page, triggerWordRules).replace(/\s*,\s*/g, ", "),
    size: sanitizeWhitespace(firstNonEmpty(page, sizeRules)),
    thumbnail_url: firstNonEmpty(page, thumbnailRules),
    video_url: extractVideoUrl(page),
    download_link: url.trim(),
  };
}

/**
 * Scrapes the model page itself. Used when the API cannot resolve a link; the
 * markup carries no hashes or base-model type, so those stay empty.
 */
export async function resolveFromPage(name: string, url: string, deps: ResolverDeps): Promise<ResolvedModel> {
  const html = await deps.http.getText(url, deps.config.requestTimeoutMs);
  const fields = extractPageFields(html, url);
  if (!fields.title) {
    throw new ResolutionError(`No title found on page ${url}`);
  }

  const modelId = modelIdFromUrl(url);
  return {
    fields: {
      filename: name,
      title: fields.title,
      type: fields.type,
      base_model: fields.base_model,
      base_model_type: "",
      size: fields.size,
      model_link: modelId ? `${deps.config.siteBaseUrl}/models/${modelId}` : url,
      metadata: {
        trained_words: fields.trigger_words,
        hashes: {},
        description: fields.description,
        download_link: fields.download_link,
        published_on: fields.published_on,
      },
    },
    imageUrls: [fields.thumbnail_url, fields.video_url].filter(Boolean).slice(0, deps.config.maxThumbnails),
  };
}
