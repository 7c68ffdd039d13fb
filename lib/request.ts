import type { ImageProviderName } from "./config";
import { ValidationError } from "./errors";
import { isRecord } from "./http";
import {
  ARTICLE_LANGUAGES,
  ARTICLE_TONES,
  IMAGE_PROVIDERS,
  IMAGE_TONES,
  PROMOTION_STYLES,
  type ArticleLanguage,
  type ArticleTone,
  type GenerationRequest,
  type ImageTone,
  type PromotionStyle,
} from "./types";

export const MAX_SOURCE_URLS = 5;
export const MIN_SECTIONS = 1;
export const MAX_SECTIONS = 6;
export const DEFAULT_SECTIONS = 4;
export const DEFAULT_WORD_COUNT = 500;

export function pickOption<T extends string>(
  options: readonly T[],
  value: unknown,
  fallback: T
): T {
  if (typeof value !== "string") return fallback;
  const needle = value.trim().toLowerCase();
  return options.find((option) => option.toLowerCase() === needle) ?? fallback;
}

export function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function readTextList(value: unknown): string {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string").join("\n");
  }
  return readText(value);
}

/** Newline-separated when the text has a newline, comma-separated otherwise. */
export function parseKeywordList(text: string): string[] {
  const separator = text.includes("\n") ? /\n/ : /,/;
  const seen = new Set<string>();
  const keywords: string[] = [];
  for (const part of text.split(separator)) {
    const keyword = part.trim();
    const key = keyword.toLowerCase();
    if (!keyword || seen.has(key)) continue;
    seen.add(key);
    keywords.push(keyword);
  }
  return keywords;
}

export function parseUrlList(text: string): string[] {
  return text
    .split(/[\n,\s]+/)
    .map((part) => part.trim())
    .filter(Boolean);
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === "http:" || url.protocol === "https:") && !!url.hostname;
  } catch {
    return false;
  }
}

function clampSectionCount(value: unknown): number {
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(parsed)) return DEFAULT_SECTIONS;
  return Math.min(MAX_SECTIONS, Math.max(MIN_SECTIONS, Math.round(parsed)));
}

function readWordCount(value: unknown): number {
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(parsed) || parsed < 100) return DEFAULT_WORD_COUNT;
  return Math.min(5000, Math.round(parsed));
}

/**
 * Builds a GenerationRequest from an untyped payload (form post or JSON file).
 * Throws ValidationError before anything touches the network.
 */
export function normalizeGenerationRequest(raw: unknown): GenerationRequest {
  if (!isRecord(raw)) {
    throw new ValidationError("Request body must be a JSON object.");
  }

  const keywords = parseKeywordList(readTextList(raw.keywords));
  const sourceUrls = parseUrlList(readTextList(raw.sourceUrls));
  const issues: string[] = [];

  if (keywords.length === 0 && sourceUrls.length === 0) {
    issues.push("Enter at least one keyword or source URL.");
  }
  for (const url of sourceUrls) {
    if (!isHttpUrl(url)) issues.push(`Not a valid http(s) URL: ${url}`);
  }
  if (sourceUrls.length > MAX_SOURCE_URLS) {
    issues.push(`At most ${MAX_SOURCE_URLS} source URLs are supported.`);
  }
  if (issues.length > 0) {
    throw new ValidationError(issues[0], issues);
  }

  const promotion: Record<string, unknown> = isRecord(raw.promotion) ? raw.promotion : {};
  const language: ArticleLanguage = pickOption(ARTICLE_LANGUAGES, raw.language, "English");
  const tone: ArticleTone = pickOption(ARTICLE_TONES, raw.tone, "Professional");
  const imageTone: ImageTone = pickOption(IMAGE_TONES, raw.imageTone, "professional");
  const imageProvider: ImageProviderName = pickOption(
    IMAGE_PROVIDERS,
    raw.imageProvider,
    "openai"
  );
  const promotionStyle: PromotionStyle = pickOption(
    PROMOTION_STYLES,
    promotion.style,
    "none"
  );

  return {
    language,
    tone,
    keywords,
    sourceUrls,
    focus: readText(raw.focus),
    additionalContent: readText(raw.additionalContent),
    sectionCount: clampSectionCount(raw.sectionCount),
    wordCountTarget: readWordCount(raw.wordCountTarget),
    promotion: {
      name: readText(promotion.name) || "None",
      style: promotionStyle,
      customText: readText(promotion.customText),
    },
    imageTone,
    imageProvider,
    includeImages: raw.includeImages !== false,
    internalLinks: readText(raw.internalLinks),
    externalLinks: readText(raw.externalLinks),
  };
}

/** Custom promotion text wins over the catalogue entry; "None" means no promotion. */
export function resolvePromotionName(request: GenerationRequest): string | null {
  if (request.promotion.customText) return request.promotion.customText;
  const name = request.promotion.name.trim();
  if (!name || name.toLowerCase() === "none") return null;
  return name;
}
