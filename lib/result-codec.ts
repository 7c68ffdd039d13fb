import { generateSlug } from "./article-parser";
import { ValidationError } from "./errors";
import { isRecord } from "./http";
import type { GenerationResult } from "./pipeline";
import { isHttpUrl, normalizeGenerationRequest, pickOption, readText } from "./request";
import { analyzeArticle } from "./seo-tools";
import { countWords } from "./text";
import {
  ARTICLE_LANGUAGES,
  ARTICLE_TONES,
  IMAGE_PROVIDERS,
  IMAGE_TONES,
  type ArticleDraft,
  type ArticleSection,
  type ImageResult,
} from "./types";

// The client posts a GenerationResult back for exports and follow-up calls.
// Everything is re-read field by field and the SEO report is recomputed.
// Cached file paths are not accepted from clients.

function readNumber(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function readStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function parseSection(raw: unknown): ArticleSection | null {
  if (!isRecord(raw)) return null;
  const heading = readText(raw.heading);
  const content = typeof raw.content === "string" ? raw.content.trim() : "";
  if (!heading || !content) return null;
  return { heading, content, keywords: readStrings(raw.keywords), wordCount: countWords(content) };
}

export function parseArticleDraft(raw: unknown): ArticleDraft {
  if (!isRecord(raw)) throw new ValidationError("Article draft is missing.");
  const title = readText(raw.title);
  const sections = (Array.isArray(raw.sections) ? raw.sections : [])
    .map(parseSection)
    .filter((section): section is ArticleSection => section !== null);

  if (!title || sections.length === 0) {
    throw new ValidationError("Article draft needs a title and at least one section.");
  }

  return {
    title,
    seoTitle: readText(raw.seoTitle) || title,
    metaDescription: readText(raw.metaDescription),
    // The slug ends up in the Content-Disposition header of exports.
    slug: generateSlug(readText(raw.slug)) || generateSlug(title),
    sections,
    cta: readText(raw.cta),
    totalWordCount: sections.reduce((sum, section) => sum + section.wordCount, 0),
    focusKeywords: readStrings(raw.focusKeywords),
    language: pickOption(ARTICLE_LANGUAGES, raw.language, "English"),
    tone: pickOption(ARTICLE_TONES, raw.tone, "Professional"),
    rawContent: typeof raw.rawContent === "string" ? raw.rawContent : "",
  };
}

function parseImage(raw: unknown): ImageResult | null {
  if (!isRecord(raw)) return null;
  const url = readText(raw.url);
  if (!isHttpUrl(url)) return null;
  const isPlaceholder = raw.isPlaceholder === true;
  const reason = readText(raw.reason);

  return {
    url,
    promptUsed: readText(raw.promptUsed),
    sourcePrompt: readText(raw.sourcePrompt) || readText(raw.promptUsed),
    ...(readText(raw.revisedPrompt) ? { revisedPrompt: readText(raw.revisedPrompt) } : {}),
    provider: pickOption(IMAGE_PROVIDERS, raw.provider, "openai"),
    model: readText(raw.model),
    tone: pickOption(IMAGE_TONES, raw.tone, "professional"),
    index: readNumber(raw.index, 0),
    isPlaceholder,
    ...(isPlaceholder ? { reason: reason || "Image generation failed." } : {}),
    attempts: readNumber(raw.attempts, 0),
    caption: readText(raw.caption),
    altText: readText(raw.altText),
    createdAt: readText(raw.createdAt) || new Date(0).toISOString(),
  };
}

export function parseImageResults(raw: unknown): ImageResult[] {
  if (!Array.isArray(raw)) return [];
  return raw.map(parseImage).filter((image): image is ImageResult => image !== null);
}

export function parseGenerationResult(raw: unknown, now: Date = new Date()): GenerationResult {
  if (!isRecord(raw)) throw new ValidationError("Generation result must be a JSON object.");
  const request = normalizeGenerationRequest(raw.request);
  const draft = parseArticleDraft(raw.draft);

  return {
    request,
    draft,
    seo: analyzeArticle(draft, request.keywords, undefined, now),
    images: parseImageResults(raw.images),
    usedFallbackArticle: raw.usedFallbackArticle === true,
    linksInserted: readNumber(raw.linksInserted, 0),
    generatedAt: readText(raw.generatedAt) || now.toISOString(),
  };
}
