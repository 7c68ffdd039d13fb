import { buildFallbackArticle } from "./article-parser";
import type { GenerationResult } from "./pipeline";
import { normalizeGenerationRequest } from "./request";
import { analyzeArticle } from "./seo-tools";
import type { ArticleDraft, ImageResult } from "./types";

export const FIXTURE_TIME = new Date("2026-05-06T07:08:09.000Z");

export const SOLAR_SECTIONS = [
  {
    heading: "Why <Solar> Matters",
    content: [
      'Panels cut bills & emissions. Read the [primer](/primer) or <a href="https://energy.example.test/report" target="_blank">the report</a>.',
      "",
      "- Lower bills",
      "- Cleaner air",
    ].join("\n"),
  },
  {
    heading: "Getting Started",
    content: "### First Steps\nCall an installer. Avoid [this](javascript:void) trick.",
  },
];

export function fixtureImage(overrides: Partial<ImageResult> = {}): ImageResult {
  return {
    url: "https://img.example.test/cover.jpg",
    promptUsed: "Rooftop solar panels at dawn, detailed professional illustration, modern style, high quality digital art, professional illustration",
    sourcePrompt: "Rooftop solar panels at dawn",
    provider: "openai",
    model: "dall-e-3",
    tone: "professional",
    index: 0,
    isPlaceholder: false,
    attempts: 1,
    caption: "Rooftop solar",
    altText: "Professional illustration: Rooftop solar",
    createdAt: FIXTURE_TIME.toISOString(),
    ...overrides,
  };
}

export function fixtureResult(
  options: { draft?: Partial<ArticleDraft>; images?: ImageResult[] } = {}
): GenerationResult {
  const base = buildFallbackArticle(["solar"], "English", "Professional");
  const draft: ArticleDraft = {
    ...base,
    title: "Solar Power for Homes",
    slug: "solar-power-for-homes",
    cta: "Get a quote today.",
    sections: SOLAR_SECTIONS.map((section) => ({
      ...section,
      keywords: ["solar"],
      wordCount: section.content.split(/\s+/).length,
    })),
    ...options.draft,
  };

  return {
    request: normalizeGenerationRequest({ keywords: "solar" }),
    draft,
    seo: analyzeArticle(draft, ["solar"], undefined, FIXTURE_TIME),
    images: options.images ?? [fixtureImage()],
    usedFallbackArticle: false,
    linksInserted: 0,
    generatedAt: FIXTURE_TIME.toISOString(),
  };
}

/** 1x1 transparent PNG. */
export const FIXTURE_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==",
  "base64"
);
