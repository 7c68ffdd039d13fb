import type { AppConfig } from "./config";
import {
  buildSourceContext,
  combineExtractedContents,
  extractMultipleUrls,
  summarizeExtraction,
} from "./content-extractor";
import type { FetchFn } from "./http";
import { createImageEngine, type ImageEngine } from "./image-engine";
import { enhanceArticle } from "./link-insertion";
import { createChatCompletion, generateArticle, type ChatCompletionFn } from "./llm-engine";
import { analyzeArticle, type SeoReport } from "./seo-tools";
import type { ArticleDraft, ExtractionSummary, GenerationRequest, ImageResult } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Everything one generation produced; the client keeps it and posts it back. */
export interface GenerationResult {
  request: GenerationRequest;
  draft: ArticleDraft;
  seo: SeoReport;
  images: ImageResult[];
  extraction?: ExtractionSummary;
  usedFallbackArticle: boolean;
  generationError?: string;
  linksInserted: number;
  generatedAt: string;
}

export type GenerationStage =
  | "configuration"
  | "extraction"
  | "drafting"
  | "seo"
  | "images"
  | "enhancement"
  | "complete";

export type ProgressFn = (stage: GenerationStage, message: string) => void;

export interface PipelineDeps {
  config: AppConfig;
  chat?: ChatCompletionFn;
  imageEngine?: ImageEngine;
  fetchFn?: FetchFn;
  now?: () => Date;
}

const MAX_DERIVED_KEYWORDS = 5;

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Linear run: configuration, source extraction, draft, SEO, cover image,
 * link and SEO enhancement, final report. Configuration problems throw
 * before any network call; later stages degrade instead of failing.
 */
export async function runGeneration(
  request: GenerationRequest,
  deps: PipelineDeps,
  onProgress: ProgressFn = () => undefined
): Promise<GenerationResult> {
  const now = deps.now ?? (() => new Date());
  const fetchFn = deps.fetchFn ?? fetch;

  onProgress("configuration", "Checking API configuration");
  const chat = deps.chat ?? createChatCompletion(deps.config, fetchFn);
  const imageEngine = request.includeImages
    ? deps.imageEngine ?? createImageEngine(request.imageProvider, deps.config, { fetchFn })
    : null;

  let keywords = request.keywords;
  let extraction: ExtractionSummary | undefined;
  let sourceContext = buildSourceContext(null, keywords);

  if (request.sourceUrls.length > 0) {
    onProgress("extraction", `Reading ${request.sourceUrls.length} source URL(s)`);
    const extracted = await extractMultipleUrls(request.sourceUrls, {
      fetchFn,
      readerApiKey: deps.config.jinaApiKey,
    });
    const combined = combineExtractedContents(extracted);
    extraction = summarizeExtraction(extracted);
    if (keywords.length === 0) {
      keywords = combined.keywords.slice(0, MAX_DERIVED_KEYWORDS);
    }
    sourceContext = buildSourceContext(combined, keywords);
  }

  const effectiveRequest: GenerationRequest = { ...request, keywords };

  onProgress("drafting", "Writing the article");
  const outcome = await generateArticle(effectiveRequest, sourceContext, {
    chat,
    config: deps.config,
  });

  onProgress("seo", "Analyzing SEO");
  const initialSeo = analyzeArticle(outcome.draft, keywords, undefined, now());

  const images: ImageResult[] = [];
  if (imageEngine) {
    onProgress("images", "Generating the cover image");
    images.push(await imageEngine.generateCoverImage(outcome.draft, request.imageTone));
  }

  onProgress("enhancement", "Inserting internal links");
  const enhanced = enhanceArticle(outcome.draft, request.internalLinks, initialSeo.focusKeyword);
  const seo = analyzeArticle(enhanced.draft, keywords, undefined, now());

  onProgress("complete", "Article ready");
  console.log(
    `[pipeline] done sections=${enhanced.draft.sections.length} score=${seo.seoScore} images=${images.length} fallback=${outcome.usedFallback}`
  );

  return {
    request: effectiveRequest,
    draft: enhanced.draft,
    seo,
    images,
    ...(extraction ? { extraction } : {}),
    usedFallbackArticle: outcome.usedFallback,
    ...(outcome.error ? { generationError: outcome.error } : {}),
    linksInserted: enhanced.linksInserted,
    generatedAt: now().toISOString(),
  };
}
