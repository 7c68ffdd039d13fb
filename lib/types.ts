import type { ImageProviderName } from "./config";

export const ARTICLE_LANGUAGES = ["English", "French", "Turkish", "Spanish", "German"] as const;
export type ArticleLanguage = (typeof ARTICLE_LANGUAGES)[number];

export const ARTICLE_TONES = [
  "Professional",
  "Conversational",
  "Academic",
  "Technical",
  "Creative",
] as const;
export type ArticleTone = (typeof ARTICLE_TONES)[number];

export const IMAGE_TONES = ["professional", "warm", "playful", "dark", "elegant"] as const;
export type ImageTone = (typeof IMAGE_TONES)[number];

export const PROMOTION_STYLES = ["none", "cta_only", "full_section_cta"] as const;
export type PromotionStyle = (typeof PROMOTION_STYLES)[number];

export const IMAGE_PROVIDERS: readonly ImageProviderName[] = ["openai", "seedream"];

export interface PromotionSelection {
  /** Catalogue name, or "None". */
  name: string;
  style: PromotionStyle;
  /** Free text; overrides `name` when non-empty. */
  customText: string;
}

export interface GenerationRequest {
  language: ArticleLanguage;
  tone: ArticleTone;
  keywords: string[];
  sourceUrls: string[];
  focus: string;
  additionalContent: string;
  sectionCount: number;
  wordCountTarget: number;
  promotion: PromotionSelection;
  imageTone: ImageTone;
  imageProvider: ImageProviderName;
  includeImages: boolean;
  internalLinks: string;
  externalLinks: string;
}

export interface ArticleSection {
  heading: string;
  content: string;
  keywords: string[];
  wordCount: number;
}

export interface ArticleDraft {
  title: string;
  seoTitle: string;
  metaDescription: string;
  slug: string;
  sections: ArticleSection[];
  cta: string;
  totalWordCount: number;
  focusKeywords: string[];
  language: ArticleLanguage;
  tone: ArticleTone;
  rawContent: string;
}

export interface ImageResult {
  url: string;
  /** Prompt as sent to the provider, after length fitting and the style suffix. */
  promptUsed: string;
  /** Prompt as the caller wrote it; regeneration starts from this. */
  sourcePrompt: string;
  /** Provider's rewrite of the prompt, when it reports one. */
  revisedPrompt?: string;
  provider: ImageProviderName;
  model: string;
  tone: ImageTone;
  index: number;
  isPlaceholder: boolean;
  reason?: string;
  attempts: number;
  caption: string;
  altText: string;
  localPath?: string;
  createdAt: string;
}

export interface ExtractionSummary {
  sources: Array<{ url: string; title: string; method: string; success: boolean }>;
  keywords: string[];
  successRate: number;
}
