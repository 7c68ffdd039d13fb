import { readTimeMinutes } from "../document-model";
import { stableHash } from "../hash";
import type { GenerationResult } from "../pipeline";
import type { SeoReport } from "../seo-tools";
import type { ArticleDraft } from "../types";

export interface PublicationReadiness {
  score: number;
  isReady: boolean;
  issues: string[];
  recommendations: string[];
}

export interface ArticleAnalytics {
  generationMetadata: {
    timestamp: string;
    generator: string;
    articleId: string;
    language: string;
    tone: string;
    usedFallbackArticle: boolean;
  };
  contentMetrics: {
    title: string;
    totalWordCount: number;
    sectionCount: number;
    estimatedReadTimeMinutes: number;
    sectionWordDistribution: Array<{ sectionIndex: number; heading: string; wordCount: number }>;
  };
  seoMetrics: {
    overallScore: number;
    focusKeyword: string | null;
    targetKeywords: string[];
    keywordDensity: number;
    titleOptimization: SeoReport["titleAnalysis"];
    metaDescriptionOptimization: SeoReport["metaAnalysis"];
    readabilityScore: number;
    recommendationsCount: number;
    lsiKeywordsSuggested: string[];
  };
  contentQuality: {
    readabilityAnalysis: SeoReport["readability"];
    structureAnalysis: SeoReport["structure"];
    linkAnalysis: { internalLinks: number; externalLinks: number; totalLinks: number };
  };
  images: { total: number; placeholders: number };
  optimizationSuggestions: {
    highPriority: string[];
    mediumPriority: string[];
    lowPriority: string[];
  };
  exportInfo: {
    formatsAvailable: string[];
    seoReady: boolean;
    publicationReady: PublicationReadiness;
  };
}

export const GENERATOR_NAME = "Article Studio v1.0";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `yyyymmdd_hhmmss` in UTC. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function buildArticleId(title: string, now: Date): string {
  return `art_${formatTimestamp(now)}_${stableHash(title || "article") % 10000}`;
}

export function assessPublicationReadiness(
  draft: ArticleDraft,
  seo: SeoReport
): PublicationReadiness {
  let score = 0;
  const issues: string[] = [];

  if (draft.title) score += 10;
  else issues.push("Missing title");

  if (draft.metaDescription) score += 10;
  else issues.push("Missing meta description");

  if (draft.sections.length >= 3) score += 10;
  else issues.push("Need at least 3 content sections");

  score += Math.trunc(seo.seoScore * 0.4);
  if (seo.seoScore < 60) issues.push("SEO score needs improvement");

  if (seo.wordCount >= 300) score += 15;
  else if (seo.wordCount >= 200) score += 10;
  else issues.push("Article too short (needs 300+ words)");

  if (seo.readabilityScore >= 60) score += 15;
  else if (seo.readabilityScore >= 40) score += 10;
  else issues.push("Content readability needs improvement");

  return {
    score: Math.min(100, score),
    isReady: score >= 80,
    issues,
    recommendations:
      issues.length > 0
        ? [
            "Review and address all identified issues",
            "Consider adding more relevant keywords",
            "Ensure proper internal linking",
            "Add compelling call-to-action",
          ]
        : ["Article is ready for publication!"],
  };
}

export function buildAnalytics(result: GenerationResult, now: Date = new Date()): ArticleAnalytics {
  const { draft, seo } = result;
  const internalLinks = seo.links.filter((link) => link.type === "internal").length;

  return {
    generationMetadata: {
      timestamp: now.toISOString(),
      generator: GENERATOR_NAME,
      articleId: buildArticleId(draft.title, now),
      language: draft.language,
      tone: draft.tone,
      usedFallbackArticle: result.usedFallbackArticle,
    },
    contentMetrics: {
      title: draft.title,
      totalWordCount: seo.wordCount,
      sectionCount: draft.sections.length,
      estimatedReadTimeMinutes: readTimeMinutes(seo.wordCount),
      sectionWordDistribution: draft.sections.map((section, sectionIndex) => ({
        sectionIndex,
        heading: section.heading,
        wordCount: section.wordCount,
      })),
    },
    seoMetrics: {
      overallScore: seo.seoScore,
      focusKeyword: seo.focusKeyword,
      targetKeywords: seo.targetKeywords,
      keywordDensity: seo.keywordDensity,
      titleOptimization: seo.titleAnalysis,
      metaDescriptionOptimization: seo.metaAnalysis,
      readabilityScore: seo.readabilityScore,
      recommendationsCount: seo.recommendations.length,
      lsiKeywordsSuggested: seo.lsiSuggestions,
    },
    contentQuality: {
      readabilityAnalysis: seo.readability,
      structureAnalysis: seo.structure,
      linkAnalysis: {
        internalLinks,
        externalLinks: seo.links.length - internalLinks,
        totalLinks: seo.links.length,
      },
    },
    images: {
      total: result.images.length,
      placeholders: result.images.filter((image) => image.isPlaceholder).length,
    },
    optimizationSuggestions: {
      highPriority: seo.recommendations.slice(0, 3),
      mediumPriority: seo.recommendations.slice(3, 6),
      lowPriority: seo.recommendations.slice(6),
    },
    exportInfo: {
      formatsAvailable: ["HTML", "DOCX", "JSON"],
      seoReady: seo.seoScore >= 70,
      publicationReady: assessPublicationReadiness(draft, seo),
    },
  };
}
