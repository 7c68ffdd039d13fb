import { STOP_WORDS } from "./stop-words";
import { toPlainText } from "./text";
import type { ArticleDraft } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ContentBalance = "good" | "uneven" | "too_short" | "sections_too_long";
export type KeywordPosition = "introduction" | "heading" | "conclusion";
export type ReadingLevel =
  | "Very Easy"
  | "Easy"
  | "Fairly Easy"
  | "Standard"
  | "Fairly Difficult"
  | "Difficult"
  | "Very Difficult";

export interface KeywordStats {
  count: number;
  density: number;
  positions: KeywordPosition[];
}

export interface KeywordAnalysis {
  totalWords: number;
  primaryKeyword: string | null;
  primaryCount: number;
  primaryDensity: number;
  distribution: Record<string, KeywordStats>;
  missingKeywords: string[];
  overusedKeywords: string[];
}

export interface ReadabilityAnalysis {
  wordCount: number;
  sentenceCount: number;
  syllableCount: number;
  avgSentenceLength: number;
  avgSyllablesPerWord: number;
  fleschScore: number;
  readingLevel: ReadingLevel;
  grade: number;
}

export interface TitleAnalysis {
  title: string;
  length: number;
  optimalLength: boolean;
  containsPrimaryKeyword: boolean;
  keywordPosition: "beginning" | "middle" | "end" | null;
  recommendations: string[];
}

export interface MetaAnalysis {
  metaDescription: string;
  length: number;
  optimalLength: boolean;
  containsPrimaryKeyword: boolean;
  recommendations: string[];
}

export interface StructureAnalysis {
  totalSections: number;
  sectionLengths: number[];
  balance: ContentBalance;
}

export interface ArticleLink {
  url: string;
  text: string;
  type: "internal" | "external";
}

export interface SeoReport {
  focusKeyword: string | null;
  targetKeywords: string[];
  keywordAnalysis: KeywordAnalysis;
  readability: ReadabilityAnalysis;
  titleAnalysis: TitleAnalysis;
  metaAnalysis: MetaAnalysis;
  structure: StructureAnalysis;
  seoScore: number;
  recommendations: string[];
  lsiSuggestions: string[];
  links: ArticleLink[];
  wordCount: number;
  keywordDensity: number;
  readabilityScore: number;
  analyzedAt: string;
}

export const OPTIMAL_TITLE_LENGTH = [50, 60] as const;
export const OPTIMAL_META_LENGTH = [150, 160] as const;
export const OPTIMAL_KEYWORD_DENSITY = [1.0, 2.5] as const;
export const OPTIMAL_READABILITY = [60, 80] as const;

const LSI_KEYWORDS: Record<string, string[]> = {
  bitcoin: ["cryptocurrency", "blockchain", "digital currency", "crypto", "satoshi"],
  trading: ["investment", "market", "portfolio", "broker", "strategy"],
  health: ["wellness", "fitness", "nutrition", "medical", "healthcare"],
  technology: ["innovation", "digital", "software", "tech", "development"],
  business: ["company", "corporate", "enterprise", "commercial", "professional"],
  marketing: ["advertising", "promotion", "branding", "campaign", "digital marketing"],
  education: ["learning", "training", "academic", "course", "knowledge"],
  finance: ["money", "financial", "investment", "banking", "economic"],
};

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function countSubstring(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/** Lower-cased words longer than two characters that are not stop words. */
export function extractMeaningfulWords(text: string): string[] {
  return toPlainText(text)
    .replace(/[^\w\s]/g, " ")
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 2 && !STOP_WORDS.has(word));
}

export function countSentences(text: string): number {
  return Math.max(1, text.match(/[.!?]+/g)?.length ?? 0);
}

/** Vowel groups per word, minus a trailing silent "e", never below one. */
export function countSyllables(text: string): number {
  let total = 0;
  for (const word of text.toLowerCase().split(/\s+/).filter(Boolean)) {
    let syllables = word.match(/[aeiouy]+/g)?.length ?? 0;
    if (word.endsWith("e")) syllables -= 1;
    total += Math.max(1, syllables);
  }
  return total;
}

export function fleschReadingEase(sentences: number, words: number, syllables: number): number {
  if (sentences === 0 || words === 0) return 0;
  const score = 206.835 - 1.015 * (words / sentences) - 84.6 * (syllables / words);
  return Math.max(0, Math.min(100, score));
}

export function readingLevel(score: number): ReadingLevel {
  if (score >= 90) return "Very Easy";
  if (score >= 80) return "Easy";
  if (score >= 70) return "Fairly Easy";
  if (score >= 60) return "Standard";
  if (score >= 50) return "Fairly Difficult";
  if (score >= 30) return "Difficult";
  return "Very Difficult";
}

// ---------------------------------------------------------------------------
// Analyses
// ---------------------------------------------------------------------------

export function collectFullText(draft: ArticleDraft): string {
  const parts = [draft.title, draft.metaDescription];
  for (const section of draft.sections) {
    parts.push(section.heading, toPlainText(section.content));
  }
  parts.push(draft.cta);
  return parts.filter(Boolean).join(" ");
}

function keywordPositions(text: string, keyword: string, headings: string[]): KeywordPosition[] {
  const positions: KeywordPosition[] = [];
  if (text.slice(0, 100).includes(keyword)) positions.push("introduction");
  if (headings.some((heading) => heading.toLowerCase().includes(keyword))) positions.push("heading");
  if (text.slice(-100).includes(keyword)) positions.push("conclusion");
  return positions;
}

export function analyzeKeywords(
  text: string,
  keywords: string[],
  primaryKeyword: string | null,
  headings: string[] = []
): KeywordAnalysis {
  const lower = text.toLowerCase();
  const totalWords = extractMeaningfulWords(text).length;
  const analysis: KeywordAnalysis = {
    totalWords,
    primaryKeyword,
    primaryCount: 0,
    primaryDensity: 0,
    distribution: {},
    missingKeywords: [],
    overusedKeywords: [],
  };

  for (const keyword of keywords) {
    const needle = keyword.toLowerCase();
    const count = countSubstring(lower, needle);
    const density = totalWords > 0 ? round((count / totalWords) * 100, 2) : 0;
    analysis.distribution[keyword] = {
      count,
      density,
      positions: keywordPositions(lower, needle, headings),
    };
    if (primaryKeyword && needle === primaryKeyword.toLowerCase()) {
      analysis.primaryCount = count;
      analysis.primaryDensity = density;
    }
    if (count === 0) {
      analysis.missingKeywords.push(keyword);
    } else if (density > OPTIMAL_KEYWORD_DENSITY[1]) {
      analysis.overusedKeywords.push(keyword);
    }
  }
  return analysis;
}

export function analyzeReadability(text: string): ReadabilityAnalysis {
  const clean = toPlainText(text).replace(/\s+/g, " ").trim();
  const sentenceCount = countSentences(clean);
  const wordCount = clean ? clean.split(" ").length : 0;
  const syllableCount = countSyllables(clean);
  const avgSentenceLength = wordCount / sentenceCount;
  const avgSyllablesPerWord = wordCount > 0 ? syllableCount / wordCount : 0;
  const fleschScore = fleschReadingEase(sentenceCount, wordCount, syllableCount);
  const grade = 0.39 * avgSentenceLength + 11.8 * avgSyllablesPerWord - 15.59;

  return {
    wordCount,
    sentenceCount,
    syllableCount,
    avgSentenceLength: round(avgSentenceLength, 1),
    avgSyllablesPerWord: round(avgSyllablesPerWord, 2),
    fleschScore: round(fleschScore, 1),
    readingLevel: readingLevel(fleschScore),
    grade: Math.max(1, Math.min(16, Math.round(grade))),
  };
}

export function analyzeTitle(title: string, primaryKeyword: string | null): TitleAnalysis {
  const [min, max] = OPTIMAL_TITLE_LENGTH;
  const analysis: TitleAnalysis = {
    title,
    length: title.length,
    optimalLength: title.length >= min && title.length <= max,
    containsPrimaryKeyword: false,
    keywordPosition: null,
    recommendations: [],
  };

  if (primaryKeyword) {
    const index = title.toLowerCase().indexOf(primaryKeyword.toLowerCase());
    if (index !== -1) {
      analysis.containsPrimaryKeyword = true;
      analysis.keywordPosition =
        index < title.length * 0.33 ? "beginning" : index < title.length * 0.66 ? "middle" : "end";
    }
  }

  if (title.length < min) {
    analysis.recommendations.push(`Title is too short. Consider expanding to ${min}-${max} characters.`);
  } else if (title.length > max) {
    analysis.recommendations.push(`Title is too long. Consider shortening to under ${max} characters.`);
  }
  if (primaryKeyword && !analysis.containsPrimaryKeyword) {
    analysis.recommendations.push(`Include the primary keyword '${primaryKeyword}' in the title.`);
  } else if (primaryKeyword && analysis.keywordPosition !== "beginning") {
    analysis.recommendations.push(
      "Consider placing the primary keyword closer to the beginning of the title."
    );
  }
  return analysis;
}

export function analyzeMeta(metaDescription: string, primaryKeyword: string | null): MetaAnalysis {
  const [min, max] = OPTIMAL_META_LENGTH;
  const containsPrimaryKeyword = primaryKeyword
    ? metaDescription.toLowerCase().includes(primaryKeyword.toLowerCase())
    : false;
  const recommendations: string[] = [];

  if (metaDescription.length < min) {
    recommendations.push(`Meta description is too short. Expand to ${min}-${max} characters.`);
  } else if (metaDescription.length > max) {
    recommendations.push(`Meta description is too long. Shorten to under ${max} characters.`);
  }
  if (primaryKeyword && !containsPrimaryKeyword) {
    recommendations.push(`Include the primary keyword '${primaryKeyword}' in the meta description.`);
  }

  return {
    metaDescription,
    length: metaDescription.length,
    optimalLength: metaDescription.length >= min && metaDescription.length <= max,
    containsPrimaryKeyword,
    recommendations,
  };
}

export function analyzeStructure(draft: ArticleDraft): StructureAnalysis {
  const sectionLengths = draft.sections.map(
    (section) => section.content.split(/\s+/).filter(Boolean).length
  );
  let balance: ContentBalance = "good";

  if (sectionLengths.length > 0) {
    const avg = sectionLengths.reduce((sum, n) => sum + n, 0) / sectionLengths.length;
    const variance =
      sectionLengths.reduce((sum, n) => sum + (n - avg) ** 2, 0) / sectionLengths.length;
    if (variance > avg * 0.5) {
      balance = "uneven";
    } else if (sectionLengths.every((n) => n < 50)) {
      balance = "too_short";
    } else if (sectionLengths.some((n) => n > 300)) {
      balance = "sections_too_long";
    }
  }

  return { totalSections: draft.sections.length, sectionLengths, balance };
}

export function extractLinks(draft: ArticleDraft): ArticleLink[] {
  const links: ArticleLink[] = [];
  const push = (url: string, text: string) =>
    links.push({ url, text: text.trim(), type: url.startsWith("/") ? "internal" : "external" });

  for (const section of draft.sections) {
    for (const match of section.content.matchAll(/<a\s+href=["']([^"']+)["'][^>]*>([^<]+)<\/a>/gi)) {
      push(match[1], match[2]);
    }
    for (const match of section.content.matchAll(/\[([^\]]+)\]\(([^)\s]+)\)/g)) {
      push(match[2], match[1]);
    }
  }
  return links;
}

export function lsiSuggestions(keywords: string[]): string[] {
  const suggestions: string[] = [];
  for (const keyword of keywords) {
    const lower = keyword.toLowerCase();
    for (const [base, related] of Object.entries(LSI_KEYWORDS)) {
      if (!lower.includes(base) && !base.includes(lower)) continue;
      for (const term of related) {
        if (!suggestions.includes(term)) suggestions.push(term);
      }
    }
  }
  return suggestions.slice(0, 10);
}

// ---------------------------------------------------------------------------
// Score
// ---------------------------------------------------------------------------

type ScoreInput = Pick<
  SeoReport,
  "titleAnalysis" | "metaAnalysis" | "keywordAnalysis" | "readability" | "structure"
>;

export function computeSeoScore(input: ScoreInput): number {
  let score = 0;

  if (input.titleAnalysis.optimalLength) score += 10;
  if (input.titleAnalysis.containsPrimaryKeyword) score += 10;

  if (input.metaAnalysis.optimalLength) score += 8;
  if (input.metaAnalysis.containsPrimaryKeyword) score += 7;

  const density = input.keywordAnalysis.primaryDensity;
  if (density >= OPTIMAL_KEYWORD_DENSITY[0] && density <= OPTIMAL_KEYWORD_DENSITY[1]) {
    score += 15;
  } else if (density > 0) {
    score += 8;
  }

  const missing = input.keywordAnalysis.missingKeywords.length;
  if (missing === 0) score += 10;
  else if (missing <= 2) score += 5;

  const flesch = input.readability.fleschScore;
  if (flesch >= OPTIMAL_READABILITY[0] && flesch <= OPTIMAL_READABILITY[1]) score += 20;
  else if (flesch >= 50) score += 12;
  else if (flesch >= 30) score += 8;

  if (input.structure.totalSections >= 3) score += 8;
  if (input.structure.balance === "good") score += 12;
  else if (input.structure.balance === "uneven" || input.structure.balance === "sections_too_long") {
    score += 6;
  }

  return Math.min(100, Math.max(0, score));
}

function buildRecommendations(input: ScoreInput): string[] {
  const recommendations = [
    ...input.titleAnalysis.recommendations,
    ...input.metaAnalysis.recommendations,
  ];
  const { missingKeywords, overusedKeywords, primaryDensity } = input.keywordAnalysis;

  if (missingKeywords.length > 0) {
    recommendations.push(`Consider adding these missing keywords: ${missingKeywords.slice(0, 3).join(", ")}`);
  }
  if (overusedKeywords.length > 0) {
    recommendations.push(`Reduce usage of overused keywords: ${overusedKeywords.slice(0, 2).join(", ")}`);
  }
  if (primaryDensity === 0) {
    recommendations.push("Add the primary keyword throughout the content naturally.");
  } else if (primaryDensity < OPTIMAL_KEYWORD_DENSITY[0]) {
    recommendations.push("Increase primary keyword usage slightly for better optimization.");
  } else if (primaryDensity > OPTIMAL_KEYWORD_DENSITY[1]) {
    recommendations.push("Reduce primary keyword usage to avoid over-optimization.");
  }

  const flesch = input.readability.fleschScore;
  if (flesch < 30) {
    recommendations.push("Content is very difficult to read. Significantly simplify language and structure.");
  } else if (flesch < OPTIMAL_READABILITY[0]) {
    recommendations.push("Improve readability by using shorter sentences and simpler words.");
  }

  if (input.structure.totalSections < 3) {
    recommendations.push("Add more sections to improve content structure and SEO.");
  }
  if (input.structure.balance === "uneven") {
    recommendations.push("Balance section lengths for better content flow.");
  } else if (input.structure.balance === "too_short") {
    recommendations.push("Expand sections to provide more valuable content.");
  }

  return recommendations.slice(0, 8);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function analyzeArticle(
  draft: ArticleDraft,
  keywords: string[],
  focusKeyword?: string,
  now: Date = new Date()
): SeoReport {
  const targetKeywords = keywords.map((keyword) => keyword.trim().toLowerCase()).filter(Boolean);
  const primary = (focusKeyword || targetKeywords[0] || "").toLowerCase() || null;
  const text = collectFullText(draft);
  const headings = draft.sections.map((section) => section.heading);

  const scoreInput: ScoreInput = {
    keywordAnalysis: analyzeKeywords(text, targetKeywords, primary, headings),
    readability: analyzeReadability(text),
    titleAnalysis: analyzeTitle(draft.title, primary),
    metaAnalysis: analyzeMeta(draft.metaDescription, primary),
    structure: analyzeStructure(draft),
  };

  return {
    focusKeyword: primary,
    targetKeywords,
    ...scoreInput,
    seoScore: computeSeoScore(scoreInput),
    recommendations: buildRecommendations(scoreInput),
    lsiSuggestions: lsiSuggestions(targetKeywords),
    links: extractLinks(draft),
    wordCount: scoreInput.readability.wordCount,
    keywordDensity: scoreInput.keywordAnalysis.primaryDensity,
    readabilityScore: scoreInput.readability.fleschScore,
    analyzedAt: now.toISOString(),
  };
}

export function buildSchemaMarkup(
  draft: ArticleDraft,
  report: SeoReport,
  now: Date = new Date(),
  imageUrl?: string
): Record<string, unknown> {
  return {
    "@context": "https://schema.org",
    "@type": "Article",
    headline: draft.title,
    description: draft.metaDescription,
    author: { "@type": "Organization", name: "Article Studio" },
    publisher: { "@type": "Organization", name: "Article Studio" },
    datePublished: now.toISOString(),
    dateModified: now.toISOString(),
    wordCount: report.wordCount,
    keywords: report.targetKeywords,
    inLanguage: draft.language,
    ...(imageUrl ? { image: imageUrl } : {}),
  };
}
