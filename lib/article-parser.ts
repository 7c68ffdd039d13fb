import { stableHash } from "./hash";
import { countWords } from "./text";
import type { ArticleDraft, ArticleLanguage, ArticleSection, ArticleTone } from "./types";

export interface ParseArticleOptions {
  keywords: string[];
  language: ArticleLanguage;
  tone: ArticleTone;
  /** Surplus sections beyond this count are dropped. */
  maxSections?: number;
}

const LABEL_PREFIX = /^(title|meta|description|meta description)\s*:/i;
const PARSE_FAILURE_BODY =
  "Content parsing encountered an issue. Please review the generated content.";

export function generateSlug(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 50)
    .replace(/-+$/, "");
}

export function buildCta(title: string, keywords: string[]): string {
  const keyword = keywords[0] || "this topic";
  const options = [
    `Stay informed about ${keyword} developments by following our latest updates.`,
    `Explore more insights about ${keyword} in our related articles.`,
    `Keep up with ${keyword} trends and analysis through our newsletter.`,
    `Discover more about ${keyword} with our comprehensive resources.`,
  ];
  return options[stableHash(title) % options.length];
}

function fallbackMeta(keywords: string[]): string {
  return keywords[0]
    ? `Comprehensive analysis of ${keywords[0]} and its impact. Explore key insights, trends, and implications in this detailed guide.`
    : "Discover key insights and analysis in this comprehensive guide covering important trends and developments.";
}

function makeSection(heading: string, content: string, keywords: string[]): ArticleSection {
  return { heading, content, keywords: keywords.slice(0, 3), wordCount: countWords(content) };
}

function cleanTitle(line: string): string {
  return line.replace(/^#+\s*/, "").replace(LABEL_PREFIX, "").trim();
}

function isMetaCandidate(line: string): boolean {
  return (
    line.length > 80 && line.length < 500 && !line.startsWith("#") && !LABEL_PREFIX.test(line)
  );
}

function splitSections(lines: string[], keywords: string[]): ArticleSection[] {
  const sections: ArticleSection[] = [];
  let heading: string | null = null;
  let body: string[] = [];

  const flush = () => {
    if (heading === null) return;
    const content = body.join("\n").trim();
    if (heading && content) sections.push(makeSection(heading, content, keywords));
  };

  for (const line of lines) {
    if (line.startsWith("## ")) {
      flush();
      heading = line.slice(3).trim();
      body = [];
    } else if (heading !== null) {
      body.push(line);
    }
  }
  flush();
  return sections;
}

/**
 * Turns a model reply into a draft. Title is the first line, the meta
 * description the first later line of 81-499 characters, and sections start
 * at lines beginning with "## ". A reply without markers becomes one section.
 */
export function parseArticleReply(reply: string, options: ParseArticleOptions): ArticleDraft {
  const { keywords } = options;
  const cleaned = reply.replace(/\*\*/g, "").replace(/\r\n/g, "\n").trim();
  const lines = cleaned.split("\n");
  const title = cleanTitle(lines[0] ?? "") || "Generated Article";

  let metaIndex = -1;
  for (let i = 1; i < lines.length; i++) {
    if (isMetaCandidate(lines[i].trim())) {
      metaIndex = i;
      break;
    }
  }
  const metaDescription = metaIndex > 0 ? lines[metaIndex].trim() : fallbackMeta(keywords);

  let sections = splitSections(lines, keywords);
  if (options.maxSections && sections.length > options.maxSections) {
    console.warn(
      `[article-parser] reply had ${sections.length} sections, keeping ${options.maxSections}`
    );
    sections = sections.slice(0, options.maxSections);
  }

  if (sections.length === 0) {
    const rest = lines
      .filter((_, i) => i > 0 && i !== metaIndex)
      .join("\n")
      .trim();
    sections = [
      makeSection(
        `Understanding ${keywords[0] || "the Topic"}`,
        rest || PARSE_FAILURE_BODY,
        keywords
      ),
    ];
  }

  return {
    title,
    seoTitle: title,
    metaDescription,
    slug: generateSlug(title),
    sections,
    cta: buildCta(title, keywords),
    totalWordCount: sections.reduce((sum, section) => sum + section.wordCount, 0),
    focusKeywords: keywords.slice(0, 3),
    language: options.language,
    tone: options.tone,
    rawContent: cleaned,
  };
}

/** Canned article used whenever the model call or parsing fails. */
export function buildFallbackArticle(
  keywords: string[],
  language: ArticleLanguage,
  tone: ArticleTone
): ArticleDraft {
  const keyword = keywords[0] || "Topic";
  const title = `Understanding ${keyword}: A Comprehensive Guide`;
  const sections = [
    makeSection(
      `What is ${keyword}?`,
      `Understanding ${keyword} is essential in today's landscape. This guide explores the key aspects and provides valuable insights.`,
      keywords
    ),
    makeSection(
      `Benefits of ${keyword}`,
      `${keyword} offers numerous advantages that can significantly shape your understanding and decision-making process.`,
      keywords
    ),
  ];

  return {
    title,
    seoTitle: `${keyword} Guide - Everything You Need to Know`,
    metaDescription: `Discover everything about ${keyword} in this comprehensive guide. Learn key concepts, benefits, and practical applications.`,
    slug: generateSlug(`understanding ${keyword} guide`),
    sections,
    cta: `Learn more about ${keyword} and discover how it can benefit you.`,
    totalWordCount: sections.reduce((sum, section) => sum + section.wordCount, 0),
    focusKeywords: keywords.slice(0, 3),
    language,
    tone,
    rawContent: "",
  };
}
