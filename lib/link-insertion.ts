import { buildCta } from "./article-parser";
import { escapeRegExp, HTML_TAG } from "./text";
import type { ArticleDraft } from "./types";

export interface InternalLink {
  text: string;
  url: string;
}

export interface LinkInsertionResult {
  content: string;
  inserted: InternalLink[];
}

export interface EnhancementResult {
  draft: ArticleDraft;
  linksInserted: number;
}

export const MAX_LINKS_PER_SECTION = 2;

interface Candidate {
  phrase: string;
  relevance: number;
}

/** `Text: url` entries, one per line or comma separated. Later duplicates of a text win. */
export function parseInternalLinks(text: string): InternalLink[] {
  const byText = new Map<string, string>();
  const entries = text
    .split("\n")
    .flatMap((line) => line.split(","))
    .map((entry) => entry.trim())
    .filter(Boolean);

  for (const entry of entries) {
    const colon = entry.indexOf(":");
    if (colon === -1) continue;
    const label = entry.slice(0, colon).trim();
    let url = entry.slice(colon + 1).trim();
    if (url && !/^(https?:\/\/|\/)/.test(url)) url = `/${url}`;
    if (label && url) byText.set(label, url);
  }
  return [...byText].map(([label, url]) => ({ text: label, url }));
}

// Ranges already occupied by markdown links, anchors or tag markup.
function linkedRanges(content: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  const patterns = [/\[[^\]]*\]\([^)]*\)/g, /<a\b[^>]*>[\s\S]*?<\/a>/gi, HTML_TAG];
  for (const pattern of patterns) {
    for (const match of content.matchAll(pattern)) {
      const start = match.index ?? 0;
      ranges.push([start, start + match[0].length]);
    }
  }
  return ranges;
}

function findUnlinked(content: string, phrase: string): { index: number; text: string } | null {
  const ranges = linkedRanges(content);
  const pattern = new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "gi");
  for (const match of content.matchAll(pattern)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (!ranges.some(([from, to]) => start < to && end > from)) {
      return { index: start, text: match[0] };
    }
  }
  return null;
}

function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9']+/g) ?? [];
}

function relevance(phrase: string, linkText: string, keyword: string): number {
  const phraseLower = phrase.toLowerCase();
  let score = 0;
  if (phraseLower === linkText.toLowerCase()) score += 1;
  else if (phraseLower === keyword.toLowerCase()) score += 0.9;

  const phraseWords = new Set(words(phrase));
  const overlap = (target: string) => {
    const targetWords = new Set(words(target));
    if (targetWords.size === 0) return 0;
    return [...targetWords].filter((word) => phraseWords.has(word)).length / targetWords.size;
  };
  return score + overlap(linkText) * 0.6 + overlap(keyword) * 0.4;
}

function semanticCandidates(content: string, linkText: string, keywords: string[]): Candidate[] {
  const linkWords = [...new Set(words(linkText))];
  const candidates: Candidate[] = [];

  for (const sentence of content.split(/(?<=[.!?])\s+/)) {
    const lower = sentence.toLowerCase();
    for (const keyword of keywords) {
      if (keyword && lower.includes(keyword.toLowerCase())) {
        candidates.push({ phrase: keyword, relevance: relevance(keyword, linkText, keyword) });
      }
    }

    if (linkWords.length === 0) continue;
    const sentenceWords = new Set(words(sentence));
    const shared = linkWords.filter((word) => sentenceWords.has(word));
    const score = shared.length / linkWords.length;
    const phrase = shared.find((word) => word.length > 3);
    if (score > 0.2 && phrase) {
      candidates.push({ phrase, relevance: score });
    }
  }

  // Stable: earlier candidates win ties.
  return candidates
    .map((candidate, order) => ({ candidate, order }))
    .sort((a, b) => b.candidate.relevance - a.candidate.relevance || a.order - b.order)
    .map(({ candidate }) => candidate);
}

function linkAt(content: string, index: number, text: string, url: string): string {
  return `${content.slice(0, index)}[${text}](${url})${content.slice(index + text.length)}`;
}

/**
 * Adds markdown links to a section body: the link text itself when it
 * appears, otherwise the best keyword or word-overlap phrase.
 */
export function insertLinksInContent(
  content: string,
  links: InternalLink[],
  keywords: string[],
  maxLinks = MAX_LINKS_PER_SECTION
): LinkInsertionResult {
  let updated = content;
  const inserted: InternalLink[] = [];

  for (const link of links) {
    if (inserted.length >= maxLinks) break;
    if (inserted.some((done) => done.url === link.url)) continue;

    const exact = findUnlinked(updated, link.text);
    if (exact) {
      updated = linkAt(updated, exact.index, exact.text, link.url);
      inserted.push(link);
      continue;
    }

    for (const candidate of semanticCandidates(updated, link.text, keywords)) {
      const spot = findUnlinked(updated, candidate.phrase);
      if (!spot) continue;
      updated = linkAt(updated, spot.index, spot.text, link.url);
      inserted.push(link);
      break;
    }
  }

  return { content: updated, inserted };
}

export function applySeoEnhancements(draft: ArticleDraft, focusKeyword: string | null): ArticleDraft {
  if (!focusKeyword) return draft;
  const keyword = focusKeyword.toLowerCase();
  const enhanced = { ...draft };

  if (!draft.title.toLowerCase().includes(keyword)) {
    enhanced.seoTitle = `${focusKeyword}: ${draft.title}`;
  }
  if (!draft.metaDescription.toLowerCase().includes(keyword)) {
    enhanced.metaDescription = `Discover ${focusKeyword} insights. ${draft.metaDescription}`.slice(0, 160);
  }
  return enhanced;
}

export function enhanceArticle(
  draft: ArticleDraft,
  internalLinks: string,
  focusKeyword: string | null
): EnhancementResult {
  const links = parseInternalLinks(internalLinks);
  let linksInserted = 0;

  const sections = draft.sections.map((section) => {
    if (links.length === 0) return section;
    const result = insertLinksInContent(section.content, links, section.keywords);
    linksInserted += result.inserted.length;
    return { ...section, content: result.content };
  });

  const enhanced = applySeoEnhancements({ ...draft, sections }, focusKeyword);
  if (!enhanced.cta) {
    enhanced.cta = buildCta(enhanced.title, enhanced.focusKeywords);
  }
  if (links.length > 0) {
    console.log(`[link-insertion] links=${links.length} inserted=${linksInserted}`);
  }
  return { draft: enhanced, linksInserted };
}
