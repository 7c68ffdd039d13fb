import { Readability } from "@mozilla/readability";
import { JSDOM } from "jsdom";
import { extractErrorMessage, fetchWithTimeout, isRecord, type FetchFn } from "./http";
import { MAX_SOURCE_URLS } from "./request";
import { STOP_WORDS } from "./stop-words";
import { countWords } from "./text";
import type { ExtractionSummary } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ExtractionMethod = "reader" | "direct" | "fallback";

export interface ExtractedLink {
  href: string;
  text: string;
  internal: boolean;
}

export interface ExtractedContent {
  url: string;
  title: string;
  description: string;
  content: string;
  headings: string[];
  keywords: string[];
  links: ExtractedLink[];
  wordCount: number;
  method: ExtractionMethod;
  success: boolean;
  error?: string;
}

export interface CombinedContent {
  titles: string[];
  contents: string[];
  keywords: string[];
  methods: ExtractionMethod[];
  summaries: string[];
  totalSources: number;
  successfulSources: number;
  successRate: number;
}

export interface ExtractorDeps {
  fetchFn?: FetchFn;
  readerApiKey?: string;
}

export const READER_ENDPOINT = "https://r.jina.ai/";
const READER_TIMEOUT_MS = 15_000;
const DIRECT_TIMEOUT_MS = 10_000;
const MAX_CONTENT_CHARS = 2000;
const MAX_COMBINED_SOURCE_CHARS = 800;
const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function capContent(text: string, max = MAX_CONTENT_CHARS): string {
  const cleaned = text.replace(/\n{3,}/g, "\n\n").trim();
  return cleaned.length > max ? `${cleaned.slice(0, max).trimEnd()}...` : cleaned;
}

export function extractFrequentKeywords(text: string, limit = 10): string[] {
  const counts = new Map<string, number>();
  for (const word of text.toLowerCase().match(/[a-z][a-z'-]{3,}/g) ?? []) {
    if (STOP_WORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => word);
}

function fallbackContent(url: string, error: string): ExtractedContent {
  let host = url;
  try {
    host = new URL(url).hostname;
  } catch {
    host = url;
  }
  return {
    url,
    title: `Content from ${host}`,
    description: "",
    content: "",
    headings: [],
    keywords: [],
    links: [],
    wordCount: 0,
    method: "fallback",
    success: false,
    error,
  };
}

// ---------------------------------------------------------------------------
// Reader API
// ---------------------------------------------------------------------------

function parseReaderText(text: string): { title: string; description: string; content: string } {
  const title = text.match(/^Title:\s*(.+)$/m)?.[1]?.trim() ?? "";
  const marker = text.indexOf("Markdown Content:");
  const content = marker >= 0 ? text.slice(marker + "Markdown Content:".length) : text;
  return { title, description: "", content: content.trim() };
}

function parseReaderJson(data: unknown): { title: string; description: string; content: string } | null {
  const payload = isRecord(data) && isRecord(data.data) ? data.data : data;
  if (!isRecord(payload)) return null;
  const content = typeof payload.content === "string" ? payload.content : "";
  if (!content) return null;
  return {
    title: typeof payload.title === "string" ? payload.title : "",
    description: typeof payload.description === "string" ? payload.description : "",
    content,
  };
}

async function extractWithReader(url: string, deps: ExtractorDeps): Promise<ExtractedContent> {
  const headers: Record<string, string> = { Accept: "application/json" };
  if (deps.readerApiKey) headers.Authorization = `Bearer ${deps.readerApiKey}`;

  const response = await fetchWithTimeout(
    `${READER_ENDPOINT}${url}`,
    { headers },
    READER_TIMEOUT_MS,
    "reader",
    deps.fetchFn
  );
  if (!response.ok) {
    throw new Error(`reader returned HTTP ${response.status}`);
  }

  const raw = await response.text();
  let parsed: { title: string; description: string; content: string } | null = null;
  try {
    parsed = parseReaderJson(JSON.parse(raw));
  } catch {
    parsed = parseReaderText(raw);
  }
  if (!parsed || parsed.content.length < 50) {
    throw new Error("reader returned too little content");
  }

  const headings = (parsed.content.match(/^#{1,6}\s+.+$/gm) ?? [])
    .map((line) => line.replace(/^#+\s*/, "").trim())
    .slice(0, 20);
  const content = capContent(parsed.content);
  return {
    url,
    title: collapse(parsed.title) || headings[0] || url,
    description: collapse(parsed.description),
    content,
    headings,
    keywords: extractFrequentKeywords(parsed.content),
    links: [],
    wordCount: countWords(content),
    method: "reader",
    success: true,
  };
}

// ---------------------------------------------------------------------------
// Direct fetch + Readability
// ---------------------------------------------------------------------------

export function parseHtmlDocument(html: string, url: string): ExtractedContent {
  const dom = new JSDOM(html, { url });
  const doc = dom.window.document;
  const origin = new URL(url).origin;

  const metaContent = (selector: string) =>
    collapse(doc.querySelector(selector)?.getAttribute("content") ?? "");
  const description =
    metaContent('meta[name="description"]') || metaContent('meta[property="og:description"]');
  const metaKeywords = metaContent('meta[name="keywords"]')
    .split(",")
    .map((keyword) => keyword.trim())
    .filter(Boolean);

  const headings = Array.from(doc.querySelectorAll("h1, h2, h3, h4, h5, h6"))
    .map((node) => collapse(node.textContent ?? ""))
    .filter(Boolean)
    .slice(0, 20);

  const links: ExtractedLink[] = [];
  for (const anchor of Array.from(doc.querySelectorAll("a[href]"))) {
    if (links.length >= 20) break;
    const rawHref = anchor.getAttribute("href") ?? "";
    const text = collapse(anchor.textContent ?? "");
    if (!text || rawHref.startsWith("#") || rawHref.startsWith("javascript:")) continue;
    let href: string;
    try {
      href = new URL(rawHref, url).toString();
    } catch {
      continue;
    }
    links.push({ href, text, internal: href.startsWith(origin) });
  }

  const fallbackTitle =
    collapse(doc.querySelector("title")?.textContent ?? "") ||
    collapse(doc.querySelector("h1")?.textContent ?? "");

  // Readability rewrites the document it is given.
  const article = new Readability(new JSDOM(html, { url }).window.document).parse();
  const text = article?.textContent ?? doc.body?.textContent ?? "";
  const content = capContent(text.replace(/[ \t]+/g, " ").replace(/\n\s*\n/g, "\n\n"));

  return {
    url,
    title: collapse(article?.title ?? "") || fallbackTitle || url,
    description: description || collapse(article?.excerpt ?? ""),
    content,
    headings,
    keywords: metaKeywords.length > 0 ? metaKeywords.slice(0, 10) : extractFrequentKeywords(text),
    links,
    wordCount: countWords(content),
    method: "direct",
    success: content.length > 0,
  };
}

async function extractDirect(url: string, deps: ExtractorDeps): Promise<ExtractedContent> {
  const response = await fetchWithTimeout(
    url,
    { headers: { "User-Agent": BROWSER_USER_AGENT, Accept: "text/html,application/xhtml+xml" } },
    DIRECT_TIMEOUT_MS,
    "direct-fetch",
    deps.fetchFn
  );
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }
  const extracted = parseHtmlDocument(await response.text(), url);
  if (!extracted.success) {
    throw new Error("page has no readable content");
  }
  return extracted;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Reader API first, then a direct fetch; never throws. */
export async function extractUrlContent(
  url: string,
  deps: ExtractorDeps = {}
): Promise<ExtractedContent> {
  const errors: string[] = [];
  try {
    const result = await extractWithReader(url, deps);
    console.log(`[content-extractor] reader ok url=${url} words=${result.wordCount}`);
    return result;
  } catch (err) {
    errors.push(`reader: ${extractErrorMessage(err)}`);
  }

  try {
    const result = await extractDirect(url, deps);
    console.log(`[content-extractor] direct ok url=${url} words=${result.wordCount}`);
    return result;
  } catch (err) {
    errors.push(`direct: ${extractErrorMessage(err)}`);
  }

  console.warn(`[content-extractor] all methods failed url=${url}: ${errors.join("; ")}`);
  return fallbackContent(url, errors.join("; "));
}

/** Sequential by design of the pipeline; capped at five URLs. */
export async function extractMultipleUrls(
  urls: string[],
  deps: ExtractorDeps = {},
  max = MAX_SOURCE_URLS
): Promise<ExtractedContent[]> {
  const results: ExtractedContent[] = [];
  for (const url of urls.slice(0, max)) {
    results.push(await extractUrlContent(url, deps));
  }
  return results;
}

export function combineExtractedContents(list: ExtractedContent[]): CombinedContent {
  const successful = list.filter((item) => item.success);
  const keywords: string[] = [];
  for (const item of successful) {
    for (const keyword of item.keywords) {
      if (!keywords.includes(keyword)) keywords.push(keyword);
    }
  }

  return {
    titles: successful.map((item) => item.title),
    contents: successful.map((item) => item.content.slice(0, MAX_COMBINED_SOURCE_CHARS)),
    keywords: keywords.slice(0, 15),
    methods: list.map((item) => item.method),
    summaries: successful.map((item) => item.description || item.content.slice(0, 200)),
    totalSources: list.length,
    successfulSources: successful.length,
    successRate: list.length > 0 ? Math.round((successful.length / list.length) * 100) : 0,
  };
}

/** The "SOURCE MATERIAL" block handed to the model. */
export function buildSourceContext(combined: CombinedContent | null, keywords: string[]): string {
  const keywordLine = `Keywords: ${keywords.length > 0 ? keywords.join(", ") : "none provided"}`;
  if (!combined || combined.successfulSources === 0) {
    return keywordLine;
  }

  const parts = [
    `Multi-URL Analysis (${combined.successfulSources} sources)`,
    ...combined.contents.map(
      (content, i) => `Source ${i + 1} (${combined.titles[i]}):\n${content}`
    ),
  ];
  if (combined.keywords.length > 0) {
    parts.push(`Keywords found in sources: ${combined.keywords.join(", ")}`);
  }
  parts.push(keywordLine);
  return parts.join("\n\n");
}

export function summarizeExtraction(list: ExtractedContent[]): ExtractionSummary {
  const combined = combineExtractedContents(list);
  return {
    sources: list.map((item) => ({
      url: item.url,
      title: item.title,
      method: item.method,
      success: item.success,
    })),
    keywords: combined.keywords,
    successRate: combined.successRate,
  };
}
