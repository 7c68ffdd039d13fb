import type { GenerationResult } from "./pipeline";
import type { ReadingLevel } from "./seo-tools";
import { HTML_TAG } from "./text";
import type { ArticleLanguage } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type InlineNode =
  | { type: "text"; text: string }
  | { type: "link"; text: string; href: string; external: boolean };

export interface ImageBlock {
  type: "image";
  url: string;
  alt: string;
  caption: string;
  isPlaceholder: boolean;
  localPath?: string;
}

export type Block =
  | { type: "heading"; level: 2 | 3; text: string }
  | { type: "paragraph"; children: InlineNode[] }
  | { type: "list"; ordered: boolean; items: InlineNode[][] }
  | ImageBlock
  | { type: "cta"; children: InlineNode[] };

export interface ArticleDocument {
  title: string;
  description: string;
  keywords: string[];
  language: ArticleLanguage;
  slug: string;
  readTimeMinutes: number;
  wordCount: number;
  seoScore: number;
  readingLevel: ReadingLevel;
  generatedAt: string;
  cover?: ImageBlock;
  blocks: Block[];
}

const WORDS_PER_MINUTE = 225;
const LINK_PATTERN =
  /\[([^\]]+)\]\(([^)\s]+)\)|<a\s[^>]*?href\s*=\s*["']([^"']*)["'][^>]*>([\s\S]*?)<\/a>/gi;

// ---------------------------------------------------------------------------
// Inline parsing
// ---------------------------------------------------------------------------

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  "#39": "'",
  nbsp: " ",
};

function stripMarkup(text: string): string {
  return text
    .replace(HTML_TAG, "")
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (_, name: string) => ENTITIES[name] ?? "")
    .replace(/\*\*/g, "");
}

export function isSafeHref(href: string): boolean {
  return /^(https?:\/\/|\/|#)/i.test(href.trim());
}

function pushText(nodes: InlineNode[], text: string) {
  if (!text) return;
  const last = nodes[nodes.length - 1];
  if (last && last.type === "text") {
    last.text += text;
  } else {
    nodes.push({ type: "text", text });
  }
}

/** Markdown links and `<a>` anchors become link nodes; other markup is dropped. */
export function parseInline(source: string): InlineNode[] {
  const nodes: InlineNode[] = [];
  let cursor = 0;

  for (const match of source.matchAll(LINK_PATTERN)) {
    const start = match.index ?? 0;
    pushText(nodes, stripMarkup(source.slice(cursor, start)));
    cursor = start + match[0].length;

    const href = (match[2] ?? match[3] ?? "").trim();
    const text = stripMarkup(match[1] ?? match[4] ?? "").trim();
    if (!text) continue;
    if (isSafeHref(href)) {
      nodes.push({ type: "link", text, href, external: /^https?:\/\//i.test(href) });
    } else {
      pushText(nodes, text);
    }
  }
  pushText(nodes, stripMarkup(source.slice(cursor)));
  return nodes;
}

export function inlineText(nodes: InlineNode[]): string {
  return nodes.map((node) => node.text).join("");
}

// ---------------------------------------------------------------------------
// Block parsing
// ---------------------------------------------------------------------------

const BULLET = /^[-*+]\s+/;
const NUMBERED = /^\d+[.)]\s+/;

/** Splits one section body into headings, lists and paragraphs. */
export function parseSectionBody(content: string): Block[] {
  const blocks: Block[] = [];
  const lines = content
    .replace(/\r/g, "")
    .replace(/<\/?p(?:\s[^<>]*)?>/gi, "\n\n")
    .replace(/<br\s*\/?>/gi, "\n")
    .split("\n");

  let paragraph: string[] = [];
  const flushParagraph = () => {
    const text = paragraph.join(" ").trim();
    paragraph = [];
    if (!text) return;
    const children = parseInline(text);
    if (inlineText(children).trim()) blocks.push({ type: "paragraph", children });
  };

  let i = 0;
  while (i < lines.length) {
    const line = lines[i].trim();

    if (!line) {
      flushParagraph();
      i++;
      continue;
    }

    const heading = line.match(/^#{3,6}\s+(.+)$/);
    if (heading) {
      flushParagraph();
      blocks.push({ type: "heading", level: 3, text: stripMarkup(heading[1]).trim() });
      i++;
      continue;
    }

    if (BULLET.test(line) || NUMBERED.test(line)) {
      flushParagraph();
      const ordered = NUMBERED.test(line);
      const marker = ordered ? NUMBERED : BULLET;
      const items: InlineNode[][] = [];
      while (i < lines.length && marker.test(lines[i].trim())) {
        items.push(parseInline(lines[i].trim().replace(marker, "")));
        i++;
      }
      blocks.push({ type: "list", ordered, items });
      continue;
    }

    paragraph.push(line);
    i++;
  }
  flushParagraph();
  return blocks;
}

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export function readTimeMinutes(wordCount: number): number {
  return Math.max(1, Math.round(wordCount / WORDS_PER_MINUTE));
}

export function buildArticleDocument(result: GenerationResult): ArticleDocument {
  const { draft, seo } = result;
  const blocks: Block[] = [];

  for (const section of draft.sections) {
    blocks.push({ type: "heading", level: 2, text: section.heading.replace(/\*\*/g, "").trim() });
    blocks.push(...parseSectionBody(section.content));
  }
  if (draft.cta.trim()) {
    blocks.push({ type: "cta", children: parseInline(draft.cta) });
  }

  const coverImage = result.images.find((image) => image.index === 0) ?? result.images[0];
  const cover: ImageBlock | undefined = coverImage
    ? {
        type: "image",
        url: coverImage.url,
        alt: coverImage.altText,
        caption: coverImage.caption,
        isPlaceholder: coverImage.isPlaceholder,
        ...(coverImage.localPath ? { localPath: coverImage.localPath } : {}),
      }
    : undefined;

  return {
    title: draft.title,
    description: draft.metaDescription,
    keywords: seo.targetKeywords,
    language: draft.language,
    slug: draft.slug,
    readTimeMinutes: readTimeMinutes(seo.wordCount),
    wordCount: seo.wordCount,
    seoScore: seo.seoScore,
    readingLevel: seo.readability.readingLevel,
    generatedAt: result.generatedAt,
    ...(cover ? { cover } : {}),
    blocks,
  };
}
