import type { ArticleDocument, Block, ImageBlock, InlineNode } from "../document-model";
import type { ArticleLanguage } from "../types";

const LANGUAGE_CODES: Record<ArticleLanguage, string> = {
  English: "en",
  French: "fr",
  Turkish: "tr",
  Spanish: "es",
  German: "de",
};

const CSS = `
* { margin: 0; padding: 0; box-sizing: border-box; }
body { font-family: Georgia, "Times New Roman", serif; line-height: 1.6; color: #2c3e50; background: #f8f9fa; }
.article { max-width: 800px; margin: 0 auto; background: #fff; box-shadow: 0 4px 6px rgba(0, 0, 0, 0.1); }
.article-header { padding: 3rem 2rem 2rem; text-align: center; border-bottom: 1px solid #e9ecef; }
.article-title { font-size: 2.5rem; font-weight: 700; margin-bottom: 1rem; line-height: 1.2; }
.meta-description { font-size: 1.1rem; color: #6c757d; margin-bottom: 1.5rem; font-style: italic; }
.article-info { display: flex; justify-content: center; gap: 2rem; font-size: 0.9rem; }
.article-info span { color: #667eea; padding: 0.3rem 0.8rem; border-radius: 15px; border: 1px solid rgba(102, 126, 234, 0.2); }
.cover-image { text-align: center; margin: 1.5rem 0; }
.cover-image img { max-width: 100%; height: auto; border-radius: 8px; }
.article-content { padding: 3rem 2rem; }
.article-content h2 { font-size: 1.8rem; margin: 2rem 0 1rem; color: #34495e; }
.article-content h3 { font-size: 1.3rem; margin: 1.5rem 0 0.75rem; }
.article-content p, .article-content ul, .article-content ol { margin-bottom: 1.2rem; font-size: 1.05rem; }
.article-content ul, .article-content ol { padding-left: 1.5rem; }
.article-content a { color: #667eea; text-decoration: underline; }
.cta-section { margin: 2rem; padding: 1.5rem; border-radius: 8px; background: #f1f3ff; text-align: center; font-weight: 600; }
`.trim();

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** JSON-LD can sit inside a script tag only if no `<` survives. */
export function serializeJsonLd(schema: Record<string, unknown>): string {
  return JSON.stringify(schema, null, 2).replace(/</g, "\\u003c");
}

function renderInline(nodes: InlineNode[]): string {
  return nodes
    .map((node) => {
      if (node.type === "text") return escapeHtml(node.text);
      const target = node.external ? ' target="_blank" rel="noopener noreferrer"' : "";
      return `<a href="${escapeHtml(node.href)}"${target}>${escapeHtml(node.text)}</a>`;
    })
    .join("");
}

function renderImage(image: ImageBlock): string {
  return `<figure class="cover-image"><img src="${escapeHtml(image.url)}" alt="${escapeHtml(
    image.alt
  )}" loading="lazy"></figure>`;
}

function renderBlock(block: Block): string {
  switch (block.type) {
    case "heading":
      return `<h${block.level}>${escapeHtml(block.text)}</h${block.level}>`;
    case "paragraph":
      return `<p>${renderInline(block.children)}</p>`;
    case "list": {
      const tag = block.ordered ? "ol" : "ul";
      const items = block.items.map((item) => `<li>${renderInline(item)}</li>`).join("");
      return `<${tag}>${items}</${tag}>`;
    }
    case "image":
      return renderImage(block);
    case "cta":
      return "";
  }
}

export function renderHtml(doc: ArticleDocument, schema: Record<string, unknown>): string {
  const title = escapeHtml(doc.title);
  const description = escapeHtml(doc.description);
  const body = doc.blocks.map(renderBlock).filter(Boolean).join("\n");
  const cta = doc.blocks
    .flatMap((block) => (block.type === "cta" ? [`<div class="cta-section"><p>${renderInline(block.children)}</p></div>`] : []))
    .join("\n");

  return `<!DOCTYPE html>
<html lang="${LANGUAGE_CODES[doc.language]}">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${title}</title>
<meta name="description" content="${description}">
<meta name="keywords" content="${escapeHtml(doc.keywords.join(", "))}">
<meta property="og:title" content="${title}">
<meta property="og:description" content="${description}">
<meta property="og:type" content="article">
<script type="application/ld+json">
${serializeJsonLd(schema)}
</script>
<style>
${CSS}
</style>
</head>
<body>
<article class="article">
<header class="article-header">
<h1 class="article-title">${title}</h1>
<p class="meta-description">${description}</p>
<div class="article-info"><span>${doc.wordCount} words</span><span>${doc.readTimeMinutes} min read</span></div>
</header>
${doc.cover ? renderImage(doc.cover) : ""}
<div class="article-content">
${body}
</div>
<footer class="article-footer">
${cta}
</footer>
</article>
</body>
</html>
`;
}
