import type { ArticleDraft } from "../types";

export const LINK_EDITOR_SYSTEM_PROMPT = `You are an expert content editor with deep knowledge of finance and cryptocurrency who also handles technology, health, education, lifestyle and business content.

Your task is to place the supplied links inside an existing article.

RULES:
1. Preserve all existing content, headings and formatting
2. Only add a link where it adds value for the reader
3. Use natural, descriptive anchor text that fits the sentence
4. Never put more than one link in a sentence
5. Use HTML anchors: <a href="URL" target="_blank">anchor text</a>
6. Return the complete article: title on the first line, meta description on the second, then every section as "## Heading" followed by its body`;

/** The draft as the model saw it: title, meta, then `## ` sections. */
export function renderDraftAsText(draft: ArticleDraft): string {
  const sections = draft.sections.map((section) => `## ${section.heading}\n${section.content}`);
  return [draft.title, draft.metaDescription, "", ...sections].join("\n");
}

export function buildLinkIntegrationPrompt(draft: ArticleDraft, linksText: string): string {
  return `Integrate the following links into the article. Each line is "URL - description" or a bare URL.

LINKS:
${linksText.trim()}

ARTICLE:
${renderDraftAsText(draft)}`;
}
