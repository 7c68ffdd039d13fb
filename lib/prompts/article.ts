import type { CryptoVoiceMode } from "../config";
import type { ArticleTone, GenerationRequest } from "../types";

const TONE_PERSONALITIES: Record<ArticleTone, string> = {
  Professional:
    "Professional, informative, and authoritative tone suitable for business readers. Formal structure, industry terminology, objective and concise.",
  Conversational:
    "Friendly, conversational, and approachable tone for general readers. Everyday language, relatable examples, easy to follow.",
  Academic:
    "Academic, scholarly, and research-oriented tone with formal language and detailed analysis.",
  Technical:
    "Technical, precise, and detailed tone focusing on specifications and technical accuracy.",
  Creative:
    "Creative, engaging, and imaginative tone that captures reader attention with vivid language.",
};

const CRYPTO_VOICE = `Write as an authoritative source on cryptocurrency topics. Use a casual, personable voice and crypto slang where it fits naturally (HODL, diamond hands, DYOR, "not financial advice"). Be talkative with quick, clever humor. Address the reader as "you", never refer to yourself and never ask the reader questions directly.`;

const FINANCE_VOCABULARY = [
  "bitcoin",
  "crypto",
  "blockchain",
  "defi",
  "nft",
  "trading",
  "investment",
  "finance",
  "financial",
  "market",
  "price",
  "altcoin",
  "ethereum",
  "wallet",
  "exchange",
  "staking",
  "mining",
  "portfolio",
  "stocks",
  "forex",
  "web3",
  "token",
  "memecoin",
];

export interface ExternalLink {
  url: string;
  description: string;
}

export interface ArticlePromptInput {
  request: GenerationRequest;
  sourceContext: string;
  promotionName: string | null;
  promotionContext: string;
  cryptoVoiceMode: CryptoVoiceMode;
}

export function isFinanceTopic(keywords: string[]): boolean {
  const text = keywords.join(" ").toLowerCase();
  return FINANCE_VOCABULARY.some((word) => text.includes(word));
}

export function usesCryptoVoice(mode: CryptoVoiceMode, keywords: string[]): boolean {
  if (mode === "always") return true;
  if (mode === "off") return false;
  return isFinanceTopic(keywords);
}

/** `url - description` per line; a bare URL is allowed. */
export function parseExternalLinks(text: string): ExternalLink[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const separator = line.indexOf(" - ");
      if (separator === -1) return { url: line, description: "" };
      return {
        url: line.slice(0, separator).trim(),
        description: line.slice(separator + 3).trim(),
      };
    });
}

export function buildArticleSystemPrompt(tone: ArticleTone, cryptoVoice: boolean): string {
  const personality = cryptoVoice
    ? `You are a crypto expert writer. ${CRYPTO_VOICE}\nKeep the overall ${tone.toLowerCase()} structure while applying this voice.`
    : `You are an expert content writer. ${TONE_PERSONALITIES[tone]}`;

  return `${personality}

WRITING RULES:
- Write original content, using any source material only as a factual foundation
- Keep every number, date, price, statistic, quote and company name from the sources unchanged
- Write specific, natural headings; never use placeholder words such as "topic" or "the article"
- Use ## for section headings only
- No labels such as "Title:" or "Meta:"
- Produce exactly the number of sections requested, no more and no fewer`;
}

function buildLinksBlock(links: ExternalLink[]): string {
  if (links.length === 0) return "";
  const list = links
    .map((link) => (link.description ? `- ${link.url} (${link.description})` : `- ${link.url}`))
    .join("\n");
  return `EXTERNAL LINKS (use every link exactly once):
${list}
- Place each link inside a relevant paragraph with natural anchor text
- Use HTML: <a href="URL" target="_blank">anchor text</a>
- You have ${links.length} link${links.length === 1 ? "" : "s"} and must use all of them`;
}

function buildPromotionBlock(request: GenerationRequest, promotion: string): string {
  const transition = `After the main sections, add one more section:
- An ## section about ${promotion} that connects to the main subject: one sentence referencing the article's subject, then one to five factual, educational sentences about ${promotion}
- Keep the tone consistent with the rest of the article; it must not read like an advertisement
- Language: ${request.language}`;

  if (request.promotion.style === "cta_only") {
    return `${transition}
- Close with a single sentence: "Visit the ${promotion} official website."`;
  }

  return `${transition}
- Close with this call to action, reworded to flow naturally:
"If you're considering ${promotion}, read our ${promotion} price analysis and our step-by-step guide to buying ${promotion}.

Stay updated via the ${promotion} official website, X (Twitter), and Telegram channels.

Visit the ${promotion} official website."`;
}

export function buildArticleUserPrompt(input: ArticlePromptInput): string {
  const { request } = input;
  const keywords = request.keywords.length > 0 ? request.keywords.join(", ") : "the subject of the sources";
  const primary = request.keywords[0] || "the subject of the sources";
  const cryptoVoice = usesCryptoVoice(input.cryptoVoiceMode, request.keywords);
  const promotion =
    input.promotionName && request.promotion.style !== "none" ? input.promotionName : null;

  const blocks: string[] = [
    "TASK: Write an original, comprehensive article using the source material below as its factual foundation.",
    `SOURCE MATERIAL:\n${input.sourceContext}`,
    `REQUIREMENTS:
- Language: ${request.language}
- Voice: ${cryptoVoice ? "crypto expert (casual, authoritative, light slang)" : request.tone}
- Keywords to include naturally: ${keywords}
- Target length: about ${request.wordCountTarget} words
- Exactly ${request.sectionCount} main sections with ## headings`,
  ];

  if (request.focus) {
    blocks.push(`FOCUS:
- The article must center on: ${request.focus}
- Every section relates back to this angle
- Use it as the main lens for analysing ${primary}`);
  }
  if (request.additionalContent) {
    blocks.push(`ADDITIONAL NOTES FROM THE EDITOR:\n${request.additionalContent}`);
  }

  const linksBlock = buildLinksBlock(parseExternalLinks(request.externalLinks));
  if (linksBlock) blocks.push(linksBlock);

  if (promotion) {
    blocks.push(buildPromotionBlock(request, promotion));
    if (input.promotionContext) {
      blocks.push(`BACKGROUND ON ${promotion.toUpperCase()} (use for accuracy):\n${input.promotionContext}`);
    }
  }

  blocks.push(`OUTPUT FORMAT:
[Compelling title]
[Meta description, 120-160 characters]

## [Section 1 heading]
[Section 1 body]

## [Section 2 heading]
[Section 2 body]

Continue until there are exactly ${request.sectionCount} main sections${
    promotion ? `, add the ${promotion} section` : ""
  }, then stop.`);

  return blocks.join("\n\n");
}
