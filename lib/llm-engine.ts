import { isUsableApiKey, loadAppConfig, type AppConfig } from "./config";
import { buildFallbackArticle, parseArticleReply } from "./article-parser";
import { ConfigurationError } from "./errors";
import { extractErrorMessage, fetchWithTimeout, isRecord, readApiError, type FetchFn } from "./http";
import { getPromotionContext } from "./promotions";
import {
  buildArticleSystemPrompt,
  buildArticleUserPrompt,
  usesCryptoVoice,
} from "./prompts/article";
import { buildLinkIntegrationPrompt, LINK_EDITOR_SYSTEM_PROMPT } from "./prompts/link-integration";
import { resolvePromotionName } from "./request";
import type { ArticleDraft, GenerationRequest } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type ChatCallError = Error & { status?: number; model?: string };

export interface ChatCompletionOptions {
  maxTokens?: number;
}

export type ChatCompletionFn = (
  systemPrompt: string,
  userPrompt: string,
  options?: ChatCompletionOptions
) => Promise<string>;

export interface ArticleGenerationOutcome {
  draft: ArticleDraft;
  usedFallback: boolean;
  error?: string;
}

export interface LinkIntegrationOutcome {
  draft: ArticleDraft;
  integrated: boolean;
  linksFound: number;
  error?: string;
}

// ---------------------------------------------------------------------------
// Chat client
// ---------------------------------------------------------------------------

export function assertChatConfigured(config: AppConfig): void {
  if (!isUsableApiKey(config.openaiApiKey)) {
    throw new ConfigurationError(
      "OpenAI API key is missing or still a placeholder.",
      "Add a valid OPENAI_API_KEY to .env.local and restart the server."
    );
  }
}

function readReplyText(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices)) return "";
  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return "";
  return typeof choice.message.content === "string" ? choice.message.content : "";
}

export function createChatCompletion(
  config: AppConfig = loadAppConfig(),
  fetchFn: FetchFn = fetch
): ChatCompletionFn {
  assertChatConfigured(config);
  const endpoint = `${config.openaiBaseUrl}/chat/completions`;

  return async (systemPrompt, userPrompt, options = {}) => {
    const startedAt = Date.now();
    const response = await fetchWithTimeout(
      endpoint,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${config.openaiApiKey}`,
        },
        body: JSON.stringify({
          model: config.chatModel,
          max_tokens: options.maxTokens ?? config.maxTokens,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
        }),
      },
      config.chatTimeoutMs,
      "chat-completion",
      fetchFn
    );

    if (!response.ok) {
      const { message } = await readApiError(response);
      const error: ChatCallError = new Error(`Chat completion failed: ${message}`);
      error.status = response.status;
      error.model = config.chatModel;
      throw error;
    }

    const text = readReplyText(await response.json().catch(() => null)).trim();
    if (!text) {
      const error: ChatCallError = new Error("Chat completion returned no text");
      error.status = response.status;
      error.model = config.chatModel;
      throw error;
    }

    console.log(
      `[llm-engine] model=${config.chatModel} chars=${text.length} elapsedMs=${Date.now() - startedAt}`
    );
    return text;
  };
}

// ---------------------------------------------------------------------------
// Article generation
// ---------------------------------------------------------------------------

export interface GenerateArticleDeps {
  chat: ChatCompletionFn;
  config: Pick<AppConfig, "cryptoVoiceMode">;
}

/** One model call, no retry: any failure returns the canned fallback article. */
export async function generateArticle(
  request: GenerationRequest,
  sourceContext: string,
  deps: GenerateArticleDeps
): Promise<ArticleGenerationOutcome> {
  const promotionName = resolvePromotionName(request);
  const hasPromotion = promotionName !== null && request.promotion.style !== "none";
  const cryptoVoice = usesCryptoVoice(deps.config.cryptoVoiceMode, request.keywords);

  try {
    const reply = await deps.chat(
      buildArticleSystemPrompt(request.tone, cryptoVoice),
      buildArticleUserPrompt({
        request,
        sourceContext,
        promotionName,
        promotionContext: promotionName ? getPromotionContext(promotionName) : "",
        cryptoVoiceMode: deps.config.cryptoVoiceMode,
      })
    );
    const draft = parseArticleReply(reply, {
      keywords: request.keywords,
      language: request.language,
      tone: request.tone,
      maxSections: request.sectionCount + (hasPromotion ? 1 : 0),
    });
    return { draft, usedFallback: false };
  } catch (err) {
    const message = extractErrorMessage(err);
    console.warn(`[llm-engine] generation failed, using fallback article: ${message}`);
    return {
      draft: buildFallbackArticle(request.keywords, request.language, request.tone),
      usedFallback: true,
      error: message,
    };
  }
}

// ---------------------------------------------------------------------------
// Link integration
// ---------------------------------------------------------------------------

export function countAnchors(draft: ArticleDraft): number {
  return draft.sections.reduce(
    (sum, section) => sum + (section.content.match(/<a\s+href=/gi)?.length ?? 0),
    0
  );
}

/**
 * Follow-up call that weaves the supplied links into an existing draft.
 * Title, meta description, slug and CTA are kept from the original.
 */
export async function integrateLinks(
  draft: ArticleDraft,
  linksText: string,
  chat: ChatCompletionFn
): Promise<LinkIntegrationOutcome> {
  if (!linksText.trim()) {
    return { draft, integrated: false, linksFound: countAnchors(draft), error: "No links supplied." };
  }

  try {
    const reply = await chat(LINK_EDITOR_SYSTEM_PROMPT, buildLinkIntegrationPrompt(draft, linksText));
    if (!/^## /m.test(reply)) {
      throw new Error("reply has no section headings");
    }
    const parsed = parseArticleReply(reply, {
      keywords: draft.focusKeywords,
      language: draft.language,
      tone: draft.tone,
      maxSections: draft.sections.length,
    });
    const updated: ArticleDraft = {
      ...draft,
      sections: parsed.sections,
      totalWordCount: parsed.totalWordCount,
      rawContent: parsed.rawContent,
    };
    const linksFound = countAnchors(updated);
    console.log(`[llm-engine] link integration done, anchors=${linksFound}`);
    return { draft: updated, integrated: true, linksFound };
  } catch (err) {
    const message = extractErrorMessage(err);
    console.warn(`[llm-engine] link integration failed: ${message}`);
    return { draft, integrated: false, linksFound: countAnchors(draft), error: message };
  }
}
