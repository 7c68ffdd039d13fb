import type { AppConfig } from "../config";
import {
  extractErrorMessage,
  fetchWithTimeout,
  isRecord,
  readApiError,
  type FetchFn,
} from "../http";
import { failure, isServerStatus, type ImageProviderAdapter, type ProviderOutcome } from "./types";

const CONTENT_POLICY_REGEX = /content[_ ]policy|safety system|moderation_blocked/i;

export function classifyOpenAiImageFailure(
  status: number,
  code: string,
  message: string
): ProviderOutcome {
  if (status === 429) {
    return failure("rate_limit", message, status);
  }
  if (CONTENT_POLICY_REGEX.test(code) || CONTENT_POLICY_REGEX.test(message)) {
    return failure("content_policy", message, status);
  }
  if (isServerStatus(status)) {
    return failure("transient", message, status);
  }
  return failure("other", message, status);
}

function readFirstImage(data: unknown): { url: string; revisedPrompt?: string } | null {
  if (!isRecord(data) || !Array.isArray(data.data)) return null;
  const first: unknown = data.data[0];
  if (!isRecord(first) || typeof first.url !== "string" || !first.url) return null;
  return {
    url: first.url,
    ...(typeof first.revised_prompt === "string" ? { revisedPrompt: first.revised_prompt } : {}),
  };
}

export function createOpenAiImageAdapter(
  config: AppConfig,
  fetchFn: FetchFn = fetch
): ImageProviderAdapter {
  const endpoint = `${config.openaiBaseUrl}/images/generations`;

  return {
    name: "openai",
    label: "OpenAI Images",
    model: config.dalleModel,
    maxPromptLength: 400,
    styleSuffix: "high quality digital art, professional illustration",
    shortPromptDetail: "detailed professional illustration, modern style",

    async generate(prompt: string): Promise<ProviderOutcome> {
      let response: Response;
      try {
        response = await fetchWithTimeout(
          endpoint,
          {
            method: "POST",
            headers: {
              "Content-Type": "application/json",
              Authorization: `Bearer ${config.openaiApiKey}`,
            },
            body: JSON.stringify({
              model: config.dalleModel,
              prompt,
              size: config.dalleSize,
              quality: config.dalleQuality,
              n: 1,
            }),
          },
          config.imageTimeoutMs,
          "openai-images",
          fetchFn
        );
      } catch (err) {
        return failure("transient", extractErrorMessage(err));
      }

      if (!response.ok) {
        const { message, code } = await readApiError(response);
        return classifyOpenAiImageFailure(response.status, code, message);
      }

      const image = readFirstImage(await response.json().catch(() => null));
      if (!image) {
        return failure("transient", "OpenAI returned no image URL", response.status);
      }
      return { ok: true, ...image };
    },
  };
}
