import type { AppConfig } from "../config";
import {
  extractErrorMessage,
  fetchWithTimeout,
  isRecord,
  readApiError,
  type FetchFn,
} from "../http";
import { failure, isServerStatus, type ImageProviderAdapter, type ProviderOutcome } from "./types";

// Ark reports moderation hits as InputTextSensitiveContentDetected,
// OutputImageSensitiveContentDetected and similar codes.
const SENSITIVE_REGEX = /sensitive|content[_ ]policy|moderation/i;

export function classifySeedreamFailure(
  status: number,
  code: string,
  message: string
): ProviderOutcome {
  if (status === 429 || /ratelimit|rate limit|quota/i.test(code)) {
    return failure("rate_limit", message, status);
  }
  if (SENSITIVE_REGEX.test(code) || SENSITIVE_REGEX.test(message)) {
    return failure("content_policy", message, status);
  }
  if (isServerStatus(status)) {
    return failure("transient", message, status);
  }
  return failure("other", message, status);
}

function readImageUrl(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.data)) return "";
  const first: unknown = data.data[0];
  return isRecord(first) && typeof first.url === "string" ? first.url : "";
}

export function createSeedreamAdapter(
  config: AppConfig,
  fetchFn: FetchFn = fetch
): ImageProviderAdapter {
  const endpoint = `${config.seedreamBaseUrl}/images/generations`;

  return {
    name: "seedream",
    label: "SeeDream",
    model: config.seedreamModel,
    maxPromptLength: 800,
    styleSuffix: "high quality digital art, cinematic composition",
    shortPromptDetail: "cinematic style",

    async generate(prompt: string): Promise<ProviderOutcome> {
      let response: Response;
      try {
        response = await fetchWithTimeout(
          endpoint,
          {
            method: "POST",
            headers: {
              "Content-Type": "application/json",
              Authorization: `Bearer ${config.arkApiKey}`,
            },
            body: JSON.stringify({
              model: config.seedreamModel,
              prompt,
              size: config.seedreamSize,
              response_format: "url",
              watermark: false,
            }),
          },
          config.imageTimeoutMs,
          "seedream",
          fetchFn
        );
      } catch (err) {
        return failure("transient", extractErrorMessage(err));
      }

      if (!response.ok) {
        const { message, code } = await readApiError(response);
        return classifySeedreamFailure(response.status, code, message);
      }

      const url = readImageUrl(await response.json().catch(() => null));
      if (!url) {
        return failure("transient", "SeeDream returned no image URL", response.status);
      }
      return { ok: true, url };
    },
  };
}
