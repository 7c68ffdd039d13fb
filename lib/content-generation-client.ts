import type { ImageProviderName } from "./config";
import { isRecord } from "./http";
import type { GenerationResult } from "./pipeline";
import type {
  ArticleLanguage,
  ArticleTone,
  ImageResult,
  ImageTone,
  PromotionStyle,
} from "./types";

export interface StudioFormState {
  keywords: string;
  sourceUrls: string;
  language: ArticleLanguage;
  tone: ArticleTone;
  focus: string;
  additionalContent: string;
  sectionCount: number;
  promotionName: string;
  promotionStyle: PromotionStyle;
  promotionCustomText: string;
  imageTone: ImageTone;
  imageProvider: ImageProviderName;
  includeImages: boolean;
  internalLinks: string;
  externalLinks: string;
}

export const DEFAULT_FORM: StudioFormState = {
  keywords: "",
  sourceUrls: "",
  language: "English",
  tone: "Professional",
  focus: "",
  additionalContent: "",
  sectionCount: 4,
  promotionName: "None",
  promotionStyle: "none",
  promotionCustomText: "",
  imageTone: "professional",
  imageProvider: "openai",
  includeImages: true,
  internalLinks: "",
  externalLinks: "",
};

/** Body for POST /api/generate. */
export function buildGeneratePayload(form: StudioFormState) {
  const promotionActive =
    form.promotionStyle !== "none" &&
    (form.promotionCustomText.trim() !== "" || form.promotionName !== "None");

  return {
    keywords: form.keywords.trim(),
    sourceUrls: form.sourceUrls.trim(),
    language: form.language,
    tone: form.tone,
    focus: form.focus.trim(),
    additionalContent: form.additionalContent.trim(),
    sectionCount: form.sectionCount,
    promotion: promotionActive
      ? {
          name: form.promotionName,
          style: form.promotionStyle,
          customText: form.promotionCustomText.trim(),
        }
      : { name: "None", style: "none", customText: "" },
    imageTone: form.imageTone,
    imageProvider: form.imageProvider,
    includeImages: form.includeImages,
    internalLinks: form.internalLinks.trim(),
    externalLinks: form.externalLinks.trim(),
  };
}

export interface ApiProblem {
  message: string;
  remediation: string | null;
}

export function describeApiError(body: unknown, fallback: string): ApiProblem {
  if (!isRecord(body)) return { message: fallback, remediation: null };
  const message = typeof body.error === "string" && body.error ? body.error : fallback;
  const remediation = typeof body.remediation === "string" ? body.remediation : null;
  return { message, remediation };
}

export function isGenerationResult(value: unknown): value is GenerationResult {
  return (
    isRecord(value) &&
    isRecord(value.draft) &&
    Array.isArray(value.draft.sections) &&
    isRecord(value.seo) &&
    isRecord(value.request) &&
    Array.isArray(value.images)
  );
}

export function isImageResult(value: unknown): value is ImageResult {
  return (
    isRecord(value) &&
    typeof value.url === "string" &&
    typeof value.sourcePrompt === "string" &&
    typeof value.isPlaceholder === "boolean" &&
    typeof value.index === "number"
  );
}

/** Replaces the image with the same index, or appends it. */
export function replaceImage(images: ImageResult[], image: ImageResult): ImageResult[] {
  return images.some((item) => item.index === image.index)
    ? images.map((item) => (item.index === image.index ? image : item))
    : [...images, image];
}

export function filenameFromDisposition(header: string | null, fallback: string): string {
  const match = header?.match(/filename="([^"]+)"/);
  return match?.[1] ?? fallback;
}

export class ApiRequestError extends Error {
  readonly remediation: string | null;

  constructor(problem: ApiProblem) {
    super(problem.message);
    this.name = "ApiRequestError";
    this.remediation = problem.remediation;
  }
}

/** POST JSON and return the parsed body; non-2xx responses throw ApiRequestError. */
export async function postJson(
  url: string,
  payload: unknown,
  timeoutMs: number,
  fetchFn: typeof fetch = fetch
): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchFn(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });
    const body: unknown = await res.json().catch(() => null);
    if (!res.ok) {
      throw new ApiRequestError(describeApiError(body, `Request failed (${res.status})`));
    }
    return body;
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new ApiRequestError({
        message: `Timed out after ${Math.round(timeoutMs / 1000)}s`,
        remediation: null,
      });
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
