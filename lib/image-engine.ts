import fs from "fs/promises";
import path from "path";
import {
  isProviderConfigured,
  loadAppConfig,
  type AppConfig,
  type ImageProviderName,
} from "./config";
import { ConfigurationError, ValidationError } from "./errors";
import { stableHash } from "./hash";
import { extractErrorMessage, fetchWithTimeout, wait, type FetchFn } from "./http";
import { buildCoverPrompt, truncateAtComma } from "./image-prompt";
import { createOpenAiImageAdapter } from "./image-providers/openai";
import { createSeedreamAdapter } from "./image-providers/seedream";
import type {
  ImageProviderAdapter,
  ProviderFailureKind,
} from "./image-providers/types";
import type { ArticleDraft, ImageResult, ImageTone } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ImageCache {
  save(url: string, index: number): Promise<string>;
}

export interface ImageEngineOptions {
  adapter: ImageProviderAdapter;
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  cache?: ImageCache | null;
  now?: () => Date;
  /** Highest number of images per article; indexes run from 0 to maxImages - 1. */
  maxImages?: number;
}

export interface GenerateImageOptions {
  /** Short human label for caption and alt text; defaults to the prompt. */
  subject?: string;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 2000;
export const DEFAULT_MAX_IMAGES = 5;
const SHORT_PROMPT_LENGTH = 50;

// ---------------------------------------------------------------------------
// Prompt shaping
// ---------------------------------------------------------------------------

function capitalize(text: string): string {
  return text ? text.charAt(0).toUpperCase() + text.slice(1) : text;
}

/**
 * Fits the prompt into the provider's limit. The body is cut first so the
 * style suffix always survives.
 */
export function normalizePrompt(prompt: string, adapter: ImageProviderAdapter): string {
  let body = prompt.replace(/\s+/g, " ").trim().replace(/[,.\s]+$/, "");
  if (body.length < SHORT_PROMPT_LENGTH) {
    body = `${body}, ${adapter.shortPromptDetail}`;
  }
  const suffix = `, ${adapter.styleSuffix}`;
  const budget = Math.max(0, adapter.maxPromptLength - suffix.length);
  if (body.length > budget) {
    body = truncateAtComma(body, budget);
  }
  return capitalize(`${body}${suffix}`);
}

export function placeholderImageUrl(prompt: string): string {
  const seed = stableHash(prompt) % 1000;
  return `https://picsum.photos/seed/${seed}/800/600`;
}

function failureReason(
  kind: ProviderFailureKind,
  adapter: ImageProviderAdapter,
  attempts: number,
  message: string
): string {
  switch (kind) {
    case "transient":
      return `${adapter.label} kept failing with server or connection errors after ${attempts} attempt${
        attempts === 1 ? "" : "s"
      } (${message}). Try regenerating in a few minutes.`;
    case "rate_limit":
      return `${adapter.label} rate limit exceeded. Wait a moment before regenerating.`;
    case "content_policy":
      return `The prompt was rejected by ${adapter.label}'s content policy. Edit the prompt and regenerate.`;
    case "other":
      return `${adapter.label} image generation failed: ${message}`;
  }
}

function describe(prompt: string, options: GenerateImageOptions, tone: ImageTone) {
  const subject = (options.subject || "").trim() || truncateAtComma(prompt, 80);
  return {
    caption: subject,
    altText: `${capitalize(tone)} illustration: ${subject}`.slice(0, 125),
  };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class ImageEngine {
  readonly provider: ImageProviderName;
  readonly model: string;
  private readonly adapter: ImageProviderAdapter;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly cache: ImageCache | null;
  private readonly now: () => Date;
  private readonly maxImages: number;

  constructor(options: ImageEngineOptions) {
    this.adapter = options.adapter;
    this.provider = options.adapter.name;
    this.model = options.adapter.model;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.sleep = options.sleep ?? wait;
    this.cache = options.cache ?? null;
    this.now = options.now ?? (() => new Date());
    this.maxImages = Math.max(1, options.maxImages ?? DEFAULT_MAX_IMAGES);
  }

  /** Never throws: any generation failure degrades to a placeholder. */
  async generateImage(
    prompt: string,
    tone: ImageTone,
    index: number,
    options: GenerateImageOptions = {}
  ): Promise<ImageResult> {
    const promptUsed = prompt.trim() ? normalizePrompt(prompt, this.adapter) : "";
    const base = {
      promptUsed,
      sourcePrompt: prompt.trim(),
      provider: this.provider,
      model: this.model,
      tone,
      index,
      ...describe(prompt, options, tone),
      createdAt: this.now().toISOString(),
    };

    if (!promptUsed) {
      return {
        ...base,
        url: placeholderImageUrl(prompt),
        isPlaceholder: true,
        reason: "Image prompt is empty.",
        attempts: 0,
      };
    }

    let attempts = 0;
    let reason = "";
    while (attempts < this.maxAttempts) {
      attempts += 1;
      console.log(
        `[image-engine] provider=${this.provider} model=${this.model} index=${index} attempt=${attempts}/${this.maxAttempts}`
      );
      const outcome = await this.adapter.generate(promptUsed).catch((err: unknown) => ({
        ok: false as const,
        kind: "other" as const,
        message: extractErrorMessage(err),
      }));

      if (outcome.ok) {
        const localPath = await this.cacheImage(outcome.url, index);
        return {
          ...base,
          url: outcome.url,
          isPlaceholder: false,
          attempts,
          ...(outcome.revisedPrompt ? { revisedPrompt: outcome.revisedPrompt } : {}),
          ...(localPath ? { localPath } : {}),
        };
      }

      console.warn(
        `[image-engine] attempt ${attempts} failed kind=${outcome.kind}: ${outcome.message}`
      );
      reason = failureReason(outcome.kind, this.adapter, attempts, outcome.message);
      if (outcome.kind !== "transient" || attempts >= this.maxAttempts) {
        break;
      }
      await this.sleep(this.baseDelayMs * 2 ** (attempts - 1));
    }

    return {
      ...base,
      url: placeholderImageUrl(prompt),
      isPlaceholder: true,
      reason,
      attempts,
    };
  }

  async generateCoverImage(draft: ArticleDraft, tone: ImageTone): Promise<ImageResult> {
    return this.generateImage(buildCoverPrompt(draft, tone), tone, 0, {
      subject: draft.title,
    });
  }

  async regenerateImage(
    customPrompt: string,
    tone: ImageTone,
    index: number,
    subject?: string
  ): Promise<ImageResult> {
    if (!Number.isInteger(index) || index < 0 || index >= this.maxImages) {
      throw new ValidationError(
        `Image index ${index} is out of range; an article has at most ${this.maxImages} images.`
      );
    }
    console.log(`[image-engine] regenerating index=${index} with a custom prompt`);
    return this.generateImage(customPrompt, tone, index, subject ? { subject } : {});
  }

  private async cacheImage(url: string, index: number): Promise<string | undefined> {
    if (!this.cache) return undefined;
    try {
      return await this.cache.save(url, index);
    } catch (err) {
      console.warn(`[image-engine] could not cache image ${index}: ${extractErrorMessage(err)}`);
      return undefined;
    }
  }
}

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

export function createDiskImageCache(
  dir: string,
  fetchFn: FetchFn = fetch,
  timeoutMs = 30_000
): ImageCache {
  return {
    async save(url: string, index: number): Promise<string> {
      const response = await fetchWithTimeout(url, {}, timeoutMs, "image-cache", fetchFn);
      if (!response.ok) {
        throw new Error(`download failed with HTTP ${response.status}`);
      }
      const bytes = Buffer.from(await response.arrayBuffer());
      await fs.mkdir(dir, { recursive: true });
      const file = path.join(dir, `generated_image_${index}_${Date.now()}.jpg`);
      await fs.writeFile(file, bytes);
      return file;
    },
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateImageEngineDeps {
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  cache?: ImageCache | null;
}

function createAdapter(
  provider: ImageProviderName,
  config: AppConfig,
  fetchFn: FetchFn
): ImageProviderAdapter {
  return provider === "seedream"
    ? createSeedreamAdapter(config, fetchFn)
    : createOpenAiImageAdapter(config, fetchFn);
}

/** Picks the preferred provider, or the other one when its key is missing. */
export function resolveImageProvider(
  preference: ImageProviderName,
  config: AppConfig
): ImageProviderName {
  if (isProviderConfigured(config, preference)) return preference;
  const alternative: ImageProviderName = preference === "seedream" ? "openai" : "seedream";
  if (isProviderConfigured(config, alternative)) {
    console.warn(
      `[image-engine] ${preference} has no usable API key, falling back to ${alternative}`
    );
    return alternative;
  }
  throw new ConfigurationError(
    "No image provider is configured.",
    "Set OPENAI_API_KEY (OpenAI Images) or ARK_API_KEY (SeeDream) in .env.local and restart the server."
  );
}

export function createImageEngine(
  preference: ImageProviderName,
  config: AppConfig = loadAppConfig(),
  deps: CreateImageEngineDeps = {}
): ImageEngine {
  const fetchFn = deps.fetchFn ?? fetch;
  const provider = resolveImageProvider(preference, config);
  const cache =
    deps.cache !== undefined
      ? deps.cache
      : config.cacheImages
      ? createDiskImageCache(config.imageCacheDir, fetchFn)
      : null;

  return new ImageEngine({
    adapter: createAdapter(provider, config, fetchFn),
    ...(deps.sleep ? { sleep: deps.sleep } : {}),
    cache,
    maxImages: config.maxImagesPerArticle,
  });
}
