import path from "path";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ImageProviderName = "openai" | "seedream";

export const DALLE_SIZES = ["1024x1024", "1024x1792", "1792x1024"] as const;
export type DalleSize = (typeof DALLE_SIZES)[number];

export type CryptoVoiceMode = "always" | "auto" | "off";

export interface AppConfig {
  openaiApiKey: string;
  arkApiKey: string;
  jinaApiKey: string;
  openaiBaseUrl: string;
  chatModel: string;
  maxTokens: number;
  chatTimeoutMs: number;
  dalleModel: string;
  dalleSize: DalleSize;
  dalleQuality: string;
  seedreamModel: string;
  seedreamSize: string;
  seedreamBaseUrl: string;
  maxImagesPerArticle: number;
  imageTimeoutMs: number;
  imageCacheDir: string;
  cacheImages: boolean;
  exportDir: string;
  cryptoVoiceMode: CryptoVoiceMode;
}

export interface ProviderStatus {
  chat: boolean;
  openaiImages: boolean;
  seedream: boolean;
  reader: "authenticated" | "anonymous";
  chatModel: string;
  dalleModel: string;
  seedreamModel: string;
}

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.trunc(parsed);
}

function readString(env: Env, name: string, fallback: string): string {
  const value = (env[name] || "").trim();
  return value || fallback;
}

/** Template keys from `.env.example` files and the demo marker count as unset. */
export function isUsableApiKey(value: string | undefined | null): boolean {
  const key = (value || "").trim();
  if (!key) return false;
  if (key.startsWith("sk-your-")) return false;
  if (key === "demo-mode") return false;
  return true;
}

function isDalleSize(value: string): value is DalleSize {
  return DALLE_SIZES.some((size) => size === value);
}

export function coerceDalleSize(value: string | undefined): DalleSize {
  const size = (value || "").trim();
  if (isDalleSize(size)) return size;
  if (size === "1280x720") return "1024x1792";
  if (size) {
    console.warn(`[config] unsupported DALLE_SIZE=${size}, using 1024x1024`);
  }
  return "1024x1024";
}

function resolveCryptoVoiceMode(value: string | undefined): CryptoVoiceMode {
  const mode = (value || "").trim().toLowerCase();
  if (mode === "always" || mode === "off") return mode;
  return "auto";
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function loadAppConfig(env: Env = process.env): AppConfig {
  const cwd = process.cwd();
  return {
    openaiApiKey: (env.OPENAI_API_KEY || "").trim(),
    arkApiKey: (env.ARK_API_KEY || "").trim(),
    jinaApiKey: (env.JINA_API_KEY || "").trim(),
    openaiBaseUrl: readString(env, "OPENAI_BASE_URL", "https://api.openai.com/v1").replace(
      /\/+$/,
      ""
    ),
    chatModel: readString(env, "OPENAI_CHAT_MODEL", "gpt-4o"),
    maxTokens: parsePositiveInt(env.MAX_TOKENS, 4000),
    chatTimeoutMs: parsePositiveInt(env.LLM_TIMEOUT_MS, 120_000),
    dalleModel: readString(env, "DALLE_MODEL", "dall-e-3"),
    dalleSize: coerceDalleSize(env.DALLE_SIZE),
    dalleQuality: readString(env, "DALLE_QUALITY", "standard"),
    seedreamModel: readString(env, "SEEDREAM_MODEL", "seedream-4-0-250828"),
    seedreamSize: readString(env, "SEEDREAM_SIZE", "2K"),
    seedreamBaseUrl: readString(
      env,
      "SEEDREAM_BASE_URL",
      "https://ark.ap-southeast.bytepluses.com/api/v3"
    ).replace(/\/+$/, ""),
    maxImagesPerArticle: parsePositiveInt(env.MAX_IMAGES_PER_ARTICLE, 5),
    imageTimeoutMs: parsePositiveInt(env.IMAGE_TIMEOUT_MS, 120_000),
    imageCacheDir: path.resolve(cwd, readString(env, "IMAGE_CACHE_DIR", "generated/images")),
    cacheImages: env.IMAGE_CACHE_ENABLED !== "0",
    exportDir: path.resolve(cwd, readString(env, "EXPORT_DIR", "generated/exports")),
    cryptoVoiceMode: resolveCryptoVoiceMode(env.CRYPTO_VOICE_MODE),
  };
}

export function isProviderConfigured(
  config: AppConfig,
  provider: ImageProviderName
): boolean {
  return provider === "openai"
    ? isUsableApiKey(config.openaiApiKey)
    : isUsableApiKey(config.arkApiKey);
}

export function getProviderStatus(config: AppConfig): ProviderStatus {
  return {
    chat: isUsableApiKey(config.openaiApiKey),
    openaiImages: isProviderConfigured(config, "openai"),
    seedream: isProviderConfigured(config, "seedream"),
    reader: isUsableApiKey(config.jinaApiKey) ? "authenticated" : "anonymous",
    chatModel: config.chatModel,
    dalleModel: config.dalleModel,
    seedreamModel: config.seedreamModel,
  };
}
