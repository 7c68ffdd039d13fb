import type { ImageProviderName } from "../config";

export type ProviderFailureKind = "transient" | "rate_limit" | "content_policy" | "other";

export type ProviderOutcome =
  | { ok: true; url: string; revisedPrompt?: string }
  | { ok: false; kind: ProviderFailureKind; message: string; status?: number };

export interface ImageProviderAdapter {
  readonly name: ImageProviderName;
  readonly label: string;
  readonly model: string;
  readonly maxPromptLength: number;
  /** Appended to every prompt after truncation. */
  readonly styleSuffix: string;
  /** Appended to prompts under 50 characters. */
  readonly shortPromptDetail: string;
  generate(prompt: string): Promise<ProviderOutcome>;
}

export function failure(
  kind: ProviderFailureKind,
  message: string,
  status?: number
): ProviderOutcome {
  return status === undefined ? { ok: false, kind, message } : { ok: false, kind, message, status };
}

export function isServerStatus(status: number): boolean {
  return status >= 500 || status === 408;
}
