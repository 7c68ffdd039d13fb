export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export function extractErrorMessage(err: unknown): string {
  if (!err) return "unknown error";
  if (typeof err === "string") return err;
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? err.cause.message : undefined;
    return [err.message, cause].filter(Boolean).join(" | ");
  }
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TimeoutError extends Error {
  constructor(ms: number, label: string) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  label: string,
  fetchFn: FetchFn = fetch
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } catch (err) {
    if (isAbortError(err)) {
      throw new TimeoutError(timeoutMs, label);
    }
    throw new Error(`[${label}] fetch failed: ${extractErrorMessage(err)}`);
  } finally {
    clearTimeout(timer);
  }
}

/** Reads an OpenAI-style `{ error: { message, code } }` body, tolerating non-JSON. */
export async function readApiError(
  response: Response
): Promise<{ message: string; code: string }> {
  const text = await response.text().catch(() => "");
  let message = "";
  let code = "";
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed) && isRecord(parsed.error)) {
      message = typeof parsed.error.message === "string" ? parsed.error.message : "";
      code = typeof parsed.error.code === "string" ? parsed.error.code : "";
    }
  } catch {
    message = text.slice(0, 300);
  }
  return { message: message || `HTTP ${response.status}`, code };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
