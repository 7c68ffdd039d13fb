import type { FetchFn } from "../http";
import type { ProviderOutcome } from "./types";

export interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Answers each call with the next reply; the last one repeats. Errors are thrown. */
export function scriptedFetch(replies: Array<() => Response | Error>) {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    const reply = replies[Math.min(calls.length - 1, replies.length - 1)]();
    if (reply instanceof Error) throw reply;
    return reply;
  };
  return { calls, fetchFn };
}

export function kindOf(outcome: ProviderOutcome): string {
  return outcome.ok ? "ok" : outcome.kind;
}

export function recordSleeps() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}
