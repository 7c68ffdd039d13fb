import { NextRequest, NextResponse } from "next/server";
import { readJsonBody, toApiError } from "@/lib/api-errors";
import { loadAppConfig } from "@/lib/config";
import { ValidationError } from "@/lib/errors";
import { isRecord } from "@/lib/http";
import { createChatCompletion, integrateLinks } from "@/lib/llm-engine";
import { readText } from "@/lib/request";
import { parseGenerationResult } from "@/lib/result-codec";
import { analyzeArticle } from "@/lib/seo-tools";

export const runtime = "nodejs";
export const maxDuration = 120;

export async function POST(req: NextRequest) {
  try {
    const raw = await readJsonBody(req);
    if (!isRecord(raw)) throw new ValidationError("Request body must be a JSON object.");
    const links = readText(raw.links);
    if (!links) throw new ValidationError("Paste at least one link to integrate.");

    const result = parseGenerationResult(raw.result);
    const chat = createChatCompletion(loadAppConfig());
    const outcome = await integrateLinks(result.draft, links, chat);

    return NextResponse.json({
      integrated: outcome.integrated,
      linksFound: outcome.linksFound,
      error: outcome.error ?? null,
      result: {
        ...result,
        draft: outcome.draft,
        seo: analyzeArticle(outcome.draft, result.request.keywords),
      },
    });
  } catch (err) {
    const { status, body } = toApiError(err, "api/integrate-links");
    return NextResponse.json(body, { status });
  }
}
