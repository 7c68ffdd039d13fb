import { NextRequest, NextResponse } from "next/server";
import { readJsonBody, toApiError } from "@/lib/api-errors";
import { loadAppConfig } from "@/lib/config";
import { runGeneration } from "@/lib/pipeline";
import { normalizeGenerationRequest } from "@/lib/request";

export const runtime = "nodejs";
export const maxDuration = 300;

export async function POST(req: NextRequest) {
  try {
    const request = normalizeGenerationRequest(await readJsonBody(req));
    const result = await runGeneration(request, { config: loadAppConfig() }, (stage, message) =>
      console.log(`[api/generate] ${stage}: ${message}`)
    );
    return NextResponse.json(result);
  } catch (err) {
    const { status, body } = toApiError(err, "api/generate");
    return NextResponse.json(body, { status });
  }
}
