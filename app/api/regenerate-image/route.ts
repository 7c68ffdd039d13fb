import { NextRequest, NextResponse } from "next/server";
import { readJsonBody, toApiError } from "@/lib/api-errors";
import { loadAppConfig } from "@/lib/config";
import { ValidationError } from "@/lib/errors";
import { isRecord } from "@/lib/http";
import { createImageEngine } from "@/lib/image-engine";
import { pickOption, readText } from "@/lib/request";
import { IMAGE_PROVIDERS, IMAGE_TONES } from "@/lib/types";

export const runtime = "nodejs";
export const maxDuration = 120;

export async function POST(req: NextRequest) {
  try {
    const raw = await readJsonBody(req);
    if (!isRecord(raw)) throw new ValidationError("Request body must be a JSON object.");

    const prompt = readText(raw.prompt);
    if (!prompt) throw new ValidationError("Enter a prompt to regenerate the image.");
    const tone = pickOption(IMAGE_TONES, raw.tone, "professional");
    const provider = pickOption(IMAGE_PROVIDERS, raw.provider, "openai");
    const index = typeof raw.index === "number" && raw.index >= 0 ? Math.floor(raw.index) : 0;

    const engine = createImageEngine(provider, loadAppConfig());
    const image = await engine.regenerateImage(prompt, tone, index, readText(raw.subject) || undefined);
    return NextResponse.json({ image });
  } catch (err) {
    const { status, body } = toApiError(err, "api/regenerate-image");
    return NextResponse.json(body, { status });
  }
}
