import { NextRequest, NextResponse } from "next/server";
import { readJsonBody, toApiError } from "@/lib/api-errors";
import { ValidationError } from "@/lib/errors";
import { exportArticle, isExportFormat } from "@/lib/exporters";
import { isRecord } from "@/lib/http";
import { parseGenerationResult } from "@/lib/result-codec";

export const runtime = "nodejs";

export async function POST(req: NextRequest) {
  try {
    const raw = await readJsonBody(req);
    if (!isRecord(raw)) throw new ValidationError("Request body must be a JSON object.");
    if (!isExportFormat(raw.format)) {
      throw new ValidationError("format must be one of html, docx or json.");
    }

    const file = await exportArticle(parseGenerationResult(raw.result), raw.format);
    return new NextResponse(new Uint8Array(file.body), {
      headers: {
        "Content-Type": file.contentType,
        "Content-Disposition": `attachment; filename="${file.filename}"`,
      },
    });
  } catch (err) {
    const { status, body } = toApiError(err, "api/export");
    return NextResponse.json(body, { status });
  }
}
