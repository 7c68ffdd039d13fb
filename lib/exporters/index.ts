import fs from "fs/promises";
import path from "path";
import { buildArticleDocument, type ArticleDocument } from "../document-model";
import { extractErrorMessage, fetchWithTimeout, type FetchFn } from "../http";
import type { GenerationResult } from "../pipeline";
import { buildSchemaMarkup } from "../seo-tools";
import { buildAnalytics, formatTimestamp } from "./analytics";
import { detectImageType, renderDocx, type DocxCover } from "./docx";
import { renderHtml } from "./html";

export type ExportFormat = "html" | "docx" | "json";
export const EXPORT_FORMATS: readonly ExportFormat[] = ["html", "docx", "json"];

export interface ExportedFile {
  format: ExportFormat;
  filename: string;
  contentType: string;
  body: Buffer;
}

export interface ExportDeps {
  fetchFn?: FetchFn;
  now?: Date;
}

const COVER_DOWNLOAD_TIMEOUT_MS = 10_000;

export function isExportFormat(value: unknown): value is ExportFormat {
  return typeof value === "string" && EXPORT_FORMATS.some((format) => format === value);
}

/** Cached file first, then the remote URL; placeholders are not embedded. */
export async function loadCoverImage(
  doc: ArticleDocument,
  fetchFn: FetchFn = fetch
): Promise<DocxCover | null> {
  const cover = doc.cover;
  if (!cover || cover.isPlaceholder) return null;
  try {
    let data: Buffer;
    let contentType: string | null = null;
    if (cover.localPath) {
      data = await fs.readFile(cover.localPath);
    } else {
      const response = await fetchWithTimeout(cover.url, {}, COVER_DOWNLOAD_TIMEOUT_MS, "docx-cover", fetchFn);
      if (!response.ok) throw new Error(`HTTP ${response.status}`);
      contentType = response.headers.get("Content-Type");
      data = Buffer.from(await response.arrayBuffer());
    }
    const type = detectImageType(data, contentType);
    if (!type) throw new Error(`unsupported image format (${contentType ?? "unknown"})`);
    return { data, type };
  } catch (err) {
    console.warn(`[exporters] cover image not embedded: ${extractErrorMessage(err)}`);
    return null;
  }
}

export function exportBaseName(result: GenerationResult, now: Date): string {
  return `${result.draft.slug || "article"}_${formatTimestamp(now)}`;
}

export async function exportArticle(
  result: GenerationResult,
  format: ExportFormat,
  deps: ExportDeps = {}
): Promise<ExportedFile> {
  const now = deps.now ?? new Date();
  const base = exportBaseName(result, now);
  const doc = buildArticleDocument(result);

  switch (format) {
    case "html": {
      const schema = buildSchemaMarkup(result.draft, result.seo, now, doc.cover?.url);
      return {
        format,
        filename: `${base}.html`,
        contentType: "text/html; charset=utf-8",
        body: Buffer.from(renderHtml(doc, schema), "utf-8"),
      };
    }
    case "docx": {
      const cover = await loadCoverImage(doc, deps.fetchFn);
      return {
        format,
        filename: `${base}.docx`,
        contentType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
        body: await renderDocx(doc, cover),
      };
    }
    case "json":
      return {
        format,
        filename: `${base}_analytics.json`,
        contentType: "application/json; charset=utf-8",
        body: Buffer.from(JSON.stringify(buildAnalytics(result, now), null, 2), "utf-8"),
      };
  }
}

/** Writes all three formats into `dir` and returns their paths by format. */
export async function exportAllFormats(
  result: GenerationResult,
  dir: string,
  deps: ExportDeps = {}
): Promise<Record<ExportFormat, string>> {
  const now = deps.now ?? new Date();
  await fs.mkdir(dir, { recursive: true });

  const write = async (format: ExportFormat) => {
    const file = await exportArticle(result, format, { ...deps, now });
    const target = path.join(dir, file.filename);
    await fs.writeFile(target, file.body);
    return target;
  };

  const paths = { html: await write("html"), docx: await write("docx"), json: await write("json") };
  console.log(`[exporters] wrote ${EXPORT_FORMATS.length} files to ${dir}`);
  return paths;
}
