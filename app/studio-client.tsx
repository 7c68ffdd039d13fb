"use client";

import { useEffect, useMemo, useState } from "react";
import type { ImageProviderName, ProviderStatus } from "@/lib/config";
import {
  ApiRequestError,
  buildGeneratePayload,
  DEFAULT_FORM,
  describeApiError,
  filenameFromDisposition,
  isGenerationResult,
  isImageResult,
  postJson,
  replaceImage,
  type StudioFormState,
} from "@/lib/content-generation-client";
import { buildArticleDocument, type Block, type InlineNode } from "@/lib/document-model";
import { isRecord } from "@/lib/http";
import { summarizeImages } from "@/lib/image-stats";
import type { GenerationResult } from "@/lib/pipeline";
import { pickOption } from "@/lib/request";
import type {
  ArticleLanguage,
  ArticleTone,
  ImageResult,
  ImageTone,
  PromotionStyle,
} from "@/lib/types";

// ----- Types -----

export interface StudioOptions {
  languages: ArticleLanguage[];
  tones: ArticleTone[];
  imageTones: ImageTone[];
  imageProviders: ImageProviderName[];
  promotions: string[];
  /** One-line description per catalogue promotion. */
  promotionSummaries: Record<string, string>;
  promotionStyles: PromotionStyle[];
  minSections: number;
  maxSections: number;
  maxSourceUrls: number;
}

interface Problem {
  message: string;
  remediation: string | null;
}

type DownloadFormat = "html" | "docx" | "json";

const GENERATE_TIMEOUT_MS = 300_000;
const FOLLOW_UP_TIMEOUT_MS = 120_000;

const STAGE_HINTS = [
  "Reading sources",
  "Drafting the article",
  "Analyzing SEO",
  "Creating the cover image",
  "Inserting links",
];

const PROMOTION_STYLE_LABELS: Record<PromotionStyle, string> = {
  none: "No promotion",
  cta_only: "Call to action only",
  full_section_cta: "Dedicated section + call to action",
};

const inputClass =
  "w-full px-3 py-2 text-sm border border-gray-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-indigo-400 focus:border-transparent";

function toProblem(err: unknown, fallback: string): Problem {
  if (err instanceof ApiRequestError) {
    return { message: err.message, remediation: err.remediation };
  }
  return { message: err instanceof Error ? err.message : fallback, remediation: null };
}

// ----- Small pieces -----

function Field({ label, hint, children }: { label: string; hint?: string; children: React.ReactNode }) {
  return (
    <label className="block">
      <span className="block text-sm font-medium text-gray-700 mb-1">{label}</span>
      {hint && <span className="block text-xs text-gray-400 mb-1">{hint}</span>}
      {children}
    </label>
  );
}

function StatusDot({ ok, label }: { ok: boolean; label: string }) {
  return (
    <span className="inline-flex items-center gap-1.5 text-xs text-gray-600">
      <span className={`w-2 h-2 rounded-full ${ok ? "bg-green-500" : "bg-red-400"}`} />
      {label}
    </span>
  );
}

function ProblemBox({ problem }: { problem: Problem }) {
  return (
    <div className="bg-red-50 border border-red-200 rounded-lg p-4 text-sm">
      <p className="font-medium text-red-700">{problem.message}</p>
      {problem.remediation && <p className="text-red-600 mt-1">{problem.remediation}</p>}
    </div>
  );
}

function Metric({ label, value }: { label: string; value: string }) {
  return (
    <div className="bg-gray-50 rounded-lg p-3">
      <p className="text-xs text-gray-500">{label}</p>
      <p className="text-lg font-bold text-gray-900">{value}</p>
    </div>
  );
}

function Inline({ nodes }: { nodes: InlineNode[] }) {
  return (
    <>
      {nodes.map((node, i) =>
        node.type === "link" ? (
          <a
            key={i}
            href={node.href}
            target={node.external ? "_blank" : undefined}
            rel={node.external ? "noopener noreferrer" : undefined}
          >
            {node.text}
          </a>
        ) : (
          <span key={i}>{node.text}</span>
        )
      )}
    </>
  );
}

function PreviewBlock({ block }: { block: Block }) {
  switch (block.type) {
    case "heading":
      return block.level === 2 ? (
        <h2 className="text-xl font-bold text-gray-900 mt-6 mb-2">{block.text}</h2>
      ) : (
        <h3 className="text-lg font-semibold text-gray-800 mt-4 mb-2">{block.text}</h3>
      );
    case "paragraph":
      return (
        <p className="text-sm text-gray-700 leading-relaxed mb-3">
          <Inline nodes={block.children} />
        </p>
      );
    case "list": {
      const items = block.items.map((item, i) => (
        <li key={i}>
          <Inline nodes={item} />
        </li>
      ));
      return block.ordered ? (
        <ol className="list-decimal pl-6 text-sm text-gray-700 mb-3 space-y-1">{items}</ol>
      ) : (
        <ul className="list-disc pl-6 text-sm text-gray-700 mb-3 space-y-1">{items}</ul>
      );
    }
    case "image":
      return (
        <figure className="my-4">
          {/* eslint-disable-next-line @next/next/no-img-element */}
          <img src={block.url} alt={block.alt} className="rounded-lg w-full" />
          {block.caption && (
            <figcaption className="text-xs text-gray-500 mt-1">{block.caption}</figcaption>
          )}
        </figure>
      );
    case "cta":
      return (
        <div className="bg-indigo-50 border border-indigo-100 rounded-lg p-4 mt-6 text-sm text-indigo-900">
          <Inline nodes={block.children} />
        </div>
      );
  }
}

// ----- Main component -----

export default function StudioClient({
  options,
  status,
}: {
  options: StudioOptions;
  status: ProviderStatus;
}) {
  const [form, setForm] = useState<StudioFormState>(DEFAULT_FORM);
  const [result, setResult] = useState<GenerationResult | null>(null);
  const [generating, setGenerating] = useState(false);
  const [elapsed, setElapsed] = useState(0);
  const [problem, setProblem] = useState<Problem | null>(null);

  const [prompts, setPrompts] = useState<Record<number, string>>({});
  const [regenerating, setRegenerating] = useState<number | null>(null);
  const [imageProblem, setImageProblem] = useState<Problem | null>(null);

  const [linkText, setLinkText] = useState("");
  const [integrating, setIntegrating] = useState(false);
  const [linkMessage, setLinkMessage] = useState<string | null>(null);

  const [downloading, setDownloading] = useState<DownloadFormat | null>(null);
  const [downloadProblem, setDownloadProblem] = useState<Problem | null>(null);

  useEffect(() => {
    if (!generating) return;
    setElapsed(0);
    const timer = window.setInterval(() => setElapsed((s) => s + 1), 1000);
    return () => window.clearInterval(timer);
  }, [generating]);

  const doc = useMemo(() => (result ? buildArticleDocument(result) : null), [result]);
  const imageStats = useMemo(() => (result ? summarizeImages(result.images) : null), [result]);

  const update = <K extends keyof StudioFormState>(key: K, value: StudioFormState[K]) =>
    setForm((prev) => ({ ...prev, [key]: value }));

  const imageProviderReady =
    form.imageProvider === "openai" ? status.openaiImages : status.seedream;

  const handleGenerate = async () => {
    setGenerating(true);
    setProblem(null);
    setLinkMessage(null);
    try {
      const body = await postJson("/api/generate", buildGeneratePayload(form), GENERATE_TIMEOUT_MS);
      if (!isGenerationResult(body)) throw new Error("Unexpected response from the server");
      setResult(body);
      setPrompts(Object.fromEntries(body.images.map((image): [number, string] => [image.index, image.sourcePrompt])));
    } catch (err) {
      setProblem(toProblem(err, "Generation failed"));
    } finally {
      setGenerating(false);
    }
  };

  const handleRegenerate = async (image: ImageResult) => {
    if (!result) return;
    setRegenerating(image.index);
    setImageProblem(null);
    try {
      const body = await postJson(
        "/api/regenerate-image",
        {
          prompt: prompts[image.index] ?? image.sourcePrompt,
          tone: form.imageTone,
          provider: form.imageProvider,
          index: image.index,
          subject: result.request.keywords[0] ?? result.draft.title,
        },
        FOLLOW_UP_TIMEOUT_MS
      );
      if (!isRecord(body) || !isImageResult(body.image)) {
        throw new Error("Unexpected response from the server");
      }
      const fresh = body.image;
      setResult((prev) => (prev ? { ...prev, images: replaceImage(prev.images, fresh) } : prev));
      setPrompts((prev) => ({ ...prev, [fresh.index]: fresh.sourcePrompt }));
    } catch (err) {
      setImageProblem(toProblem(err, "Image regeneration failed"));
    } finally {
      setRegenerating(null);
    }
  };

  const handleIntegrateLinks = async () => {
    if (!result || !linkText.trim()) return;
    setIntegrating(true);
    setLinkMessage(null);
    try {
      const body = await postJson(
        "/api/integrate-links",
        { links: linkText, result },
        FOLLOW_UP_TIMEOUT_MS
      );
      if (!isRecord(body) || !isGenerationResult(body.result)) {
        throw new Error("Unexpected response from the server");
      }
      setResult(body.result);
      const found = typeof body.linksFound === "number" ? body.linksFound : 0;
      setLinkMessage(
        body.integrated === true
          ? `Integrated ${found} link${found === 1 ? "" : "s"}.`
          : typeof body.error === "string"
            ? body.error
            : "No links were integrated."
      );
    } catch (err) {
      setLinkMessage(toProblem(err, "Link integration failed").message);
    } finally {
      setIntegrating(false);
    }
  };

  const handleDownload = async (format: DownloadFormat) => {
    if (!result) return;
    setDownloading(format);
    setDownloadProblem(null);
    try {
      const res = await fetch("/api/export", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ format, result }),
      });
      if (!res.ok) {
        const body: unknown = await res.json().catch(() => null);
        throw new ApiRequestError(describeApiError(body, `Export failed (${res.status})`));
      }
      const blob = await res.blob();
      const url = URL.createObjectURL(blob);
      const anchor = document.createElement("a");
      anchor.href = url;
      anchor.download = filenameFromDisposition(
        res.headers.get("Content-Disposition"),
        `${result.draft.slug || "article"}.${format}`
      );
      anchor.click();
      URL.revokeObjectURL(url);
    } catch (err) {
      setDownloadProblem(toProblem(err, "Export failed"));
    } finally {
      setDownloading(null);
    }
  };

  const stageHint = STAGE_HINTS[Math.min(STAGE_HINTS.length - 1, Math.floor(elapsed / 15))];

  return (
    <div className="space-y-6">
      <div className="flex items-start justify-between">
        <div>
          <h2 className="text-2xl font-bold text-gray-900">New article</h2>
          <p className="text-sm text-gray-500 mt-1">
            Start from keywords, up to {options.maxSourceUrls} source URLs, or both.
          </p>
        </div>
        <div className="flex flex-wrap gap-3 justify-end">
          <StatusDot ok={status.chat} label={`Articles (${status.chatModel})`} />
          <StatusDot ok={status.openaiImages} label="OpenAI images" />
          <StatusDot ok={status.seedream} label="Seedream images" />
        </div>
      </div>

      {/* Form */}
      <div className="bg-white rounded-lg border border-gray-200 p-6 space-y-5">
        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
          <Field label="Keywords" hint="Comma or newline separated; the first one is the focus keyword">
            <textarea
              rows={3}
              value={form.keywords}
              onChange={(e) => update("keywords", e.target.value)}
              placeholder="solar panels, home energy"
              className={inputClass}
            />
          </Field>
          <Field label="Source URLs" hint="One per line">
            <textarea
              rows={3}
              value={form.sourceUrls}
              onChange={(e) => update("sourceUrls", e.target.value)}
              placeholder="https://..."
              className={`${inputClass} font-mono`}
            />
          </Field>
        </div>

        <div className="grid grid-cols-2 md:grid-cols-4 gap-4">
          <Field label="Language">
            <select
              value={form.language}
              onChange={(e) => update("language", pickOption(options.languages, e.target.value, "English"))}
              className={inputClass}
            >
              {options.languages.map((language) => (
                <option key={language}>{language}</option>
              ))}
            </select>
          </Field>
          <Field label="Tone">
            <select
              value={form.tone}
              onChange={(e) => update("tone", pickOption(options.tones, e.target.value, "Professional"))}
              className={inputClass}
            >
              {options.tones.map((tone) => (
                <option key={tone}>{tone}</option>
              ))}
            </select>
          </Field>
          <Field label="Sections">
            <input
              type="number"
              min={options.minSections}
              max={options.maxSections}
              value={form.sectionCount}
              onChange={(e) => update("sectionCount", Number(e.target.value))}
              className={inputClass}
            />
          </Field>
          <Field label="Focus">
            <input
              value={form.focus}
              onChange={(e) => update("focus", e.target.value)}
              placeholder="Beginners, cost savings..."
              className={inputClass}
            />
          </Field>
        </div>

        <Field label="Additional content" hint="Notes, facts or angles the article should cover">
          <textarea
            rows={2}
            value={form.additionalContent}
            onChange={(e) => update("additionalContent", e.target.value)}
            className={inputClass}
          />
        </Field>

        <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
          <Field label="Promotion" hint={options.promotionSummaries[form.promotionName]}>
            <select
              value={form.promotionName}
              onChange={(e) => update("promotionName", e.target.value)}
              className={inputClass}
            >
              {options.promotions.map((name) => (
                <option key={name}>{name}</option>
              ))}
            </select>
          </Field>
          <Field label="Promotion style">
            <select
              value={form.promotionStyle}
              onChange={(e) =>
                update("promotionStyle", pickOption(options.promotionStyles, e.target.value, "none"))
              }
              className={inputClass}
            >
              {options.promotionStyles.map((style) => (
                <option key={style} value={style}>
                  {PROMOTION_STYLE_LABELS[style]}
                </option>
              ))}
            </select>
          </Field>
          <Field label="Custom promotion" hint="Overrides the selected promotion">
            <input
              value={form.promotionCustomText}
              onChange={(e) => update("promotionCustomText", e.target.value)}
              className={inputClass}
            />
          </Field>
        </div>

        <div className="grid grid-cols-1 md:grid-cols-3 gap-4 items-end">
          <Field label="Image tone">
            <select
              value={form.imageTone}
              onChange={(e) => update("imageTone", pickOption(options.imageTones, e.target.value, "professional"))}
              className={inputClass}
            >
              {options.imageTones.map((tone) => (
                <option key={tone}>{tone}</option>
              ))}
            </select>
          </Field>
          <Field label="Image provider">
            <select
              value={form.imageProvider}
              onChange={(e) =>
                update("imageProvider", pickOption(options.imageProviders, e.target.value, "openai"))
              }
              className={inputClass}
            >
              {options.imageProviders.map((provider) => (
                <option key={provider}>{provider}</option>
              ))}
            </select>
          </Field>
          <label className="flex items-center gap-2 text-sm text-gray-700 pb-2">
            <input
              type="checkbox"
              checked={form.includeImages}
              onChange={(e) => update("includeImages", e.target.checked)}
            />
            Generate a cover image
            {form.includeImages && !imageProviderReady && (
              <span className="text-xs text-amber-600">(provider not configured)</span>
            )}
          </label>
        </div>

        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
          <Field label="Internal links" hint="Text: /path, one per line">
            <textarea
              rows={2}
              value={form.internalLinks}
              onChange={(e) => update("internalLinks", e.target.value)}
              className={`${inputClass} font-mono`}
            />
          </Field>
          <Field label="External links" hint="Added to the link context of the draft">
            <textarea
              rows={2}
              value={form.externalLinks}
              onChange={(e) => update("externalLinks", e.target.value)}
              className={`${inputClass} font-mono`}
            />
          </Field>
        </div>

        <div className="flex items-center gap-4">
          <button
            onClick={handleGenerate}
            disabled={generating}
            className="px-5 py-2.5 bg-indigo-600 text-white text-sm font-medium rounded-lg hover:bg-indigo-700 disabled:opacity-50 disabled:cursor-not-allowed transition-colors"
          >
            {generating ? "Generating..." : "Generate article"}
          </button>
          {generating && (
            <span className="text-sm text-gray-500">
              {stageHint}... ({elapsed}s)
            </span>
          )}
        </div>

        {problem && <ProblemBox problem={problem} />}
      </div>

      {result && doc && (
        <>
          {result.usedFallbackArticle && (
            <div className="bg-amber-50 border border-amber-200 rounded-lg p-4 text-sm text-amber-800">
              The model response could not be used, so a template article was produced.
              {result.generationError && <span className="block mt-1">{result.generationError}</span>}
            </div>
          )}

          {/* SEO */}
          <div className="bg-white rounded-lg border border-gray-200 p-6 space-y-4">
            <h3 className="text-sm font-bold text-gray-900 uppercase tracking-wide">SEO analysis</h3>
            <div className="grid grid-cols-2 md:grid-cols-5 gap-3">
              <Metric label="SEO score" value={`${result.seo.seoScore}/100`} />
              <Metric label="Words" value={String(result.seo.wordCount)} />
              <Metric label="Keyword density" value={`${result.seo.keywordDensity}%`} />
              <Metric label="Readability" value={String(result.seo.readabilityScore)} />
              <Metric label="Links inserted" value={String(result.linksInserted)} />
            </div>
            <p className="text-xs text-gray-500">
              Reading level: {result.seo.readability.readingLevel} · Title length{" "}
              {result.seo.titleAnalysis.length} · Meta length {result.seo.metaAnalysis.length}
            </p>
            {result.seo.recommendations.length > 0 && (
              <ul className="list-disc pl-5 text-sm text-gray-700 space-y-1">
                {result.seo.recommendations.map((item) => (
                  <li key={item}>{item}</li>
                ))}
              </ul>
            )}
            {result.seo.lsiSuggestions.length > 0 && (
              <div className="flex flex-wrap gap-2">
                {result.seo.lsiSuggestions.map((term) => (
                  <span key={term} className="text-xs bg-gray-100 text-gray-600 px-2 py-0.5 rounded-full">
                    {term}
                  </span>
                ))}
              </div>
            )}
          </div>

          {/* Images */}
          {result.images.length > 0 && (
            <div className="bg-white rounded-lg border border-gray-200 p-6 space-y-4">
              <div className="flex items-center justify-between">
                <h3 className="text-sm font-bold text-gray-900 uppercase tracking-wide">Cover image</h3>
                {imageStats && (
                  <span className="text-xs text-gray-500">
                    {imageStats.generated}/{imageStats.total} generated · {imageStats.successRate}% success
                    {imageStats.placeholders > 0 && ` · ${imageStats.placeholders} placeholder`}
                  </span>
                )}
              </div>
              {result.images.map((image) => (
                <div key={image.index} className="grid grid-cols-1 md:grid-cols-2 gap-4">
                  <div>
                    {/* eslint-disable-next-line @next/next/no-img-element */}
                    <img src={image.url} alt={image.altText} className="rounded-lg w-full" />
                    <p className="text-xs text-gray-500 mt-1">
                      {image.provider} · {image.model} · {image.attempts} attempt
                      {image.attempts === 1 ? "" : "s"}
                    </p>
                    {image.isPlaceholder && (
                      <p className="text-xs text-amber-600 mt-1">Placeholder: {image.reason}</p>
                    )}
                    {image.promptUsed && (
                      <p className="text-xs text-gray-400 mt-1">Sent: {image.promptUsed}</p>
                    )}
                    {image.revisedPrompt && (
                      <p className="text-xs text-gray-400 mt-1">Revised by the provider: {image.revisedPrompt}</p>
                    )}
                  </div>
                  <div className="space-y-2">
                    <Field label="Prompt">
                      <textarea
                        rows={6}
                        value={prompts[image.index] ?? image.sourcePrompt}
                        onChange={(e) =>
                          setPrompts((prev) => ({ ...prev, [image.index]: e.target.value }))
                        }
                        className={inputClass}
                      />
                    </Field>
                    <button
                      onClick={() => handleRegenerate(image)}
                      disabled={regenerating !== null}
                      className="px-4 py-2 bg-white border border-gray-300 text-sm text-gray-700 rounded-lg hover:bg-gray-50 disabled:opacity-50"
                    >
                      {regenerating === image.index ? "Regenerating..." : "Regenerate"}
                    </button>
                  </div>
                </div>
              ))}
              {imageProblem && <ProblemBox problem={imageProblem} />}
            </div>
          )}

          {/* Links */}
          <div className="bg-white rounded-lg border border-gray-200 p-6 space-y-3">
            <h3 className="text-sm font-bold text-gray-900 uppercase tracking-wide">Integrate links</h3>
            <textarea
              rows={3}
              value={linkText}
              onChange={(e) => setLinkText(e.target.value)}
              placeholder="Paste URLs or link notes; the model places them in relevant sentences"
              className={`${inputClass} font-mono`}
            />
            <div className="flex items-center gap-3">
              <button
                onClick={handleIntegrateLinks}
                disabled={integrating || !linkText.trim()}
                className="px-4 py-2 bg-white border border-gray-300 text-sm text-gray-700 rounded-lg hover:bg-gray-50 disabled:opacity-50"
              >
                {integrating ? "Integrating..." : "Integrate"}
              </button>
              {linkMessage && <span className="text-sm text-gray-500">{linkMessage}</span>}
            </div>
          </div>

          {/* Preview */}
          <div className="bg-white rounded-lg border border-gray-200 p-6">
            <div className="flex items-center justify-between mb-4">
              <h3 className="text-sm font-bold text-gray-900 uppercase tracking-wide">Preview</h3>
              <div className="flex gap-2">
                {(["html", "docx", "json"] as const).map((format) => (
                  <button
                    key={format}
                    onClick={() => handleDownload(format)}
                    disabled={downloading !== null}
                    className="px-3 py-1.5 text-xs font-medium bg-gray-900 text-white rounded-lg hover:bg-gray-700 disabled:opacity-50"
                  >
                    {downloading === format ? "Exporting..." : format.toUpperCase()}
                  </button>
                ))}
              </div>
            </div>
            {downloadProblem && <ProblemBox problem={downloadProblem} />}
            <article className="article-preview">
              <h1 className="text-2xl font-bold text-gray-900">{doc.title}</h1>
              <p className="text-sm text-gray-500 mt-1">
                {doc.description} · {doc.readTimeMinutes} min read
              </p>
              {doc.cover && (
                <PreviewBlock block={doc.cover} />
              )}
              {doc.blocks.map((block, i) => (
                <PreviewBlock key={i} block={block} />
              ))}
            </article>
          </div>
        </>
      )}
    </div>
  );
}
