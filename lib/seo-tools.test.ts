import assert from "node:assert/strict";
import test from "node:test";
import { buildFallbackArticle } from "./article-parser";
import {
  analyzeArticle,
  analyzeKeywords,
  analyzeReadability,
  analyzeStructure,
  analyzeTitle,
  buildSchemaMarkup,
  computeSeoScore,
  countSyllables,
  extractLinks,
  lsiSuggestions,
  readingLevel,
} from "./seo-tools";
import type { ArticleDraft } from "./types";

function draftWithSections(contents: string[]): ArticleDraft {
  const base = buildFallbackArticle(["solar"], "English", "Professional");
  return {
    ...base,
    sections: contents.map((content, i) => ({
      heading: `Part ${i + 1}`,
      content,
      keywords: [],
      wordCount: content.split(/\s+/).filter(Boolean).length,
    })),
  };
}

test("short simple sentences clamp to the top of the reading scale", () => {
  const result = analyzeReadability("The cat sat. The dog ran.");

  assert.equal(result.sentenceCount, 2);
  assert.equal(result.wordCount, 6);
  assert.equal(result.syllableCount, 6);
  assert.equal(result.fleschScore, 100);
  assert.equal(result.readingLevel, "Very Easy");
  assert.equal(result.avgSentenceLength, 3);
  assert.equal(result.grade, 1);
});

test("syllables count vowel groups and drop a trailing e", () => {
  assert.equal(countSyllables("table"), 1);
  assert.equal(countSyllables("reading"), 2);
  assert.equal(countSyllables("the rhythm"), 2);
});

test("reading levels follow the Flesch bands", () => {
  assert.equal(readingLevel(90), "Very Easy");
  assert.equal(readingLevel(65), "Standard");
  assert.equal(readingLevel(45), "Difficult");
  assert.equal(readingLevel(29.9), "Very Difficult");
});

test("keyword analysis reports density, positions and missing terms", () => {
  const result = analyzeKeywords("solar panels cut solar bills", ["solar", "wind"], "solar");

  assert.equal(result.totalWords, 5);
  assert.equal(result.primaryCount, 2);
  assert.equal(result.primaryDensity, 40);
  assert.deepEqual(result.distribution.solar.positions, ["introduction", "conclusion"]);
  assert.deepEqual(result.missingKeywords, ["wind"]);
  assert.deepEqual(result.overusedKeywords, ["solar"]);
});

test("title analysis flags length and keyword placement", () => {
  const short = analyzeTitle("Solar Power Guide", "solar");
  assert.equal(short.keywordPosition, "beginning");
  assert.deepEqual(short.recommendations, [
    "Title is too short. Consider expanding to 50-60 characters.",
  ]);

  const late = analyzeTitle("A practical and complete guide to choosing solar", "solar");
  assert.equal(late.length, 48);
  assert.equal(late.keywordPosition, "end");
  assert.equal(
    late.recommendations[1],
    "Consider placing the primary keyword closer to the beginning of the title."
  );

  const missing = analyzeTitle("Wind Power Guide", "solar");
  assert.equal(missing.containsPrimaryKeyword, false);
  assert.equal(missing.recommendations[1], "Include the primary keyword 'solar' in the title.");
});

test("structure balance distinguishes uneven and short sections", () => {
  const ten = Array.from({ length: 10 }, () => "word").join(" ");
  const hundred = Array.from({ length: 100 }, () => "word").join(" ");

  assert.equal(analyzeStructure(draftWithSections([ten, ten])).balance, "too_short");
  assert.equal(analyzeStructure(draftWithSections([ten, hundred])).balance, "uneven");
  assert.deepEqual(analyzeStructure(draftWithSections([ten, hundred])).sectionLengths, [10, 100]);
});

test("links are collected from anchors and markdown", () => {
  const draft = draftWithSections([
    'See <a href="https://x.example.test/a" target="_blank">guide</a> and [docs](/docs).',
  ]);

  assert.deepEqual(extractLinks(draft), [
    { url: "https://x.example.test/a", text: "guide", type: "external" },
    { url: "/docs", text: "docs", type: "internal" },
  ]);
});

test("LSI suggestions merge related terms without duplicates", () => {
  assert.deepEqual(lsiSuggestions(["trading", "finance"]), [
    "investment",
    "market",
    "portfolio",
    "broker",
    "strategy",
    "money",
    "financial",
    "banking",
    "economic",
  ]);
  assert.deepEqual(lsiSuggestions(["gardening"]), []);
});

test("analyzeArticle assembles a full report", () => {
  const draft = buildFallbackArticle(["Solar"], "English", "Professional");
  const now = new Date("2026-01-02T03:04:05.000Z");

  const report = analyzeArticle(draft, ["Solar", " "], undefined, now);

  assert.equal(report.focusKeyword, "solar");
  assert.deepEqual(report.targetKeywords, ["solar"]);
  assert.equal(report.titleAnalysis.containsPrimaryKeyword, true);
  assert.equal(report.structure.totalSections, 2);
  assert.ok(report.recommendations.includes("Add more sections to improve content structure and SEO."));
  assert.ok(report.recommendations.length <= 8);
  assert.equal(report.seoScore, computeSeoScore(report));
  assert.equal(report.wordCount, report.readability.wordCount);
  assert.equal(report.keywordDensity, report.keywordAnalysis.primaryDensity);
  assert.equal(report.analyzedAt, "2026-01-02T03:04:05.000Z");
});

test("schema markup carries the headline and optional image", () => {
  const draft = buildFallbackArticle(["Solar"], "English", "Professional");
  const now = new Date("2026-01-02T00:00:00.000Z");
  const report = analyzeArticle(draft, ["solar"], undefined, now);

  const withImage = buildSchemaMarkup(draft, report, now, "https://img.example.test/1.jpg");
  assert.equal(withImage["@type"], "Article");
  assert.equal(withImage.headline, "Understanding Solar: A Comprehensive Guide");
  assert.equal(withImage.image, "https://img.example.test/1.jpg");
  assert.equal(withImage.inLanguage, "English");
  assert.equal("image" in buildSchemaMarkup(draft, report, now), false);
});

test("readability counts words on both sides of a comparison sign", () => {
  const report = analyzeReadability("Fees stay <2% for small loans and >5% for large ones.");

  assert.equal(report.wordCount, 11);
  assert.equal(report.sentenceCount, 1);
});
