import assert from "node:assert/strict";
import test from "node:test";
import {
  buildArticleDocument,
  parseInline,
  parseSectionBody,
  readTimeMinutes,
} from "./document-model";
import { fixtureResult, SOLAR_SECTIONS } from "./test-fixtures";

test("parseInline turns markdown links and anchors into link nodes", () => {
  const nodes = parseInline(SOLAR_SECTIONS[0].content.split("\n")[0]);

  assert.deepEqual(nodes, [
    { type: "text", text: "Panels cut bills & emissions. Read the " },
    { type: "link", text: "primer", href: "/primer", external: false },
    { type: "text", text: " or " },
    {
      type: "link",
      text: "the report",
      href: "https://energy.example.test/report",
      external: true,
    },
    { type: "text", text: "." },
  ]);
});

test("unsafe hrefs stay plain text", () => {
  assert.deepEqual(parseInline("Avoid [this](javascript:void) trick."), [
    { type: "text", text: "Avoid this trick." },
  ]);
});

test("section bodies split into headings, lists and paragraphs", () => {
  assert.deepEqual(parseSectionBody("### First Steps\nCall us.\n\n1. Measure\n2. Quote"), [
    { type: "heading", level: 3, text: "First Steps" },
    { type: "paragraph", children: [{ type: "text", text: "Call us." }] },
    {
      type: "list",
      ordered: true,
      items: [[{ type: "text", text: "Measure" }], [{ type: "text", text: "Quote" }]],
    },
  ]);
});

test("buildArticleDocument orders sections, cover and call to action", () => {
  const doc = buildArticleDocument(fixtureResult());

  assert.equal(doc.title, "Solar Power for Homes");
  assert.equal(doc.slug, "solar-power-for-homes");
  assert.equal(doc.cover?.url, "https://img.example.test/cover.jpg");
  assert.equal(doc.readTimeMinutes, 1);
  assert.deepEqual(
    doc.blocks.map((block) => block.type),
    ["heading", "paragraph", "list", "heading", "heading", "paragraph", "cta"]
  );
  assert.deepEqual(doc.blocks[0], { type: "heading", level: 2, text: "Why <Solar> Matters" });
  assert.deepEqual(doc.blocks[6], {
    type: "cta",
    children: [{ type: "text", text: "Get a quote today." }],
  });
});

test("documents without images have no cover", () => {
  assert.equal(buildArticleDocument(fixtureResult({ images: [] })).cover, undefined);
});

test("read time never drops below one minute", () => {
  assert.equal(readTimeMinutes(0), 1);
  assert.equal(readTimeMinutes(900), 4);
});

test("comparison signs survive while real tags are stripped", () => {
  assert.deepEqual(
    parseSectionBody("Fees stay <2% for small loans and >5% for large ones. <strong>Compare</strong> offers."),
    [
      {
        type: "paragraph",
        children: [
          { type: "text", text: "Fees stay <2% for small loans and >5% for large ones. Compare offers." },
        ],
      },
    ]
  );
});
