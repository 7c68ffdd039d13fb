import assert from "node:assert/strict";
import test from "node:test";
import { buildFallbackArticle } from "./article-parser";
import {
  applySeoEnhancements,
  enhanceArticle,
  insertLinksInContent,
  parseInternalLinks,
} from "./link-insertion";

test("parseInternalLinks accepts lines and commas and prefixes relative paths", () => {
  const links = parseInternalLinks(
    "Solar Panels: solar-guide\nStorage Tips: /storage, Grid: https://grid.example.test\nno colon here"
  );

  assert.deepEqual(links, [
    { text: "Solar Panels", url: "/solar-guide" },
    { text: "Storage Tips", url: "/storage" },
    { text: "Grid", url: "https://grid.example.test" },
  ]);
});

test("exact phrases are linked first and overlap phrases next, two per section", () => {
  const links = parseInternalLinks("Solar Panels: /solar-guide, Storage Tips: /storage, Grid: /grid");

  const result = insertLinksInContent(
    "Solar panels lower bills. Battery storage adds resilience on the grid.",
    links,
    []
  );

  assert.equal(
    result.content,
    "[Solar panels](/solar-guide) lower bills. Battery [storage](/storage) adds resilience on the grid."
  );
  assert.deepEqual(
    result.inserted.map((link) => link.url),
    ["/solar-guide", "/storage"]
  );
});

test("text already inside a markdown link is skipped", () => {
  const result = insertLinksInContent(
    "Read [solar panels](/x) today. Solar panels again.",
    [{ text: "Solar Panels", url: "/y" }],
    []
  );

  assert.equal(result.content, "Read [solar panels](/x) today. [Solar panels](/y) again.");
});

test("text inside an HTML anchor is never relinked", () => {
  const content = 'See <a href="/a">solar panels</a>.';

  const result = insertLinksInContent(content, [{ text: "Solar Panels", url: "/y" }], []);

  assert.equal(result.content, content);
  assert.deepEqual(result.inserted, []);
});

test("applySeoEnhancements prefixes title and meta when the keyword is absent", () => {
  const draft = buildFallbackArticle(["wind"], "English", "Professional");

  const enhanced = applySeoEnhancements(draft, "solar");

  assert.equal(enhanced.seoTitle, "solar: Understanding wind: A Comprehensive Guide");
  assert.equal(enhanced.metaDescription, `Discover solar insights. ${draft.metaDescription}`);
  assert.equal(enhanced.title, draft.title);

  const long = applySeoEnhancements({ ...draft, metaDescription: "x".repeat(200) }, "solar");
  assert.equal(long.metaDescription.length, 160);
});

test("enhanceArticle links each section through its keywords", () => {
  const draft = buildFallbackArticle(["solar"], "English", "Professional");

  const { draft: enhanced, linksInserted } = enhanceArticle(draft, "Solar Guide: /solar-guide", "solar");

  assert.equal(linksInserted, 2);
  assert.ok(enhanced.sections[0].content.startsWith("Understanding [solar](/solar-guide) is essential"));
  assert.ok(enhanced.sections[1].content.startsWith("[solar](/solar-guide) offers numerous"));
  assert.equal(enhanced.seoTitle, draft.seoTitle);
  assert.equal(enhanced.metaDescription, draft.metaDescription);
  assert.equal(draft.sections[0].content.includes("]("), false);
});
