import assert from "node:assert/strict";
import test from "node:test";
import {
  buildCta,
  buildFallbackArticle,
  generateSlug,
  parseArticleReply,
} from "./article-parser";

const META =
  "A practical look at how solar storage batteries change household energy bills, backup power and grid independence.";

const options = {
  keywords: ["solar storage", "home batteries"],
  language: "English" as const,
  tone: "Professional" as const,
};

function reply(sectionCount: number): string {
  const sections = Array.from(
    { length: sectionCount },
    (_, i) => `## Heading ${i + 1}\nBody text for section ${i + 1}.`
  );
  return ["**Solar Storage Explained**", META, "", ...sections].join("\n");
}

test("a reply with N headings yields N sections with heading and body", () => {
  for (const n of [1, 3, 6]) {
    const draft = parseArticleReply(reply(n), { ...options, maxSections: 6 });
    assert.equal(draft.sections.length, n);
    for (const section of draft.sections) {
      assert.ok(section.heading.length > 0);
      assert.ok(section.content.length > 0);
    }
  }
});

test("title, meta description, slug and word counts come from the reply", () => {
  const draft = parseArticleReply(reply(2), options);

  assert.equal(draft.title, "Solar Storage Explained");
  assert.equal(draft.seoTitle, "Solar Storage Explained");
  assert.equal(draft.metaDescription, META);
  assert.equal(draft.slug, "solar-storage-explained");
  assert.deepEqual(
    draft.sections.map((section) => section.heading),
    ["Heading 1", "Heading 2"]
  );
  assert.equal(draft.sections[0].content, "Body text for section 1.");
  assert.equal(draft.sections[0].wordCount, 5);
  assert.equal(draft.totalWordCount, 10);
  assert.deepEqual(draft.focusKeywords, ["solar storage", "home batteries"]);
});

test("surplus sections are trimmed to the requested count", () => {
  const draft = parseArticleReply(reply(5), { ...options, maxSections: 3 });
  assert.equal(draft.sections.length, 3);
  assert.equal(draft.sections[2].heading, "Heading 3");
});

test("sections without a body are skipped", () => {
  const text = ["Title", "## Empty", "", "## Full", "Some words here."].join("\n");
  const draft = parseArticleReply(text, options);
  assert.deepEqual(
    draft.sections.map((section) => section.heading),
    ["Full"]
  );
});

test("sub-headings stay inside the section body", () => {
  const text = ["Title", "## Main", "Intro.", "### Detail", "More."].join("\n");
  const draft = parseArticleReply(text, options);
  assert.equal(draft.sections.length, 1);
  assert.equal(draft.sections[0].content, "Intro.\n### Detail\nMore.");
});

test("a reply without markers becomes one synthesized section", () => {
  const text = ["My Title", META, "First paragraph.", "Second paragraph."].join("\n");
  const draft = parseArticleReply(text, options);

  assert.equal(draft.sections.length, 1);
  assert.equal(draft.sections[0].heading, "Understanding solar storage");
  assert.equal(draft.sections[0].content, "First paragraph.\nSecond paragraph.");
});

test("a one-line reply still produces a non-empty section list", () => {
  const draft = parseArticleReply("Only a title", { ...options, keywords: [] });

  assert.equal(draft.sections.length, 1);
  assert.equal(draft.sections[0].heading, "Understanding the Topic");
  assert.ok(draft.sections[0].content.length > 0);
  assert.ok(draft.metaDescription.startsWith("Discover key insights"));
});

test("label lines are not taken as the meta description", () => {
  const label = `Meta description: ${META}`;
  const draft = parseArticleReply(["Title", label, "## A", "b"].join("\n"), options);
  assert.ok(draft.metaDescription.startsWith("Comprehensive analysis of solar storage"));
});

test("generateSlug strips punctuation and caps the length", () => {
  assert.equal(generateSlug("Bitcoin's Next Move: What to Expect!"), "bitcoins-next-move-what-to-expect");
  const slug = generateSlug("a ".repeat(60));
  assert.ok(slug.length <= 50);
  assert.ok(!slug.endsWith("-"));
});

test("buildCta is deterministic for a title", () => {
  assert.equal(buildCta("Same title", ["solar"]), buildCta("Same title", ["solar"]));
  assert.match(buildCta("Same title", ["solar"]), /solar/);
});

test("fallback article has two sections about the primary keyword", () => {
  const draft = buildFallbackArticle(["solar storage"], "English", "Professional");
  assert.equal(draft.title, "Understanding solar storage: A Comprehensive Guide");
  assert.deepEqual(
    draft.sections.map((section) => section.heading),
    ["What is solar storage?", "Benefits of solar storage"]
  );
  assert.equal(draft.slug, "understanding-solar-storage-guide");
});
