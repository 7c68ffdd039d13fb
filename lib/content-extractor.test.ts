import assert from "node:assert/strict";
import test from "node:test";
import {
  buildSourceContext,
  combineExtractedContents,
  extractMultipleUrls,
  extractUrlContent,
  parseHtmlDocument,
  type ExtractedContent,
} from "./content-extractor";
import type { FetchFn } from "./http";

const ARTICLE_TEXT =
  "Home batteries store surplus solar energy during the day and release it in the evening when grid prices peak.";

const PAGE = `<!doctype html>
<html>
  <head>
    <title>Home Battery Basics</title>
    <meta name="description" content="How home batteries pair with rooftop solar.">
    <meta name="keywords" content="home battery, solar, storage">
  </head>
  <body>
    <article>
      <h1>Home Battery Basics</h1>
      <p>${ARTICLE_TEXT}</p>
      <h2>Sizing</h2>
      <p>Most households size storage to cover one evening of typical use.</p>
      <a href="/guides/sizing">Sizing guide</a>
      <a href="https://other.example.test/report">Industry report</a>
      <a href="#top">Back to top</a>
    </article>
  </body>
</html>`;

function routeFetch(routes: Record<string, () => Response>): FetchFn & { urls: string[] } {
  const urls: string[] = [];
  const fn = async (url: string) => {
    urls.push(url);
    const route = routes[url];
    if (!route) throw new Error("getaddrinfo ENOTFOUND");
    return route();
  };
  return Object.assign(fn, { urls });
}

test("reader JSON responses are used first", async () => {
  const body = `# Battery Guide\n\n${ARTICLE_TEXT}\n\n## Costs\nPrices keep falling.`;
  const fetchFn = routeFetch({
    "https://r.jina.ai/https://site.example.test/post": () =>
      new Response(JSON.stringify({ data: { title: "Battery Guide", description: "d", content: body } })),
  });

  const result = await extractUrlContent("https://site.example.test/post", { fetchFn });

  assert.equal(result.method, "reader");
  assert.equal(result.success, true);
  assert.equal(result.title, "Battery Guide");
  assert.deepEqual(result.headings, ["Battery Guide", "Costs"]);
  assert.deepEqual(fetchFn.urls, ["https://r.jina.ai/https://site.example.test/post"]);
});

test("falls back to a direct fetch when the reader fails", async () => {
  const fetchFn = routeFetch({
    "https://r.jina.ai/https://site.example.test/post": () => new Response("busy", { status: 503 }),
    "https://site.example.test/post": () =>
      new Response(PAGE, { headers: { "Content-Type": "text/html" } }),
  });

  const result = await extractUrlContent("https://site.example.test/post", { fetchFn });

  assert.equal(result.method, "direct");
  assert.equal(result.description, "How home batteries pair with rooftop solar.");
  assert.deepEqual(result.keywords, ["home battery", "solar", "storage"]);
  assert.ok(result.content.includes("surplus solar energy"));
});

test("returns fallback data when every method fails", async () => {
  const fetchFn = routeFetch({});

  const result = await extractUrlContent("https://down.example.test/x", { fetchFn });

  assert.equal(result.method, "fallback");
  assert.equal(result.success, false);
  assert.equal(result.title, "Content from down.example.test");
  assert.ok(result.error?.startsWith("reader:"));
});

test("parseHtmlDocument collects headings and classifies links", () => {
  const result = parseHtmlDocument(PAGE, "https://site.example.test/post");

  assert.equal(result.title, "Home Battery Basics");
  assert.deepEqual(result.headings, ["Home Battery Basics", "Sizing"]);
  assert.deepEqual(result.links, [
    { href: "https://site.example.test/guides/sizing", text: "Sizing guide", internal: true },
    { href: "https://other.example.test/report", text: "Industry report", internal: false },
  ]);
});

test("extractMultipleUrls caps the batch at five", async () => {
  const fetchFn = routeFetch({});
  const urls = Array.from({ length: 7 }, (_, i) => `https://s${i}.example.test/`);

  const results = await extractMultipleUrls(urls, { fetchFn });

  assert.equal(results.length, 5);
});

function extracted(overrides: Partial<ExtractedContent>): ExtractedContent {
  return {
    url: "https://a.example.test",
    title: "A",
    description: "",
    content: "",
    headings: [],
    keywords: [],
    links: [],
    wordCount: 0,
    method: "reader",
    success: true,
    ...overrides,
  };
}

test("combined context caps each source and merges keywords", () => {
  const combined = combineExtractedContents([
    extracted({ title: "First", content: "x".repeat(900), keywords: ["solar", "battery"] }),
    extracted({ title: "Second", content: "short text", keywords: ["battery", "grid"] }),
    extracted({ title: "Broken", success: false, method: "fallback" }),
  ]);

  assert.equal(combined.successfulSources, 2);
  assert.equal(combined.successRate, 67);
  assert.equal(combined.contents[0].length, 800);
  assert.deepEqual(combined.keywords, ["solar", "battery", "grid"]);

  const context = buildSourceContext(combined, ["home battery"]);
  assert.ok(context.startsWith("Multi-URL Analysis (2 sources)"));
  assert.ok(context.includes("Source 2 (Second):\nshort text"));
  assert.ok(context.endsWith("Keywords: home battery"));
});

test("context falls back to the keyword line without sources", () => {
  assert.equal(buildSourceContext(null, ["a", "b"]), "Keywords: a, b");
});
