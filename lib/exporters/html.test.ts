import assert from "node:assert/strict";
import test from "node:test";
import { buildArticleDocument } from "../document-model";
import { buildSchemaMarkup } from "../seo-tools";
import { FIXTURE_TIME, fixtureResult } from "../test-fixtures";
import { escapeHtml, renderHtml, serializeJsonLd } from "./html";

function render(overrides: Parameters<typeof fixtureResult>[0] = {}) {
  const result = fixtureResult(overrides);
  const schema = buildSchemaMarkup(result.draft, result.seo, FIXTURE_TIME);
  return renderHtml(buildArticleDocument(result), schema);
}

test("escapeHtml covers markup and quotes", () => {
  assert.equal(escapeHtml(`<b>"Tom" & 'Jerry'</b>`), "&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;");
});

test("renderHtml escapes text and renders links from the block tree", () => {
  const html = render();

  assert.ok(html.startsWith("<!DOCTYPE html>\n<html lang=\"en\">"));
  assert.ok(html.includes("<h2>Why &lt;Solar&gt; Matters</h2>"));
  assert.ok(
    html.includes(
      '<p>Panels cut bills &amp; emissions. Read the <a href="/primer">primer</a> or <a href="https://energy.example.test/report" target="_blank" rel="noopener noreferrer">the report</a>.</p>'
    )
  );
  assert.ok(html.includes("<ul><li>Lower bills</li><li>Cleaner air</li></ul>"));
  assert.ok(html.includes("<h3>First Steps</h3>"));
  assert.ok(html.includes("<p>Call an installer. Avoid this trick.</p>"));
  assert.ok(html.includes('<div class="cta-section"><p>Get a quote today.</p></div>'));
  assert.equal(html.includes("javascript:"), false);
});

test("the cover image is rendered once, before the content", () => {
  const html = render();
  const img =
    '<figure class="cover-image"><img src="https://img.example.test/cover.jpg" alt="Professional illustration: Rooftop solar" loading="lazy"></figure>';

  assert.ok(html.indexOf(img) > 0);
  assert.ok(html.indexOf(img) < html.indexOf('<div class="article-content">'));
  assert.equal(html.split("<figure").length, 2);
});

test("titles are escaped in head and body", () => {
  const html = render({ draft: { title: 'Sun & "Shade"' } });

  assert.ok(html.includes("<title>Sun &amp; &quot;Shade&quot;</title>"));
  assert.ok(html.includes('<h1 class="article-title">Sun &amp; &quot;Shade&quot;</h1>'));
});

test("JSON-LD cannot close its script tag", () => {
  assert.equal(serializeJsonLd({ headline: "</script>" }), '{\n  "headline": "\\u003c/script>"\n}');
});
