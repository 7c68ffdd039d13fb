import assert from "node:assert/strict";
import test from "node:test";
import { buildArticleDocument } from "../document-model";
import { FIXTURE_PNG, fixtureResult } from "../test-fixtures";
import { detectImageType, metadataRows, renderDocx } from "./docx";

test("metadata rows summarize the article", () => {
  const result = fixtureResult();
  const doc = buildArticleDocument(result);

  assert.deepEqual(metadataRows(doc), [
    ["Word Count", String(result.seo.wordCount)],
    ["SEO Score", `${result.seo.seoScore}/100`],
    ["Readability", result.seo.readability.readingLevel],
    ["Keywords", "solar"],
    ["Generated", "2026-05-06 07:08"],
  ]);
});

test("renderDocx packs a zip container", async () => {
  const buffer = await renderDocx(buildArticleDocument(fixtureResult()));

  assert.ok(buffer.length > 0);
  assert.equal(buffer.subarray(0, 2).toString("latin1"), "PK");
});

test("an embedded cover is stored with its image extension", async () => {
  const buffer = await renderDocx(buildArticleDocument(fixtureResult()), {
    data: FIXTURE_PNG,
    type: "png",
  });

  // Zip entry names are stored uncompressed.
  const entries = buffer.toString("latin1");
  assert.match(entries, /word\/media\/[\w-]+\.png/);
  assert.doesNotMatch(entries, /word\/media\/[\w-]+\.undefined/);
});

test("image types come from magic bytes before the content type", () => {
  assert.equal(detectImageType(FIXTURE_PNG, "image/jpeg"), "png");
  assert.equal(detectImageType(Buffer.from([0xff, 0xd8, 0xff, 0xe0])), "jpg");
  assert.equal(detectImageType(Buffer.from("GIF89a", "latin1")), "gif");
  assert.equal(detectImageType(Buffer.from([0, 1, 2, 3]), "image/jpeg; charset=binary"), "jpg");
  assert.equal(detectImageType(Buffer.from([0, 1, 2, 3]), "image/webp"), null);
});
