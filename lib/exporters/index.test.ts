import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { buildArticleDocument } from "../document-model";
import type { FetchFn } from "../http";
import { FIXTURE_PNG, FIXTURE_TIME, fixtureImage, fixtureResult } from "../test-fixtures";
import { exportAllFormats, exportArticle, isExportFormat, loadCoverImage } from "./index";

const offline: FetchFn = async () => {
  throw new Error("offline");
};

test("isExportFormat accepts the three formats only", () => {
  assert.equal(isExportFormat("docx"), true);
  assert.equal(isExportFormat("pdf"), false);
  assert.equal(isExportFormat(undefined), false);
});

test("placeholder covers are never downloaded", async () => {
  let calls = 0;
  const fetchFn: FetchFn = async () => {
    calls += 1;
    return new Response("img");
  };
  const doc = buildArticleDocument(fixtureResult({ images: [fixtureImage({ isPlaceholder: true })] }));

  assert.equal(await loadCoverImage(doc, fetchFn), null);
  assert.equal(calls, 0);
});

test("remote covers are downloaded for embedding", async () => {
  const fetchFn: FetchFn = async () => new Response(new Uint8Array(FIXTURE_PNG));

  const cover = await loadCoverImage(buildArticleDocument(fixtureResult()), fetchFn);

  assert.equal(cover?.type, "png");
  assert.deepEqual(cover && [...cover.data], [...FIXTURE_PNG]);
});

test("covers in formats Word cannot embed are skipped", async () => {
  const fetchFn: FetchFn = async () =>
    new Response(new Uint8Array([0x52, 0x49, 0x46, 0x46]), { headers: { "Content-Type": "image/webp" } });

  assert.equal(await loadCoverImage(buildArticleDocument(fixtureResult()), fetchFn), null);
});

test("exportArticle names the analytics file after the slug", async () => {
  const file = await exportArticle(fixtureResult(), "json", { now: FIXTURE_TIME });

  assert.equal(file.filename, "solar-power-for-homes_20260506_070809_analytics.json");
  assert.equal(file.contentType, "application/json; charset=utf-8");
  const parsed: unknown = JSON.parse(file.body.toString("utf-8"));
  assert.ok(typeof parsed === "object" && parsed !== null && "exportInfo" in parsed);
});

test("exportAllFormats writes html, docx and json side by side", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "article-export-"));
  try {
    const paths = await exportAllFormats(fixtureResult(), dir, { now: FIXTURE_TIME, fetchFn: offline });

    assert.deepEqual(paths, {
      html: path.join(dir, "solar-power-for-homes_20260506_070809.html"),
      docx: path.join(dir, "solar-power-for-homes_20260506_070809.docx"),
      json: path.join(dir, "solar-power-for-homes_20260506_070809_analytics.json"),
    });
    const html = await fs.readFile(paths.html, "utf-8");
    assert.ok(html.includes('"image": "https://img.example.test/cover.jpg"'));
    assert.equal((await fs.readFile(paths.docx)).subarray(0, 2).toString("latin1"), "PK");
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
