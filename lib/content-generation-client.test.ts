import assert from "node:assert/strict";
import test from "node:test";
import {
  ApiRequestError,
  buildGeneratePayload,
  DEFAULT_FORM,
  describeApiError,
  filenameFromDisposition,
  isGenerationResult,
  postJson,
  replaceImage,
} from "./content-generation-client";
import { normalizeGenerationRequest } from "./request";
import { fixtureImage, fixtureResult } from "./test-fixtures";

test("the form payload normalizes into a generation request", () => {
  const payload = buildGeneratePayload({
    ...DEFAULT_FORM,
    keywords: " solar panels, home energy ",
    promotionName: "None",
    promotionStyle: "cta_only",
    promotionCustomText: "Acme Solar installs panels",
  });

  const request = normalizeGenerationRequest(payload);

  assert.deepEqual(request.keywords, ["solar panels", "home energy"]);
  assert.deepEqual(request.promotion, {
    name: "None",
    style: "cta_only",
    customText: "Acme Solar installs panels",
  });
});

test("a promotion style without a promotion is dropped", () => {
  const payload = buildGeneratePayload({ ...DEFAULT_FORM, keywords: "x", promotionStyle: "cta_only" });
  assert.deepEqual(payload.promotion, { name: "None", style: "none", customText: "" });
});

test("api errors surface their message and remediation", () => {
  assert.deepEqual(
    describeApiError({ error: "no key", kind: "configuration", remediation: "set OPENAI_API_KEY" }, "failed"),
    { message: "no key", remediation: "set OPENAI_API_KEY" }
  );
  assert.deepEqual(describeApiError("<html>", "failed"), { message: "failed", remediation: null });
});

test("generation results are recognized after a JSON round trip", () => {
  assert.equal(isGenerationResult(JSON.parse(JSON.stringify(fixtureResult()))), true);
  assert.equal(isGenerationResult({ draft: {} }), false);
});

test("a regenerated image replaces the one at its index", () => {
  const first = fixtureImage({ index: 0 });
  const fresh = fixtureImage({ index: 0, url: "https://images.test/new.png" });

  assert.deepEqual(replaceImage([first], fresh), [fresh]);
  assert.deepEqual(replaceImage([], fresh), [fresh]);
});

test("download names come from the content disposition header", () => {
  assert.equal(
    filenameFromDisposition('attachment; filename="solar_20260506.html"', "article.html"),
    "solar_20260506.html"
  );
  assert.equal(filenameFromDisposition(null, "article.html"), "article.html");
});

test("postJson turns error responses into ApiRequestError", async () => {
  const fetchFn: typeof fetch = async () =>
    new Response(JSON.stringify({ error: "no key", kind: "configuration", remediation: "set OPENAI_API_KEY" }), {
      status: 400,
      headers: { "Content-Type": "application/json" },
    });

  await assert.rejects(postJson("/api/generate", {}, 1000, fetchFn), (err: unknown) => {
    assert.ok(err instanceof ApiRequestError);
    assert.equal(err.message, "no key");
    assert.equal(err.remediation, "set OPENAI_API_KEY");
    return true;
  });
});

test("postJson returns the parsed body on success", async () => {
  const fetchFn: typeof fetch = async (_input, init) => new Response(init?.body ?? "null");

  assert.deepEqual(await postJson("/api/echo", { ok: 1 }, 1000, fetchFn), { ok: 1 });
});
