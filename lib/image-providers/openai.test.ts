import assert from "node:assert/strict";
import test from "node:test";
import { loadAppConfig } from "../config";
import { createImageEngine } from "../image-engine";
import { createOpenAiImageAdapter } from "./openai";
import { jsonResponse, kindOf, recordSleeps, scriptedFetch } from "./test-helpers";

const config = loadAppConfig({ OPENAI_API_KEY: "test-secret", IMAGE_CACHE_ENABLED: "0" });

function openAiError(status: number, code: string, message: string) {
  return () => jsonResponse(status, { error: { code, message } });
}

test("a successful reply yields the url and the revised prompt", async () => {
  const { calls, fetchFn } = scriptedFetch([
    () => jsonResponse(200, { data: [{ url: "https://img.test/a.png", revised_prompt: "A rooftop" }] }),
  ]);

  const outcome = await createOpenAiImageAdapter(config, fetchFn).generate("solar roof");

  assert.deepEqual(outcome, { ok: true, url: "https://img.test/a.png", revisedPrompt: "A rooftop" });
  assert.equal(calls[0].url, "https://api.openai.com/v1/images/generations");
  assert.deepEqual(calls[0].init?.headers, {
    "Content-Type": "application/json",
    Authorization: "Bearer test-secret",
  });
  assert.deepEqual(JSON.parse(String(calls[0].init?.body)), {
    model: "dall-e-3",
    prompt: "solar roof",
    size: "1024x1024",
    quality: "standard",
    n: 1,
  });
});

test("HTTP failures map onto failure kinds", async () => {
  const cases: Array<[() => Response, string]> = [
    [openAiError(429, "rate_limit_exceeded", "Rate limit reached"), "rate_limit"],
    [openAiError(400, "content_policy_violation", "Your request was rejected"), "content_policy"],
    [openAiError(400, "", "Rejected by our safety system"), "content_policy"],
    [openAiError(500, "server_error", "The server had an error"), "transient"],
    [openAiError(503, "", "Service unavailable"), "transient"],
    [openAiError(408, "", "Request timeout"), "transient"],
    [openAiError(400, "invalid_size", "Invalid size"), "other"],
    [() => new Response("<html>Bad gateway</html>", { status: 502 }), "transient"],
  ];

  for (const [reply, expected] of cases) {
    const { fetchFn } = scriptedFetch([reply]);
    const outcome = await createOpenAiImageAdapter(config, fetchFn).generate("solar roof");
    assert.equal(kindOf(outcome), expected);
  }
});

test("rate limits keep the status and message", async () => {
  const { fetchFn } = scriptedFetch([openAiError(429, "rate_limit_exceeded", "Rate limit reached")]);

  assert.deepEqual(await createOpenAiImageAdapter(config, fetchFn).generate("solar roof"), {
    ok: false,
    kind: "rate_limit",
    message: "Rate limit reached",
    status: 429,
  });
});

test("network errors and replies without a url are transient", async () => {
  const offline = scriptedFetch([() => new TypeError("fetch failed")]);
  const empty = scriptedFetch([() => jsonResponse(200, { data: [] })]);

  assert.equal(kindOf(await createOpenAiImageAdapter(config, offline.fetchFn).generate("x")), "transient");
  assert.equal(kindOf(await createOpenAiImageAdapter(config, empty.fetchFn).generate("x")), "transient");
});

test("three server errors end in a placeholder after three requests", async () => {
  const { calls, fetchFn } = scriptedFetch([openAiError(500, "server_error", "The server had an error")]);
  const { delays, sleep } = recordSleeps();
  const engine = createImageEngine("openai", config, { fetchFn, sleep, cache: null });

  const image = await engine.generateImage("professional photo of a coin", "professional", 0);

  assert.equal(calls.length, 3);
  assert.equal(image.attempts, 3);
  assert.equal(image.isPlaceholder, true);
  assert.deepEqual(delays, [2000, 4000]);
});

test("a rate limit stops after one request", async () => {
  const { calls, fetchFn } = scriptedFetch([openAiError(429, "rate_limit_exceeded", "Rate limit reached")]);
  const engine = createImageEngine("openai", config, { fetchFn, sleep: recordSleeps().sleep, cache: null });

  const image = await engine.generateImage("professional photo of a coin", "professional", 0);

  assert.equal(calls.length, 1);
  assert.equal(image.isPlaceholder, true);
});

test("a recovered request keeps the provider's revised prompt", async () => {
  const { fetchFn } = scriptedFetch([
    openAiError(503, "", "Service unavailable"),
    () => jsonResponse(200, { data: [{ url: "https://img.test/b.png", revised_prompt: "A coin on a desk" }] }),
  ]);
  const engine = createImageEngine("openai", config, { fetchFn, sleep: recordSleeps().sleep, cache: null });

  const image = await engine.generateImage("professional photo of a coin", "professional", 0);

  assert.equal(image.url, "https://img.test/b.png");
  assert.equal(image.attempts, 2);
  assert.equal(image.revisedPrompt, "A coin on a desk");
  assert.equal(image.sourcePrompt, "professional photo of a coin");
});
