import assert from "node:assert/strict";
import test from "node:test";
import { loadAppConfig } from "./config";
import { ConfigurationError } from "./errors";
import type { FetchFn } from "./http";
import { ImageEngine } from "./image-engine";
import type { ImageProviderAdapter } from "./image-providers/types";
import type { ChatCompletionFn } from "./llm-engine";
import { runGeneration, type GenerationStage } from "./pipeline";
import { normalizeGenerationRequest } from "./request";

const META =
  "A plain guide to hardware wallets covering offline keys, seed phrases and the habits that keep savings safe.";

const REPLY = [
  "Hardware Wallets Explained",
  META,
  "",
  "## Why Offline",
  "A hardware wallet keeps keys offline. Ledger basics matter.",
  "## Setup",
  "Write down the seed phrase.",
].join("\n");

const rejectingAdapter: ImageProviderAdapter = {
  name: "openai",
  label: "OpenAI Images",
  model: "dall-e-3",
  maxPromptLength: 400,
  styleSuffix: "high quality digital art",
  shortPromptDetail: "detailed illustration",
  async generate() {
    return { ok: false, kind: "content_policy", message: "rejected by safety system" };
  },
};

const fixedNow = () => new Date("2026-03-04T05:06:07.000Z");

test("runGeneration drafts, scores, illustrates and links in order", async () => {
  const request = normalizeGenerationRequest({
    keywords: "hardware wallet",
    sectionCount: 2,
    internalLinks: "Seed Phrase: /seed-phrase",
  });
  const chat: ChatCompletionFn = async () => REPLY;
  const stages: GenerationStage[] = [];

  const result = await runGeneration(
    request,
    {
      config: loadAppConfig({}),
      chat,
      imageEngine: new ImageEngine({ adapter: rejectingAdapter, sleep: async () => undefined }),
      now: fixedNow,
    },
    (stage) => stages.push(stage)
  );

  assert.deepEqual(stages, ["configuration", "drafting", "seo", "images", "enhancement", "complete"]);
  assert.equal(result.usedFallbackArticle, false);
  assert.equal(result.draft.title, "Hardware Wallets Explained");
  assert.equal(result.draft.sections[1].content, "Write down the [seed phrase](/seed-phrase).");
  assert.equal(result.linksInserted, 2);
  assert.equal(result.images.length, 1);
  assert.equal(result.images[0].isPlaceholder, true);
  assert.equal(result.images[0].attempts, 1);
  assert.equal(result.seo.focusKeyword, "hardware wallet");
  assert.equal(result.seo.links.length, 2);
  assert.equal(result.generatedAt, "2026-03-04T05:06:07.000Z");
  assert.equal(result.extraction, undefined);
});

test("URL-only requests take their keywords from the sources", async () => {
  const source =
    "Composting turns kitchen scraps into rich soil. Composting needs air and moisture. Composting bins sit in shade.";
  const fetchFn: FetchFn = async (url) => {
    if (url === "https://r.jina.ai/https://garden.example.test/compost") {
      return new Response(JSON.stringify({ data: { title: "Compost 101", content: source } }));
    }
    throw new Error("unexpected request");
  };
  const prompts: string[] = [];
  const chat: ChatCompletionFn = async (_system, user) => {
    prompts.push(user);
    return REPLY;
  };
  const request = normalizeGenerationRequest({
    sourceUrls: "https://garden.example.test/compost",
    includeImages: false,
  });

  const result = await runGeneration(request, { config: loadAppConfig({}), chat, fetchFn, now: fixedNow });

  assert.equal(result.request.keywords[0], "composting");
  assert.equal(result.extraction?.successRate, 100);
  assert.deepEqual(result.images, []);
  assert.match(prompts[0], /Source 1 \(Compost 101\):/);
});

test("missing keys fail before any network call", async () => {
  let calls = 0;
  const fetchFn: FetchFn = async () => {
    calls += 1;
    return new Response("{}");
  };
  const request = normalizeGenerationRequest({ keywords: "tea" });

  await assert.rejects(
    runGeneration(request, { config: loadAppConfig({}), fetchFn }),
    ConfigurationError
  );
  assert.equal(calls, 0);
});
