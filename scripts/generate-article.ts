/**
 * Generates one article from a JSON request file and writes HTML, DOCX and
 * JSON exports.
 * Run with: npm run generate -- scripts/sample-request.json [output-dir]
 */

import fs from "fs";
import path from "path";
import { loadAppConfig } from "../lib/config";
import { exportAllFormats } from "../lib/exporters";
import { extractErrorMessage } from "../lib/http";
import { isConfigurationError, isValidationError } from "../lib/errors";
import { runGeneration } from "../lib/pipeline";
import { normalizeGenerationRequest } from "../lib/request";

async function main() {
  const [requestFile, outputDir] = process.argv.slice(2);
  if (!requestFile) {
    console.error("Usage: generate-article <request.json> [output-dir]");
    process.exitCode = 1;
    return;
  }

  const config = loadAppConfig();
  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(requestFile), "utf-8"));
  const request = normalizeGenerationRequest(raw);

  const started = Date.now();
  const result = await runGeneration(request, { config }, (stage, message) =>
    console.log(`[${stage}] ${message}`)
  );

  const files = await exportAllFormats(result, outputDir ? path.resolve(outputDir) : config.exportDir);

  console.log(`\nResults:`);
  console.log(`  Title: ${result.draft.title}`);
  console.log(`  Words: ${result.seo.wordCount}`);
  console.log(`  SEO score: ${result.seo.seoScore}/100`);
  console.log(`  Images: ${result.images.length} (${result.images.filter((i) => i.isPlaceholder).length} placeholder)`);
  console.log(`  Links inserted: ${result.linksInserted}`);
  if (result.usedFallbackArticle) {
    console.log(`  Template article used: ${result.generationError ?? "model output unusable"}`);
  }
  console.log(`  Time: ${((Date.now() - started) / 1000).toFixed(1)}s`);
  console.log(`\nFiles:`);
  for (const file of Object.values(files)) console.log(`  ${file}`);
}

main().catch((err: unknown) => {
  console.error(`Generation failed: ${extractErrorMessage(err)}`);
  if (isConfigurationError(err)) console.error(err.remediation);
  if (isValidationError(err)) for (const issue of err.issues) console.error(`  - ${issue}`);
  process.exitCode = 1;
});
