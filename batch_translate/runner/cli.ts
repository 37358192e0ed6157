#!/usr/bin/env node
import "dotenv/config";

import { parseCliArgs } from "../config/parseCliArgs.js";
import { createConsoleProgress } from "../dispatch/progressReporter.js";
import { ConfigurationError } from "../errors.js";
import { DEFAULT_REQUEST_TIMEOUT_MS, createOpenRouterTransport } from "../llm/requestCompletion.js";
import { runTranslationBatch } from "./runTranslationBatch.js";

function readTimeoutMs(): number {
  const raw = process.env.BATCH_TRANSLATE_TIMEOUT_MS;
  if (!raw) return DEFAULT_REQUEST_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`BATCH_TRANSLATE_TIMEOUT_MS must be a positive number, got "${raw}"`);
  }
  return value;
}

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  const transport = createOpenRouterTransport({
    api_key: options.api_key,
    api_url: process.env.OPENROUTER_API_URL || undefined,
    timeout_ms: readTimeoutMs(),
  });

  console.log(`[batch-translate] source=${options.source} model=${options.config.model}`);
  console.log(
    `[batch-translate] max_tokens=${options.config.max_tokens} temperature=${options.config.temperature} max_concurrent=${options.config.max_concurrent}`
  );

  const summary = await runTranslationBatch({
    source: options.source,
    config: options.config,
    transport,
    data_dir: options.data_dir,
    dataset_prefix: options.dataset_prefix,
    csv_dir: options.csv_dir,
    txt_dir: options.txt_dir,
    createProgress: (total) => createConsoleProgress(total),
  });

  console.log(`[batch-translate] Completed ${summary.succeeded}/${summary.total} rows (${summary.failed} failed)`);
  console.log(`[batch-translate] Total time: ${(summary.elapsed_ms / 1000).toFixed(2)}s`);
  console.log(`[batch-translate] Total cost: ${summary.total_cost}`);
  console.log(`[batch-translate] CSV: ${summary.artifacts.csv_path}`);
  console.log(`[batch-translate] TXT: ${summary.artifacts.txt_path}`);
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`[batch-translate] ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
