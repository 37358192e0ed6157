import type { RunConfig } from "../config/runConfig.js";
import { datasetPath, loadDataset } from "../dataset/loadDataset.js";
import { runParallelRequests } from "../dispatch/runParallelRequests.js";
import type { ProgressReporter } from "../dispatch/progressReporter.js";
import { fetchCompletion } from "../llm/fetchCompletion.js";
import type { CompletionTransport } from "../llm/requestCompletion.js";
import type { RetryPolicy } from "../llm/retryPolicy.js";
import type { RowResult } from "../llm/types.js";
import { writeResults, type WrittenArtifacts } from "../output/writeResults.js";
import { resolvePromptTemplate } from "../prompts/promptTemplates.js";
import { runLogHelpers } from "../../logging/runLog.js";

export type RunTranslationBatchParams = {
  source: string;
  config: RunConfig;
  transport: CompletionTransport;
  data_dir: string;
  dataset_prefix: string;
  csv_dir: string;
  txt_dir: string;
  policy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  /** Called with the row count once the dataset is loaded. */
  createProgress?: (total: number) => ProgressReporter;
};

export type RunSummary = {
  total: number;
  succeeded: number;
  failed: number;
  total_cost: number;
  elapsed_ms: number;
  artifacts: WrittenArtifacts;
  results: RowResult[];
};

export function summarizeResults(results: readonly RowResult[]): {
  succeeded: number;
  failed: number;
  total_cost: number;
} {
  let succeeded = 0;
  let total_cost = 0;
  for (const result of results) {
    if (result.status === "ok") {
      succeeded++;
      total_cost += result.cost ?? 0;
    }
  }
  return { succeeded, failed: results.length - succeeded, total_cost };
}

/**
 * Load the dataset for `source`, translate every row and write both
 * artifacts. Configuration problems throw before any request is sent;
 * individual row failures only show up in the results.
 */
export async function runTranslationBatch(params: RunTranslationBatchParams): Promise<RunSummary> {
  const template = resolvePromptTemplate(params.source);
  const rows = await loadDataset(
    datasetPath(params.data_dir, params.dataset_prefix, params.source),
    template
  );

  runLogHelpers.runStarted({
    source: params.source,
    model: params.config.model,
    rows: rows.length,
    max_concurrent: params.config.max_concurrent,
  });

  const startedAt = Date.now();
  const progress = params.createProgress?.(rows.length);

  let results: RowResult[];
  try {
    results = await runParallelRequests({
      rows,
      max_concurrent: params.config.max_concurrent,
      buildPrompt: template.build,
      complete: (prompt, index) =>
        fetchCompletion(prompt, params.config, {
          transport: params.transport,
          policy: params.policy,
          sleep: params.sleep,
          row_index: index,
        }),
      progress,
    });
  } finally {
    progress?.finish();
  }
  const elapsed_ms = Date.now() - startedAt;

  const artifacts = await writeResults({
    results,
    config: params.config,
    csv_dir: params.csv_dir,
    txt_dir: params.txt_dir,
  });

  const summary = summarizeResults(results);
  runLogHelpers.runCompleted({ model: params.config.model, ...summary, elapsed_ms });

  return { total: results.length, ...summary, elapsed_ms, artifacts, results };
}
