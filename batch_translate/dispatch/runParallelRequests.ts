import type { InputRow } from "../dataset/types.js";
import type { CompletionResult, RowResult } from "../llm/types.js";
import type { Prompt } from "../prompts/promptTemplates.js";
import { ConcurrencyGate } from "./concurrencyGate.js";
import { silentProgress, type ProgressReporter } from "./progressReporter.js";

export type RunParallelRequestsParams = {
  rows: readonly InputRow[];
  max_concurrent: number;
  buildPrompt: (row: InputRow) => Prompt;
  complete: (prompt: Prompt, index: number) => Promise<CompletionResult>;
  progress?: ProgressReporter;
};

/**
 * Fan out one completion per row behind a shared concurrency gate and join
 * them. The returned list is index-aligned with `rows` whatever order the
 * requests finish in.
 */
export async function runParallelRequests(params: RunParallelRequestsParams): Promise<RowResult[]> {
  const gate = new ConcurrencyGate(params.max_concurrent);
  const progress = params.progress ?? silentProgress;

  return Promise.all(
    params.rows.map(async (row, index): Promise<RowResult> => {
      const result = await gate.run(() => completeRow(params, row, index));
      const rowResult: RowResult = { ...result, index };
      reportProgress(progress, rowResult);
      return rowResult;
    })
  );
}

// advance() failures are logged, never propagated into the join.
function reportProgress(progress: ProgressReporter, result: RowResult): void {
  try {
    progress.advance(result);
  } catch (err) {
    console.warn("[batch-translate] progress reporter failed", {
      row_index: result.index,
      msg: err instanceof Error ? err.message : String(err),
    });
  }
}

async function completeRow(
  params: RunParallelRequestsParams,
  row: InputRow,
  index: number
): Promise<CompletionResult> {
  try {
    return await params.complete(params.buildPrompt(row), index);
  } catch (err) {
    // complete() is expected to resolve; keep the row anyway if it doesn't
    return {
      status: "error",
      error_type: "unknown",
      message: err instanceof Error ? err.message : String(err),
      attempts: 0,
    };
  }
}
