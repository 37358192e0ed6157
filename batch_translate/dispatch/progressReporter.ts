import type { RowResult } from "../llm/types.js";

export type ProgressReporter = {
  advance(result: RowResult): void;
  finish(): void;
};

export const silentProgress: ProgressReporter = {
  advance() {},
  finish() {},
};

type WritableLike = { write(chunk: string): unknown };

/**
 * Single-line progress counter, redrawn in place on stderr.
 */
export function createConsoleProgress(
  total: number,
  stream: WritableLike = process.stderr
): ProgressReporter {
  let done = 0;
  let failed = 0;

  const render = () => {
    const failedSuffix = failed > 0 ? ` (${failed} failed)` : "";
    stream.write(`\r[progress] ${done}/${total}${failedSuffix}`);
  };

  return {
    advance(result) {
      done++;
      if (result.status === "error") failed++;
      render();
    },
    finish() {
      stream.write("\n");
    },
  };
}
