import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { RunConfig } from "../config/runConfig.js";
import type { RowResult } from "../llm/types.js";
import { artifactBaseName } from "./artifactName.js";

export const CSV_COLUMNS = [
  "index",
  "status",
  "assistant",
  "reasoning",
  "cost",
  "reasoning_tokens",
  "error",
] as const;

export type CsvRecord = {
  index: number;
  status: "ok" | "failed";
  assistant: string | null;
  reasoning: string | null;
  cost: number | null;
  reasoning_tokens: number | null;
  error: string | null;
};

export type WrittenArtifacts = {
  csv_path: string;
  txt_path: string;
};

/**
 * Flatten a model answer to one line: drop think tags and line breaks.
 */
export function cleanTranslation(text: string): string {
  return text
    .replaceAll("<think>", "")
    .replaceAll("</think>", "")
    .replace(/[\r\n]/g, " ")
    .trim();
}

export function toCsvRecord(result: RowResult): CsvRecord {
  if (result.status === "error") {
    return {
      index: result.index,
      status: "failed",
      assistant: null,
      reasoning: null,
      cost: null,
      reasoning_tokens: null,
      error: `${result.error_type}: ${result.message}`,
    };
  }
  return {
    index: result.index,
    status: "ok",
    assistant: result.text,
    reasoning: result.reasoning,
    cost: result.cost,
    reasoning_tokens: result.reasoning_tokens,
    error: null,
  };
}

export function renderCsv(results: readonly RowResult[]): string {
  return stringify(results.map(toCsvRecord), {
    header: true,
    columns: [...CSV_COLUMNS],
  });
}

// Failed rows become empty lines so line N still matches input row N.
export function renderTxt(results: readonly RowResult[]): string {
  return results
    .map((result) => (result.status === "ok" ? cleanTranslation(result.text) : "") + "\n")
    .join("");
}

export async function writeResults(params: {
  results: readonly RowResult[];
  config: RunConfig;
  csv_dir: string;
  txt_dir: string;
}): Promise<WrittenArtifacts> {
  const baseName = artifactBaseName(params.config.model);
  const csv_path = path.join(params.csv_dir, `${baseName}.csv`);
  const txt_path = path.join(params.txt_dir, `${baseName}.txt`);

  await mkdir(params.csv_dir, { recursive: true });
  await mkdir(params.txt_dir, { recursive: true });

  await writeFile(csv_path, renderCsv(params.results), "utf8");
  await writeFile(txt_path, renderTxt(params.results), "utf8");

  return { csv_path, txt_path };
}
