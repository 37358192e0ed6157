import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { PromptTemplate } from "../prompts/promptTemplates.js";
import type { InputRow } from "./types.js";

export const SENTENCE_COLUMN = "IT EXAMPLE";
export const TERM_COLUMN = "IT TERM";

const DatasetRecordsSchema = z.array(z.record(z.string().optional()));

export function datasetPath(dataDir: string, prefix: string, source: string): string {
  return path.join(dataDir, `${prefix}${source}.csv`);
}

/**
 * Split an options cell into individual candidates. Cells use either `|` or
 * `,` between candidates.
 */
export function splitOptions(cell: string): string[] {
  return cell
    .split(/[|,]/)
    .map((option) => option.trim())
    .filter((option) => option.length > 0);
}

export function parseDataset(content: string, template: PromptTemplate, label = "dataset"): InputRow[] {
  let header: string[] = [];
  let records: unknown;
  try {
    records = parse(content, {
      delimiter: ";",
      bom: true,
      skip_empty_lines: true,
      // short rows are kept; their missing cells read as empty
      relax_column_count_less: true,
      columns: (names: string[]) => {
        header = names.map((column) => column.trim());
        return header;
      },
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Could not parse ${label}: ${message}`, { cause: err });
  }

  const rows = DatasetRecordsSchema.parse(records);
  if (header.length > 0) {
    const required = [SENTENCE_COLUMN, TERM_COLUMN, template.options_column];
    const missing = required.filter((column) => !header.includes(column));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `${label} is missing column(s) ${missing.map((c) => `"${c}"`).join(", ")} ` +
          `required by the "${template.kind}" template`
      );
    }
  }

  return rows.map((record) =>
    Object.freeze({
      source_sentence: record[SENTENCE_COLUMN] ?? "",
      term: record[TERM_COLUMN] ?? "",
      options: Object.freeze(splitOptions(record[template.options_column] ?? "")),
    })
  );
}

export async function loadDataset(filePath: string, template: PromptTemplate): Promise<InputRow[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Source file not found: ${filePath}`, { cause: err });
  }
  return parseDataset(content, template, filePath);
}
