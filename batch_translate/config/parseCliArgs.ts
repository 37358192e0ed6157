import { ConfigurationError } from "../errors.js";
import { buildRunConfig, type RunConfig } from "./runConfig.js";

export const DEFAULT_DATA_DIR = "data";
export const DEFAULT_DATASET_PREFIX = "LegISTyr__";
export const DEFAULT_CSV_DIR = "output_csv";
export const DEFAULT_TXT_DIR = "output_txt";

export const USAGE =
  "Usage: batch-translate --source <name> --model <id> [--api-key <key>] [--max-tokens N] " +
  "[--temperature T] [--max-concurrent N] [--data-dir DIR] [--dataset-prefix PREFIX] " +
  "[--csv-dir DIR] [--txt-dir DIR]";

export type CliOptions = {
  source: string;
  api_key: string;
  config: RunConfig;
  data_dir: string;
  dataset_prefix: string;
  csv_dir: string;
  txt_dir: string;
};

const VALUE_FLAGS = new Set([
  "--source",
  "--model",
  "--api-key",
  "--max-tokens",
  "--temperature",
  "--max-concurrent",
  "--data-dir",
  "--dataset-prefix",
  "--csv-dir",
  "--txt-dir",
]);

function parseNumberFlag(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new ConfigurationError(`${flag} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse `process.argv.slice(2)`-style arguments. The API key falls back to
 * OPENROUTER_API_KEY from the environment.
 */
export function parseCliArgs(
  args: string[],
  env: NodeJS.ProcessEnv = process.env
): CliOptions {
  const values = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!VALUE_FLAGS.has(arg)) {
      throw new ConfigurationError(`Unknown argument: ${arg}\n${USAGE}`);
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigurationError(`${arg} requires a value\n${USAGE}`);
    }
    values.set(arg, value);
    i++;
  }

  const source = values.get("--source");
  const model = values.get("--model");
  if (!source || !model) {
    throw new ConfigurationError(`--source and --model are required\n${USAGE}`);
  }

  const api_key = values.get("--api-key") ?? env.OPENROUTER_API_KEY;
  if (!api_key) {
    throw new ConfigurationError("Missing API key: pass --api-key or set OPENROUTER_API_KEY");
  }

  const config = buildRunConfig({
    model,
    max_tokens: parseNumberFlag("--max-tokens", values.get("--max-tokens")),
    temperature: parseNumberFlag("--temperature", values.get("--temperature")),
    max_concurrent: parseNumberFlag("--max-concurrent", values.get("--max-concurrent")),
  });

  return {
    source,
    api_key,
    config,
    data_dir: values.get("--data-dir") ?? DEFAULT_DATA_DIR,
    dataset_prefix: values.get("--dataset-prefix") ?? DEFAULT_DATASET_PREFIX,
    csv_dir: values.get("--csv-dir") ?? DEFAULT_CSV_DIR,
    txt_dir: values.get("--txt-dir") ?? DEFAULT_TXT_DIR,
  };
}
