import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors.js";
import { parseCliArgs } from "../parseCliArgs.js";
import { buildRunConfig } from "../runConfig.js";

describe("parseCliArgs", () => {
  it("applies defaults for optional flags", () => {
    const options = parseCliArgs(
      ["--source", "homonyms", "--model", "openai/gpt-4o-mini", "--api-key", "test-secret"],
      {}
    );

    expect(options).toEqual({
      source: "homonyms",
      api_key: "test-secret",
      config: {
        model: "openai/gpt-4o-mini",
        max_tokens: 1000,
        temperature: 0.1,
        max_concurrent: 15,
      },
      data_dir: "data",
      dataset_prefix: "LegISTyr__",
      csv_dir: "output_csv",
      txt_dir: "output_txt",
    });
  });

  it("reads numeric flags and falls back to OPENROUTER_API_KEY", () => {
    const options = parseCliArgs(
      [
        "--source",
        "simple_terms",
        "--model",
        "anthropic/claude-3-haiku",
        "--max-tokens",
        "200",
        "--temperature",
        "0",
        "--max-concurrent",
        "4",
        "--csv-dir",
        "out/csv",
      ],
      { OPENROUTER_API_KEY: "test-secret" }
    );

    expect(options.api_key).toBe("test-secret");
    expect(options.config).toEqual({
      model: "anthropic/claude-3-haiku",
      max_tokens: 200,
      temperature: 0,
      max_concurrent: 4,
    });
    expect(options.csv_dir).toBe("out/csv");
  });

  it("requires source and model", () => {
    expect(() => parseCliArgs(["--model", "m", "--api-key", "k"], {})).toThrow(
      "--source and --model are required"
    );
  });

  it("requires a credential", () => {
    expect(() => parseCliArgs(["--source", "homonyms", "--model", "m"], {})).toThrow(ConfigurationError);
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseCliArgs(["--verbose"], {})).toThrow("Unknown argument: --verbose");
    expect(() => parseCliArgs(["--source"], {})).toThrow("--source requires a value");
  });

  it("rejects non-numeric and out-of-range numbers", () => {
    const base = ["--source", "homonyms", "--model", "m", "--api-key", "k"];
    expect(() => parseCliArgs([...base, "--max-concurrent", "many"], {})).toThrow(
      '--max-concurrent must be a number, got "many"'
    );
    expect(() => parseCliArgs([...base, "--max-concurrent", "0"], {})).toThrow(ConfigurationError);
    expect(() => parseCliArgs([...base, "--max-tokens", "1.5"], {})).toThrow(ConfigurationError);
  });
});

describe("buildRunConfig", () => {
  it("freezes the configuration", () => {
    const config = buildRunConfig({ model: "m" });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reports the offending field", () => {
    expect(() => buildRunConfig({ model: "m", temperature: 5 })).toThrow(/^Invalid run configuration: temperature:/);
  });
});
