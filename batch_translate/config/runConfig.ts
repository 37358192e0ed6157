import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_CONCURRENT = 15;

export const RunConfigSchema = z.object({
  model: z.string().trim().min(1, "model identifier is required"),
  max_tokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  max_concurrent: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT),
});

export type RunConfig = Readonly<z.output<typeof RunConfigSchema>>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

/**
 * Validate and freeze the configuration for one run.
 */
export function buildRunConfig(input: RunConfigInput): RunConfig {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid run configuration: ${details}`);
  }
  return Object.freeze(parsed.data);
}
