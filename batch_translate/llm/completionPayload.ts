import type { RunConfig } from "../config/runConfig.js";
import type { Prompt } from "../prompts/promptTemplates.js";

export type CompletionPayload = {
  model: string;
  max_tokens: number;
  temperature: number;
  top_p: number;
  data_collection: "allow" | "deny";
  messages: Prompt;
  usage: { include: boolean };
  reasoning: { effort: "low" | "medium" | "high"; exclude: boolean };
};

// Request body for an OpenRouter chat completion. Usage accounting is
// requested so the response carries cost and reasoning token counts.
export function buildCompletionPayload(prompt: Prompt, config: RunConfig): CompletionPayload {
  return {
    model: config.model,
    max_tokens: config.max_tokens,
    temperature: config.temperature,
    top_p: 0.9,
    data_collection: "deny",
    messages: prompt,
    usage: { include: true },
    reasoning: { effort: "low", exclude: false },
  };
}
