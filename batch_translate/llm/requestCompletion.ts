import { z } from "zod";
import type { RunConfig } from "../config/runConfig.js";
import { PermanentRequestError, TransientRequestError } from "../errors.js";
import type { Prompt } from "../prompts/promptTemplates.js";
import { buildCompletionPayload } from "./completionPayload.js";
import type { ParsedCompletion } from "./types.js";

export const OPENROUTER_API_URL = "https://openrouter.ai/api/v1/chat/completions";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * One network attempt. Resolves with the parsed completion or rejects with a
 * TransientRequestError / PermanentRequestError.
 */
export type CompletionTransport = (prompt: Prompt, config: RunConfig) => Promise<ParsedCompletion>;

export type OpenRouterTransportOptions = {
  api_key: string;
  api_url?: string;
  timeout_ms?: number;
  fetchImpl?: typeof fetch;
};

const ProviderErrorBodySchema = z.object({
  error: z.object({
    code: z.union([z.number(), z.string()]).nullish(),
    message: z.string().nullish(),
  }),
});

const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          reasoning: z.string().nullish(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      cost_details: z
        .object({
          upstream_inference_completions_cost: z.number().nullish(),
        })
        .nullish(),
      completion_tokens_details: z
        .object({
          reasoning_tokens: z.number().int().nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

export function errorForStatus(status: number, detail: string): TransientRequestError | PermanentRequestError {
  const message = `OpenRouter error ${status}: ${detail.slice(0, 500)}`;
  if (status === 408) return new TransientRequestError("timeout", message, status);
  if (status === 429) return new TransientRequestError("rate_limited", message, status);
  if (status >= 500) return new TransientRequestError("server_error", message, status);
  return new PermanentRequestError("client_error", message, status);
}

/**
 * Parse a 2xx response body. Malformed bodies are permanent failures.
 */
export function parseCompletionBody(raw: string): ParsedCompletion {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PermanentRequestError("invalid_response", `Response is not valid JSON: ${message}`);
  }

  // OpenRouter can report upstream failures inside a 200 body.
  const providerError = ProviderErrorBodySchema.safeParse(data);
  if (providerError.success) {
    const { code, message } = providerError.data.error;
    const detail = message ?? "provider returned an error";
    if (typeof code === "number") throw errorForStatus(code, detail);
    throw new PermanentRequestError("invalid_response", `Provider error: ${detail}`);
  }

  const parsed = CompletionResponseSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unexpected shape";
    throw new PermanentRequestError("invalid_response", `Malformed completion response (${where})`);
  }

  const message = parsed.data.choices[0].message;
  const usage = parsed.data.usage;
  // Empty or null content is still a success: a reasoning model may spend
  // max_tokens on its trace, and that trace and its cost are kept.
  return {
    text: message.content ?? "",
    reasoning: message.reasoning ?? null,
    cost: usage?.cost_details?.upstream_inference_completions_cost ?? null,
    reasoning_tokens: usage?.completion_tokens_details?.reasoning_tokens ?? null,
  };
}

export function createOpenRouterTransport(options: OpenRouterTransportOptions): CompletionTransport {
  const url = options.api_url ?? OPENROUTER_API_URL;
  const timeoutMs = options.timeout_ms ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (prompt, config) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchImpl(url, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${options.api_key}`,
        },
        body: JSON.stringify(buildCompletionPayload(prompt, config)),
      });

      if (!response.ok) {
        throw errorForStatus(response.status, await safeReadError(response));
      }

      return parseCompletionBody(await response.text());
    } catch (err) {
      if (err instanceof TransientRequestError || err instanceof PermanentRequestError) {
        throw err;
      }
      if (controller.signal.aborted) {
        throw new TransientRequestError("timeout", `Request timed out after ${timeoutMs}ms`);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TransientRequestError("network", `Request failed: ${message}`);
    } finally {
      clearTimeout(timeout);
    }
  };
}

async function safeReadError(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text || response.statusText || "Unknown provider error";
  } catch {
    return response.statusText || "Unknown provider error";
  }
}
