import type { RunConfig } from "../config/runConfig.js";
import { runLogHelpers } from "../../logging/runLog.js";
import type { Prompt } from "../prompts/promptTemplates.js";
import type { CompletionTransport } from "./requestCompletion.js";
import {
  DEFAULT_RETRY_POLICY,
  classifyError,
  decideRetry,
  sleep as realSleep,
  type RetryPolicy,
} from "./retryPolicy.js";
import type { CompletionResult } from "./types.js";

export type FetchCompletionOptions = {
  transport: CompletionTransport;
  policy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Only used to label log events. */
  row_index?: number;
};

/**
 * Request one completion, retrying transient failures with exponential
 * backoff. Never rejects: every outcome is returned as a CompletionResult.
 */
export async function fetchCompletion(
  prompt: Prompt,
  config: RunConfig,
  options: FetchCompletionOptions
): Promise<CompletionResult> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? realSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      const completion = await options.transport(prompt, config);
      return { status: "ok", ...completion, attempts: attempt };
    } catch (e) {
      const error = classifyError(e);
      const decision = decideRetry({ attempt, error, policy, random: options.random });

      if (!decision.shouldRetry) {
        runLogHelpers.completionFailed({
          row_index: options.row_index,
          attempts: attempt,
          error_type: error.error_type,
          error_message: error.message,
        });
        return {
          status: "error",
          error_type: error.error_type,
          message: error.message,
          attempts: attempt,
        };
      }

      runLogHelpers.retryScheduled({
        row_index: options.row_index,
        attempt,
        backoff_ms: decision.backoffMs,
        error_type: error.error_type,
        error_message: error.message,
      });
      await wait(decision.backoffMs);
    }
  }
}
