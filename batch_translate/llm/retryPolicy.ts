import { z } from "zod";
import { PermanentRequestError, TransientRequestError } from "../errors.js";
import type { CompletionErrorType } from "./types.js";

export const RetryPolicySchema = z.object({
  max_attempts: z.number().int().positive().default(3),
  base_delay_ms: z.number().nonnegative().default(1000),
  backoff_multiplier: z.number().min(1).default(2),
  jitter_ms: z.number().nonnegative().default(250),
});

export type RetryPolicy = Readonly<z.output<typeof RetryPolicySchema>>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze(RetryPolicySchema.parse({}));

export type RetryDecision = { shouldRetry: boolean; backoffMs: number };

export type ClassifiedError = {
  transient: boolean;
  error_type: CompletionErrorType;
  message: string;
};

export function classifyError(e: unknown): ClassifiedError {
  if (e instanceof TransientRequestError) {
    return { transient: true, error_type: e.error_type, message: e.message };
  }
  if (e instanceof PermanentRequestError) {
    return { transient: false, error_type: e.error_type, message: e.message };
  }
  // Untyped errors are never retried.
  const message = e instanceof Error ? e.message : String(e);
  return { transient: false, error_type: "unknown", message };
}

/**
 * Delay before retrying after `attempt` (1-based) failed:
 * base * multiplier^(attempt-1) plus uniform jitter in [0, jitter_ms).
 */
export function backoffDelayMs(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.base_delay_ms * policy.backoff_multiplier ** (attempt - 1);
  return Math.round(exponential + random() * policy.jitter_ms);
}

export function decideRetry(params: {
  attempt: number;
  error: ClassifiedError;
  policy: RetryPolicy;
  random?: () => number;
}): RetryDecision {
  if (!params.error.transient) return { shouldRetry: false, backoffMs: 0 };
  if (params.attempt >= params.policy.max_attempts) return { shouldRetry: false, backoffMs: 0 };

  return {
    shouldRetry: true,
    backoffMs: backoffDelayMs(params.attempt, params.policy, params.random),
  };
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((r) => setTimeout(r, ms));
}
