import type { RequestErrorType } from "../errors.js";

export type CompletionErrorType = RequestErrorType | "unknown";

export type CompletionSuccess = {
  status: "ok";
  /** Raw answer text as returned by the model. */
  text: string;
  reasoning: string | null;
  cost: number | null;
  reasoning_tokens: number | null;
  attempts: number;
};

export type CompletionFailure = {
  status: "error";
  error_type: CompletionErrorType;
  message: string;
  attempts: number;
};

export type CompletionResult = CompletionSuccess | CompletionFailure;

export type RowResult = CompletionResult & { index: number };

/** What one successful HTTP exchange yields, before retry bookkeeping. */
export type ParsedCompletion = Omit<CompletionSuccess, "status" | "attempts">;
