/**
 * Structured logging for translation runs.
 *
 * Emits one JSON line per event so a run can be grepped or piped into jq.
 */

export type RunLogEvent =
  | "run.started"
  | "run.completed"
  | "completion.retry_scheduled"
  | "completion.failed";

export type RunLogData = {
  event: RunLogEvent;
  model?: string;
  source?: string;
  row_index?: number;
  attempt?: number;
  backoff_ms?: number;
  error_type?: string;
  error_message?: string;
  [key: string]: unknown;
};

export type RunLogSink = (line: string) => void;

let sink: RunLogSink = (line) => console.log(line);

/**
 * Redirect run log output. Returns the previous sink so callers can restore it.
 */
export function setRunLogSink(next: RunLogSink): RunLogSink {
  const previous = sink;
  sink = next;
  return previous;
}

export function runLog(data: RunLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  sink(JSON.stringify(logEntry));
}

export const runLogHelpers = {
  runStarted(params: { source: string; model: string; rows: number; max_concurrent: number }): void {
    runLog({
      event: "run.started",
      source: params.source,
      model: params.model,
      rows: params.rows,
      max_concurrent: params.max_concurrent,
    });
  },

  retryScheduled(params: {
    row_index?: number;
    attempt: number;
    backoff_ms: number;
    error_type: string;
    error_message: string;
  }): void {
    runLog({
      event: "completion.retry_scheduled",
      row_index: params.row_index,
      attempt: params.attempt,
      backoff_ms: params.backoff_ms,
      error_type: params.error_type,
      error_message: params.error_message,
    });
  },

  completionFailed(params: {
    row_index?: number;
    attempts: number;
    error_type: string;
    error_message: string;
  }): void {
    runLog({
      event: "completion.failed",
      row_index: params.row_index,
      attempt: params.attempts,
      error_type: params.error_type,
      error_message: params.error_message,
    });
  },

  runCompleted(params: {
    model: string;
    succeeded: number;
    failed: number;
    elapsed_ms: number;
    total_cost: number;
  }): void {
    runLog({
      event: "run.completed",
      model: params.model,
      succeeded: params.succeeded,
      failed: params.failed,
      elapsed_ms: params.elapsed_ms,
      total_cost: params.total_cost,
    });
  },
};
