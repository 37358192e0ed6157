import { afterEach, describe, expect, it } from "vitest";
import { runLog, runLogHelpers, setRunLogSink, type RunLogSink } from "../runLog.js";

describe("runLog", () => {
  let previous: RunLogSink | undefined;

  afterEach(() => {
    if (previous) setRunLogSink(previous);
    previous = undefined;
  });

  it("emits one JSON line with a timestamp", () => {
    const lines: string[] = [];
    previous = setRunLogSink((line) => lines.push(line));

    runLog({ event: "run.started", model: "openai/gpt-4o-mini" });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry.event).toBe("run.started");
    expect(entry.model).toBe("openai/gpt-4o-mini");
    expect(new Date(entry.timestamp).toISOString()).toBe(entry.timestamp);
  });

  it("shapes retry events", () => {
    const lines: string[] = [];
    previous = setRunLogSink((line) => lines.push(line));

    runLogHelpers.retryScheduled({
      row_index: 4,
      attempt: 2,
      backoff_ms: 2000,
      error_type: "rate_limited",
      error_message: "OpenRouter error 429: slow",
    });

    const { timestamp: _timestamp, ...rest } = JSON.parse(lines[0]);
    expect(rest).toEqual({
      event: "completion.retry_scheduled",
      row_index: 4,
      attempt: 2,
      backoff_ms: 2000,
      error_type: "rate_limited",
      error_message: "OpenRouter error 429: slow",
    });
  });
});
