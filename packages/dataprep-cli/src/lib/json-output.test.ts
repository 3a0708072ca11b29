import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { initContext, resetContext } from "./cli-context.js";
import { CLIError } from "./errors/types.js";
import { maybeOutputJson, outputError } from "./json-output.js";

describe("json-output", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    resetContext();
    vi.restoreAllMocks();
  });

  it("prints nothing outside JSON mode", () => {
    initContext(["node", "dataprep"], {});

    expect(maybeOutputJson({ downloads: [] })).toBe(false);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it("wraps the result in a success document on stdout", () => {
    initContext(["node", "dataprep", "--json"], {});

    expect(maybeOutputJson({ downloads: [] })).toBe(true);
    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
      success: true,
      data: { downloads: [] },
    });
  });

  it("writes a CLIError with its suggestion and details to stderr", () => {
    outputError(
      new CLIError("DOWNLOAD_FAILED", "Can't download https://example.com/dev.jsonl", {
        suggestion: "Check your network connection",
        details: "connection reset",
      })
    );

    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toEqual({
      success: false,
      error: {
        code: "DOWNLOAD_FAILED",
        message: "Can't download https://example.com/dev.jsonl",
        suggestion: "Check your network connection",
        details: "connection reset",
      },
    });
  });

  it("reports a plain Error as UNKNOWN_ERROR", () => {
    outputError(new Error("boom"));

    expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toEqual({
      success: false,
      error: { code: "UNKNOWN_ERROR", message: "boom" },
    });
  });
});
