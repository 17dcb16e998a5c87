/**
 * Unit tests for the server logger and tool metrics
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Logger, levelFromEnv } from "../../observability/logger.js";
import { MAX_LATENCY_SAMPLES, ToolMetrics, percentile } from "../../observability/metrics.js";

const silenceConsole = () => vi.spyOn(console, "error").mockImplementation(() => undefined);

describe("Logger", () => {
  let errorSpy: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    errorSpy = silenceConsole();
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("should write JSON lines to stderr", () => {
    new Logger("info").info("tool.success", { tool: "extract", duration_ms: 4 });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const line = String(errorSpy.mock.calls[0]?.[0]);
    expect(JSON.parse(line)).toMatchObject({ level: "info", event: "tool.success", tool: "extract", duration_ms: 4 });
  });

  it("should drop events below the minimum level", () => {
    const logger = new Logger("warn");

    logger.info("ignored");
    logger.debug("ignored");
    logger.warn("kept");

    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("should log failed tool calls with their code", () => {
    new Logger("info").toolCall("lookup_field", 2, false, "ENOENT", "Dataset not found");

    const line = String(errorSpy.mock.calls[0]?.[0]);
    expect(JSON.parse(line)).toMatchObject({
      level: "error",
      event: "tool.error",
      tool: "lookup_field",
      err_code: "ENOENT",
      err_message: "Dataset not found",
    });
  });
});

describe("levelFromEnv", () => {
  it("should read LEADLINK_LOG_LEVEL and fall back to info", () => {
    expect(levelFromEnv({ LEADLINK_LOG_LEVEL: "error" })).toBe("error");
    expect(levelFromEnv({ LEADLINK_LOG_LEVEL: "loud" })).toBe("info");
    expect(levelFromEnv({})).toBe("info");
  });

  it("should force debug under LEADLINK_DEBUG", () => {
    expect(levelFromEnv({ LEADLINK_DEBUG: "1", LEADLINK_LOG_LEVEL: "error" })).toBe("debug");
  });
});

describe("percentile", () => {
  it("should use the nearest rank", () => {
    expect(percentile([1, 2, 3, 4], 50)).toBe(2);
    expect(percentile([1, 2, 3, 4], 99)).toBe(4);
    expect(percentile([], 50)).toBe(0);
  });
});

describe("ToolMetrics", () => {
  it("should count calls and errors per tool", () => {
    const metrics = new ToolMetrics();

    metrics.record("extract", 3, true);
    metrics.record("extract", 5, false, "ENOENT");
    metrics.record("extract", 4, false, "E_PATH");
    metrics.record("lookup_field", 1, false);

    expect(metrics.calls("extract")).toBe(3);
    expect(metrics.errors("extract")).toBe(2);
    expect(metrics.errors("extract", "ENOENT")).toBe(1);
    expect(metrics.errors("lookup_field", "UNKNOWN")).toBe(1);
    expect(metrics.calls("link_indices")).toBe(0);
  });

  it("should report latency percentiles", () => {
    const metrics = new ToolMetrics();
    for (let ms = 100; ms >= 1; ms--) {
      metrics.record("extract", ms, true);
    }

    expect(metrics.latency("extract")).toEqual({ count: 100, sum: 5050, p50: 50, p95: 95, p99: 99 });
    expect(metrics.latency("other")).toBeNull();
  });

  it("should keep only the most recent samples", () => {
    const metrics = new ToolMetrics();
    metrics.record("extract", 5000, true);
    for (let i = 0; i < MAX_LATENCY_SAMPLES; i++) {
      metrics.record("extract", 1, true);
    }

    expect(metrics.latency("extract")).toMatchObject({ count: MAX_LATENCY_SAMPLES, sum: MAX_LATENCY_SAMPLES });
    expect(metrics.calls("extract")).toBe(MAX_LATENCY_SAMPLES + 1);
  });

  it("should snapshot counters under leadlink.tool keys", () => {
    const metrics = new ToolMetrics();
    metrics.record("extract", 7, false, "ENOENT");

    expect(metrics.snapshot()).toEqual({
      "leadlink.tool.calls_total{tool=extract}": 1,
      "leadlink.tool.errors_total{tool=extract,err_code=ENOENT}": 1,
      "leadlink.tool.latency_ms.p95{tool=extract}": 7,
    });
  });
});
