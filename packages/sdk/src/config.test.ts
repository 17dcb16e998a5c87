import { describe, it, expect } from "vitest";
import { DEFAULT_BATCH_SIZE, defaultRoot, resolveBatchSize } from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("defaultRoot", () => {
  it("should prefer LEADLINK_ROOT", () => {
    expect(defaultRoot({ LEADLINK_ROOT: "/data/leads" })).toBe("/data/leads");
  });

  it("should fall back to .tmp", () => {
    expect(defaultRoot({})).toBe(".tmp");
    expect(defaultRoot({ LEADLINK_ROOT: "" })).toBe(".tmp");
  });
});

describe("resolveBatchSize", () => {
  it("should prefer an explicit size", () => {
    expect(resolveBatchSize(5, { LEADLINK_BATCH_SIZE: "50" })).toBe(5);
  });

  it("should read LEADLINK_BATCH_SIZE", () => {
    expect(resolveBatchSize(undefined, { LEADLINK_BATCH_SIZE: "50" })).toBe(50);
  });

  it("should default to 20", () => {
    expect(resolveBatchSize(undefined, {})).toBe(DEFAULT_BATCH_SIZE);
    expect(DEFAULT_BATCH_SIZE).toBe(20);
  });

  it("should reject sizes below 1", () => {
    expect(() => resolveBatchSize(0, {})).toThrow(ConfigurationError);
    expect(() => resolveBatchSize(undefined, { LEADLINK_BATCH_SIZE: "zero" })).toThrow(
      'LEADLINK_BATCH_SIZE must be a positive integer, got "zero"'
    );
  });
});
