/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { expandHome, isVerbose, resolveRoot } from "../src/lib/env.js";

describe("environment resolution", () => {
  let originalRoot: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalRoot = process.env.LEADLINK_ROOT;
    originalDebug = process.env.LEADLINK_CLI_DEBUG;
  });

  afterEach(() => {
    if (originalRoot !== undefined) {
      process.env.LEADLINK_ROOT = originalRoot;
    } else {
      delete process.env.LEADLINK_ROOT;
    }
    if (originalDebug !== undefined) {
      process.env.LEADLINK_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.LEADLINK_CLI_DEBUG;
    }
  });

  describe("resolveRoot", () => {
    it("should use CLI option when provided", () => {
      process.env.LEADLINK_ROOT = "/env/path";
      expect(resolveRoot("/cli/path")).toBe(path.resolve("/cli/path"));
    });

    it("should use LEADLINK_ROOT when CLI option not provided", () => {
      process.env.LEADLINK_ROOT = "/env/path";
      expect(resolveRoot()).toBe(path.resolve("/env/path"));
    });

    it("should default to .tmp when neither provided", () => {
      delete process.env.LEADLINK_ROOT;
      expect(resolveRoot()).toBe(path.resolve(".tmp"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveRoot("~/leads")).toBe(path.join(homedir(), "leads"));
      expect(resolveRoot("~")).toBe(homedir());
    });

    it("should read an explicit environment", () => {
      expect(resolveRoot(undefined, { LEADLINK_ROOT: "/explicit" })).toBe(path.resolve("/explicit"));
    });

    it("should resolve relative paths to absolute", () => {
      expect(resolveRoot("./my-data")).toBe(path.resolve("my-data"));
    });
  });

  describe("expandHome", () => {
    it("should expand ~ and ~/ against the given home", () => {
      expect(expandHome("~", "/home/test")).toBe("/home/test");
      expect(expandHome("~/leads/run1", "/home/test")).toBe(path.join("/home/test", "leads/run1"));
    });

    it("should leave other paths alone", () => {
      expect(expandHome("~other/leads", "/home/test")).toBe("~other/leads");
      expect(expandHome("./~/leads", "/home/test")).toBe("./~/leads");
    });
  });

  describe("isVerbose", () => {
    it("should only be on for LEADLINK_CLI_DEBUG=1", () => {
      process.env.LEADLINK_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
      process.env.LEADLINK_CLI_DEBUG = "true";
      expect(isVerbose()).toBe(false);
    });
  });
});
