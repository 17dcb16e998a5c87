/**
 * Unit tests for Zod schemas
 */

import { describe, it, expect } from "vitest";
import {
  FileNameSchema,
  FieldNameSchema,
  ExtractInputSchema,
  InitMappingInputSchema,
  UpdateMappingInputSchema,
  LinkIndicesInputSchema,
  RegisterOutputInputSchema,
  LookupFieldInputSchema,
} from "../../schemas.js";

describe("FileNameSchema", () => {
  it("should accept dataset and output file names", () => {
    expect(FileNameSchema.parse("postData")).toBe("postData");
    expect(FileNameSchema.parse("postData_isHiring.json")).toBe("postData_isHiring.json");
  });

  it("should reject path traversal patterns", () => {
    expect(() => FileNameSchema.parse("../etc")).toThrow(/name must start/);
    expect(() => FileNameSchema.parse("a..b")).toThrow(/name must start/);
    expect(() => FileNameSchema.parse("sub/postData")).toThrow(/name must start/);
    expect(() => FileNameSchema.parse(".hidden")).toThrow(/name must start/);
  });

  it("should reject empty strings", () => {
    expect(() => FileNameSchema.parse("")).toThrow();
  });
});

describe("FieldNameSchema", () => {
  it("should accept word characters only", () => {
    expect(FieldNameSchema.parse("postIndex")).toBe("postIndex");
    expect(() => FieldNameSchema.parse("is-hiring")).toThrow(/letters, digits and underscores/);
    expect(() => FieldNameSchema.parse("a.b")).toThrow(/letters, digits and underscores/);
  });
});

describe("ExtractInputSchema", () => {
  it("should accept a path or a projection", () => {
    expect(ExtractInputSchema.parse({ source: "postData", path: "[*].content" })).toEqual({
      source: "postData",
      path: "[*].content",
    });
    expect(
      ExtractInputSchema.parse({ source: "postData", fields: { url: "author.profileUrl" }, limit: 0 })
    ).toEqual({ source: "postData", fields: { url: "author.profileUrl" }, limit: 0 });
  });

  it("should require exactly one of path or fields", () => {
    expect(() => ExtractInputSchema.parse({ source: "postData" })).toThrow(
      /Provide exactly one of 'path' or 'fields'/
    );
    expect(() =>
      ExtractInputSchema.parse({ source: "postData", path: "content", fields: { a: "b" } })
    ).toThrow(/Provide exactly one/);
  });

  it("should reject negative or fractional pagination", () => {
    expect(() => ExtractInputSchema.parse({ source: "postData", path: "a", offset: -1 })).toThrow();
    expect(() => ExtractInputSchema.parse({ source: "postData", path: "a", limit: 1.5 })).toThrow();
  });

  it("should validate the save name", () => {
    expect(() => ExtractInputSchema.parse({ source: "postData", path: "a", saveAs: "../x" })).toThrow(
      /name must start/
    );
  });
});

describe("InitMappingInputSchema", () => {
  it("should make the index field optional", () => {
    expect(InitMappingInputSchema.parse({ source: "postData" })).toEqual({ source: "postData" });
  });
});

describe("UpdateMappingInputSchema", () => {
  it("should accept boolean, number and string values", () => {
    for (const value of [true, 3, "contacted"]) {
      expect(
        UpdateMappingInputSchema.parse({ indexField: "postIndex", indices: [0], field: "status", value }).value
      ).toBe(value);
    }
  });

  it("should reject null values and empty index lists", () => {
    expect(() =>
      UpdateMappingInputSchema.parse({ indexField: "postIndex", indices: [0], field: "status", value: null })
    ).toThrow();
    expect(() =>
      UpdateMappingInputSchema.parse({ indexField: "postIndex", indices: [], field: "status", value: 1 })
    ).toThrow(/at least one index is required/);
  });
});

describe("LinkIndicesInputSchema", () => {
  it("should reject negative indices", () => {
    expect(() =>
      LinkIndicesInputSchema.parse({
        sourceIndexField: "postIndex",
        sourceIndices: [0, -1],
        targetIndexField: "profileIndex",
      })
    ).toThrow();
  });
});

describe("RegisterOutputInputSchema", () => {
  it("should require at least one field", () => {
    expect(() =>
      RegisterOutputInputSchema.parse({ outputFile: "out.json", fields: [], indexField: "postIndex" })
    ).toThrow(/at least one field is required/);
  });
});

describe("LookupFieldInputSchema", () => {
  it("should require an integer index", () => {
    expect(LookupFieldInputSchema.parse({ field: "isHiring", index: 2 })).toEqual({ field: "isHiring", index: 2 });
    expect(() => LookupFieldInputSchema.parse({ field: "isHiring", index: "2" })).toThrow();
  });
});
