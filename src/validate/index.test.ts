/**
 * Tests for the composite validator.
 */

import { describe, expect, it, vi } from "vitest";
import { InvalidIdentifierTypeError } from "../errors.js";
import type { IdentifierType } from "../types.js";
import { CompositeValidator, compositeConfidence } from "./index.js";
import type { SourceKind, ValidationSource } from "./source.js";

function fakeSource(name: string, kind: SourceKind, answer: number | null | Error) {
  const lookup = vi.fn((_type: IdentifierType, _value: string) =>
    answer instanceof Error ? Promise.reject(answer) : Promise.resolve(answer)
  );
  const source: ValidationSource = { name, kind, supports: () => true, lookup };
  return { source, lookup };
}

describe("compositeConfidence", () => {
  it("is the highest confirmed confidence", () => {
    expect(
      compositeConfidence([
        { source: "a", status: "confirmed", confidence: 0.9 },
        { source: "b", status: "confirmed", confidence: 0.95 },
        { source: "c", status: "not-found" },
      ])
    ).toBe(0.95);
  });

  it("is 0 when nothing confirmed", () => {
    expect(
      compositeConfidence([
        { source: "a", status: "not-found" },
        { source: "b", status: "error", error: "timeout" },
      ])
    ).toBe(0);
    expect(compositeConfidence([])).toBe(0);
  });
});

describe("CompositeValidator", () => {
  it("takes the maximum over confirming sources", async () => {
    const registry = fakeSource("registry", "registry", 0.95);
    const database = fakeSource("database", "database", null);
    const validator = new CompositeValidator({ sources: [registry.source, database.source] });

    const assessment = await validator.assess("doi", "10.1000/xyz123");

    expect(assessment).toEqual({
      valid: true,
      confidence: 0.95,
      checks: [
        { source: "registry", status: "confirmed", confidence: 0.95 },
        { source: "database", status: "not-found" },
      ],
    });
  });

  it("ignores failing sources", async () => {
    const registry = fakeSource("registry", "registry", new Error("HTTP 503"));
    const database = fakeSource("database", "database", 0.9);
    const validator = new CompositeValidator({ sources: [registry.source, database.source] });

    const assessment = await validator.assess("pmid", "37674083");

    expect(assessment.confidence).toBe(0.9);
    expect(assessment.checks[0]).toEqual({ source: "registry", status: "error", error: "HTTP 503" });
  });

  it("scores 0 when no source confirms", async () => {
    const registry = fakeSource("registry", "registry", null);
    const validator = new CompositeValidator({ sources: [registry.source] });

    expect(await validator.getConfidenceScore("pmc", "PMC1")).toBe(0);
    expect(await validator.validateIdentifier("pmc", "PMC1")).toBe(false);
  });

  it("looks up the normalized value", async () => {
    const registry = fakeSource("registry", "registry", 0.95);
    const validator = new CompositeValidator({ sources: [registry.source] });

    await validator.assess("doi", "https://doi.org/10.1000/XYZ123");

    expect(registry.lookup).toHaveBeenCalledWith("doi", "10.1000/xyz123");
  });

  it("scores an unnormalizable value 0 without lookups", async () => {
    const registry = fakeSource("registry", "registry", 0.95);
    const validator = new CompositeValidator({ sources: [registry.source] });

    expect(await validator.assess("pmid", "not-a-pmid")).toEqual({ valid: false, confidence: 0, checks: [] });
    expect(registry.lookup).not.toHaveBeenCalled();
  });

  it("filters sources by the use flags", async () => {
    const registry = fakeSource("registry", "registry", 0.95);
    const database = fakeSource("database", "database", 0.9);
    const validator = new CompositeValidator({
      useApi: false,
      sources: [registry.source, database.source],
    });

    expect(await validator.getConfidenceScore("doi", "10.1000/xyz123")).toBe(0.9);
    expect(registry.lookup).not.toHaveBeenCalled();
  });

  it("has no sources when both flags are off", async () => {
    const validator = new CompositeValidator({ useApi: false, useDatabase: false });

    expect(validator.sources).toEqual([]);
    expect(await validator.getConfidenceScore("doi", "10.1000/xyz123")).toBe(0);
  });

  it("builds the registry and database sources by default", () => {
    const validator = new CompositeValidator();

    expect(validator.sources.map((source) => source.name)).toEqual(["registry", "database"]);
  });

  it("rejects identifier types outside the closed set", async () => {
    const validator = new CompositeValidator({ sources: [] });
    const type: IdentifierType = JSON.parse('"isbn"');

    await expect(validator.assess(type, "978-3-16-148410-0")).rejects.toThrow(InvalidIdentifierTypeError);
  });
});
