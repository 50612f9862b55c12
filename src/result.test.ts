/**
 * Tests for batch result assembly.
 */

import { describe, expect, it } from "vitest";
import { createIdentifier } from "./identifiers.js";
import { ResultBuilder, successRate } from "./result.js";
import type { AcademicIdentifier } from "./types.js";

function doi(value: string, sourceUrl: string, confidence = 0.9): AcademicIdentifier {
  return createIdentifier({ type: "doi", value }, sourceUrl, confidence, "url-pattern");
}

function pmid(value: string, sourceUrl: string, confidence = 0.95): AcademicIdentifier {
  return createIdentifier({ type: "pmid", value }, sourceUrl, confidence, "url-pattern");
}

describe("ResultBuilder", () => {
  it("counts successes, failures and identifier types", () => {
    const builder = new ResultBuilder();
    builder.addUrl("https://a.example", [doi("10.1000/a", "https://a.example")]);
    builder.addUrl("https://b.example", []);
    builder.addUrl("https://c.example", [pmid("1", "https://c.example")]);

    const result = builder.build();
    expect(result.extractionStats).toEqual({
      totalUrls: 3,
      successfulExtractions: 2,
      failedExtractions: 1,
      doiCount: 1,
      pmidCount: 1,
      pmcCount: 0,
    });
    expect(result.failedUrls).toEqual(["https://b.example"]);
    expect(result.identifiers.map((id) => id.value)).toEqual(["10.1000/a", "1"]);
  });

  it("counts every occurrence of a repeated URL but lists it once", () => {
    const builder = new ResultBuilder();
    builder.addUrl("https://b.example", []);
    builder.addUrl("https://b.example", []);

    const result = builder.build();
    expect(result.extractionStats.totalUrls).toBe(2);
    expect(result.extractionStats.failedExtractions).toBe(2);
    expect(result.failedUrls).toEqual(["https://b.example"]);
  });

  it("returns a frozen result", () => {
    const builder = new ResultBuilder();
    builder.addUrl("https://a.example", [doi("10.1000/a", "https://a.example")]);
    const result = builder.build();

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.identifiers)).toBe(true);
    expect(Object.isFrozen(result.identifiers[0])).toBe(true);
    expect(Object.isFrozen(result.extractionStats)).toBe(true);
  });

  describe("mergeConfidences", () => {
    it("raises but never lowers confidence", async () => {
      const builder = new ResultBuilder();
      builder.addUrl("https://a.example", [
        doi("10.1000/a", "https://a.example", 0.8),
        pmid("1", "https://a.example", 0.95),
      ]);

      await builder.mergeConfidences(async () => 0.9);

      const result = builder.build();
      expect(result.identifiers.map((id) => id.confidence)).toEqual([0.9, 0.95]);
    });

    it("leaves counts untouched when every score is 0", async () => {
      const builder = new ResultBuilder();
      builder.addUrl("https://a.example", [doi("10.1000/a", "https://a.example", 0.8)]);

      await builder.mergeConfidences(async () => 0);

      const result = builder.build();
      expect(result.identifiers).toHaveLength(1);
      expect(result.identifiers[0]?.confidence).toBe(0.8);
      expect(result.extractionStats.doiCount).toBe(1);
    });
  });

  describe("applyPhase2Outcomes", () => {
    it("moves recovered URLs from failed to successful", () => {
      const builder = new ResultBuilder();
      builder.addUrl("https://a.example", [doi("10.1000/a", "https://a.example")]);
      builder.addUrl("https://b.example", []);
      builder.addUrl("https://c.example", []);
      builder.addUrl("https://b.example", []);

      const recovered = builder.applyPhase2Outcomes([
        { url: "https://b.example", status: "recovered", identifiers: [pmid("2", "https://b.example", 0.9)] },
        { url: "https://c.example", status: "failed", reason: "HTTP 404 Not Found" },
      ]);

      expect(recovered).toBe(1);
      const result = builder.build();
      expect(result.failedUrls).toEqual(["https://c.example"]);
      expect(result.extractionStats).toEqual({
        totalUrls: 4,
        successfulExtractions: 3,
        failedExtractions: 1,
        doiCount: 1,
        pmidCount: 1,
        pmcCount: 0,
      });
      expect(result.identifiers.map((id) => id.sourceUrl)).toEqual([
        "https://a.example",
        "https://b.example",
      ]);
    });

    it("ignores outcomes for URLs that were not failed", () => {
      const builder = new ResultBuilder();
      builder.addUrl("https://a.example", [doi("10.1000/a", "https://a.example")]);

      const recovered = builder.applyPhase2Outcomes([
        { url: "https://a.example", status: "recovered", identifiers: [pmid("2", "https://a.example")] },
      ]);

      expect(recovered).toBe(0);
      expect(builder.build().identifiers).toHaveLength(1);
    });
  });
});

describe("successRate", () => {
  it("is the share of URLs with identifiers", () => {
    const builder = new ResultBuilder();
    builder.addUrl("https://a.example", [doi("10.1000/a", "https://a.example")]);
    builder.addUrl("https://b.example", []);
    expect(successRate(builder.build())).toBe(0.5);
  });

  it("is 0 for an empty batch", () => {
    expect(successRate(new ResultBuilder().build())).toBe(0);
  });
});
