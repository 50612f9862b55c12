/**
 * Tests for URL pattern extraction.
 */

import { describe, expect, it } from "vitest";
import { extractFromUrl, extractFromUrls, parseHttpUrl } from "./url-extractor.js";

function summarize(url: string): Array<[string, string, number]> {
  return extractFromUrl(url).map((id) => [id.type, id.value, id.confidence]);
}

describe("extractFromUrl", () => {
  it("extracts a PMID from a PubMed URL", () => {
    const [identifier, ...rest] = extractFromUrl("https://pubmed.ncbi.nlm.nih.gov/37674083/");
    expect(rest).toEqual([]);
    expect(identifier).toEqual({
      type: "pmid",
      value: "37674083",
      confidence: 0.95,
      sourceUrl: "https://pubmed.ncbi.nlm.nih.gov/37674083/",
      method: "url-pattern",
    });
  });

  it("extracts a PMID from the legacy NCBI path", () => {
    expect(summarize("https://www.ncbi.nlm.nih.gov/pubmed/12345")).toEqual([["pmid", "12345", 0.95]]);
  });

  it("extracts a PMC accession", () => {
    expect(summarize("https://www.ncbi.nlm.nih.gov/pmc/articles/PMC1234567/")).toEqual([
      ["pmc", "PMC1234567", 0.95],
    ]);
    expect(summarize("https://pmc.ncbi.nlm.nih.gov/articles/pmc7654321/")).toEqual([
      ["pmc", "PMC7654321", 0.95],
    ]);
  });

  it("extracts a DOI from a publisher /doi/ path", () => {
    expect(summarize("https://www.science.org/doi/10.1126/science.abc1234")).toEqual([
      ["doi", "10.1126/science.abc1234", 0.95],
    ]);
    expect(summarize("https://onlinelibrary.wiley.com/doi/full/10.1002/anie.202012345")).toEqual([
      ["doi", "10.1002/anie.202012345", 0.95],
    ]);
  });

  it("gives resolver URLs the highest confidence", () => {
    expect(summarize("https://doi.org/10.1000/xyz123")).toEqual([["doi", "10.1000/xyz123", 0.98]]);
  });

  it("decodes percent-encoded DOIs", () => {
    expect(summarize("https://doi.org/10.1002%2Fabc.123")).toEqual([["doi", "10.1002/abc.123", 0.98]]);
  });

  it("rebuilds DOIs from publisher article ids", () => {
    expect(summarize("https://www.nature.com/articles/s41586-020-2649-2")).toEqual([
      ["doi", "10.1038/s41586-020-2649-2", 0.9],
    ]);
    expect(summarize("https://elifesciences.org/articles/12345")).toEqual([
      ["doi", "10.7554/elife.12345", 0.9],
    ]);
  });

  it("reads preprint and query-string DOIs", () => {
    expect(summarize("https://www.biorxiv.org/content/10.1101/2020.03.01.123456v1")).toEqual([
      ["doi", "10.1101/2020.03.01.123456", 0.9],
    ]);
    expect(
      summarize("https://journals.plos.org/plosone/article?id=10.1371/journal.pone.0123456")
    ).toEqual([["doi", "10.1371/journal.pone.0123456", 0.9]]);
  });

  it("falls back to any DOI-shaped token at lower confidence", () => {
    expect(summarize("https://example.com/view?ref=10.5555/abcd&x=1")).toEqual([
      ["doi", "10.5555/abcd", 0.8],
    ]);
  });

  it("returns nothing for URLs without identifiers", () => {
    expect(extractFromUrl("https://example.org/paper-landing-page")).toEqual([]);
  });

  it("returns nothing for non-http strings", () => {
    expect(extractFromUrl("not a url")).toEqual([]);
    expect(extractFromUrl("ftp://doi.org/10.1000/xyz")).toEqual([]);
    expect(extractFromUrl("")).toEqual([]);
  });
});

describe("parseHttpUrl", () => {
  it("accepts only http and https", () => {
    expect(parseHttpUrl("https://example.org/a")?.hostname).toBe("example.org");
    expect(parseHttpUrl("mailto:someone@example.org")).toBeNull();
    expect(parseHttpUrl("::")).toBeNull();
  });
});

describe("extractFromUrls", () => {
  it("builds a result with failed URLs and stats", () => {
    const result = extractFromUrls([
      "https://pubmed.ncbi.nlm.nih.gov/37674083/",
      "https://www.science.org/doi/10.1126/science.abc1234",
      "https://example.org/paper-landing-page",
    ]);

    expect(result.identifiers.map((id) => id.value)).toEqual(["37674083", "10.1126/science.abc1234"]);
    expect(result.failedUrls).toEqual(["https://example.org/paper-landing-page"]);
    expect(result.extractionStats).toEqual({
      totalUrls: 3,
      successfulExtractions: 2,
      failedExtractions: 1,
      doiCount: 1,
      pmidCount: 1,
      pmcCount: 0,
    });
  });

  it("is deterministic", () => {
    const urls = ["https://doi.org/10.1000/xyz123", "https://example.org/x"];
    expect(extractFromUrls(urls)).toEqual(extractFromUrls(urls));
  });
});
