/**
 * Tests for the NCBI E-utilities client.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { fetchPubmedRecord, hasDocumentSummary, ncbiIntervalMs, parsePubmedArticlePmids } from "./eutils.js";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function pubmedXml(...pmids: string[]): string {
  const articles = pmids
    .map(
      (pmid) =>
        `<PubmedArticle><MedlineCitation Status="MEDLINE" Owner="NLM"><PMID Version="1">${pmid}</PMID>` +
        "<Article><ArticleTitle>Example</ArticleTitle></Article></MedlineCitation></PubmedArticle>"
    )
    .join("");
  return `<?xml version="1.0" ?><PubmedArticleSet>${articles}</PubmedArticleSet>`;
}

describe("ncbiIntervalMs", () => {
  it("is shorter with an API key", () => {
    expect(ncbiIntervalMs({ apiKey: "test-key" })).toBe(100);
    expect(ncbiIntervalMs()).toBe(340);
  });
});

describe("parsePubmedArticlePmids", () => {
  it("reads the PMID of each article", () => {
    expect(parsePubmedArticlePmids(pubmedXml("37674083"))).toEqual(["37674083"]);
    expect(parsePubmedArticlePmids(pubmedXml("1", "2"))).toEqual(["1", "2"]);
  });

  it("returns nothing for an empty article set", () => {
    expect(parsePubmedArticlePmids("<PubmedArticleSet></PubmedArticleSet>")).toEqual([]);
  });

  it("throws on an unexpected document", () => {
    expect(() => parsePubmedArticlePmids("<html><body>oops</body></html>")).toThrow(
      "Unexpected PubMed efetch response"
    );
  });
});

describe("hasDocumentSummary", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("is true when the summary exists", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: () => Promise.resolve({ result: { uids: ["37674083"], "37674083": { uid: "37674083", title: "x" } } }),
    });

    expect(await hasDocumentSummary("pubmed", "37674083")).toBe(true);
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi?db=pubmed&id=37674083&retmode=json"
    );
  });

  it("is false when the summary carries an error", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: () =>
        Promise.resolve({
          result: { uids: ["99999999"], "99999999": { uid: "99999999", error: "cannot get document summary" } },
        }),
    });

    expect(await hasDocumentSummary("pubmed", "99999999")).toBe(false);
  });

  it("is false when the response has no result", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: () => Promise.resolve({ error: "Invalid uid" }),
    });

    expect(await hasDocumentSummary("pmc", "1")).toBe(false);
  });

  it("adds the API key to the request", async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: () => Promise.resolve({ result: {} }) });

    await hasDocumentSummary("pmc", "123", { apiKey: "test-key" });

    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi?db=pmc&id=123&retmode=json&api_key=test-key"
    );
  });

  it("throws on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 500, statusText: "Internal Server Error" });

    await expect(hasDocumentSummary("pubmed", "1")).rejects.toThrow(
      "E-utilities error: HTTP 500 Internal Server Error"
    );
  });
});

describe("fetchPubmedRecord", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("is true when PubMed returns the article", async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, text: () => Promise.resolve(pubmedXml("37674083")) });

    expect(await fetchPubmedRecord("37674083")).toBe(true);
  });

  it("is false when PubMed returns a different article", async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, text: () => Promise.resolve(pubmedXml("1")) });

    expect(await fetchPubmedRecord("37674083")).toBe(false);
  });

  it("is false for an empty body", async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, text: () => Promise.resolve("\n") });

    expect(await fetchPubmedRecord("37674083")).toBe(false);
  });
});
