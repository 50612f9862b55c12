/**
 * Tests for reasoning prompt construction and answer parsing.
 */

import { describe, expect, it } from "vitest";
import { IDENTIFIER_PROMPT_INSTRUCTIONS, buildIdentifierPrompt, parseIdentifierAnswer } from "./prompt.js";

describe("buildIdentifierPrompt", () => {
  it("wraps the text after the instructions", () => {
    expect(buildIdentifierPrompt("Title page")).toBe(
      `${IDENTIFIER_PROMPT_INSTRUCTIONS}\n\nArticle text:\n"""\nTitle page\n"""`
    );
  });

  it("truncates long text", () => {
    expect(buildIdentifierPrompt("abcdef", 3).endsWith('Article text:\n"""\nabc\n"""')).toBe(true);
  });
});

describe("parseIdentifierAnswer", () => {
  it("parses the three-line answer", () => {
    expect(parseIdentifierAnswer("DOI: 10.1000/Answer.1\nPMID: 12345\nPMCID: PMC7777")).toEqual([
      { type: "doi", value: "10.1000/answer.1" },
      { type: "pmid", value: "12345" },
      { type: "pmc", value: "PMC7777" },
    ]);
  });

  it("skips NONE lines", () => {
    expect(parseIdentifierAnswer("DOI: NONE\nPMID: 12345\nPMCID: NONE")).toEqual([
      { type: "pmid", value: "12345" },
    ]);
  });

  it("returns nothing for an empty answer", () => {
    expect(parseIdentifierAnswer("")).toEqual([]);
    expect(parseIdentifierAnswer("   ")).toEqual([]);
    expect(parseIdentifierAnswer("I could not find any identifier.")).toEqual([]);
  });

  it("keeps only the first identifier of each type", () => {
    expect(parseIdentifierAnswer("DOI: 10.1000/a.1 (also 10.1000/b.2)")).toEqual([
      { type: "doi", value: "10.1000/a.1" },
    ]);
  });
});
