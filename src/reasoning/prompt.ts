/**
 * Prompt construction and answer parsing for identifier lookup in document text.
 */

import { findIdentifiersInText, firstOfEachType } from "../identifiers.js";
import type { IdentifierCandidate } from "../types.js";

export const IDENTIFIER_PROMPT_INSTRUCTIONS = `You are given the opening text of a scholarly article extracted from a PDF.
Identify the identifiers of THIS article (not of works it cites).

Answer with exactly three lines and nothing else:
DOI: <the article's DOI, or NONE>
PMID: <the article's PubMed ID, or NONE>
PMCID: <the article's PubMed Central ID, or NONE>

If the text contains no identifier for the article, answer NONE on every line.`;

/** Build the reasoning prompt, truncating the document text to `maxChars`. */
export function buildIdentifierPrompt(text: string, maxChars = 4000): string {
  const excerpt = text.length > maxChars ? text.slice(0, maxChars) : text;
  return `${IDENTIFIER_PROMPT_INSTRUCTIONS}\n\nArticle text:\n"""\n${excerpt}\n"""`;
}

/**
 * Parse a free-text answer into identifier candidates.
 * Answers without a recognizable identifier produce an empty array.
 */
export function parseIdentifierAnswer(answer: string): IdentifierCandidate[] {
  if (answer.trim() === "") return [];
  return firstOfEachType(findIdentifiersInText(answer));
}
