/**
 * Identifier normalization, free-text search, and the confidence merge.
 */

import anyAscii from "any-ascii";
import { InvalidIdentifierTypeError } from "./errors.js";
import {
  type AcademicIdentifier,
  type ExtractionMethod,
  IDENTIFIER_TYPES,
  type IdentifierCandidate,
  type IdentifierType,
} from "./types.js";

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isIdentifierType(value: unknown): value is IdentifierType {
  return typeof value === "string" && (IDENTIFIER_TYPES as readonly string[]).includes(value);
}

/** @throws InvalidIdentifierTypeError */
export function assertIdentifierType(value: unknown): asserts value is IdentifierType {
  if (!isIdentifierType(value)) {
    throw new InvalidIdentifierTypeError(value);
  }
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

const DOI_PREFIX = /^(?:doi:\s*|https?:\/\/(?:dx\.|www\.)?doi\.org\/)/i;
const DOI_SHAPE = /^10\.\d{4,9}\/\S+$/;
/** Viewer segments publishers append after the DOI in article URLs */
const DOI_VIEWER_SUFFIX = /(?:\/(?:full|abstract|pdf|epdf|epub|html|fulltext|meta|references|figures)|\.pdf)$/i;
const TRAILING_PUNCTUATION = new Set([".", ",", ";", ":", "'", '"', "]", "}", ">"]);

function safeDecode(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function count(text: string, ch: string): number {
  let n = 0;
  for (const c of text) if (c === ch) n++;
  return n;
}

/** Strip sentence punctuation; a closing paren is kept when it balances an opening one. */
function stripTrailingPunctuation(value: string): string {
  let result = value;
  for (;;) {
    const last = result.at(-1);
    if (last === undefined) return result;
    if (TRAILING_PUNCTUATION.has(last)) {
      result = result.slice(0, -1);
    } else if (last === ")" && count(result, "(") < count(result, ")")) {
      result = result.slice(0, -1);
    } else {
      return result;
    }
  }
}

export function normalizeDoi(raw: string): string | null {
  let value = safeDecode(raw.trim()).replace(DOI_PREFIX, "");
  value = stripTrailingPunctuation(value);
  while (DOI_VIEWER_SUFFIX.test(value)) {
    value = stripTrailingPunctuation(value.replace(DOI_VIEWER_SUFFIX, ""));
  }
  value = value.toLowerCase();
  return DOI_SHAPE.test(value) ? value : null;
}

export function normalizePmid(raw: string): string | null {
  const match = /^(?:pmid:?\s*)?(\d{1,9})$/i.exec(raw.trim());
  if (!match?.[1]) return null;
  const digits = match[1].replace(/^0+/, "");
  return digits === "" ? null : digits;
}

export function normalizePmcid(raw: string): string | null {
  const match = /^(?:pmcid:?\s*)?(?:pmc)?(\d{1,10})$/i.exec(raw.trim());
  if (!match?.[1]) return null;
  return `PMC${match[1]}`;
}

/** Strip "PMC" prefix from a PMC accession, returning just the numeric part */
export function stripPmcPrefix(pmcid: string): string {
  return pmcid.replace(/^PMC/i, "");
}

const normalizers: Record<IdentifierType, (raw: string) => string | null> = {
  doi: normalizeDoi,
  pmid: normalizePmid,
  pmc: normalizePmcid,
};

/**
 * Normalize a raw identifier string for the given type.
 * @returns The canonical value, or null if the string is not a valid identifier of that type
 * @throws InvalidIdentifierTypeError if the type is outside the supported set
 */
export function normalizeIdentifier(type: IdentifierType, raw: string): string | null {
  assertIdentifierType(type);
  return normalizers[type](raw);
}

// ---------------------------------------------------------------------------
// Free-text search
// ---------------------------------------------------------------------------

const DOI_IN_TEXT = /\b10\.\d{4,9}\/[^\s"'<>]+/g;
/** Bare numbers are too ambiguous; PMIDs are only taken when labelled. */
const PMID_IN_TEXT = /\b(?:PMID|PubMed\s*ID)\s*[:#]?\s*(\d{1,9})\b/gi;
const PMC_IN_TEXT = /\bPMC\s?(\d{4,10})\b/g;

interface PositionedCandidate extends IdentifierCandidate {
  index: number;
}

function collect(
  text: string,
  pattern: RegExp,
  type: IdentifierType,
  group: number
): PositionedCandidate[] {
  const found: PositionedCandidate[] = [];
  for (const match of text.matchAll(pattern)) {
    const raw = match[group];
    if (raw === undefined) continue;
    const value = normalizers[type](raw);
    if (value) found.push({ type, value, index: match.index ?? 0 });
  }
  return found;
}

/**
 * Find DOI, PMID and PMC tokens in free text.
 * Text is transliterated to ASCII first so that Unicode hyphens inside DOIs
 * (common in PDF text) still match.
 * @returns Unique candidates in order of first appearance
 */
export function findIdentifiersInText(text: string): IdentifierCandidate[] {
  const ascii = anyAscii(text);
  const positioned = [
    ...collect(ascii, DOI_IN_TEXT, "doi", 0),
    ...collect(ascii, PMID_IN_TEXT, "pmid", 1),
    ...collect(ascii, PMC_IN_TEXT, "pmc", 1),
  ].sort((a, b) => a.index - b.index);

  const seen = new Set<string>();
  const result: IdentifierCandidate[] = [];
  for (const candidate of positioned) {
    const key = identifierKey(candidate);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push({ type: candidate.type, value: candidate.value });
  }
  return result;
}

/** Keep only the first candidate of each type. */
export function firstOfEachType(candidates: IdentifierCandidate[]): IdentifierCandidate[] {
  const seenTypes = new Set<IdentifierType>();
  return candidates.filter((candidate) => {
    if (seenTypes.has(candidate.type)) return false;
    seenTypes.add(candidate.type);
    return true;
  });
}

// ---------------------------------------------------------------------------
// Identifier construction and confidence
// ---------------------------------------------------------------------------

export function identifierKey(identifier: IdentifierCandidate): string {
  return `${identifier.type}:${identifier.value}`;
}

export function clampConfidence(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

/**
 * The single confidence update rule: the higher of the current and incoming
 * scores. Confidence never decreases.
 */
export function mergeConfidence(current: number, incoming: number): number {
  return Math.max(current, clampConfidence(incoming));
}

/** Return the identifier with its confidence merged against a new score. */
export function withConfidence<T extends AcademicIdentifier>(identifier: T, score: number): T {
  const confidence = mergeConfidence(identifier.confidence, score);
  return confidence === identifier.confidence ? identifier : { ...identifier, confidence };
}

export function createIdentifier(
  candidate: IdentifierCandidate,
  sourceUrl: string,
  confidence: number,
  method: ExtractionMethod
): AcademicIdentifier {
  return {
    type: candidate.type,
    value: candidate.value,
    confidence: clampConfidence(confidence),
    sourceUrl,
    method,
  };
}

/**
 * Drop repeated (type, value) pairs, keeping the first occurrence's position
 * and the highest confidence seen.
 */
export function dedupeIdentifiers(identifiers: AcademicIdentifier[]): AcademicIdentifier[] {
  const byKey = new Map<string, AcademicIdentifier>();
  for (const identifier of identifiers) {
    const key = identifierKey(identifier);
    const existing = byKey.get(key);
    byKey.set(key, existing ? withConfidence(existing, identifier.confidence) : identifier);
  }
  return [...byKey.values()];
}
