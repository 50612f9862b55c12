/**
 * Phase 1: identifiers from URL structure alone.
 *
 * Pure string parsing against the URL_PATTERNS table; no network access, so
 * the same input always produces the same output.
 */

import { createIdentifier, dedupeIdentifiers, normalizeIdentifier } from "../identifiers.js";
import { ResultBuilder } from "../result.js";
import type { AcademicIdentifier, IdentifierExtractionResult, IdentifierType } from "../types.js";
import { URL_PATTERNS, type UrlPattern } from "./patterns.js";

function hostMatches(hostname: string, suffixes: string[] | undefined): boolean {
  if (!suffixes) return true;
  return suffixes.some((suffix) => hostname === suffix || hostname.endsWith(`.${suffix}`));
}

/** Parse an http(s) URL, returning null for anything else. */
export function parseHttpUrl(url: string): URL | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  return parsed.protocol === "http:" || parsed.protocol === "https:" ? parsed : null;
}

function decodedTarget(url: URL): string {
  const raw = `${url.pathname}${url.search}`;
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Extract identifiers from a single URL.
 * Strings that are not http(s) URLs yield an empty array.
 */
export function extractFromUrl(
  url: string,
  patterns: readonly UrlPattern[] = URL_PATTERNS
): AcademicIdentifier[] {
  const parsed = parseHttpUrl(url.trim());
  if (!parsed) return [];

  const hostname = parsed.hostname.toLowerCase();
  const target = decodedTarget(parsed);
  const found: AcademicIdentifier[] = [];
  const typesFound = new Set<IdentifierType>();

  for (const rule of patterns) {
    if (rule.fallback && typesFound.has(rule.type)) continue;
    if (!hostMatches(hostname, rule.hosts)) continue;

    const match = rule.pattern.exec(target);
    if (!match) continue;

    const raw = rule.toValue ? rule.toValue(match) : match[1];
    if (!raw) continue;

    const value = normalizeIdentifier(rule.type, raw);
    if (!value) continue;

    found.push(createIdentifier({ type: rule.type, value }, url, rule.confidence, "url-pattern"));
    typesFound.add(rule.type);
  }

  return dedupeIdentifiers(found);
}

/** Run Phase 1 over a batch, returning the builder so later phases can continue it. */
export function runUrlPhase(
  urls: readonly string[],
  patterns: readonly UrlPattern[] = URL_PATTERNS
): ResultBuilder {
  const builder = new ResultBuilder();
  for (const url of urls) {
    builder.addUrl(url, extractFromUrl(url, patterns));
  }
  return builder;
}

/**
 * Extract identifiers from a list of URLs.
 * URLs with no identifier are listed in `failedUrls`.
 */
export function extractFromUrls(
  urls: readonly string[],
  patterns: readonly UrlPattern[] = URL_PATTERNS
): IdentifierExtractionResult {
  return runUrlPhase(urls, patterns).build();
}
