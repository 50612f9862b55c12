/**
 * Phase 2a: identifiers from a landing page's HTML.
 *
 * Sources are searched tier by tier and the first tier that yields anything
 * wins, so a page's own citation metadata is preferred over DOIs that happen
 * to appear in its reference list.
 */

import { type HTMLElement, parse as parseHtml } from "node-html-parser";
import type { IdentifierConfig } from "../config.js";
import { extractFromUrl } from "../extract/url-extractor.js";
import {
  createIdentifier,
  dedupeIdentifiers,
  findIdentifiersInText,
  firstOfEachType,
  isIdentifierType,
  normalizeIdentifier,
} from "../identifiers.js";
import { createChildLogger } from "../logger.js";
import { RateLimiter } from "../rate-limiter.js";
import type {
  AcademicIdentifier,
  ExtractionMethod,
  IdentifierCandidate,
  IdentifierType,
  UrlExtractor,
} from "../types.js";
import { HTML_CONTENT_TYPES, fetchText } from "./fetch.js";

const log = createChildLogger({ component: "page-scraper" });

export const PAGE_TIER_CONFIDENCE = {
  "citation-meta": 0.9,
  "publisher-meta": 0.85,
  "page-text": 0.7,
} as const satisfies Partial<Record<ExtractionMethod, number>>;

type PageTier = keyof typeof PAGE_TIER_CONFIDENCE;

/** Highwire Press / Google Scholar citation tags */
const CITATION_META = new Map<string, IdentifierType>([
  ["citation_doi", "doi"],
  ["citation_pmid", "pmid"],
  ["citation_pmcid", "pmc"],
]);

/** Publisher-platform tags whose content may hold an identifier among other text */
const PUBLISHER_META = new Set([
  "dc.identifier",
  "dc.identifier.doi",
  "dcterms.identifier",
  "prism.doi",
  "bepress_citation_doi",
  "eprints.id_number",
  "eprints.official_url",
]);

const JSON_LD_KEYS = new Set(["identifier", "sameAs", "@id", "doi", "url"]);

// ---------------------------------------------------------------------------
// Tiers
// ---------------------------------------------------------------------------

function metaTags(root: HTMLElement): Array<{ name: string; content: string }> {
  const tags: Array<{ name: string; content: string }> = [];
  for (const el of root.querySelectorAll("meta")) {
    const name = el.getAttribute("name") ?? el.getAttribute("property");
    const content = el.getAttribute("content");
    if (name && content) tags.push({ name: name.trim().toLowerCase(), content });
  }
  return tags;
}

function citationMetaCandidates(root: HTMLElement): IdentifierCandidate[] {
  const candidates: IdentifierCandidate[] = [];
  for (const { name, content } of metaTags(root)) {
    const type = CITATION_META.get(name);
    if (!type) continue;
    const value = normalizeIdentifier(type, content);
    if (value) candidates.push({ type, value });
  }
  return candidates;
}

/** Identifiers in a metadata value that may be a URL, a prefixed DOI, or a bare DOI. */
function candidatesFromValue(content: string): IdentifierCandidate[] {
  const fromUrl = extractFromUrl(content).map(({ type, value }) => ({ type, value }));
  return fromUrl.length > 0 ? fromUrl : findIdentifiersInText(content);
}

/** schema.org PropertyValue: { propertyID: "pmid", value: "12345" } */
function propertyValueCandidate(node: object): IdentifierCandidate | undefined {
  const propertyId =
    "propertyID" in node && typeof node.propertyID === "string" ? node.propertyID.toLowerCase() : "";
  const type = propertyId === "pmcid" ? "pmc" : propertyId;
  if (!isIdentifierType(type) || !("value" in node) || typeof node.value !== "string") return undefined;
  const value = normalizeIdentifier(type, node.value);
  return value ? { type, value } : undefined;
}

/**
 * Identifier keys of one described node. Nested nodes (citation, isPartOf,
 * mentions, about) describe other works and are not read.
 */
function collectJsonLdNode(node: object, out: IdentifierCandidate[]): void {
  for (const [key, value] of Object.entries(node)) {
    if (!JSON_LD_KEYS.has(key)) continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      if (typeof item === "string") {
        out.push(...candidatesFromValue(item));
      } else if (typeof item === "object" && item !== null) {
        const candidate = propertyValueCandidate(item);
        if (candidate) out.push(candidate);
      }
    }
  }
}

/** Top-level JSON-LD nodes and the entries of their `@graph`. */
function collectJsonLd(block: unknown, out: IdentifierCandidate[]): void {
  for (const node of Array.isArray(block) ? block : [block]) {
    if (typeof node !== "object" || node === null) continue;
    collectJsonLdNode(node, out);
    if ("@graph" in node && Array.isArray(node["@graph"])) {
      for (const entry of node["@graph"]) {
        if (typeof entry === "object" && entry !== null) collectJsonLdNode(entry, out);
      }
    }
  }
}

function publisherMetaCandidates(root: HTMLElement, pageUrl: string): IdentifierCandidate[] {
  const candidates: IdentifierCandidate[] = [];

  for (const { name, content } of metaTags(root)) {
    if (PUBLISHER_META.has(name)) candidates.push(...candidatesFromValue(content));
  }

  for (const script of root.querySelectorAll('script[type="application/ld+json"]')) {
    try {
      collectJsonLd(JSON.parse(script.rawText), candidates);
    } catch (err) {
      log.debug({ url: pageUrl, err }, "Skipping malformed JSON-LD block");
    }
  }

  const canonical = root.querySelector('link[rel="canonical"]')?.getAttribute("href");
  if (canonical && canonical !== pageUrl) {
    candidates.push(...extractFromUrl(canonical).map(({ type, value }) => ({ type, value })));
  }

  return candidates;
}

function pageTextCandidates(root: HTMLElement): IdentifierCandidate[] {
  for (const el of root.querySelectorAll("script, style, noscript")) {
    el.remove();
  }
  const body = root.querySelector("body") ?? root;
  const doiLinks = body
    .querySelectorAll("a[href]")
    .map((a) => a.getAttribute("href") ?? "")
    .filter((href) => /doi\.org\/10\./i.test(href));

  // Reference lists repeat identifiers of other works; keep the first of each type.
  return firstOfEachType(findIdentifiersInText(`${body.textContent}\n${doiLinks.join("\n")}`));
}

/**
 * Extract identifiers from an HTML document.
 *
 * @param html - Raw page HTML
 * @param sourceUrl - Bibliography URL recorded on each identifier
 */
export function extractIdentifiersFromHtml(html: string, sourceUrl: string): AcademicIdentifier[] {
  const root = parseHtml(html);
  const tiers: Array<[PageTier, () => IdentifierCandidate[]]> = [
    ["citation-meta", () => citationMetaCandidates(root)],
    ["publisher-meta", () => publisherMetaCandidates(root, sourceUrl)],
    ["page-text", () => pageTextCandidates(root)],
  ];

  for (const [tier, search] of tiers) {
    const candidates = search();
    if (candidates.length === 0) continue;
    return dedupeIdentifiers(
      candidates.map((c) => createIdentifier(c, sourceUrl, PAGE_TIER_CONFIDENCE[tier], tier))
    );
  }
  return [];
}

// ---------------------------------------------------------------------------
// Extractor
// ---------------------------------------------------------------------------

export interface PageScraperOptions {
  config: Pick<IdentifierConfig, "userAgent" | "fetchTimeoutMs" | "pageRateLimitMs">;
  /** Share a limiter between scrapers; defaults to one at config.pageRateLimitMs */
  rateLimiter?: RateLimiter;
}

/**
 * Create the page scraper. Every failure (network, HTTP status, content type,
 * no match) results in an empty array.
 */
export function createPageScraper(options: PageScraperOptions): UrlExtractor {
  const { config } = options;
  const limiter = options.rateLimiter ?? new RateLimiter(config.pageRateLimitMs);

  return {
    name: "page-scraper",
    async extractFromUrl(url: string): Promise<AcademicIdentifier[]> {
      const outcome = await limiter.schedule(() =>
        fetchText(url, {
          userAgent: config.userAgent,
          timeoutMs: config.fetchTimeoutMs,
          acceptTypes: HTML_CONTENT_TYPES,
        })
      );

      if (outcome.kind === "fail") {
        log.debug({ url, error: outcome.error }, "Page fetch failed");
        return [];
      }

      const identifiers = extractIdentifiersFromHtml(outcome.body, url);
      log.debug({ url, found: identifiers.length }, "Page scraped");
      return identifiers;
    },
  };
}
