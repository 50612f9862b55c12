/**
 * Publisher URL shapes that carry an identifier.
 *
 * Rules are evaluated in order against the decoded `pathname + search` of a
 * URL. Confidence reflects how certain the match is: a DOI sitting literally
 * in a resolver or `/doi/` path scores highest, a DOI rebuilt from a
 * publisher's article slug a little lower, and a DOI-shaped token found
 * anywhere in the URL lowest.
 */

import type { IdentifierType } from "../types.js";

export interface UrlPattern {
  name: string;
  type: IdentifierType;
  /** Hostname suffixes the rule applies to; omitted means any host */
  hosts?: string[];
  pattern: RegExp;
  confidence: number;
  /** Only evaluated when no earlier rule produced an identifier of the same type */
  fallback?: boolean;
  /** Build the raw identifier from the match; defaults to capture group 1 */
  toValue?: (match: RegExpExecArray) => string | undefined;
}

/** A DOI running to the end of the path segment sequence */
const DOI = String.raw`10\.\d{4,9}\/[^?#\s]+`;

export const URL_PATTERNS: readonly UrlPattern[] = [
  // PubMed / Europe PMC
  {
    name: "pubmed",
    type: "pmid",
    hosts: ["pubmed.ncbi.nlm.nih.gov"],
    pattern: /^\/(\d{1,9})(?:[/?]|$)/,
    confidence: 0.95,
  },
  {
    name: "ncbi-pubmed",
    type: "pmid",
    hosts: ["ncbi.nlm.nih.gov"],
    pattern: /^\/pubmed\/(\d{1,9})(?:[/?]|$)/,
    confidence: 0.95,
  },
  {
    name: "europepmc-med",
    type: "pmid",
    hosts: ["europepmc.org"],
    pattern: /\/(?:article|abstract)\/MED\/(\d{1,9})(?:[/?]|$)/i,
    confidence: 0.95,
  },

  // PubMed Central
  {
    name: "pmc",
    type: "pmc",
    hosts: ["pmc.ncbi.nlm.nih.gov"],
    pattern: /^\/articles\/(PMC\d+)/i,
    confidence: 0.95,
  },
  {
    name: "ncbi-pmc",
    type: "pmc",
    hosts: ["ncbi.nlm.nih.gov"],
    pattern: /\/pmc\/articles\/(PMC\d+)/i,
    confidence: 0.95,
  },
  {
    name: "europepmc-pmc",
    type: "pmc",
    hosts: ["europepmc.org"],
    pattern: /\/(?:article\/PMC\/|articles\/)(PMC\d+)/i,
    confidence: 0.95,
  },

  // DOI literally in the path
  {
    name: "doi-resolver",
    type: "doi",
    hosts: ["doi.org"],
    pattern: new RegExp(String.raw`^\/(${DOI})`),
    confidence: 0.98,
  },
  {
    name: "publisher-doi-path",
    type: "doi",
    pattern: new RegExp(
      String.raw`\/doi\/(?:(?:abs|full|pdf|pdfdirect|epdf|reader|epub|book|chapter)\/)?(${DOI})`,
      "i"
    ),
    confidence: 0.95,
  },
  {
    name: "springer",
    type: "doi",
    hosts: ["link.springer.com"],
    pattern: new RegExp(String.raw`^\/(?:article|chapter|content\/pdf)\/(${DOI})`),
    confidence: 0.9,
  },
  {
    name: "bmc",
    type: "doi",
    hosts: ["biomedcentral.com", "springeropen.com"],
    pattern: new RegExp(String.raw`^\/articles\/(${DOI})`),
    confidence: 0.9,
  },
  {
    name: "frontiers",
    type: "doi",
    hosts: ["frontiersin.org"],
    pattern: new RegExp(String.raw`\/articles\/(${DOI})`),
    confidence: 0.9,
  },
  {
    name: "plos",
    type: "doi",
    hosts: ["plos.org"],
    pattern: /[?&]id=(10\.\d{4,9}\/[^&#\s]+)/,
    confidence: 0.9,
  },
  {
    name: "biorxiv",
    type: "doi",
    hosts: ["biorxiv.org", "medrxiv.org"],
    pattern: /\/content\/(10\.1101\/(?:\d{4}\.\d{2}\.\d{2}\.)?\d+)/,
    confidence: 0.9,
  },

  // DOI rebuilt from a publisher article id
  {
    name: "biorxiv-early",
    type: "doi",
    hosts: ["biorxiv.org", "medrxiv.org"],
    pattern: /\/content\/early\/\d{4}\/\d{2}\/\d{2}\/((?:\d{4}\.\d{2}\.\d{2}\.)?\d+)/,
    confidence: 0.85,
    fallback: true,
    toValue: (match) => (match[1] ? `10.1101/${match[1]}` : undefined),
  },
  {
    name: "nature",
    type: "doi",
    hosts: ["nature.com"],
    pattern: /^\/articles\/([a-z0-9][\w.-]*)/i,
    confidence: 0.9,
    toValue: (match) => (match[1] ? `10.1038/${match[1]}` : undefined),
  },
  {
    name: "elife",
    type: "doi",
    hosts: ["elifesciences.org"],
    pattern: /^\/articles\/(\d+)(?:[/?]|$)/,
    confidence: 0.9,
    toValue: (match) => (match[1] ? `10.7554/eLife.${match[1]}` : undefined),
  },

  // Anything DOI-shaped, anywhere in the URL
  {
    name: "generic-doi",
    type: "doi",
    pattern: /(10\.\d{4,9}\/[^?#&\s]+)/,
    confidence: 0.8,
    fallback: true,
  },
];
