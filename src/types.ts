/**
 * Identifier type definitions.
 * Defines the identifier value objects and the aggregate batch result.
 */

/** Supported identifier kinds. Closed set. */
export const IDENTIFIER_TYPES = ["doi", "pmid", "pmc"] as const;

export type IdentifierType = (typeof IDENTIFIER_TYPES)[number];

/** Which stage produced an identifier */
export type ExtractionMethod =
  | "url-pattern"
  | "citation-meta"
  | "publisher-meta"
  | "page-text"
  | "pdf-text"
  | "pdf-reasoning";

/**
 * One recognized identifier.
 */
export interface AcademicIdentifier {
  type: IdentifierType;
  /** Normalized value: lower-case DOI, numeric PMID, "PMC"-prefixed PMC accession */
  value: string;
  /** Current best estimate of correctness, in [0, 1]. Only ever raised. */
  confidence: number;
  /** The bibliography URL that produced this identifier */
  sourceUrl: string;
  method: ExtractionMethod;
}

/** An identifier found in free text, before it is attached to a URL */
export interface IdentifierCandidate {
  type: IdentifierType;
  value: string;
}

export interface ExtractionStats {
  totalUrls: number;
  successfulExtractions: number;
  failedExtractions: number;
  doiCount: number;
  pmidCount: number;
  pmcCount: number;
}

/**
 * Outcome of a batch run.
 */
export interface IdentifierExtractionResult {
  /** Discovery order: Phase 1 first, Phase 2 appended */
  readonly identifiers: readonly Readonly<AcademicIdentifier>[];
  /** URLs with no identifier from any phase run so far; no duplicates */
  readonly failedUrls: readonly string[];
  readonly extractionStats: Readonly<ExtractionStats>;
}

/**
 * Common shape of the content-fetching extractors used in Phase 2.
 * An empty array means the URL yielded nothing; implementations do not throw.
 */
export interface UrlExtractor {
  readonly name: string;
  extractFromUrl(url: string): Promise<AcademicIdentifier[]>;
}
