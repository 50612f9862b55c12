/**
 * # academic-identifiers
 *
 * DOI, PMID and PMC identifier extraction for bibliography URLs.
 *
 * ## Workflow
 *
 * A batch of URLs goes through up to three steps:
 *
 * 1. **Patterns** — Identifiers recognized from URL structure alone (no network).
 * 2. **Validation** — Confidence raised when registries or bibliographic databases confirm an identifier.
 * 3. **Scraping** — URLs still without identifiers are fetched: landing pages are searched
 *    for citation metadata, linked PDFs for identifier text (with an optional LLM fallback).
 *
 * ## Quick Example
 *
 * ```typescript
 * import { extractIdentifiersFromBibliography, validateIdentifier } from "academic-identifiers";
 *
 * const result = await extractIdentifiersFromBibliography(
 *   [
 *     "https://pubmed.ncbi.nlm.nih.gov/37674083/",
 *     "https://www.science.org/doi/10.1126/science.abc1234",
 *     "https://example.org/paper-landing-page",
 *   ],
 *   { useWebScraping: true },
 * );
 *
 * result.identifiers;     // pmid 37674083, doi 10.1126/science.abc1234, ...
 * result.failedUrls;      // URLs no step could resolve
 * result.extractionStats; // totals and per-type counts
 *
 * const check = await validateIdentifier("pmc", "PMC1234567");
 * check.valid; // true when any source confirms it
 * ```
 *
 * ## Configuration
 *
 * Read from the environment by {@link loadConfig}:
 *
 * - **NCBI_API_KEY** / **NCBI_EMAIL** / **NCBI_TOOL** (optional): NCBI E-utilities and ID Converter.
 * - **CROSSREF_MAILTO** (optional): Crossref polite pool contact.
 * - **OPENAI_API_KEY** / **ANTHROPIC_API_KEY** (optional): Enables the document reasoning fallback.
 * - **PAGE_RATE_LIMIT_MS** / **DOCUMENT_RATE_LIMIT_MS**: Spacing between fetches. Default: 1000 / 2000.
 * - **LOG_LEVEL**: pino log level. Default: `info`.
 *
 * ## Modules
 *
 * - **Pipeline**: {@link extractIdentifiersFromBibliography}, {@link extractIdentifiersFromUrl}, {@link validateIdentifier}
 * - **Patterns**: {@link extractFromUrl}, {@link extractFromUrls}, {@link URL_PATTERNS}
 * - **Scraping**: {@link createPageScraper}, {@link extractIdentifiersFromHtml}, {@link createDocumentExtractor}, {@link extractPdfText}
 * - **Validation**: {@link CompositeValidator}, {@link createRegistrySource}, {@link createDatabaseSource}
 * - **Reasoning**: {@link createReasonerFromConfig}, {@link createOpenAIReasoner}, {@link createAnthropicReasoner}
 * - **Utilities**: {@link normalizeIdentifier}, {@link findIdentifiersInText}, {@link mergeConfidence}
 *
 * @module academic-identifiers
 */

// === Pipeline ===
export {
  extractIdentifiersFromBibliography,
  extractIdentifiersFromUrl,
  validateIdentifier,
} from "./pipeline/index.js";
export type {
  BibliographyOptions,
  IdentifierValidation,
  ValidationFlags,
} from "./pipeline/index.js";

// === Patterns ===
export { extractFromUrl, extractFromUrls } from "./extract/url-extractor.js";
export { URL_PATTERNS } from "./extract/patterns.js";
export type { UrlPattern } from "./extract/patterns.js";

// === Scraping ===
export { createPageScraper, extractIdentifiersFromHtml, PAGE_TIER_CONFIDENCE } from "./scrape/page-scraper.js";
export type { PageScraperOptions } from "./scrape/page-scraper.js";
export {
  createDocumentExtractor,
  isDocumentUrl,
  isPdfUrl,
  PDF_REASONING_CONFIDENCE,
  PDF_TEXT_CONFIDENCE,
} from "./scrape/document-extractor.js";
export type { DocumentExtractorOptions } from "./scrape/document-extractor.js";
export { extractPdfText } from "./scrape/pdf-text.js";
export type { PdfText, PdfTextOptions } from "./scrape/pdf-text.js";
export { RateLimiter } from "./rate-limiter.js";
export type { Clock } from "./rate-limiter.js";

// === Validation ===
export {
  CompositeValidator,
  compositeConfidence,
  createDatabaseSource,
  createRegistrySource,
  DATABASE_CONFIDENCE,
  REGISTRY_CONFIDENCE,
  runSourceCheck,
} from "./validate/index.js";
export type {
  ConfidenceScorer,
  SourceCheck,
  SourceKind,
  ValidationAssessment,
  ValidationSource,
  ValidatorOptions,
} from "./validate/index.js";

// === Reasoning ===
export {
  buildIdentifierPrompt,
  createAnthropicReasoner,
  createOpenAIReasoner,
  createReasonerFromConfig,
  parseIdentifierAnswer,
} from "./reasoning/index.js";
export type { TextReasoner } from "./reasoning/index.js";

// === Utilities ===
export {
  dedupeIdentifiers,
  findIdentifiersInText,
  mergeConfidence,
  normalizeDoi,
  normalizeIdentifier,
  normalizePmcid,
  normalizePmid,
  withConfidence,
} from "./identifiers.js";
export { ResultBuilder, successRate } from "./result.js";
export type { Phase2Outcome } from "./result.js";
export { loadConfig } from "./config.js";
export type { IdentifierConfig, LlmProvider } from "./config.js";
export { ConfigError, IdentifierError, InvalidIdentifierTypeError, ReasonerConfigError } from "./errors.js";
export { logger } from "./logger.js";

// === Types ===
export { IDENTIFIER_TYPES } from "./types.js";
export type {
  AcademicIdentifier,
  ExtractionMethod,
  ExtractionStats,
  IdentifierCandidate,
  IdentifierExtractionResult,
  IdentifierType,
  UrlExtractor,
} from "./types.js";
