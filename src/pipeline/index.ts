/**
 * Pipeline entry points.
 *
 * A batch runs in up to three steps:
 *
 * 1. URL patterns over every input (always).
 * 2. Confidence adjustment from validation sources (when a validation flag is set).
 * 3. Content fetching for URLs still without identifiers (when `useWebScraping`).
 *
 * Confidence only ever goes up and validation never removes an identifier.
 */

import { type IdentifierConfig, loadConfig } from "../config.js";
import { ConfigError, ReasonerConfigError } from "../errors.js";
import { extractFromUrl, runUrlPhase } from "../extract/url-extractor.js";
import { assertIdentifierType, normalizeIdentifier, withConfidence } from "../identifiers.js";
import { createChildLogger } from "../logger.js";
import { createReasonerFromConfig } from "../reasoning/index.js";
import type { TextReasoner } from "../reasoning/types.js";
import type { ResultBuilder } from "../result.js";
import { createDocumentExtractor } from "../scrape/document-extractor.js";
import { createPageScraper } from "../scrape/page-scraper.js";
import type {
  AcademicIdentifier,
  IdentifierExtractionResult,
  IdentifierType,
  UrlExtractor,
} from "../types.js";
import { CompositeValidator, type ConfidenceScorer } from "../validate/index.js";
import { type Phase2Extractors, runPhase2 } from "./phase2.js";

const log = createChildLogger({ component: "pipeline" });

export interface ValidationFlags {
  /** Query registry sources (doi.org, NCBI) */
  useApiValidation?: boolean;
  /** Query bibliographic databases (Crossref, PubMed) */
  useDatabaseValidation?: boolean;
}

export interface BibliographyOptions extends ValidationFlags {
  /** Run Phase 2 on URLs Phase 1 could not resolve. Default: false */
  useWebScraping?: boolean;
  /** Phase 2 URLs attempted at once. Default: 1 */
  phase2Concurrency?: number;
  /** Defaults to loadConfig() on first need */
  config?: IdentifierConfig;
  validator?: ConfidenceScorer;
  pageScraper?: UrlExtractor;
  documentExtractor?: UrlExtractor;
  /** Document fallback; defaults to the provider configured in the environment */
  reasoner?: TextReasoner;
}

/** Environment config, or the defaults when the environment is invalid. */
function loadConfigOrDefaults(): IdentifierConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.warn({ err }, "Invalid configuration, using defaults");
    return loadConfig({});
  }
}

/** Lazily resolved config so runs that need none never read the environment. */
function configResolver(config?: IdentifierConfig): () => IdentifierConfig {
  let resolved = config;
  return () => {
    resolved ??= loadConfigOrDefaults();
    return resolved;
  };
}

/** Configured reasoner; a provider without a key disables the fallback. */
function reasonerOrNone(config: IdentifierConfig): TextReasoner | undefined {
  try {
    return createReasonerFromConfig(config);
  } catch (err) {
    if (!(err instanceof ReasonerConfigError)) throw err;
    log.warn({ err }, "Document reasoning disabled");
    return undefined;
  }
}

function buildValidator(
  flags: Required<ValidationFlags>,
  getConfig: () => IdentifierConfig
): ConfidenceScorer {
  return new CompositeValidator({
    useApi: flags.useApiValidation,
    useDatabase: flags.useDatabaseValidation,
    config: getConfig(),
  });
}

function buildExtractors(
  options: BibliographyOptions,
  getConfig: () => IdentifierConfig
): Phase2Extractors {
  const pageScraper = options.pageScraper ?? createPageScraper({ config: getConfig() });
  let documentExtractor = options.documentExtractor;
  if (!documentExtractor) {
    const config = getConfig();
    const reasoner = options.reasoner ?? reasonerOrNone(config);
    documentExtractor = createDocumentExtractor({
      config,
      ...(reasoner ? { reasoner } : {}),
    });
  }
  return { pageScraper, documentExtractor };
}

/** Raise confidences from validation. A scorer failure leaves the identifier as it was. */
async function applyValidation(builder: ResultBuilder, validator: ConfidenceScorer): Promise<void> {
  await builder.mergeConfidences(async (identifier: AcademicIdentifier) => {
    try {
      return await validator.getConfidenceScore(identifier.type, identifier.value);
    } catch (err) {
      log.warn({ type: identifier.type, value: identifier.value, err }, "Validation failed");
      return 0;
    }
  });
}

/**
 * Extract identifiers from every URL of a bibliography.
 *
 * @example
 * ```typescript
 * const result = await extractIdentifiersFromBibliography(
 *   ["https://pubmed.ncbi.nlm.nih.gov/37674083/"],
 *   { useApiValidation: false, useDatabaseValidation: false },
 * );
 * result.identifiers[0]; // { type: "pmid", value: "37674083", confidence: 0.95, ... }
 * ```
 */
export async function extractIdentifiersFromBibliography(
  urls: readonly string[],
  options: BibliographyOptions = {}
): Promise<IdentifierExtractionResult> {
  const flags = {
    useApiValidation: options.useApiValidation ?? true,
    useDatabaseValidation: options.useDatabaseValidation ?? true,
  };
  const getConfig = configResolver(options.config);

  const builder = runUrlPhase(urls);
  const afterPatterns = builder.failedUrls().length;

  if (flags.useApiValidation || flags.useDatabaseValidation) {
    await applyValidation(builder, options.validator ?? buildValidator(flags, getConfig));
  }

  let recovered = 0;
  const pending = builder.failedUrls();
  if (options.useWebScraping && pending.length > 0) {
    const outcomes = await runPhase2(pending, buildExtractors(options, getConfig), {
      ...(options.phase2Concurrency !== undefined ? { concurrency: options.phase2Concurrency } : {}),
    });
    recovered = builder.applyPhase2Outcomes(outcomes);
  }

  const result = builder.build();
  log.info(
    {
      totalUrls: result.extractionStats.totalUrls,
      identifiers: result.identifiers.length,
      failedAfterPatterns: afterPatterns,
      recoveredByScraping: recovered,
      failed: result.failedUrls.length,
    },
    "Bibliography extraction complete"
  );
  return result;
}

/**
 * Extract identifiers from a single URL by pattern, optionally validated.
 * Validation is off unless a flag is set.
 */
export async function extractIdentifiersFromUrl(
  url: string,
  options: ValidationFlags & { config?: IdentifierConfig; validator?: ConfidenceScorer } = {}
): Promise<AcademicIdentifier[]> {
  const flags = {
    useApiValidation: options.useApiValidation ?? false,
    useDatabaseValidation: options.useDatabaseValidation ?? false,
  };
  const identifiers = extractFromUrl(url);
  if (identifiers.length === 0 || !(flags.useApiValidation || flags.useDatabaseValidation)) {
    return identifiers;
  }

  const validator = options.validator ?? buildValidator(flags, configResolver(options.config));
  const scored: AcademicIdentifier[] = [];
  for (const identifier of identifiers) {
    try {
      const score = await validator.getConfidenceScore(identifier.type, identifier.value);
      scored.push(withConfidence(identifier, score));
    } catch (err) {
      log.warn({ url, value: identifier.value, err }, "Validation failed");
      scored.push(identifier);
    }
  }
  return scored;
}

export interface IdentifierValidation {
  valid: boolean;
  confidence: number;
  identifierType: IdentifierType;
  /** Normalized value, or the input as given when it cannot be normalized */
  value: string;
}

/**
 * Validate one identifier against the enabled sources.
 * @throws InvalidIdentifierTypeError for a type outside doi | pmid | pmc
 */
export async function validateIdentifier(
  type: IdentifierType,
  value: string,
  options: { useApi?: boolean; useDatabase?: boolean; config?: IdentifierConfig } = {}
): Promise<IdentifierValidation> {
  assertIdentifierType(type);
  const normalized = normalizeIdentifier(type, value);
  if (!normalized) {
    return { valid: false, confidence: 0, identifierType: type, value };
  }

  const useApi = options.useApi ?? true;
  const useDatabase = options.useDatabase ?? true;
  const validator = new CompositeValidator({
    useApi,
    useDatabase,
    ...(useApi || useDatabase ? { config: options.config ?? loadConfig() } : {}),
  });
  const { valid, confidence } = await validator.assess(type, normalized);
  return { valid, confidence, identifierType: type, value: normalized };
}

export { attemptUrl, runPhase2 } from "./phase2.js";
export type { Phase2Extractors, Phase2Options } from "./phase2.js";
