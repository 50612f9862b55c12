/**
 * Composite validator.
 *
 * Each enabled source is asked independently. The composite confidence is
 * the highest confidence among sources that confirmed the identifier; sources
 * that answered "not found" or failed contribute nothing. With no
 * confirmation at all the confidence is 0 and the identifier is not valid.
 */

import type { IdentifierConfig } from "../config.js";
import { assertIdentifierType, clampConfidence, normalizeIdentifier } from "../identifiers.js";
import { createChildLogger } from "../logger.js";
import { RateLimiter } from "../rate-limiter.js";
import type { IdentifierType } from "../types.js";
import { createDatabaseSource } from "./database.js";
import { ncbiIntervalMs } from "./eutils.js";
import { createRegistrySource } from "./registry.js";
import { type SourceCheck, type ValidationSource, runSourceCheck } from "./source.js";

const log = createChildLogger({ component: "validator" });

export interface ValidatorOptions {
  /** Enable registry sources (doi.org, NCBI). Default: true */
  useApi?: boolean;
  /** Enable bibliographic database sources (Crossref, PubMed). Default: true */
  useDatabase?: boolean;
  config?: Pick<
    IdentifierConfig,
    "ncbiApiKey" | "ncbiEmail" | "ncbiTool" | "crossrefMailto" | "fetchTimeoutMs"
  >;
  /** Replace the built-in sources; the use* flags still filter them by kind */
  sources?: ValidationSource[];
}

export interface ValidationAssessment {
  valid: boolean;
  confidence: number;
  checks: SourceCheck[];
}

/** Anything that can score an identifier; the pipeline depends only on this. */
export interface ConfidenceScorer {
  getConfidenceScore(type: IdentifierType, value: string): Promise<number>;
}

/** Highest confirmed confidence, or 0 when nothing confirmed. */
export function compositeConfidence(checks: SourceCheck[]): number {
  let best = 0;
  for (const check of checks) {
    if (check.status === "confirmed") best = Math.max(best, clampConfidence(check.confidence));
  }
  return best;
}

function defaultSources(config: ValidatorOptions["config"]): ValidationSource[] {
  const eutils = {
    ...(config?.ncbiApiKey ? { apiKey: config.ncbiApiKey } : {}),
    ...(config?.ncbiEmail ? { email: config.ncbiEmail } : {}),
    ...(config?.ncbiTool ? { tool: config.ncbiTool } : {}),
    ...(config?.fetchTimeoutMs ? { timeoutMs: config.fetchTimeoutMs } : {}),
  };
  const ncbiLimiter = new RateLimiter(ncbiIntervalMs(eutils));
  return [
    createRegistrySource({ ...eutils, ncbiLimiter }),
    createDatabaseSource({
      ...eutils,
      ncbiLimiter,
      ...(config?.crossrefMailto ? { crossrefMailto: config.crossrefMailto } : {}),
    }),
  ];
}

export class CompositeValidator implements ConfidenceScorer {
  readonly sources: readonly ValidationSource[];

  constructor(options: ValidatorOptions = {}) {
    const useApi = options.useApi ?? true;
    const useDatabase = options.useDatabase ?? true;
    const candidates = options.sources ?? (useApi || useDatabase ? defaultSources(options.config) : []);

    this.sources = candidates.filter(
      (source) => (source.kind === "registry" && useApi) || (source.kind === "database" && useDatabase)
    );
    if (this.sources.length === 0) {
      log.debug("No validation sources enabled; every identifier scores 0");
    }
  }

  /**
   * Ask every enabled source about an identifier.
   * @throws InvalidIdentifierTypeError for a type outside doi | pmid | pmc
   */
  async assess(type: IdentifierType, value: string): Promise<ValidationAssessment> {
    assertIdentifierType(type);
    const normalized = normalizeIdentifier(type, value);
    if (!normalized) return { valid: false, confidence: 0, checks: [] };

    const checks: SourceCheck[] = [];
    for (const source of this.sources) {
      if (!source.supports(type)) continue;
      const check = await runSourceCheck(source, type, normalized);
      if (check.status === "error") {
        log.warn({ type, value: normalized, source: check.source, error: check.error }, "Validation source failed");
      }
      checks.push(check);
    }

    const confidence = compositeConfidence(checks);
    return { valid: confidence > 0, confidence, checks };
  }

  async getConfidenceScore(type: IdentifierType, value: string): Promise<number> {
    return (await this.assess(type, value)).confidence;
  }

  async validateIdentifier(type: IdentifierType, value: string): Promise<boolean> {
    return (await this.assess(type, value)).valid;
  }
}

export type { SourceCheck, SourceKind, ValidationSource } from "./source.js";
export { runSourceCheck } from "./source.js";
export { createRegistrySource, REGISTRY_CONFIDENCE } from "./registry.js";
export type { RegistrySourceOptions } from "./registry.js";
export { createDatabaseSource, DATABASE_CONFIDENCE } from "./database.js";
export type { DatabaseSourceOptions } from "./database.js";
