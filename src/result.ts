/**
 * Assembly of the batch result.
 *
 * A result is built through a ResultBuilder while the pipeline runs and handed
 * to the caller frozen. Statistics are derived from the same calls that add
 * identifiers, so the per-type counts always match the identifier list and
 * successful + failed always equals the number of input URLs.
 */

import { withConfidence } from "./identifiers.js";
import type {
  AcademicIdentifier,
  ExtractionStats,
  IdentifierExtractionResult,
  IdentifierType,
} from "./types.js";

const COUNT_FIELD: Record<IdentifierType, "doiCount" | "pmidCount" | "pmcCount"> = {
  doi: "doiCount",
  pmid: "pmidCount",
  pmc: "pmcCount",
};

/** A Phase 2 attempt on one URL, as a value rather than an exception. */
export type Phase2Outcome =
  | { url: string; status: "recovered"; identifiers: AcademicIdentifier[] }
  | { url: string; status: "failed"; reason: string };

export class ResultBuilder {
  private readonly identifiers: AcademicIdentifier[] = [];
  /** Failed URL → number of times it occurs in the input */
  private readonly failed = new Map<string, number>();
  private readonly stats: ExtractionStats = {
    totalUrls: 0,
    successfulExtractions: 0,
    failedExtractions: 0,
    doiCount: 0,
    pmidCount: 0,
    pmcCount: 0,
  };

  /** Record the Phase 1 outcome for one input URL. */
  addUrl(url: string, identifiers: AcademicIdentifier[]): void {
    this.stats.totalUrls++;
    if (identifiers.length === 0) {
      this.stats.failedExtractions++;
      this.failed.set(url, (this.failed.get(url) ?? 0) + 1);
      return;
    }
    this.stats.successfulExtractions++;
    this.append(identifiers);
  }

  /** Snapshot of the URLs that currently have no identifiers. */
  failedUrls(): string[] {
    return [...this.failed.keys()];
  }

  /** Apply a confidence score to every identifier through the monotone merge. */
  async mergeConfidences(
    score: (identifier: AcademicIdentifier) => Promise<number>
  ): Promise<void> {
    for (let i = 0; i < this.identifiers.length; i++) {
      const identifier = this.identifiers[i];
      if (!identifier) continue;
      this.identifiers[i] = withConfidence(identifier, await score(identifier));
    }
  }

  /**
   * Apply the outcomes of a completed Phase 2 sweep. Recovered URLs leave the
   * failed set (all their input occurrences move to successful) and their
   * identifiers are appended in outcome order.
   * @returns The number of distinct URLs recovered
   */
  applyPhase2Outcomes(outcomes: Phase2Outcome[]): number {
    let recovered = 0;
    for (const outcome of outcomes) {
      if (outcome.status !== "recovered" || outcome.identifiers.length === 0) continue;
      const occurrences = this.failed.get(outcome.url);
      if (occurrences === undefined) continue;

      this.failed.delete(outcome.url);
      this.stats.failedExtractions -= occurrences;
      this.stats.successfulExtractions += occurrences;
      this.append(outcome.identifiers);
      recovered++;
    }
    return recovered;
  }

  build(): IdentifierExtractionResult {
    return Object.freeze({
      identifiers: Object.freeze(this.identifiers.map((identifier) => Object.freeze({ ...identifier }))),
      failedUrls: Object.freeze(this.failedUrls()),
      extractionStats: Object.freeze({ ...this.stats }),
    });
  }

  private append(identifiers: AcademicIdentifier[]): void {
    for (const identifier of identifiers) {
      this.identifiers.push(identifier);
      this.stats[COUNT_FIELD[identifier.type]]++;
    }
  }
}

/** Fraction of input URLs that produced at least one identifier. */
export function successRate(result: IdentifierExtractionResult): number {
  const { totalUrls, successfulExtractions } = result.extractionStats;
  return totalUrls === 0 ? 0 : successfulExtractions / totalUrls;
}
