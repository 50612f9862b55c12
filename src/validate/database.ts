/**
 * Bibliographic database validation: looks for a record of the work.
 *
 * DOI:  Crossref works API  https://api.crossref.org/works/{doi}
 * PMID: PubMed efetch XML
 * PMC:  NCBI esummary (db=pmc)
 */

import { z } from "zod";
import { stripPmcPrefix } from "../identifiers.js";
import { RateLimiter } from "../rate-limiter.js";
import type { IdentifierType } from "../types.js";
import { type EutilsOptions, fetchPubmedRecord, hasDocumentSummary, ncbiIntervalMs } from "./eutils.js";
import type { ValidationSource } from "./source.js";

const CROSSREF_API = "https://api.crossref.org/works";

export const DATABASE_CONFIDENCE = 0.9;

const crossrefWorkSchema = z.object({
  status: z.string(),
  message: z.object({ DOI: z.string() }),
});

export interface DatabaseSourceOptions extends EutilsOptions {
  /** Crossref "polite pool" contact address */
  crossrefMailto?: string;
  ncbiLimiter?: RateLimiter;
}

async function crossrefHasWork(
  doi: string,
  mailto: string | undefined,
  timeoutMs: number
): Promise<boolean> {
  let url = `${CROSSREF_API}/${encodeURIComponent(doi)}`;
  if (mailto) url += `?mailto=${encodeURIComponent(mailto)}`;

  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (response.status === 404) return false;
  if (!response.ok) {
    if (response.status === 429) {
      throw new Error("Crossref rate limit exceeded");
    }
    throw new Error(`Crossref API error: HTTP ${response.status} ${response.statusText}`);
  }

  const data = crossrefWorkSchema.parse(await response.json());
  return data.status === "ok" && data.message.DOI.toLowerCase() === doi;
}

export function createDatabaseSource(options: DatabaseSourceOptions = {}): ValidationSource {
  const ncbi = options.ncbiLimiter ?? new RateLimiter(ncbiIntervalMs(options));
  const timeoutMs = options.timeoutMs ?? 15_000;

  const lookups: Record<IdentifierType, (value: string) => Promise<boolean>> = {
    doi: (doi) => crossrefHasWork(doi, options.crossrefMailto, timeoutMs),
    pmid: (pmid) => ncbi.schedule(() => fetchPubmedRecord(pmid, options)),
    pmc: (pmcid) => ncbi.schedule(() => hasDocumentSummary("pmc", stripPmcPrefix(pmcid), options)),
  };

  return {
    name: "database",
    kind: "database",
    supports: () => true,
    async lookup(type, value) {
      return (await lookups[type](value)) ? DATABASE_CONFIDENCE : null;
    },
  };
}
