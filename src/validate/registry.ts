/**
 * Registry validation: asks the bodies that issue each identifier.
 *
 * DOI:  https://doi.org/api/handles/{doi}  (responseCode 1 = handle exists)
 * PMID: NCBI esummary (db=pubmed)
 * PMC:  NCBI ID Converter
 */

import { z } from "zod";
import { RateLimiter } from "../rate-limiter.js";
import type { IdentifierType } from "../types.js";
import { type EutilsOptions, hasDocumentSummary, ncbiIntervalMs } from "./eutils.js";
import { lookupIdRecord } from "./ncbi-id-converter.js";
import type { ValidationSource } from "./source.js";

const DOI_HANDLE_API = "https://doi.org/api/handles";

export const REGISTRY_CONFIDENCE = 0.95;

const handleResponseSchema = z.object({
  responseCode: z.number(),
  handle: z.string().optional(),
});

export interface RegistrySourceOptions extends EutilsOptions {
  /** Limiter for NCBI requests; share it with other NCBI-backed sources */
  ncbiLimiter?: RateLimiter;
}

async function doiHandleExists(doi: string, timeoutMs: number): Promise<boolean> {
  const path = doi.split("/").map(encodeURIComponent).join("/");
  const response = await fetch(`${DOI_HANDLE_API}/${path}`, {
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (response.status === 404) return false;
  if (!response.ok) {
    throw new Error(`DOI handle API error: HTTP ${response.status} ${response.statusText}`);
  }
  const data = handleResponseSchema.parse(await response.json());
  return data.responseCode === 1;
}

export function createRegistrySource(options: RegistrySourceOptions = {}): ValidationSource {
  const ncbi = options.ncbiLimiter ?? new RateLimiter(ncbiIntervalMs(options));
  const timeoutMs = options.timeoutMs ?? 15_000;

  const lookups: Record<IdentifierType, (value: string) => Promise<boolean>> = {
    doi: (doi) => doiHandleExists(doi, timeoutMs),
    pmid: (pmid) => ncbi.schedule(() => hasDocumentSummary("pubmed", pmid, options)),
    pmc: async (pmcid) => {
      const record = await ncbi.schedule(() => lookupIdRecord(pmcid, options));
      return record?.pmcid?.toUpperCase() === pmcid;
    },
  };

  return {
    name: "registry",
    kind: "registry",
    supports: () => true,
    async lookup(type, value) {
      return (await lookups[type](value)) ? REGISTRY_CONFIDENCE : null;
    },
  };
}
