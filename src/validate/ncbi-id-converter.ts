/**
 * NCBI ID Converter API client.
 * Looks up the PMC / PMID / DOI cross-reference record for an identifier.
 *
 * API: https://www.ncbi.nlm.nih.gov/pmc/utils/idconv/v1.0/?ids={id}&format=json
 */

import { z } from "zod";

const IDCONV_BASE_URL = "https://www.ncbi.nlm.nih.gov/pmc/utils/idconv/v1.0/";

export interface IdConversionResult {
  pmcid?: string;
  pmid?: string;
  doi?: string;
}

export interface IdConverterOptions {
  tool?: string;
  email?: string;
  apiKey?: string;
  timeoutMs?: number;
}

const idConvResponseSchema = z.object({
  status: z.string().optional(),
  records: z
    .array(
      z.object({
        pmcid: z.string().optional(),
        pmid: z.coerce.string().optional(),
        doi: z.string().optional(),
        errmsg: z.string().optional(),
      })
    )
    .optional(),
});

type IdConvRecord = NonNullable<z.infer<typeof idConvResponseSchema>["records"]>[number];

function buildUrl(ids: string[], options?: IdConverterOptions): string {
  const params = new URLSearchParams({
    ids: ids.join(","),
    format: "json",
  });
  if (options?.tool) params.set("tool", options.tool);
  if (options?.email) params.set("email", options.email);
  if (options?.apiKey) params.set("api_key", options.apiKey);
  return `${IDCONV_BASE_URL}?${params.toString()}`;
}

function parseRecord(record: IdConvRecord): IdConversionResult | null {
  if (record.errmsg) return null;
  const result: IdConversionResult = {};
  if (record.pmcid) result.pmcid = record.pmcid;
  if (record.pmid) result.pmid = record.pmid;
  if (record.doi) result.doi = record.doi;
  return Object.keys(result).length > 0 ? result : null;
}

/**
 * Look up the cross-reference record for a DOI, PMID or PMCID.
 *
 * @returns The record, or null if NCBI has none for this identifier
 * @throws On HTTP errors other than 404, or an unexpected response body
 */
export async function lookupIdRecord(
  id: string,
  options?: IdConverterOptions
): Promise<IdConversionResult | null> {
  if (!id) return null;

  const url = buildUrl([id], options);
  const response = await fetch(url, {
    signal: AbortSignal.timeout(options?.timeoutMs ?? 15_000),
  });

  if (!response.ok) {
    if (response.status === 404) return null;
    throw new Error(`NCBI ID Converter API error: HTTP ${response.status} ${response.statusText}`);
  }

  const data = idConvResponseSchema.parse(await response.json());
  const record = data.records?.[0];
  if (!record) return null;

  return parseRecord(record);
}
