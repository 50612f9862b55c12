/**
 * NCBI E-utilities client.
 *
 * esummary: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi?db={db}&id={id}&retmode=json
 * efetch:   https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=pubmed&id={pmid}&retmode=xml
 * Rate limit: 3 req/sec without an API key, 10 req/sec with one
 */

import { XMLParser } from "fast-xml-parser";
import { z } from "zod";

const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

export interface EutilsOptions {
  apiKey?: string;
  tool?: string;
  email?: string;
  timeoutMs?: number;
}

/** Minimum spacing between NCBI requests for the given options */
export function ncbiIntervalMs(options?: EutilsOptions): number {
  return options?.apiKey ? 100 : 340;
}

function buildUrl(endpoint: string, params: Record<string, string>, options?: EutilsOptions): string {
  const search = new URLSearchParams(params);
  if (options?.apiKey) search.set("api_key", options.apiKey);
  if (options?.tool) search.set("tool", options.tool);
  if (options?.email) search.set("email", options.email);
  return `${EUTILS_BASE}/${endpoint}?${search.toString()}`;
}

async function get(url: string, options?: EutilsOptions): Promise<Response> {
  const response = await fetch(url, {
    signal: AbortSignal.timeout(options?.timeoutMs ?? 15_000),
  });
  if (!response.ok) {
    throw new Error(`E-utilities error: HTTP ${response.status} ${response.statusText}`);
  }
  return response;
}

// ---------------------------------------------------------------------------
// esummary
// ---------------------------------------------------------------------------

const esummaryResponseSchema = z.object({
  result: z.record(z.unknown()).optional(),
  error: z.string().optional(),
});

const summaryRecordSchema = z.object({
  uid: z.coerce.string(),
  error: z.string().optional(),
});

/**
 * Check whether a database has a document summary for an id.
 * @param db - "pubmed" or "pmc" (for pmc, the numeric id without the PMC prefix)
 */
export async function hasDocumentSummary(
  db: "pubmed" | "pmc",
  id: string,
  options?: EutilsOptions
): Promise<boolean> {
  const url = buildUrl("esummary.fcgi", { db, id, retmode: "json" }, options);
  const data = esummaryResponseSchema.parse(await (await get(url, options)).json());

  if (!data.result) return false;
  const record = summaryRecordSchema.safeParse(data.result[id]);
  return record.success && !record.data.error && record.data.uid === id;
}

// ---------------------------------------------------------------------------
// efetch (PubMed XML)
// ---------------------------------------------------------------------------

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (name) => name === "PubmedArticle",
});

const pmidSchema = z.union([z.string(), z.object({ "#text": z.string() })]);

const pubmedArticleSetSchema = z.object({
  PubmedArticleSet: z.union([
    z.literal(""),
    z.object({
      PubmedArticle: z
        .array(z.object({ MedlineCitation: z.object({ PMID: pmidSchema }) }))
        .optional(),
    }),
  ]),
});

/** Extract the PMIDs of every article in a PubMed efetch XML document. */
export function parsePubmedArticlePmids(xml: string): string[] {
  const parsed = pubmedArticleSetSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new Error("Unexpected PubMed efetch response");
  }
  const set = parsed.data.PubmedArticleSet;
  if (set === "" || !set.PubmedArticle) return [];

  return set.PubmedArticle.map(({ MedlineCitation }) => {
    const pmid = MedlineCitation.PMID;
    return (typeof pmid === "string" ? pmid : pmid["#text"]).trim();
  });
}

/**
 * Fetch the PubMed record for a PMID.
 * @returns true when PubMed returned an article whose PMID matches
 */
export async function fetchPubmedRecord(pmid: string, options?: EutilsOptions): Promise<boolean> {
  const url = buildUrl("efetch.fcgi", { db: "pubmed", id: pmid, retmode: "xml" }, options);
  const xml = await (await get(url, options)).text();
  if (xml.trim() === "") return false;
  return parsePubmedArticlePmids(xml).includes(pmid);
}
