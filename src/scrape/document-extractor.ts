/**
 * Phase 2b: identifiers from a linked PDF.
 *
 * The opening pages are searched for identifier patterns first. Only when
 * that finds nothing is the text handed to a reasoning provider, whose answer
 * is parsed back into identifiers at a lower confidence.
 */

import type { IdentifierConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { parseHttpUrl } from "../extract/url-extractor.js";
import { createIdentifier, findIdentifiersInText, firstOfEachType } from "../identifiers.js";
import { createChildLogger } from "../logger.js";
import { RateLimiter } from "../rate-limiter.js";
import { buildIdentifierPrompt, parseIdentifierAnswer } from "../reasoning/prompt.js";
import type { TextReasoner } from "../reasoning/types.js";
import type { AcademicIdentifier, UrlExtractor } from "../types.js";
import { PDF_CONTENT_TYPES, fetchBytes } from "./fetch.js";
import { type PdfText, type PdfTextOptions, extractPdfText } from "./pdf-text.js";

const log = createChildLogger({ component: "document-extractor" });

export const PDF_TEXT_CONFIDENCE = 0.8;
export const PDF_REASONING_CONFIDENCE = 0.6;

/**
 * Classify a URL as a direct PDF link: a `.pdf` path, a `pdf`/`epdf` path
 * segment, or a `format=pdf` / `type=pdf` query parameter.
 */
export function isPdfUrl(url: string): boolean {
  const parsed = parseHttpUrl(url.trim());
  if (!parsed) return /\.pdf(?:$|[?#])/i.test(url.trim());

  const path = parsed.pathname.toLowerCase();
  if (path.endsWith(".pdf")) return true;
  if (path.split("/").some((segment) => segment === "pdf" || segment === "epdf")) return true;

  for (const key of ["format", "type"]) {
    if (parsed.searchParams.get(key)?.toLowerCase() === "pdf") return true;
  }
  return false;
}

/** Routing predicate for Phase 2: documents go to the document extractor, everything else to the page scraper. */
export const isDocumentUrl = isPdfUrl;

export interface DocumentExtractorOptions {
  config: Pick<
    IdentifierConfig,
    "userAgent" | "fetchTimeoutMs" | "documentRateLimitMs" | "pdfScanPages" | "reasoningMaxChars"
  >;
  /** Fallback for documents whose text has no identifier pattern; omit to skip that step */
  reasoner?: TextReasoner;
  rateLimiter?: RateLimiter;
  /** Text extraction backend; defaults to pdfjs-dist */
  extractText?: (data: Uint8Array, options: PdfTextOptions) => Promise<PdfText>;
}

type Attempt =
  | { kind: "found"; identifiers: AcademicIdentifier[] }
  | { kind: "empty"; reason: string };

export function createDocumentExtractor(options: DocumentExtractorOptions): UrlExtractor {
  const { config, reasoner } = options;
  const limiter = options.rateLimiter ?? new RateLimiter(config.documentRateLimitMs);
  const extractText = options.extractText ?? extractPdfText;

  async function readText(url: string): Promise<{ text: string } | { error: string }> {
    const outcome = await limiter.schedule(() =>
      fetchBytes(url, {
        userAgent: config.userAgent,
        timeoutMs: config.fetchTimeoutMs,
        acceptTypes: PDF_CONTENT_TYPES,
      })
    );
    if (outcome.kind === "fail") return { error: outcome.error };

    try {
      const pdf = await extractText(outcome.body, { maxPages: config.pdfScanPages });
      return { text: pdf.pages.join("\n\n") };
    } catch (err) {
      return { error: `PDF parse failed: ${errorMessage(err)}` };
    }
  }

  async function askReasoner(url: string, text: string): Promise<Attempt> {
    if (!reasoner) return { kind: "empty", reason: "no identifier pattern in text" };
    try {
      const answer = await reasoner.query(buildIdentifierPrompt(text, config.reasoningMaxChars));
      const candidates = parseIdentifierAnswer(answer);
      if (candidates.length === 0) {
        return { kind: "empty", reason: `${reasoner.name} found no identifier` };
      }
      return {
        kind: "found",
        identifiers: candidates.map((c) =>
          createIdentifier(c, url, PDF_REASONING_CONFIDENCE, "pdf-reasoning")
        ),
      };
    } catch (err) {
      return { kind: "empty", reason: `${reasoner.name} failed: ${errorMessage(err)}` };
    }
  }

  async function attempt(url: string): Promise<Attempt> {
    const read = await readText(url);
    if ("error" in read) return { kind: "empty", reason: read.error };
    if (read.text.trim() === "") return { kind: "empty", reason: "PDF has no extractable text" };

    const candidates = firstOfEachType(findIdentifiersInText(read.text));
    if (candidates.length > 0) {
      return {
        kind: "found",
        identifiers: candidates.map((c) => createIdentifier(c, url, PDF_TEXT_CONFIDENCE, "pdf-text")),
      };
    }
    return askReasoner(url, read.text);
  }

  return {
    name: "document-extractor",
    async extractFromUrl(url: string): Promise<AcademicIdentifier[]> {
      const result = await attempt(url);
      if (result.kind === "empty") {
        log.debug({ url, reason: result.reason }, "No identifiers from document");
        return [];
      }
      log.debug({ url, found: result.identifiers.length }, "Document extracted");
      return result.identifiers;
    },
  };
}
