/**
 * Phase 2 sweep over the URLs Phase 1 could not resolve.
 *
 * The failed list is snapshotted before any attempt starts and the builder is
 * only touched once every attempt has finished, so concurrent workers never
 * observe a half-updated result.
 */

import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { Phase2Outcome } from "../result.js";
import { isDocumentUrl } from "../scrape/document-extractor.js";
import type { UrlExtractor } from "../types.js";

const log = createChildLogger({ component: "phase2" });

export interface Phase2Extractors {
  pageScraper: UrlExtractor;
  documentExtractor: UrlExtractor;
}

export interface Phase2Options {
  /** Number of URLs attempted at once. Default: 1 */
  concurrency?: number;
  onProgress?: (progress: { completed: number; total: number; url: string }) => void;
}

/** Route one URL to its extractor and turn the attempt into an outcome. */
export async function attemptUrl(url: string, extractors: Phase2Extractors): Promise<Phase2Outcome> {
  const extractor = isDocumentUrl(url) ? extractors.documentExtractor : extractors.pageScraper;
  try {
    const identifiers = await extractor.extractFromUrl(url);
    if (identifiers.length === 0) {
      return { url, status: "failed", reason: `${extractor.name} found no identifier` };
    }
    return { url, status: "recovered", identifiers };
  } catch (err) {
    log.warn({ url, extractor: extractor.name, err }, "Extractor threw");
    return { url, status: "failed", reason: `${extractor.name} failed: ${errorMessage(err)}` };
  }
}

/**
 * Attempt every URL with a bounded worker pool.
 * @returns Outcomes in the order of `urls`
 */
export async function runPhase2(
  urls: readonly string[],
  extractors: Phase2Extractors,
  options?: Phase2Options
): Promise<Phase2Outcome[]> {
  const concurrency = Math.max(1, Math.floor(options?.concurrency ?? 1));
  const outcomes: Phase2Outcome[] = new Array(urls.length);
  let nextIndex = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (nextIndex < urls.length) {
      const index = nextIndex++;
      const url = urls[index];
      if (url === undefined) continue;

      outcomes[index] = await attemptUrl(url, extractors);
      completed++;
      options?.onProgress?.({ completed, total: urls.length, url });
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, urls.length) }, () => worker());
  await Promise.all(workers);

  return outcomes;
}
