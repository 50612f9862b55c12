/**
 * PDF text extraction using pdfjs-dist.
 */

import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";

type PdfJs = typeof import("pdfjs-dist/legacy/build/pdf.mjs");

let pdfjs: Promise<PdfJs> | undefined;

/** Load pdfjs-dist on first use and point it at its bundled worker. */
function loadPdfJs(): Promise<PdfJs> {
  pdfjs ??= import("pdfjs-dist/legacy/build/pdf.mjs").then((lib) => {
    const require = createRequire(import.meta.url);
    lib.GlobalWorkerOptions.workerSrc = pathToFileURL(
      require.resolve("pdfjs-dist/legacy/build/pdf.worker.mjs")
    ).href;
    return lib;
  });
  return pdfjs;
}

export interface PdfText {
  /** Text of each extracted page, in page order */
  pages: string[];
  totalPages: number;
}

export interface PdfTextOptions {
  /** Stop after this many pages */
  maxPages?: number;
}

/**
 * Extract text from PDF bytes, preserving line structure.
 *
 * Text items are grouped by their rounded Y position so a DOI printed in a
 * page header comes out as one line rather than interleaved with columns.
 */
export async function extractPdfText(data: Uint8Array, options: PdfTextOptions = {}): Promise<PdfText> {
  const { getDocument } = await loadPdfJs();
  const pdf = await getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: false,
    // Standard fonts are not bundled; text extraction does not need them
    verbosity: 0,
  }).promise;

  try {
    const lastPage = Math.min(pdf.numPages, options.maxPages ?? pdf.numPages);
    const pages: string[] = [];

    for (let pageNum = 1; pageNum <= lastPage; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();
      for (const item of textContent.items) {
        if (!("str" in item) || item.str.trim() === "") continue;
        const y = Math.round(Number(item.transform[5]));
        const x = Math.round(Number(item.transform[4]));
        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // Top of the page first
      const lines = [...itemsByY.entries()]
        .sort(([a], [b]) => b - a)
        .map(([, items]) =>
          items
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str)
            .join(" ")
            .trim()
        )
        .filter((line) => line.length > 0);

      pages.push(lines.join("\n"));
    }

    return { pages, totalPages: pdf.numPages };
  } finally {
    await pdf.destroy();
  }
}
