/**
 * Single-attempt HTTP fetch for pages and documents.
 *
 * Failures come back as values; the extractors built on this never see an
 * exception from the transport. Retries are deliberately absent: a URL gets
 * one attempt per phase.
 */

import { errorMessage } from "../errors.js";

export interface FetchResourceOptions {
  userAgent: string;
  timeoutMs: number;
  /** Accepted base content types, e.g. ["text/html"] */
  acceptTypes: string[];
}

export type FetchOutcome<T> =
  | { kind: "ok"; body: T; contentType: string; finalUrl: string }
  | { kind: "fail"; error: string };

export const HTML_CONTENT_TYPES = ["text/html", "application/xhtml+xml"];

/** Content types accepted as valid PDF responses */
export const PDF_CONTENT_TYPES = [
  "application/pdf",
  "application/x-pdf",
  "application/octet-stream",
  "binary/octet-stream",
];

function baseContentType(contentType: string | null): string | null {
  if (!contentType) return null;
  return (contentType.split(";")[0] ?? "").trim().toLowerCase();
}

async function request<T>(
  url: string,
  options: FetchResourceOptions,
  read: (response: Response) => Promise<T>
): Promise<FetchOutcome<T>> {
  try {
    const response = await fetch(url, {
      headers: { "User-Agent": options.userAgent },
      redirect: "follow",
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      return { kind: "fail", error: `HTTP ${response.status} ${response.statusText}` };
    }

    const contentType = baseContentType(response.headers.get("content-type"));
    if (!contentType || !options.acceptTypes.includes(contentType)) {
      return { kind: "fail", error: `Unexpected Content-Type: ${contentType ?? "none"}` };
    }

    return {
      kind: "ok",
      body: await read(response),
      contentType,
      finalUrl: response.url || url,
    };
  } catch (err) {
    return { kind: "fail", error: errorMessage(err) };
  }
}

export function fetchText(url: string, options: FetchResourceOptions): Promise<FetchOutcome<string>> {
  return request(url, options, (response) => response.text());
}

export function fetchBytes(
  url: string,
  options: FetchResourceOptions
): Promise<FetchOutcome<Uint8Array>> {
  return request(url, options, async (response) => new Uint8Array(await response.arrayBuffer()));
}
