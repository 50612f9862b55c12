/**
 * Contract shared by validation sources.
 */

import { errorMessage } from "../errors.js";
import type { IdentifierType } from "../types.js";

/** Result of asking one source about one identifier */
export type SourceCheck =
  | { source: string; status: "confirmed"; confidence: number }
  | { source: string; status: "not-found" }
  | { source: string; status: "error"; error: string };

/**
 * "registry" sources answer from the body that issues the identifier
 * (doi.org handles, NCBI); "database" sources from bibliographic records
 * (Crossref, PubMed).
 */
export type SourceKind = "registry" | "database";

export interface ValidationSource {
  readonly name: string;
  readonly kind: SourceKind;
  supports(type: IdentifierType): boolean;
  /**
   * Look an identifier up. Resolves to the confidence of a confirmation, or
   * null when the service answered that the identifier does not exist.
   * @throws On transport or service errors
   */
  lookup(type: IdentifierType, value: string): Promise<number | null>;
}

/** Run one lookup, turning every outcome into a SourceCheck. */
export async function runSourceCheck(
  source: ValidationSource,
  type: IdentifierType,
  value: string
): Promise<SourceCheck> {
  try {
    const confidence = await source.lookup(type, value);
    if (confidence === null) return { source: source.name, status: "not-found" };
    return { source: source.name, status: "confirmed", confidence };
  } catch (err) {
    return { source: source.name, status: "error", error: errorMessage(err) };
  }
}
