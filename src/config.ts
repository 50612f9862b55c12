/**
 * Centralized configuration.
 *
 * All values can be tuned through environment variables; loadConfig() takes
 * the environment as a parameter so callers and tests can pass their own.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

const DEFAULT_USER_AGENT = "academic-identifiers/0.1.0 (+https://www.npmjs.com/package/academic-identifiers)";

/** Treat empty strings as unset so `FOO=` in a .env file falls back to the default. */
function optionalString() {
  return z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));
}

function intervalMs(defaultValue: number) {
  return z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : value),
    z.coerce.number().int().nonnegative().default(defaultValue)
  );
}

function positiveInt(defaultValue: number) {
  return z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : value),
    z.coerce.number().int().positive().default(defaultValue)
  );
}

const envSchema = z.object({
  IDENTIFIERS_USER_AGENT: optionalString(),
  FETCH_TIMEOUT_MS: positiveInt(15_000),
  PAGE_RATE_LIMIT_MS: intervalMs(1_000),
  DOCUMENT_RATE_LIMIT_MS: intervalMs(2_000),
  PDF_SCAN_PAGES: positiveInt(2),
  REASONING_MAX_CHARS: positiveInt(4_000),
  NCBI_API_KEY: optionalString(),
  NCBI_EMAIL: optionalString(),
  NCBI_TOOL: optionalString(),
  CROSSREF_MAILTO: optionalString(),
  LLM_PROVIDER: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.enum(["openai", "anthropic"]).optional()
  ),
  OPENAI_API_KEY: optionalString(),
  OPENAI_MODEL: optionalString(),
  ANTHROPIC_API_KEY: optionalString(),
  ANTHROPIC_MODEL: optionalString(),
});

export type LlmProvider = "openai" | "anthropic";

export interface IdentifierConfig {
  userAgent: string;
  /** Per-request timeout for page, document and validation fetches */
  fetchTimeoutMs: number;
  /** Minimum interval between page fetches (0 disables) */
  pageRateLimitMs: number;
  /** Minimum interval between document fetches (0 disables) */
  documentRateLimitMs: number;
  /** Number of leading PDF pages searched for the article's own identifiers */
  pdfScanPages: number;
  /** Characters of document text handed to the reasoning provider */
  reasoningMaxChars: number;

  // External services
  ncbiApiKey?: string;
  ncbiEmail?: string;
  ncbiTool: string;
  crossrefMailto?: string;

  // Text reasoning
  llmProvider?: LlmProvider;
  openaiApiKey?: string;
  openaiModel: string;
  anthropicApiKey?: string;
  anthropicModel: string;
}

/**
 * Parse configuration from an environment map.
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IdentifierConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const config: IdentifierConfig = {
    userAgent: values.IDENTIFIERS_USER_AGENT ?? DEFAULT_USER_AGENT,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    pageRateLimitMs: values.PAGE_RATE_LIMIT_MS,
    documentRateLimitMs: values.DOCUMENT_RATE_LIMIT_MS,
    pdfScanPages: values.PDF_SCAN_PAGES,
    reasoningMaxChars: values.REASONING_MAX_CHARS,
    ncbiTool: values.NCBI_TOOL ?? "academic-identifiers",
    openaiModel: values.OPENAI_MODEL ?? "gpt-4o-mini",
    anthropicModel: values.ANTHROPIC_MODEL ?? "claude-3-5-haiku-latest",
  };
  if (values.NCBI_API_KEY) config.ncbiApiKey = values.NCBI_API_KEY;
  if (values.NCBI_EMAIL) config.ncbiEmail = values.NCBI_EMAIL;
  if (values.CROSSREF_MAILTO) config.crossrefMailto = values.CROSSREF_MAILTO;
  if (values.LLM_PROVIDER) config.llmProvider = values.LLM_PROVIDER;
  if (values.OPENAI_API_KEY) config.openaiApiKey = values.OPENAI_API_KEY;
  if (values.ANTHROPIC_API_KEY) config.anthropicApiKey = values.ANTHROPIC_API_KEY;

  return config;
}
