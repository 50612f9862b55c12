/**
 * Reasoning provider selection.
 */

import type { IdentifierConfig, LlmProvider } from "../config.js";
import { ReasonerConfigError } from "../errors.js";
import { createAnthropicReasoner } from "./anthropic.js";
import { createOpenAIReasoner } from "./openai.js";
import type { TextReasoner } from "./types.js";

export type { TextReasoner } from "./types.js";
export { createOpenAIReasoner } from "./openai.js";
export type { OpenAIReasonerOptions } from "./openai.js";
export { createAnthropicReasoner } from "./anthropic.js";
export type { AnthropicReasonerOptions } from "./anthropic.js";
export { buildIdentifierPrompt, parseIdentifierAnswer } from "./prompt.js";

type ReasonerSettings = Pick<
  IdentifierConfig,
  "llmProvider" | "openaiApiKey" | "openaiModel" | "anthropicApiKey" | "anthropicModel"
>;

function build(provider: LlmProvider, config: ReasonerSettings): TextReasoner | undefined {
  if (provider === "openai") {
    if (!config.openaiApiKey) return undefined;
    return createOpenAIReasoner({ apiKey: config.openaiApiKey, model: config.openaiModel });
  }
  if (!config.anthropicApiKey) return undefined;
  return createAnthropicReasoner({ apiKey: config.anthropicApiKey, model: config.anthropicModel });
}

/**
 * Create the configured reasoner.
 *
 * With a provider named (argument or LLM_PROVIDER) its API key is required.
 * Otherwise the first provider with a key wins, OpenAI before Anthropic, and
 * no key at all means no reasoner.
 *
 * @throws ReasonerConfigError when the named provider has no API key
 */
export function createReasonerFromConfig(
  config: ReasonerSettings,
  provider: LlmProvider | undefined = config.llmProvider
): TextReasoner | undefined {
  if (provider) {
    const reasoner = build(provider, config);
    if (!reasoner) {
      throw new ReasonerConfigError(`No API key configured for reasoning provider "${provider}"`);
    }
    return reasoner;
  }
  return build("openai", config) ?? build("anthropic", config);
}
