/**
 * Text reasoning through the Anthropic messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { TextReasoner } from "./types.js";

export interface AnthropicReasonerOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  /** Prebuilt client; when given, apiKey and timeoutMs are not used */
  client?: Anthropic;
}

export function createAnthropicReasoner(options: AnthropicReasonerOptions): TextReasoner {
  const client =
    options.client ??
    new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs ?? 60_000, maxRetries: 2 });

  return {
    name: "anthropic",
    async query(prompt: string): Promise<string> {
      const message = await client.messages.create({
        model: options.model,
        max_tokens: 200,
        temperature: 0,
        messages: [{ role: "user", content: prompt }],
      });
      return message.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("")
        .trim();
    },
  };
}
