/**
 * Text reasoning through the OpenAI chat completions API.
 */

import OpenAI from "openai";
import type { TextReasoner } from "./types.js";

export interface OpenAIReasonerOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  /** Prebuilt client; when given, apiKey and timeoutMs are not used */
  client?: OpenAI;
}

export function createOpenAIReasoner(options: OpenAIReasonerOptions): TextReasoner {
  const client =
    options.client ?? new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs ?? 60_000 });

  return {
    name: "openai",
    async query(prompt: string): Promise<string> {
      const completion = await client.chat.completions.create({
        model: options.model,
        messages: [{ role: "user", content: prompt }],
        temperature: 0,
        max_tokens: 200,
      });
      return completion.choices[0]?.message.content ?? "";
    },
  };
}
