/**
 * A text-reasoning capability: takes a prompt, returns free text.
 */
export interface TextReasoner {
  readonly name: string;
  query(prompt: string): Promise<string>;
}
