export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatOptions = {
  messages: ChatMessage[];
  temperature?: number;

  /**
   * Upper bound on generated tokens, forwarded as the provider's `max_tokens`.
   */
  maxTokens?: number;
};

export interface LLMProvider {
  /**
   * Single non-streaming completion. Resolves to the trimmed assistant text,
   * or "" when the provider response carries no text.
   * Rejects on transport errors and non-2xx responses.
   */
  chat(opts: ChatOptions): Promise<{ text: string }>;
}
