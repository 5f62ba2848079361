import { z } from "zod";
import type { ChatOptions, LLMProvider } from "./provider";

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish()
      })
    )
    .default([])
});

export type DeepSeekConfig = {
  apiKey: string;
  baseUrl: string;
  model: string;
};

/**
 * DeepSeek Chat Completions wrapper (OpenAI-compatible wire format).
 */
export class DeepSeekProvider implements LLMProvider {
  private apiKey: string;
  private baseUrl: string;
  private model: string;

  constructor(config: DeepSeekConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.model = config.model;
  }

  async chat(opts: ChatOptions): Promise<{ text: string }> {
    const res = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        model: this.model,
        messages: opts.messages,
        temperature: opts.temperature ?? 0,
        ...(opts.maxTokens != null ? { max_tokens: opts.maxTokens } : {})
      })
    });

    if (!res.ok) throw new Error(`DeepSeek chat failed (${res.status}): ${await res.text()}`);

    const data: unknown = await res.json();

    // A well-formed HTTP reply with an unexpected envelope counts as empty text.
    const parsed = CompletionSchema.safeParse(data);
    const text = parsed.success ? parsed.data.choices[0]?.message?.content ?? "" : "";
    return { text: text.trim() };
  }
}
