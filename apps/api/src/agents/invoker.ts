import type { LLMProvider } from "../llm/provider";
import { extractJsonObject, withRequiredKeys } from "../llm/json";
import { UNKNOWN, placeholderSources } from "../types/analysis";

export type InvokeOptions = {
  /** Extra attempts after the first one. */
  retries: number;
  /** Fixed pause between attempts; no backoff, no jitter. */
  retryDelayMs: number;
  temperature: number;
  maxTokens: number;
};

const DEFAULT_INVOKE_OPTIONS: InvokeOptions = {
  retries: 2,
  retryDelayMs: 1000,
  temperature: 0,
  maxTokens: 500
};

export interface PromptInvoker {
  invoke(prompt: string): Promise<string>;
}

function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Sends the prompt to the model and resolves to a JSON string with
 * conclusion / explanation / sources.
 *
 * Production rule: NEVER reject. Transport errors and unparseable replies are
 * retried the same way; once the attempts run out the result is a fallback
 * verdict whose explanation names the last error.
 */
export class ModelInvoker implements PromptInvoker {
  private llm: LLMProvider;
  private opts: InvokeOptions;

  constructor(llm: LLMProvider, opts: Partial<InvokeOptions> = {}) {
    this.llm = llm;
    this.opts = { ...DEFAULT_INVOKE_OPTIONS, ...opts };
  }

  async invoke(prompt: string): Promise<string> {
    const attempts = this.opts.retries + 1;
    let lastError = "";

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const { text } = await this.llm.chat({
          messages: [{ role: "user", content: prompt }],
          temperature: this.opts.temperature,
          maxTokens: this.opts.maxTokens
        });

        const parsed = extractJsonObject(text);
        if (parsed) return JSON.stringify(withRequiredKeys(parsed));
        lastError = "Model did not return JSON.";
      } catch (err) {
        lastError = errorMessage(err);
      }

      // eslint-disable-next-line no-console
      console.warn(`Model attempt ${attempt}/${attempts} failed: ${lastError}`);
      if (attempt < attempts) await sleep(this.opts.retryDelayMs);
    }

    return JSON.stringify({
      conclusion: UNKNOWN,
      explanation: `DeepSeek API call failed or model returned unparseable output: ${lastError}`,
      sources: placeholderSources()
    });
  }
}
