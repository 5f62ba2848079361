import type { Env } from "../services/env";
import type { LLMProvider } from "./provider";
import { DeepSeekProvider } from "./deepseek";

export function createLLM(env: Env): LLMProvider {
  return new DeepSeekProvider({
    apiKey: env.DEEPSEEK_API_KEY,
    baseUrl: env.DEEPSEEK_BASE_URL,
    model: env.DEEPSEEK_MODEL
  });
}
