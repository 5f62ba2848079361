import { describe, expect, it } from "vitest";
import { loadEnv } from "./env";

describe("loadEnv", () => {
  it("applies defaults around the required key", () => {
    expect(loadEnv({ DEEPSEEK_API_KEY: "test-secret" })).toEqual({
      PORT: "5000",
      CORS_ORIGIN: "http://localhost:5000",
      DEEPSEEK_API_KEY: "test-secret",
      DEEPSEEK_BASE_URL: "https://api.deepseek.com",
      DEEPSEEK_MODEL: "deepseek-chat",
      PROMPT_PROFILE: "general",
      LLM_RETRIES: 2,
      LLM_RETRY_DELAY_MS: 1000,
      LOGS_CSV: "logs.csv"
    });
  });

  it("aborts when the API key is missing or empty", () => {
    expect(() => loadEnv({})).toThrow("DEEPSEEK_API_KEY is not set.");
    expect(() => loadEnv({ DEEPSEEK_API_KEY: "" })).toThrow("DEEPSEEK_API_KEY is not set.");
  });

  it("coerces numeric settings", () => {
    const env = loadEnv({ DEEPSEEK_API_KEY: "test-secret", LLM_RETRIES: "4", LLM_RETRY_DELAY_MS: "250" });
    expect(env.LLM_RETRIES).toBe(4);
    expect(env.LLM_RETRY_DELAY_MS).toBe(250);
  });

  it("rejects unknown prompt profiles and negative retries", () => {
    expect(() => loadEnv({ DEEPSEEK_API_KEY: "test-secret", PROMPT_PROFILE: "dental" })).toThrow(/PROMPT_PROFILE/);
    expect(() => loadEnv({ DEEPSEEK_API_KEY: "test-secret", LLM_RETRIES: "-1" })).toThrow(/LLM_RETRIES/);
  });
});
