import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ChatOptions, LLMProvider } from "../llm/provider";
import { ModelInvoker } from "./invoker";

const PLACEHOLDER = { title: "Example Scientific Source", link: "https://www.ncbi.nlm.nih.gov/pmc/articles/" };

/** Replays the given replies in order; an Error is thrown instead of returned. */
function scriptedLLM(replies: Array<string | Error>) {
  const queue = [...replies];
  const chat = vi.fn(async (_opts: ChatOptions) => {
    const next = queue.shift() ?? "";
    if (next instanceof Error) throw next;
    return { text: next };
  });
  const llm: LLMProvider = { chat };
  return { llm, chat };
}

const VERDICT = '{"conclusion":"rumor","explanation":"Diet alone does not cause diabetes.","sources":[{"title":"NIH Diabetes","link":"https://www.niddk.nih.gov"}]}';

describe("ModelInvoker", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends one user message with deterministic decoding and a token cap", async () => {
    const { llm, chat } = scriptedLLM([VERDICT]);

    const out = await new ModelInvoker(llm, { retryDelayMs: 0 }).invoke("the prompt");

    expect(out).toBe(VERDICT);
    expect(chat).toHaveBeenCalledTimes(1);
    expect(chat).toHaveBeenCalledWith({
      messages: [{ role: "user", content: "the prompt" }],
      temperature: 0,
      maxTokens: 500
    });
  });

  it("extracts the object from text wrapped in a code fence", async () => {
    const { llm } = scriptedLLM(["```json\n" + VERDICT + "\n```"]);
    await expect(new ModelInvoker(llm, { retryDelayMs: 0 }).invoke("p")).resolves.toBe(VERDICT);
  });

  it("backfills missing keys and keeps extra ones", async () => {
    const { llm } = scriptedLLM(['{"conclusion":"rumor","confidence":0.9}']);

    const out = await new ModelInvoker(llm, { retryDelayMs: 0 }).invoke("p");

    expect(JSON.parse(out)).toEqual({
      conclusion: "rumor",
      confidence: 0.9,
      explanation: "unknown",
      sources: []
    });
  });

  it("retries unparseable replies and stops at the first good one", async () => {
    const { llm, chat } = scriptedLLM(["I think this is a rumor.", new Error("socket hang up"), VERDICT, VERDICT]);

    const out = await new ModelInvoker(llm, { retryDelayMs: 0 }).invoke("p");

    expect(out).toBe(VERDICT);
    expect(chat).toHaveBeenCalledTimes(3);
  });

  it("falls back after every attempt returns non-JSON", async () => {
    const { llm, chat } = scriptedLLM(["nope", "still nope", "{}"]);

    const out = await new ModelInvoker(llm, { retryDelayMs: 0 }).invoke("p");

    expect(chat).toHaveBeenCalledTimes(3);
    expect(JSON.parse(out)).toEqual({
      conclusion: "unknown",
      explanation: "DeepSeek API call failed or model returned unparseable output: Model did not return JSON.",
      sources: [PLACEHOLDER]
    });
  });

  it("names the last provider error in the fallback and never rejects", async () => {
    const { llm } = scriptedLLM([
      new Error("DeepSeek chat failed (503): busy"),
      new Error("fetch failed"),
      new Error("DeepSeek chat failed (401): bad key")
    ]);

    const out = await new ModelInvoker(llm, { retryDelayMs: 0 }).invoke("p");

    expect(JSON.parse(out)).toEqual({
      conclusion: "unknown",
      explanation: "DeepSeek API call failed or model returned unparseable output: DeepSeek chat failed (401): bad key",
      sources: [PLACEHOLDER]
    });
  });

  it("honours the retry budget", async () => {
    const { llm, chat } = scriptedLLM(["a", "b", "c", "d", "e"]);

    await new ModelInvoker(llm, { retries: 0, retryDelayMs: 0 }).invoke("p");
    expect(chat).toHaveBeenCalledTimes(1);

    chat.mockClear();
    await new ModelInvoker(llm, { retries: 3, retryDelayMs: 0 }).invoke("p");
    expect(chat).toHaveBeenCalledTimes(4);
  });

  it("waits the fixed delay between attempts but not after the last one", async () => {
    const timeoutSpy = vi.spyOn(globalThis, "setTimeout");
    const { llm } = scriptedLLM(["x", "y", "z"]);

    await new ModelInvoker(llm, { retryDelayMs: 7 }).invoke("p");

    const waits = timeoutSpy.mock.calls.filter(([, ms]) => ms === 7);
    expect(waits).toHaveLength(2);
  });

  it("does not wait when the first attempt succeeds", async () => {
    const timeoutSpy = vi.spyOn(globalThis, "setTimeout");
    const { llm } = scriptedLLM([VERDICT]);

    await new ModelInvoker(llm, { retryDelayMs: 7 }).invoke("p");

    expect(timeoutSpy.mock.calls.filter(([, ms]) => ms === 7)).toHaveLength(0);
  });
});
