import { z } from "zod";
import { extractJsonObject } from "../llm/json";
import type { JsonObject } from "../llm/json";
import { UNKNOWN, placeholderSources } from "../types/analysis";
import type { AnalysisResult, Source } from "../types/analysis";

const SourceItemSchema = z.object({
  title: z.string().catch(""),
  link: z.string().catch("")
});

function unparseableFallback(): JsonObject {
  return {
    conclusion: UNKNOWN,
    explanation: "Model returned an unparseable result.",
    sources: placeholderSources()
  };
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value == null) return UNKNOWN;
  return JSON.stringify(value);
}

function asSources(value: unknown): Source[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((item) => {
    const r = SourceItemSchema.safeParse(item);
    if (!r.success || (!r.data.title && !r.data.link)) return [];
    return [r.data];
  });
}

/**
 * Turns the invoker's JSON string into the response shape.
 * Parses again with the same brace heuristic, so it also copes with input that
 * did not come through ModelInvoker. `sources` always ends up non-empty.
 */
export function normalizeModelOutput(modelText: string): AnalysisResult {
  const parsed = extractJsonObject(modelText) ?? unparseableFallback();
  const sources = asSources(parsed.sources);

  return {
    conclusion: asText(parsed.conclusion),
    explanation: asText(parsed.explanation),
    sources: sources.length > 0 ? sources : placeholderSources(),
    raw_model_output: modelText
  };
}
