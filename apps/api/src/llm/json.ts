import { UNKNOWN } from "../types/analysis";

export type JsonObject = Record<string, unknown>;

const REQUIRED_KEYS = ["conclusion", "explanation", "sources"] as const;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pulls a JSON object out of free model text: parses the span from the first
 * "{" to the last "}". Prose and code fences around the object are ignored.
 *
 * Returns null when there is no such span, it does not parse, or it parses to
 * an empty object.
 */
export function extractJsonObject(text: string): JsonObject | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }

  if (!isJsonObject(parsed) || Object.keys(parsed).length === 0) return null;
  return parsed;
}

/**
 * Adds the verdict keys the model left out. Keys that are present, even with a
 * null value, are kept as they are.
 */
export function withRequiredKeys(obj: JsonObject): JsonObject {
  const out: JsonObject = { ...obj };
  for (const key of REQUIRED_KEYS) {
    if (!Object.hasOwn(out, key)) out[key] = key === "sources" ? [] : UNKNOWN;
  }
  return out;
}
