export type Source = {
  title: string;
  link: string;
};

export type AnalysisResult = {
  conclusion: string;
  explanation: string;
  sources: Source[];
  raw_model_output: string;
};

/**
 * One row of the request log. `result` holds the JSON-encoded AnalysisResult.
 */
export type LogEntry = {
  timestamp: string;
  user_text: string;
  result: string;
};

export const UNKNOWN = "unknown";

export const PLACEHOLDER_SOURCE: Readonly<Source> = {
  title: "Example Scientific Source",
  link: "https://www.ncbi.nlm.nih.gov/pmc/articles/"
};

export function placeholderSources(): Source[] {
  return [{ ...PLACEHOLDER_SOURCE }];
}
