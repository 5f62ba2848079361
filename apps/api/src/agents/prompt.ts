import { PLACEHOLDER_SOURCE } from "../types/analysis";

export type PromptProfile = "general" | "pcos";

/**
 * The parts of the fact-check instruction that vary between deployments.
 */
export type PromptTemplate = {
  /** What the statement is about, as shown to the model. */
  subject: string;
  /** Example organizations the model may cite. */
  authorities: string[];
};

const TEMPLATES: Record<PromptProfile, PromptTemplate> = {
  general: {
    subject: "a **disease, symptom, treatment, or health claim**",
    authorities: ["WHO", "NIH", "CDC", "PubMed", "Mayo Clinic"]
  },
  pcos: {
    subject: "**polycystic ovary syndrome (PCOS)**: its causes, symptoms, diet, fertility, or treatment",
    authorities: ["WHO", "NIH", "ACOG", "Endocrine Society", "PubMed"]
  }
};

export function promptTemplate(profile: PromptProfile): PromptTemplate {
  return TEMPLATES[profile];
}

const EXAMPLE_REPLY = JSON.stringify(
  {
    conclusion: "accurate",
    explanation: "Short reason with clarification.",
    sources: [{ title: "Relevant Scientific Source", link: PLACEHOLDER_SOURCE.link }]
  },
  null,
  2
);

/**
 * The statement is interpolated as-is between triple quotes. It is not
 * escaped, so text that imitates instructions reaches the model unchanged.
 */
export function buildPrompt(userText: string, template: PromptTemplate = TEMPLATES.general): string {
  return [
    "You are a careful medical-information fact-checking assistant.",
    "",
    `A user will provide a short statement about ${template.subject}.`,
    "",
    "Your task:",
    "1) Judge whether the user's statement is **accurate**, **partially correct**, or **medical misinformation (rumor)**.",
    "2) Provide a short, clear explanation (1-3 sentences) to clarify the truth.",
    "3) Provide **authoritative reference links ONLY** from scientific papers or recognized medical organizations " +
      `(e.g., ${template.authorities.join(", ")}).`,
    "4) Reply in **STRICT JSON format** with keys: conclusion, explanation, sources (list of objects with title and link).",
    "",
    "User statement:",
    `"""${userText}"""`,
    "",
    "Respond strictly in JSON like:",
    EXAMPLE_REPLY,
    "",
    "IMPORTANT:",
    "- Output must be valid JSON only (no markdown or extra text).",
    "- Keys and values must use double quotes.",
    "- Do NOT include comments or trailing commas.",
    "- Do NOT wrap the JSON in code blocks."
  ].join("\n");
}
