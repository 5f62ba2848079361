import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.string().default("5000"),
  CORS_ORIGIN: z.string().default("http://localhost:5000"),

  DEEPSEEK_API_KEY: z
    .string({ required_error: "DEEPSEEK_API_KEY is not set." })
    .min(1, "DEEPSEEK_API_KEY is not set."),
  DEEPSEEK_BASE_URL: z.string().url().default("https://api.deepseek.com"),
  DEEPSEEK_MODEL: z.string().default("deepseek-chat"),

  PROMPT_PROFILE: z.enum(["general", "pcos"]).default("general"),

  LLM_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  LOGS_CSV: z.string().default("logs.csv"),
  STATIC_DIR: z.string().optional()
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Reads configuration once at startup. Throws (and so aborts the process) when
 * a variable is missing or malformed.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment: ${issues.join("; ")}`);
  }
  return parsed.data;
}
