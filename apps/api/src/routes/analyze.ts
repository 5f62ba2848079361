import type { Request, Response } from "express";
import { z } from "zod";
import { createId } from "@paralleldrive/cuid2";
import { buildPrompt } from "../agents/prompt";
import type { PromptTemplate } from "../agents/prompt";
import type { PromptInvoker } from "../agents/invoker";
import { normalizeModelOutput } from "../agents/normalizer";
import type { RequestLog } from "../services/requestLog";

const AnalyzeReqSchema = z.object({
  text: z.string().default("")
});

export type AnalyzeDeps = {
  invoker: PromptInvoker;
  requestLog: RequestLog;
  template: PromptTemplate;
  now?: () => Date;
};

/**
 * POST /analyze
 * Statement in, verdict out. Model failures degrade to an "unknown" verdict;
 * only bad input (400) and log write failures (500 via the error middleware)
 * fail the request.
 */
export function analyzeHandler(deps: AnalyzeDeps) {
  const now = deps.now ?? (() => new Date());

  return async (req: Request, res: Response) => {
    const body = AnalyzeReqSchema.safeParse(req.body ?? {});
    const userText = body.success ? body.data.text.trim() : "";

    if (!userText) {
      res.status(400).json({ error: "No text provided." });
      return;
    }

    const requestId = createId();
    const prompt = buildPrompt(userText, deps.template);

    let modelText: string;
    try {
      modelText = await deps.invoker.invoke(prompt);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      // eslint-disable-next-line no-console
      console.error(`[analyze ${requestId}] model call escaped: ${message}`);
      res.status(500).json({ error: `DeepSeek API failed: ${message}` });
      return;
    }

    const result = normalizeModelOutput(modelText);

    await deps.requestLog.append({
      timestamp: now().toISOString(),
      user_text: userText,
      result: JSON.stringify(result)
    });

    // eslint-disable-next-line no-console
    console.log(`[analyze ${requestId}] conclusion=${result.conclusion} sources=${result.sources.length}`);
    res.status(200).json(result);
  };
}
