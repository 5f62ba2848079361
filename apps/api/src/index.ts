import "dotenv/config";
import path from "node:path";
import { loadEnv } from "./services/env";
import { CsvRequestLog } from "./services/requestLog";
import { createLLM } from "./llm";
import { ModelInvoker } from "./agents/invoker";
import { promptTemplate } from "./agents/prompt";
import { createApp } from "./app";

const env = loadEnv();

const app = createApp({
  corsOrigin: env.CORS_ORIGIN,
  staticDir: env.STATIC_DIR ? path.resolve(env.STATIC_DIR) : path.resolve(__dirname, "../public"),
  template: promptTemplate(env.PROMPT_PROFILE),
  invoker: new ModelInvoker(createLLM(env), {
    retries: env.LLM_RETRIES,
    retryDelayMs: env.LLM_RETRY_DELAY_MS
  }),
  requestLog: new CsvRequestLog(path.resolve(env.LOGS_CSV))
});

app.listen(Number(env.PORT), () => {
  // eslint-disable-next-line no-console
  console.log(`API listening on http://localhost:${env.PORT} (model ${env.DEEPSEEK_MODEL}, prompt ${env.PROMPT_PROFILE})`);
});
