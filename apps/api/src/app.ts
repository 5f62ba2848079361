import express from "express";
import cors from "cors";
import { analyzeHandler } from "./routes/analyze";
import type { AnalyzeDeps } from "./routes/analyze";

export type AppDeps = AnalyzeDeps & {
  corsOrigin: string;
  /** Directory holding the front-end's index.html. */
  staticDir: string;
};

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 600 ? status : undefined;
}

/**
 * Express app:
 * - CORS locked to the configured web origin
 * - GET / serves the static front-end
 * - POST /analyze runs the fact-check pipeline
 */
export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(
    cors({
      origin: deps.corsOrigin,
      credentials: false
    })
  );

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/", (_req, res, next) => {
    res.sendFile("index.html", { root: deps.staticDir }, (err) => {
      if (!err) return;
      if (httpStatusOf(err) === 404) {
        res.status(404).json({ error: "Not found" });
        return;
      }
      next(err);
    });
  });

  // Any Content-Type is read as JSON; clients often post without one.
  app.post("/analyze", express.json({ limit: "1mb", type: () => true }), analyzeHandler(deps));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const message = err instanceof Error ? err.message : "Unknown error";
    if (res.headersSent) {
      // eslint-disable-next-line no-console
      console.error("Unhandled error after headers sent:", message);
      return;
    }
    res.status(httpStatusOf(err) ?? 500).json({ error: message });
  });

  return app;
}
