import express, { type NextFunction, type Request, type Response } from "express";
import type { Logger } from "pino";
import { LabAgent } from "../plugin/createAgent.js";
import { makeRoutes } from "./routes.js";
import { makeRateLimiter } from "./rate-limit.js";

export const APP_NAME = "Agentic Lab Assistant";
export const APP_VERSION = "0.1.0";

export function makeApp(args: {
  agent: LabAgent;
  log: Logger;
  workerRunning: () => boolean;
  rateLimit?: { windowMs: number; max: number };
}) {
  const app = express();
  app.use(express.json({ limit: "512kb" }));

  app.get("/", (_req, res) => {
    res.json({ name: APP_NAME, version: APP_VERSION, health: "/health" });
  });

  app.get("/health", async (_req, res) => {
    const storeOk = await args.agent.checkStore();
    res.json({
      status: storeOk ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      services: {
        store: storeOk ? "healthy" : "unhealthy",
        worker: args.workerRunning() ? "running" : "stopped"
      }
    });
  });

  app.use(makeRoutes({
    agent: args.agent,
    intakeLimiter: args.rateLimit ? makeRateLimiter(args.rateLimit) : undefined
  }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: "not_found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser marks malformed JSON with a 400 status
    const status = typeof err === "object" && err !== null && "status" in err && err.status === 400 ? 400 : 500;
    if (status === 500) args.log.error({ err }, "http: unhandled error");
    res.status(status).json({ ok: false, error: status === 400 ? "invalid_json" : "internal_error" });
  });

  return app;
}
