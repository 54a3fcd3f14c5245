import { Router, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { LabAgent } from "../plugin/createAgent.js";

type Handler = (req: Request, res: Response) => Promise<unknown>;

// express 4 does not forward rejected promises on its own
const route = (fn: Handler): RequestHandler => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

export function makeRoutes(args: {
  agent: LabAgent;
  intakeLimiter?: RequestHandler;
}) {
  const r = Router();
  const limit: RequestHandler = args.intakeLimiter ?? ((_req, _res, next) => next());

  r.post("/requests", limit, route(async (req, res) => {
    const out = await args.agent.intake(req.body);
    if (!out.ok) return res.status(422).json(out);
    res.status(201).json({ request_id: out.request_id, status: out.status });
  }));

  r.get("/requests/:id", route(async (req, res) => {
    const view = await args.agent.getStatus(req.params.id);
    if (!view) return res.status(404).json({ ok: false, error: "not_found" });
    res.json(view);
  }));

  r.get("/requests/:id/tool-calls", route(async (req, res) => {
    const toolCalls = await args.agent.listToolCalls(req.params.id);
    if (!toolCalls) return res.status(404).json({ ok: false, error: "not_found" });
    res.json({ ok: true, toolCalls });
  }));

  return r;
}
