import { z } from "zod";
import pino, { type Logger } from "pino";
import { Store, withSession } from "../store/store.js";
import { buildLabRequest, toStatusView } from "../core/engine.js";
import { ToolCall, RequestStatusView, RequestStatus } from "../types/contracts.js";

export const IntakeSchema = z.object({
  text: z.string().min(1).max(10000),
  priority: z.enum(["normal", "high"]).default("normal")
});

export type IntakeOutcome =
  | { ok: true; request_id: string; status: RequestStatus }
  | { ok: false; error: "invalid_request"; issues: z.ZodIssue[] };

export function createAgent(args: {
  store: Store;
  logger?: Logger;
  onQueued?: (requestId: string) => void;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  async function intake(raw: unknown): Promise<IntakeOutcome> {
    const parsed = IntakeSchema.safeParse(raw);
    if (!parsed.success) return { ok: false, error: "invalid_request", issues: parsed.error.issues };

    const req = buildLabRequest(parsed.data.text, parsed.data.priority);
    await withSession(args.store, (session) => session.createRequest(req));

    log.info({ requestId: req.id, priority: req.priority }, "request: queued");
    args.onQueued?.(req.id);
    return { ok: true, request_id: req.id, status: req.status };
  }

  async function getStatus(id: string): Promise<RequestStatusView | null> {
    const req = await withSession(args.store, (session) => session.getRequest(id));
    return req ? toStatusView(req) : null;
  }

  async function listToolCalls(id: string): Promise<ToolCall[] | null> {
    return withSession(args.store, async (session) => {
      const req = await session.getRequest(id);
      if (!req) return null;
      return session.listToolCalls(id);
    });
  }

  async function checkStore(): Promise<boolean> {
    try {
      await withSession(args.store, (session) => session.ping());
      return true;
    } catch (err) {
      log.error({ err }, "health: store check failed");
      return false;
    }
  }

  return { intake, getStatus, listToolCalls, checkStore };
}

export type LabAgent = ReturnType<typeof createAgent>;
