import { nanoid } from "nanoid";
import { LabRequest, Priority, RequestStatusView } from "../types/contracts.js";

export function buildLabRequest(text: string, priority: Priority): LabRequest {
  const now = new Date().toISOString();
  return {
    id: nanoid(),
    text,
    priority,
    status: "queued",
    createdAt: now,
    updatedAt: now
  };
}

export function toStatusView(req: LabRequest): RequestStatusView {
  return {
    request_id: req.id,
    status: req.status,
    result: req.status === "done" ? req.result ?? null : null,
    error: req.status === "failed" ? req.error ?? null : null
  };
}
