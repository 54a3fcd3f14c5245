import { RequestStatus } from "../types/contracts.js";

const allowed: Record<RequestStatus, RequestStatus[]> = {
  queued: ["running"],
  running: ["done", "failed"],
  done: [],
  failed: []
};

export function canTransition(from: RequestStatus, to: RequestStatus): boolean {
  return allowed[from].includes(to);
}
