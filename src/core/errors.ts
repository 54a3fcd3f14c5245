import { RequestStatus } from "../types/contracts.js";

export type LabErrorCode = "TOOL_UNAVAILABLE" | "INVALID_TRANSITION" | "NOT_FOUND" | "SESSION_RELEASED";

export class LabError extends Error {
  readonly code: LabErrorCode;

  constructor(code: LabErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LabError";
    this.code = code;
  }
}

// Raised by a retrieval tool when its backing corpus or store cannot answer.
export class ToolUnavailableError extends LabError {
  readonly tool: string;

  constructor(tool: string, message: string, options?: { cause?: unknown }) {
    super("TOOL_UNAVAILABLE", `${tool} unavailable: ${message}`, options);
    this.name = "ToolUnavailableError";
    this.tool = tool;
  }
}

export class InvalidTransitionError extends LabError {
  readonly from: RequestStatus;
  readonly to: RequestStatus;

  constructor(requestId: string, from: RequestStatus, to: RequestStatus) {
    super("INVALID_TRANSITION", `request ${requestId}: cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class NotFoundError extends LabError {
  constructor(what: string, id: string) {
    super("NOT_FOUND", `${what} ${id} not found`);
    this.name = "NotFoundError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
