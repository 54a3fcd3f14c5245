import { AgentResult, IncidentRecord, LabRequest, ToolCall } from "../types/contracts.js";

/**
 * One unit of store access. A worker opens a session per request and must
 * release it on every exit path; see {@link withSession}.
 */
export interface RequestSession {
  createRequest(req: LabRequest): Promise<void>;
  getRequest(id: string): Promise<LabRequest | null>;

  /** Atomically moves the next queued request to running; null when the queue is empty. */
  claimNext(): Promise<LabRequest | null>;
  completeRequest(id: string, result: AgentResult, toolCalls: ToolCall[]): Promise<LabRequest>;
  failRequest(id: string, error: string): Promise<LabRequest>;
  /** Fails requests left running since before `startedBefore` (ISO). Returns their ids. */
  failStaleRunning(startedBefore: string, error: string): Promise<string[]>;

  listToolCalls(requestId: string): Promise<ToolCall[]>;

  createIncident(inc: IncidentRecord): Promise<void>;
  searchIncidents(terms: string[], limit: number): Promise<IncidentRecord[]>;

  ping(): Promise<void>;
  release(): Promise<void>;
}

export interface Store {
  init(): Promise<void>;
  openSession(): Promise<RequestSession>;
  close(): Promise<void>;
}

export async function withSession<T>(store: Store, fn: (session: RequestSession) => Promise<T>): Promise<T> {
  const session = await store.openSession();
  try {
    return await fn(session);
  } finally {
    await session.release();
  }
}
