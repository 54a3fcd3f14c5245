import fs from "fs";
import path from "path";
import { RequestSession, Store } from "./store.js";
import { AgentResult, IncidentRecord, LabRequest, RequestStatus, ToolCall } from "../types/contracts.js";
import { canTransition } from "../core/transitions.js";
import { InvalidTransitionError, LabError, NotFoundError } from "../core/errors.js";
import { appendJsonl, appendJsonlMany, ensureDir, nowUtc, readJsonl } from "../lib/_util.js";

type ToolCallLine = ToolCall & { requestId: string };

type Index = {
  requests: Map<string, LabRequest>;
  toolCalls: Map<string, ToolCall[]>;
  incidents: Map<string, IncidentRecord>;
};

const priorityRank = (r: LabRequest) => (r.priority === "high" ? 0 : 1);

/**
 * JSONL-backed store. Every write appends a full record; on init the logs are
 * replayed into memory, last write wins.
 */
export class FileStore implements Store {
  private dir: string;
  private requestsPath: string;
  private toolCallsPath: string;
  private incidentsPath: string;
  private sessions = 0;

  private idx: Index = {
    requests: new Map(),
    toolCalls: new Map(),
    incidents: new Map()
  };

  constructor(dataDir: string) {
    this.dir = dataDir;
    this.requestsPath = path.join(this.dir, "requests.jsonl");
    this.toolCallsPath = path.join(this.dir, "tool_calls.jsonl");
    this.incidentsPath = path.join(this.dir, "incidents.jsonl");
  }

  async init(): Promise<void> {
    ensureDir(this.dir);
    for (const p of [this.requestsPath, this.toolCallsPath, this.incidentsPath]) {
      if (!fs.existsSync(p)) fs.writeFileSync(p, "", "utf8");
    }

    for (const r of readJsonl<LabRequest>(this.requestsPath)) this.idx.requests.set(r.id, r);
    for (const line of readJsonl<ToolCallLine>(this.toolCallsPath)) {
      const { requestId, ...call } = line;
      const arr = this.idx.toolCalls.get(requestId) ?? [];
      arr.push(call);
      this.idx.toolCalls.set(requestId, arr);
    }
    for (const inc of readJsonl<IncidentRecord>(this.incidentsPath)) this.idx.incidents.set(inc.id, inc);
  }

  /** Sessions opened and not yet released. */
  activeSessions(): number {
    return this.sessions;
  }

  async openSession(): Promise<RequestSession> {
    let released = false;
    this.sessions++;

    const live = () => {
      if (released) throw new LabError("SESSION_RELEASED", "store session already released");
    };

    return {
      createRequest: async (req) => { live(); this.putRequest(req); },
      getRequest: async (id) => { live(); return this.idx.requests.get(id) ?? null; },
      claimNext: async () => { live(); return this.claimNext(); },
      completeRequest: async (id, result, toolCalls) => { live(); return this.complete(id, result, toolCalls); },
      failRequest: async (id, error) => { live(); return this.transition(id, "failed", { error, finishedAt: nowUtc() }); },
      failStaleRunning: async (startedBefore, error) => { live(); return this.failStale(startedBefore, error); },
      listToolCalls: async (requestId) => { live(); return [...(this.idx.toolCalls.get(requestId) ?? [])]; },
      createIncident: async (inc) => {
        live();
        appendJsonl(this.incidentsPath, inc);
        this.idx.incidents.set(inc.id, inc);
      },
      searchIncidents: async (terms, limit) => { live(); return this.searchIncidents(terms, limit); },
      ping: async () => { live(); },
      release: async () => {
        if (released) return;
        released = true;
        this.sessions--;
      }
    };
  }

  async close(): Promise<void> {
    this.idx.requests.clear();
    this.idx.toolCalls.clear();
    this.idx.incidents.clear();
  }

  private putRequest(req: LabRequest) {
    appendJsonl(this.requestsPath, req);
    this.idx.requests.set(req.id, req);
  }

  private assertTransition(id: string, to: RequestStatus): LabRequest {
    const cur = this.idx.requests.get(id);
    if (!cur) throw new NotFoundError("request", id);
    if (!canTransition(cur.status, to)) throw new InvalidTransitionError(id, cur.status, to);
    return cur;
  }

  private transition(id: string, to: RequestStatus, patch: Partial<LabRequest>): LabRequest {
    const cur = this.assertTransition(id, to);

    const updated: LabRequest = { ...cur, ...patch, status: to, updatedAt: nowUtc() };
    this.putRequest(updated);
    return updated;
  }

  private claimNext(): LabRequest | null {
    const queued = [...this.idx.requests.values()]
      .filter(r => r.status === "queued")
      .sort((a, b) => priorityRank(a) - priorityRank(b) || a.createdAt.localeCompare(b.createdAt));
    const next = queued[0];
    if (!next) return null;
    return this.transition(next.id, "running", { startedAt: nowUtc() });
  }

  // Tool calls land before the terminal line: a failed write leaves the request running.
  private complete(id: string, result: AgentResult, toolCalls: ToolCall[]): LabRequest {
    this.assertTransition(id, "done");
    appendJsonlMany(this.toolCallsPath, toolCalls.map((call): ToolCallLine => ({ requestId: id, ...call })));
    const updated = this.transition(id, "done", { result, finishedAt: nowUtc() });
    this.idx.toolCalls.set(id, [...toolCalls]);
    return updated;
  }

  private failStale(startedBefore: string, error: string): string[] {
    const stale = [...this.idx.requests.values()].filter(
      r => r.status === "running" && (r.startedAt ?? r.updatedAt) < startedBefore
    );
    return stale.map(r => this.transition(r.id, "failed", { error, finishedAt: nowUtc() }).id);
  }

  private searchIncidents(terms: string[], limit: number): IncidentRecord[] {
    if (!terms.length) return [];
    const hits = [...this.idx.incidents.values()].filter((inc) => {
      const hay = `${inc.id} ${inc.title} ${inc.description ?? ""} ${inc.resolution ?? ""}`.toLowerCase();
      return terms.some(t => hay.includes(t));
    });
    hits.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return hits.slice(0, limit);
  }
}
