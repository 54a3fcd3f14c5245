import sqlite3 from "sqlite3";
import { RequestSession, Store } from "./store.js";
import { AgentResult, IncidentRecord, LabRequest, Priority, RequestStatus, ToolCall, ToolName } from "../types/contracts.js";
import { InvalidTransitionError, LabError, NotFoundError } from "../core/errors.js";
import { nowUtc } from "../lib/_util.js";

type RequestRow = {
  id: string;
  text: string;
  priority: Priority;
  status: RequestStatus;
  resultJson: string | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
};

type ToolCallRow = {
  tool: ToolName;
  input: string;
  outputJson: string;
  error: string | null;
  timestamp: string;
};

type IncidentRow = {
  id: string;
  title: string;
  description: string | null;
  severity: string | null;
  resolution: string | null;
  createdAt: string;
};

function run(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<number>((resolve, reject) => {
    db.run(sql, params, function (err) {
      if (err) reject(err);
      else resolve(this.changes);
    });
  });
}
function get<T>(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    db.get(sql, params, (err, row) => (err ? reject(err) : resolve(row as T | undefined)));
  });
}
function all<T>(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all(sql, params, (err, rows) => (err ? reject(err) : resolve(rows as T[])));
  });
}
function open(dbPath: string) {
  return new Promise<sqlite3.Database>((resolve, reject) => {
    const db = new sqlite3.Database(dbPath, (err) => (err ? reject(err) : resolve(db)));
  });
}
function close(db: sqlite3.Database) {
  return new Promise<void>((resolve, reject) => {
    db.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * SQLite store. Each session owns its own connection, so a worker's
 * transaction never interleaves with intake writes from the HTTP side.
 */
export class SqliteStore implements Store {
  private connections = new Set<sqlite3.Database>();

  constructor(private dbPath: string, private busyTimeoutMs = 5000) {}

  async init(): Promise<void> {
    const db = await open(this.dbPath);
    try {
      await run(db, `pragma journal_mode = wal;`);
      await run(db, `
        create table if not exists requests (
          id text primary key,
          text text not null,
          priority text not null,
          status text not null,
          resultJson text,
          error text,
          createdAt text not null,
          updatedAt text not null,
          startedAt text,
          finishedAt text
        );
      `);
      await run(db, `create index if not exists idx_requests_status on requests(status, priority, createdAt);`);

      await run(db, `
        create table if not exists tool_calls (
          requestId text not null,
          seq integer not null,
          tool text not null,
          input text not null,
          outputJson text not null,
          error text,
          timestamp text not null,
          primary key (requestId, seq)
        );
      `);

      await run(db, `
        create table if not exists incidents (
          id text primary key,
          title text not null,
          description text,
          severity text,
          resolution text,
          createdAt text not null
        );
      `);
    } finally {
      await close(db);
    }
  }

  async openSession(): Promise<RequestSession> {
    const db = await open(this.dbPath);
    db.configure("busyTimeout", this.busyTimeoutMs);
    this.connections.add(db);

    let released = false;
    const conn = () => {
      if (released) throw new LabError("SESSION_RELEASED", "store session already released");
      return db;
    };

    return {
      createRequest: async (req) => this.createRequest(conn(), req),
      getRequest: async (id) => this.getRequest(conn(), id),
      claimNext: async () => this.claimNext(conn()),
      completeRequest: async (id, result, toolCalls) => this.complete(conn(), id, result, toolCalls),
      failRequest: async (id, error) => this.fail(conn(), id, error),
      failStaleRunning: async (startedBefore, error) => this.failStale(conn(), startedBefore, error),
      listToolCalls: async (requestId) => this.listToolCalls(conn(), requestId),
      createIncident: async (inc) => this.createIncident(conn(), inc),
      searchIncidents: async (terms, limit) => this.searchIncidents(conn(), terms, limit),
      ping: async () => { await get(conn(), `select 1 as ok`); },
      release: async () => {
        if (released) return;
        released = true;
        this.connections.delete(db);
        await close(db);
      }
    };
  }

  async close(): Promise<void> {
    const dbs = [...this.connections];
    this.connections.clear();
    await Promise.all(dbs.map(close));
  }

  private async createRequest(db: sqlite3.Database, req: LabRequest): Promise<void> {
    await run(db, `
      insert into requests (id, text, priority, status, resultJson, error, createdAt, updatedAt, startedAt, finishedAt)
      values (?,?,?,?,?,?,?,?,?,?)
    `, [
      req.id, req.text, req.priority, req.status,
      req.result ? JSON.stringify(req.result) : null, req.error ?? null,
      req.createdAt, req.updatedAt, req.startedAt ?? null, req.finishedAt ?? null
    ]);
  }

  private async getRequest(db: sqlite3.Database, id: string): Promise<LabRequest | null> {
    const row = await get<RequestRow>(db, `select * from requests where id=?`, [id]);
    return row ? this.rowToRequest(row) : null;
  }

  private async claimNext(db: sqlite3.Database): Promise<LabRequest | null> {
    // Compare-and-set: lose the race to another worker and try the next row.
    for (;;) {
      const row = await get<{ id: string }>(db, `
        select id from requests
        where status = 'queued'
        order by case priority when 'high' then 0 else 1 end, createdAt asc
        limit 1
      `);
      if (!row) return null;

      const now = nowUtc();
      const changed = await run(db, `
        update requests set status='running', startedAt=?, updatedAt=?
        where id=? and status='queued'
      `, [now, now, row.id]);
      if (changed === 1) return this.getRequest(db, row.id);
    }
  }

  private async complete(db: sqlite3.Database, id: string, result: AgentResult, toolCalls: ToolCall[]): Promise<LabRequest> {
    const now = nowUtc();
    await run(db, `begin immediate`);
    try {
      const changed = await run(db, `
        update requests set status='done', resultJson=?, finishedAt=?, updatedAt=?
        where id=? and status='running'
      `, [JSON.stringify(result), now, now, id]);
      if (changed !== 1) await this.rejectTransition(db, id, "done");

      let seq = 0;
      for (const call of toolCalls) {
        await run(db, `
          insert into tool_calls (requestId, seq, tool, input, outputJson, error, timestamp)
          values (?,?,?,?,?,?,?)
        `, [id, seq++, call.tool, call.input, JSON.stringify(call.output ?? null), call.error ?? null, call.timestamp]);
      }
      await run(db, `commit`);
    } catch (e) {
      await run(db, `rollback`);
      throw e;
    }
    return this.mustGet(db, id);
  }

  private async fail(db: sqlite3.Database, id: string, error: string): Promise<LabRequest> {
    const now = nowUtc();
    const changed = await run(db, `
      update requests set status='failed', error=?, finishedAt=?, updatedAt=?
      where id=? and status='running'
    `, [error, now, now, id]);
    if (changed !== 1) await this.rejectTransition(db, id, "failed");
    return this.mustGet(db, id);
  }

  private async failStale(db: sqlite3.Database, startedBefore: string, error: string): Promise<string[]> {
    const rows = await all<{ id: string }>(db, `
      select id from requests
      where status='running' and coalesce(startedAt, updatedAt) < ?
    `, [startedBefore]);

    const failed: string[] = [];
    for (const row of rows) {
      const now = nowUtc();
      const changed = await run(db, `
        update requests set status='failed', error=?, finishedAt=?, updatedAt=?
        where id=? and status='running'
      `, [error, now, now, row.id]);
      if (changed === 1) failed.push(row.id);
    }
    return failed;
  }

  private async listToolCalls(db: sqlite3.Database, requestId: string): Promise<ToolCall[]> {
    const rows = await all<ToolCallRow>(db, `
      select tool, input, outputJson, error, timestamp from tool_calls
      where requestId=?
      order by seq asc
    `, [requestId]);
    return rows.map(r => ({
      tool: r.tool,
      input: r.input,
      output: JSON.parse(r.outputJson),
      ...(r.error ? { error: r.error } : {}),
      timestamp: r.timestamp
    }));
  }

  private async createIncident(db: sqlite3.Database, inc: IncidentRecord): Promise<void> {
    await run(db, `
      insert or replace into incidents (id, title, description, severity, resolution, createdAt)
      values (?,?,?,?,?,?)
    `, [inc.id, inc.title, inc.description ?? null, inc.severity ?? null, inc.resolution ?? null, inc.createdAt]);
  }

  private async searchIncidents(db: sqlite3.Database, terms: string[], limit: number): Promise<IncidentRecord[]> {
    if (!terms.length) return [];

    const where: string[] = [];
    const params: unknown[] = [];
    for (const t of terms) {
      where.push(`(lower(id) like ? or lower(title) like ? or lower(coalesce(description, '')) like ? or lower(coalesce(resolution, '')) like ?)`);
      params.push(`%${t}%`, `%${t}%`, `%${t}%`, `%${t}%`);
    }
    params.push(limit);

    const rows = await all<IncidentRow>(db, `
      select * from incidents
      where ${where.join(" or ")}
      order by createdAt desc
      limit ?
    `, params);
    return rows.map(r => ({
      id: r.id,
      title: r.title,
      ...(r.description ? { description: r.description } : {}),
      ...(r.severity ? { severity: r.severity } : {}),
      ...(r.resolution ? { resolution: r.resolution } : {}),
      createdAt: r.createdAt
    }));
  }

  private async mustGet(db: sqlite3.Database, id: string): Promise<LabRequest> {
    const req = await this.getRequest(db, id);
    if (!req) throw new NotFoundError("request", id);
    return req;
  }

  private async rejectTransition(db: sqlite3.Database, id: string, to: RequestStatus): Promise<never> {
    const cur = await this.getRequest(db, id);
    if (!cur) throw new NotFoundError("request", id);
    throw new InvalidTransitionError(id, cur.status, to);
  }

  private rowToRequest(r: RequestRow): LabRequest {
    const req: LabRequest = {
      id: r.id,
      text: r.text,
      priority: r.priority,
      status: r.status,
      createdAt: r.createdAt,
      updatedAt: r.updatedAt
    };
    if (r.resultJson) req.result = JSON.parse(r.resultJson) as AgentResult;
    if (r.error !== null) req.error = r.error;
    if (r.startedAt) req.startedAt = r.startedAt;
    if (r.finishedAt) req.finishedAt = r.finishedAt;
    return req;
  }
}
