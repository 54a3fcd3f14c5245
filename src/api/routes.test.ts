import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import http from "node:http";
import pino from "pino";
import { z } from "zod";
import { makeApp } from "./app.js";
import { createAgent } from "../plugin/createAgent.js";
import { FileStore } from "../store/file.js";
import { Worker } from "../worker/worker.js";
import { synthesizeDeterministic } from "../core/synthesize.js";
import { buildPlan } from "../presets/lab-support.v1.js";

const silent = pino({ level: "silent" });

const CreatedBody = z.object({ request_id: z.string().min(1), status: z.string() });
const ErrorBody = z.object({ ok: z.literal(false), error: z.string() });
const HealthBody = z.object({
  status: z.string(),
  timestamp: z.string(),
  services: z.object({ store: z.string(), worker: z.string() })
});
const StatusBody = z.object({
  request_id: z.string(),
  status: z.string(),
  result: z.object({ summary: z.string(), steps: z.array(z.string()), sources: z.array(z.string()) }).nullable(),
  error: z.string().nullable()
});
const ToolCallsBody = z.object({
  ok: z.literal(true),
  toolCalls: z.array(z.object({ tool: z.string(), input: z.string(), timestamp: z.string() }))
});

async function listen(app: http.RequestListener): Promise<{ server: http.Server; baseUrl: string }> {
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no port");
  return { server, baseUrl: `http://127.0.0.1:${addr.port}` };
}

function postJson(url: string, body: unknown) {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body)
  });
}

describe("HTTP routes", () => {
  let tmpDir: string;
  let store: FileStore;
  let worker: Worker;
  let server: http.Server;
  let baseUrl: string;

  before(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "routes_test_"));
    store = new FileStore(tmpDir);
    await store.init();

    worker = new Worker({
      store,
      logger: silent,
      planner: { plan: async (text) => buildPlan(text) },
      tools: {
        searchDocs: async () => [{ filename: "incubator.md", title: "CO2 Incubator", snippet: "Keep CO2 at 5%.", key_points: ["Check the CO2 tank"] }],
        queryIncidents: async () => []
      },
      synthesize: async (text, docs, incidents) => synthesizeDeterministic(text, docs, incidents)
    });

    const agent = createAgent({ store, logger: silent });
    ({ server, baseUrl } = await listen(makeApp({ agent, log: silent, workerRunning: () => worker.isRunning() })));
  });

  after(() => {
    server.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should describe the service at the root", async () => {
    const res = await fetch(`${baseUrl}/`);
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), { name: "Agentic Lab Assistant", version: "0.1.0", health: "/health" });
  });

  it("should report health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    assert.strictEqual(res.status, 200);
    const body = HealthBody.parse(await res.json());
    assert.strictEqual(body.status, "healthy");
    assert.deepStrictEqual(body.services, { store: "healthy", worker: "stopped" });
  });

  it("should queue a request and answer 201", async () => {
    const res = await postJson(`${baseUrl}/requests`, { text: "How do I calibrate the incubator?", priority: "high" });
    assert.strictEqual(res.status, 201);
    const body = CreatedBody.parse(await res.json());
    assert.strictEqual(body.status, "queued");
  });

  it("should reject empty text with 422", async () => {
    const res = await postJson(`${baseUrl}/requests`, { text: "" });
    assert.strictEqual(res.status, 422);
    const body = ErrorBody.parse(await res.json());
    assert.strictEqual(body.error, "invalid_request");
  });

  it("should reject an unknown priority with 422", async () => {
    const res = await postJson(`${baseUrl}/requests`, { text: "Test", priority: "invalid" });
    assert.strictEqual(res.status, 422);
  });

  it("should reject malformed JSON with 400", async () => {
    const res = await fetch(`${baseUrl}/requests`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json"
    });
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await res.json(), { ok: false, error: "invalid_json" });
  });

  it("should return 404 for an unknown request", async () => {
    const res = await fetch(`${baseUrl}/requests/00000000-0000-0000-0000-000000000000`);
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(await res.json(), { ok: false, error: "not_found" });

    const calls = await fetch(`${baseUrl}/requests/00000000-0000-0000-0000-000000000000/tool-calls`);
    assert.strictEqual(calls.status, 404);
  });

  it("should show the result once the worker is done", async () => {
    const created = CreatedBody.parse(await (await postJson(`${baseUrl}/requests`, { text: "incubator CO2 reading drifts" })).json());
    const id = created.request_id;

    const queued = await (await fetch(`${baseUrl}/requests/${id}`)).json();
    assert.deepStrictEqual(queued, { request_id: id, status: "queued", result: null, error: null });

    // drain everything queued so far, including requests from earlier cases
    while (await worker.runOnce()) { /* keep going */ }

    const done = StatusBody.parse(await (await fetch(`${baseUrl}/requests/${id}`)).json());
    assert.strictEqual(done.status, "done");
    assert.strictEqual(done.error, null);
    assert.deepStrictEqual(done.result?.sources, ["incubator.md"]);
    assert.deepStrictEqual(done.result?.steps, ["Check the CO2 tank"]);

    const calls = ToolCallsBody.parse(await (await fetch(`${baseUrl}/requests/${id}/tool-calls`)).json());
    assert.strictEqual(calls.toolCalls.length, 1);
    assert.strictEqual(calls.toolCalls[0].tool, "search_docs");
    assert.strictEqual(calls.toolCalls[0].input, "incubator CO2 reading drifts");
  });
});

describe("intake rate limit", () => {
  it("should answer 429 once the window is used up", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ratelimit_test_"));
    const store = new FileStore(tmpDir);
    await store.init();
    const agent = createAgent({ store, logger: silent });
    const { server, baseUrl } = await listen(makeApp({
      agent,
      log: silent,
      workerRunning: () => false,
      rateLimit: { windowMs: 60_000, max: 1 }
    }));

    try {
      assert.strictEqual((await postJson(`${baseUrl}/requests`, { text: "first" })).status, 201);
      const res = await postJson(`${baseUrl}/requests`, { text: "second" });
      assert.strictEqual(res.status, 429);
      assert.deepStrictEqual(await res.json(), { ok: false, error: "rate_limited" });
    } finally {
      server.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
