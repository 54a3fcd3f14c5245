import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileStore } from "./file.js";
import { withSession } from "./store.js";
import { buildLabRequest } from "../core/engine.js";
import { InvalidTransitionError, LabError } from "../core/errors.js";
import { ToolCall } from "../types/contracts.js";

const result = { summary: "done", steps: ["step"], sources: ["a.md"] };
const call: ToolCall = { tool: "search_docs", input: "pump", output: [{ filename: "a.md" }], timestamp: "2024-05-01T10:00:00.000Z" };

describe("FileStore", () => {
  let tmpDir: string;
  let store: FileStore;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "filestore_test_"));
    store = new FileStore(tmpDir);
    await store.init();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should walk a request through queued, running and done", async () => {
    const req = buildLabRequest("pump noise", "normal");
    await withSession(store, async (s) => {
      await s.createRequest(req);
      const claimed = await s.claimNext();
      assert.strictEqual(claimed?.id, req.id);
      assert.strictEqual(claimed?.status, "running");
      assert.ok(claimed?.startedAt);

      const done = await s.completeRequest(req.id, result, [call]);
      assert.strictEqual(done.status, "done");
      assert.deepStrictEqual(done.result, result);
      assert.deepStrictEqual(await s.listToolCalls(req.id), [call]);
    });
  });

  it("should claim each request only once", async () => {
    await withSession(store, (s) => s.createRequest(buildLabRequest("once", "normal")));
    const [a, b] = await Promise.all([
      withSession(store, (s) => s.claimNext()),
      withSession(store, (s) => s.claimNext())
    ]);
    assert.strictEqual([a, b].filter(Boolean).length, 1);
  });

  it("should refuse transitions the state machine forbids", async () => {
    const req = buildLabRequest("no skipping", "normal");
    await withSession(store, async (s) => {
      await s.createRequest(req);
      await assert.rejects(s.completeRequest(req.id, result, []), InvalidTransitionError);
      await assert.rejects(s.failRequest(req.id, "x"), InvalidTransitionError);

      await s.claimNext();
      await s.failRequest(req.id, "boom");
      await assert.rejects(s.completeRequest(req.id, result, []), /cannot move from failed to done/);

      const stored = await s.getRequest(req.id);
      assert.strictEqual(stored?.status, "failed");
      assert.strictEqual(stored?.error, "boom");
      assert.strictEqual(stored?.result, undefined);
    });
  });

  it("should leave the request running when its tool calls cannot be written", async () => {
    const req = buildLabRequest("disk trouble", "normal");
    await withSession(store, async (s) => {
      await s.createRequest(req);
      await s.claimNext();

      const toolCallsPath = path.join(tmpDir, "tool_calls.jsonl");
      fs.rmSync(toolCallsPath);
      fs.mkdirSync(toolCallsPath);

      await assert.rejects(s.completeRequest(req.id, result, [call]), { code: "EISDIR" });
      assert.strictEqual((await s.getRequest(req.id))?.status, "running");
      assert.deepStrictEqual(await s.listToolCalls(req.id), []);

      const failed = await s.failRequest(req.id, "write failed");
      assert.strictEqual(failed.status, "failed");
    });
  });

  it("should reject unknown ids", async () => {
    await withSession(store, async (s) => {
      await assert.rejects(s.failRequest("nope", "x"), /request nope not found/);
      assert.strictEqual(await s.getRequest("nope"), null);
    });
  });

  it("should replay the logs on init, last write wins", async () => {
    const req = buildLabRequest("persist me", "high");
    await withSession(store, async (s) => {
      await s.createRequest(req);
      await s.claimNext();
      await s.completeRequest(req.id, result, [call]);
      await s.createIncident({ id: "INC-1", title: "Pump seized", createdAt: "2024-01-01T00:00:00.000Z" });
    });

    const reopened = new FileStore(tmpDir);
    await reopened.init();
    await withSession(reopened, async (s) => {
      const stored = await s.getRequest(req.id);
      assert.strictEqual(stored?.status, "done");
      assert.deepStrictEqual(stored?.result, result);
      assert.deepStrictEqual(await s.listToolCalls(req.id), [call]);
      assert.deepStrictEqual((await s.searchIncidents(["pump"], 5)).map(i => i.id), ["INC-1"]);
    });
  });

  it("should search incidents newest first within the limit", async () => {
    await withSession(store, async (s) => {
      await s.createIncident({ id: "INC-1", title: "Freezer alarm", createdAt: "2024-01-01T00:00:00.000Z" });
      await s.createIncident({ id: "INC-2", title: "Centrifuge", resolution: "Freezer door realigned", createdAt: "2024-02-01T00:00:00.000Z" });
      await s.createIncident({ id: "INC-3", title: "Freezer warm", createdAt: "2024-03-01T00:00:00.000Z" });
      await s.createIncident({ id: "INC-4", title: "Printer", createdAt: "2024-04-01T00:00:00.000Z" });

      assert.deepStrictEqual((await s.searchIncidents(["freezer"], 5)).map(i => i.id), ["INC-3", "INC-2", "INC-1"]);
      assert.deepStrictEqual((await s.searchIncidents(["freezer"], 2)).map(i => i.id), ["INC-3", "INC-2"]);
      assert.deepStrictEqual(await s.searchIncidents([], 5), []);
    });
  });

  it("should refuse use after release", async () => {
    const s = await store.openSession();
    assert.strictEqual(store.activeSessions(), 1);
    await s.release();
    await s.release();
    assert.strictEqual(store.activeSessions(), 0);
    await assert.rejects(s.getRequest("x"), (e: unknown) => e instanceof LabError && e.code === "SESSION_RELEASED");
  });

  it("should release the session when the callback throws", async () => {
    await assert.rejects(withSession(store, async () => { throw new Error("inside"); }), /inside/);
    assert.strictEqual(store.activeSessions(), 0);
  });
});
