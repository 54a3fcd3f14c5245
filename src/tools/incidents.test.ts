import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { queryIncidents } from "./incidents.js";
import { ToolUnavailableError } from "../core/errors.js";
import { FileStore } from "../store/file.js";
import { RequestSession } from "../store/store.js";

describe("queryIncidents", () => {
  let tmpDir: string;
  let store: FileStore;
  let session: RequestSession;

  before(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "incidents_test_"));
    store = new FileStore(tmpDir);
    await store.init();
    session = await store.openSession();
    await session.createIncident({
      id: "INC-1", title: "Autoclave door seal error", severity: "medium",
      resolution: "Replaced the gasket", createdAt: "2024-01-01T00:00:00.000Z"
    });
    await session.createIncident({
      id: "INC-2", title: "Freezer alarm", description: "Rose to -60C", createdAt: "2024-02-01T00:00:00.000Z"
    });
  });

  after(async () => {
    await session.release();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should return matching incidents without store fields", async () => {
    assert.deepStrictEqual(await queryIncidents("Autoclave won't start", session), [
      { id: "INC-1", title: "Autoclave door seal error", severity: "medium", resolution: "Replaced the gasket" }
    ]);
  });

  it("should match any term, newest first", async () => {
    const hits = await queryIncidents("freezer or autoclave", session);
    assert.deepStrictEqual(hits.map(h => h.id), ["INC-2", "INC-1"]);
    assert.strictEqual(hits[0].description, "Rose to -60C");
  });

  it("should return nothing for an empty query", async () => {
    assert.deepStrictEqual(await queryIncidents("  ", session), []);
  });

  it("should report a broken session as unavailable", async () => {
    const dead = await store.openSession();
    await dead.release();
    await assert.rejects(queryIncidents("freezer", dead), (e: unknown) =>
      e instanceof ToolUnavailableError && e.message === "query_incidents unavailable: store session already released"
    );
  });
});
