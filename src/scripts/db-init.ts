import path from "node:path";
import dotenv from "dotenv";
import { fileURLToPath } from "node:url";
import pino from "pino";
import { loadConfig } from "../config.js";
import { FileStore } from "../store/file.js";
import { SqliteStore } from "../store/sqlite.js";
import { loadIncidentSeed, seedIncidents } from "../store/seed.js";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

const SEED_FILE = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../data/incidents.seed.json");

async function main() {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });
  const store = config.store.kind === "sqlite" ? new SqliteStore(config.store.dbPath) : new FileStore(config.store.dataDir);

  await store.init();
  try {
    const count = await seedIncidents(store, await loadIncidentSeed(SEED_FILE));
    log.info({ store: config.store, incidents: count }, "db-init: store initialized and seeded");
  } finally {
    await store.close();
  }
}

main().catch((e) => {
  pino().error({ err: e }, "db-init failed");
  process.exit(1);
});
