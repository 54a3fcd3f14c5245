import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import pino from "pino";

import { loadConfig } from "./config.js";
import { APP_NAME, makeApp } from "./api/app.js";
import { createAgent } from "./plugin/createAgent.js";
import { FileStore } from "./store/file.js";
import { SqliteStore } from "./store/sqlite.js";
import { Store } from "./store/store.js";
import { makeTools } from "./tools/tools.js";
import { makeSynthesizer } from "./core/synthesize.js";
import { planner } from "./presets/lab-support.v1.js";
import { Worker } from "./worker/worker.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

const store: Store = config.store.kind === "sqlite"
  ? new SqliteStore(path.resolve(config.store.dbPath))
  : new FileStore(path.resolve(config.store.dataDir));

async function main() {
  await store.init();

  const worker = new Worker({
    store,
    planner,
    tools: makeTools({ docsDir: path.resolve(config.docsDir) }),
    synthesize: makeSynthesizer(config.synthesis, { logger: log }),
    pollIntervalMs: config.worker.pollIntervalMs,
    staleRunningSeconds: config.worker.staleRunningSeconds,
    logger: log
  });

  const agent = createAgent({ store, logger: log, onQueued: () => worker.wake() });
  const app = makeApp({ agent, log, workerRunning: () => worker.isRunning(), rateLimit: config.rateLimit });

  worker.start();
  const server = app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        STORE: config.store.kind,
        DOCS_DIR: config.docsDir,
        USE_REAL_LLM: config.synthesis.useLlm,
        LLM_CONFIGURED: Boolean(config.synthesis.apiKey),
        LLM_MODEL: config.synthesis.model
      },
      `${APP_NAME} running`
    );
  });

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    log.info({ signal }, "shutting down");
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await worker.stop();
    await store.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        log.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
