import { z } from "zod";
import { DEFAULT_LLM_ENDPOINT, DEFAULT_LLM_MODEL, DEFAULT_LLM_TIMEOUT_MS } from "./core/llm.js";
import { SynthesisConfig } from "./core/synthesize.js";

const flag = z
  .string()
  .optional()
  .transform(v => ["1", "true", "yes", "on"].includes((v ?? "").trim().toLowerCase()));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(7090),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  STORE: z.enum(["file", "sqlite"]).default("file"),
  DATA_DIR: z.string().min(1).default("./data"),
  DB_PATH: z.string().min(1).default("./data/lab-assistant.sqlite"),
  DOCS_DIR: z.string().min(1).default("./docs"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1).default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(60),
  WORKER_POLL_MS: z.coerce.number().int().min(10).default(1000),
  STALE_RUNNING_SECONDS: z.coerce.number().int().min(0).default(900),
  USE_REAL_LLM: flag,
  LLM_API_KEY: z.string().optional().transform(v => (v ?? "").trim() || undefined),
  LLM_MODEL: z.string().min(1).default(DEFAULT_LLM_MODEL),
  LLM_ENDPOINT: z.string().url().default(DEFAULT_LLM_ENDPOINT),
  LLM_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_LLM_TIMEOUT_MS)
});

export type AppConfig = {
  port: number;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  store: { kind: "file"; dataDir: string } | { kind: "sqlite"; dbPath: string };
  docsDir: string;
  rateLimit: { windowMs: number; max: number };
  worker: { pollIntervalMs: number; staleRunningSeconds: number };
  synthesis: SynthesisConfig;
};

// Blank values count as unset so `FOO=` in a .env file falls back to the default.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(withoutBlanks(env));
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    store: e.STORE === "sqlite" ? { kind: "sqlite", dbPath: e.DB_PATH } : { kind: "file", dataDir: e.DATA_DIR },
    docsDir: e.DOCS_DIR,
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
    worker: { pollIntervalMs: e.WORKER_POLL_MS, staleRunningSeconds: e.STALE_RUNNING_SECONDS },
    synthesis: {
      useLlm: e.USE_REAL_LLM,
      apiKey: e.LLM_API_KEY,
      model: e.LLM_MODEL,
      endpoint: e.LLM_ENDPOINT,
      timeoutMs: e.LLM_TIMEOUT_MS
    }
  };
}
