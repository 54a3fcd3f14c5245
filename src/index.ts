export { createAgent } from "./plugin/createAgent.js";
export { makeApp } from "./api/app.js";
export { makeRoutes } from "./api/routes.js";
export { FileStore } from "./store/file.js";
export { SqliteStore } from "./store/sqlite.js";
export { withSession } from "./store/store.js";
export { loadIncidentSeed, seedIncidents } from "./store/seed.js";
export type { Store, RequestSession } from "./store/store.js";
export { Worker, processRequest } from "./worker/worker.js";
export { executePlan } from "./core/executor.js";
export { makeSynthesizer, synthesizeDeterministic } from "./core/synthesize.js";
export type { SynthesisConfig, Synthesizer } from "./core/synthesize.js";
export { makeTools } from "./tools/tools.js";
export type { Tools } from "./tools/tools.js";
export { planner as labSupportPlanner } from "./presets/lab-support.v1.js";
export { loadConfig } from "./config.js";
export { ToolUnavailableError, InvalidTransitionError } from "./core/errors.js";
export type {
  AgentPlan, AgentResult, DocHit, IncidentHit, LabRequest, PlanStep, Planner,
  Priority, RequestStatus, RequestStatusView, ToolCall, ToolName
} from "./types/contracts.js";
