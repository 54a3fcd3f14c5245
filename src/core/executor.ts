import pino, { type Logger } from "pino";
import { AgentPlan, AgentResult, DocHit, IncidentHit, PlanStep, ToolCall, ToolName } from "../types/contracts.js";
import { RequestSession } from "../store/store.js";
import { Tools } from "../tools/tools.js";
import { Synthesizer } from "./synthesize.js";
import { ToolUnavailableError } from "./errors.js";

export type ExecutionDeps = {
  tools: Tools;
  session: RequestSession;
  synthesize: Synthesizer;
  logger?: Logger;
  now?: () => Date;
};

export type ExecutionOutput = {
  result: AgentResult;
  toolCalls: ToolCall[];
};

/**
 * Runs the plan's tool steps in the order given, then synthesizes once.
 * Steps without a tool or without input are skipped. A tool that reports
 * itself unavailable contributes no results; any other error propagates.
 */
export async function executePlan(text: string, plan: AgentPlan, deps: ExecutionDeps): Promise<ExecutionOutput> {
  const log = deps.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const now = deps.now ?? (() => new Date());

  const docResults: DocHit[] = [];
  const incidentResults: IncidentHit[] = [];
  const toolCalls: ToolCall[] = [];

  async function invoke<T>(step: PlanStep, tool: ToolName, input: string, call: () => Promise<T[]>): Promise<T[]> {
    const timestamp = now().toISOString();
    log.info({ step: step.stepNumber, tool, input }, "executor: tool call");
    try {
      const output = await call();
      toolCalls.push({ tool, input, output, timestamp });
      return output;
    } catch (e) {
      if (!(e instanceof ToolUnavailableError)) throw e;
      log.warn({ step: step.stepNumber, tool, err: e }, "executor: tool unavailable, continuing with no results");
      toolCalls.push({ tool, input, output: [], error: e.message, timestamp });
      return [];
    }
  }

  for (const step of plan.steps) {
    const input = step.toolInput ?? "";

    if (step.tool === "search_docs" && input) {
      docResults.push(...await invoke(step, "search_docs", input, () => deps.tools.searchDocs(input)));
    } else if (step.tool === "query_incidents" && input) {
      incidentResults.push(...await invoke(step, "query_incidents", input, () => deps.tools.queryIncidents(input, deps.session)));
    } else if (step.tool === null) {
      log.debug({ step: step.stepNumber }, "executor: synthesis step");
    }
  }

  const result = await deps.synthesize(text, docResults, incidentResults);
  return { result, toolCalls };
}
