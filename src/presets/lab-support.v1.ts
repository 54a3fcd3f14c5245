import { AgentPlan, PlanStep, Planner } from "../types/contracts.js";
import { normalizeText } from "../core/normalize.js";

export const incidentKeywords = [
  "error", "fail", "timeout", "outage", "down", "crash", "incident", "broken", "slow"
];

export function needsIncidentSearch(normalized: string): boolean {
  return incidentKeywords.some(k => normalized.includes(k));
}

export function buildPlan(text: string): AgentPlan {
  const normalized = normalizeText(text);
  const withIncidents = needsIncidentSearch(normalized);

  const steps: Omit<PlanStep, "stepNumber">[] = [
    { action: "Search lab documentation for relevant guides", tool: "search_docs", toolInput: text }
  ];
  if (withIncidents) {
    steps.push({ action: "Look up similar past incidents", tool: "query_incidents", toolInput: text });
  }
  steps.push({ action: "Synthesize an answer from the findings", tool: null });

  return {
    reasoning: withIncidents
      ? "The request describes a failure, so past incidents may hold a known fix alongside the documentation."
      : "The request reads as a how-to question; documentation should cover it.",
    steps: steps.map((s, i) => ({ stepNumber: i + 1, ...s }))
  };
}

export const planner: Planner = {
  async plan(text: string) {
    return buildPlan(text);
  }
};
