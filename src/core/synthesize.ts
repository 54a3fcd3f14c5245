import pino, { type Logger } from "pino";
import { AgentResult, DocHit, IncidentHit } from "../types/contracts.js";
import { requestLlmSynthesis, type LlmConfig } from "./llm.js";

export const MAX_STEPS = 5;
const MAX_ENTRIES = 3;
const MAX_KEY_POINTS = 2;
const SNIPPET_CHARS = 100;

export const NO_RESULTS_SUMMARY = "No specific documentation or incidents found for this query.";
export const NO_RESULTS_STEP = "Please provide more details about your request.";
export const EMPTY_SUMMARY = "Unable to find relevant information.";
export const REVIEW_SOURCES_STEP = "Review the sources listed below for more details.";

export type SynthesisConfig = LlmConfig & {
  useLlm: boolean;
};

export type Synthesizer = (text: string, docs: DocHit[], incidents: IncidentHit[]) => Promise<AgentResult>;

/**
 * Applies the invariants every result leaves with: at most five steps, never
 * zero, and each source listed once.
 */
export function finalizeResult(summaryParts: string[], steps: string[], sources: string[]): AgentResult {
  const summary = summaryParts.length ? summaryParts.join(" ") : EMPTY_SUMMARY;
  const kept = steps.slice(0, MAX_STEPS);
  return {
    summary,
    steps: kept.length ? kept : [REVIEW_SOURCES_STEP],
    sources: Array.from(new Set(sources))
  };
}

// Cuts by code point so a surrogate pair is never split.
function clip(s: string, max: number): string {
  return Array.from(s).slice(0, max).join("");
}

export function synthesizeDeterministic(_text: string, docs: DocHit[], incidents: IncidentHit[]): AgentResult {
  let summaryParts: string[] = [];
  let steps: string[] = [];
  const sources: string[] = [];

  if (docs.length) {
    summaryParts.push("Based on the documentation:");
    for (const doc of docs.slice(0, MAX_ENTRIES)) {
      summaryParts.push(`- ${doc.title}: ${clip(doc.snippet, SNIPPET_CHARS)}...`);
      steps.push(...(doc.key_points ?? []).slice(0, MAX_KEY_POINTS));
      sources.push(doc.filename);
    }
  }

  if (incidents.length) {
    summaryParts.push("\nRelevant past incidents:");
    for (const inc of incidents.slice(0, MAX_ENTRIES)) {
      summaryParts.push(`- ${inc.id}: ${inc.title}`);
      if (inc.resolution) {
        steps.push(`From ${inc.id}: ${clip(inc.resolution, SNIPPET_CHARS)}`);
      }
      sources.push(inc.id);
    }
  }

  if (!summaryParts.length) {
    summaryParts = [NO_RESULTS_SUMMARY];
    steps = [NO_RESULTS_STEP];
  }

  return finalizeResult(summaryParts, steps, sources);
}

export function makeSynthesizer(config: SynthesisConfig, opts: {
  fetchImpl?: typeof fetch;
  logger?: Logger;
} = {}): Synthesizer {
  const log = opts.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  if (!config.useLlm) {
    return async (text, docs, incidents) => synthesizeDeterministic(text, docs, incidents);
  }

  return async (text, docs, incidents) => {
    const outcome = await requestLlmSynthesis(config, { text, docs, incidents }, opts.fetchImpl ?? fetch);
    if (outcome.ok) {
      return finalizeResult([outcome.result.summary], outcome.result.steps, outcome.result.sources);
    }

    if (outcome.reason === "missing_credential") {
      log.warn("synthesis: LLM_API_KEY not set, using deterministic synthesis");
    } else {
      log.error({ reason: outcome.reason, detail: outcome.detail }, "synthesis: LLM failed, using deterministic synthesis");
    }
    return synthesizeDeterministic(text, docs, incidents);
  };
}
