import { z } from "zod";
import { AgentResult, DocHit, IncidentHit } from "../types/contracts.js";
import { errorMessage } from "./errors.js";

export const DEFAULT_LLM_ENDPOINT = "https://api.openai.com/v1/responses";
export const DEFAULT_LLM_MODEL = "gpt-4";
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;

export type LlmConfig = {
  apiKey?: string;
  model: string;
  endpoint: string;
  timeoutMs: number;
};

export type LlmFailureReason =
  | "missing_credential"
  | "network_error"
  | "http_error"
  | "empty_text"
  | "invalid_json"
  | "schema_mismatch";

export type LlmOutcome =
  | { ok: true; result: AgentResult }
  | { ok: false; reason: LlmFailureReason; detail?: string };

const LlmResultSchema = z.object({
  summary: z.string(),
  steps: z.array(z.string()).default([]),
  sources: z.array(z.string()).default([])
});

// Only message items are inspected, so other items may carry any content.
const ContentPart = z.object({ type: z.unknown().optional(), text: z.unknown().optional() }).passthrough();
const OutputItem = z.object({ type: z.unknown().optional(), content: z.unknown().optional() }).passthrough();
const ResponsePayload = z.object({
  output: z.unknown().optional(),
  output_text: z.unknown().optional()
}).passthrough();

export function buildPrompt(text: string, docs: DocHit[], incidents: IncidentHit[]): string {
  return `User question: ${text}

Documentation results:
${JSON.stringify(docs, null, 2)}

Incident results:
${JSON.stringify(incidents, null, 2)}

Based on this information, provide:
1. A clear summary answering the user's question
2. Actionable steps they can take
3. List the sources (filenames and incident IDs) you used

Respond with JSON:
{
  "summary": "...",
  "steps": ["step1", "step2", ...],
  "sources": ["filename.md", "INC-XXX", ...]
}`;
}

/**
 * Pulls the answer text out of a responses-style payload: the first
 * `output_text` part of a `message` item, else a flat `output_text` string.
 */
export function extractOutputText(payload: unknown): string {
  const parsed = ResponsePayload.safeParse(payload);
  if (!parsed.success) return "";

  const items: unknown[] = Array.isArray(parsed.data.output) ? parsed.data.output : [];
  for (const raw of items) {
    const item = OutputItem.safeParse(raw);
    if (!item.success || item.data.type !== "message" || !Array.isArray(item.data.content)) continue;
    const parts: unknown[] = item.data.content;
    for (const rawPart of parts) {
      const part = ContentPart.safeParse(rawPart);
      if (part.success && part.data.type === "output_text") {
        return typeof part.data.text === "string" ? part.data.text : "";
      }
    }
  }

  const flat = parsed.data.output_text;
  return typeof flat === "string" ? flat : "";
}

export async function requestLlmSynthesis(
  config: LlmConfig,
  input: { text: string; docs: DocHit[]; incidents: IncidentHit[] },
  fetchImpl: typeof fetch
): Promise<LlmOutcome> {
  if (!config.apiKey) return { ok: false, reason: "missing_credential" };

  let r: Response;
  try {
    r = await fetchImpl(config.endpoint, {
      method: "POST",
      headers: {
        "Authorization": `Bearer ${config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: config.model,
        input: buildPrompt(input.text, input.docs, input.incidents),
        temperature: 0.3,
        text: { format: { type: "json_object" } }
      }),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (e) {
    return { ok: false, reason: "network_error", detail: errorMessage(e) };
  }

  if (!r.ok) {
    const txt = await r.text().catch(() => "");
    return { ok: false, reason: "http_error", detail: `${r.status} ${txt.slice(0, 200)}`.trim() };
  }

  let payload: unknown;
  try {
    payload = await r.json();
  } catch {
    return { ok: false, reason: "invalid_json", detail: "response body is not JSON" };
  }

  const content = extractOutputText(payload);
  if (!content) return { ok: false, reason: "empty_text" };

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return { ok: false, reason: "invalid_json", detail: content.slice(0, 200) };
  }

  const result = LlmResultSchema.safeParse(data);
  if (!result.success) {
    return { ok: false, reason: "schema_mismatch", detail: result.error.issues.map(i => i.path.join(".") || i.message).join(", ") };
  }
  return { ok: true, result: result.data };
}
