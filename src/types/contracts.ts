export type Priority = "normal" | "high";
export type RequestStatus = "queued" | "running" | "done" | "failed";
export type ToolName = "search_docs" | "query_incidents";

export interface LabRequest {
  id: string;
  text: string;
  priority: Priority;
  status: RequestStatus;
  result?: AgentResult; // only when done
  error?: string; // only when failed
  createdAt: string; // ISO
  updatedAt: string; // ISO
  startedAt?: string; // ISO
  finishedAt?: string; // ISO
}

export interface PlanStep {
  stepNumber: number;
  action: string;
  tool: ToolName | null;
  toolInput?: string;
}

export interface AgentPlan {
  reasoning: string;
  steps: PlanStep[];
}

export interface DocHit {
  filename: string;
  title: string;
  snippet: string;
  key_points?: string[];
}

export interface IncidentHit {
  id: string;
  title: string;
  description?: string;
  severity?: string;
  resolution?: string;
}

export interface IncidentRecord extends IncidentHit {
  createdAt: string; // ISO
}

export interface ToolCall {
  tool: ToolName;
  input: string;
  output: unknown;
  error?: string;
  timestamp: string; // ISO
}

export interface AgentResult {
  summary: string;
  steps: string[];
  sources: string[];
}

export interface RequestStatusView {
  request_id: string;
  status: RequestStatus;
  result: AgentResult | null;
  error: string | null;
}

export interface Planner {
  plan(text: string): Promise<AgentPlan>;
}
