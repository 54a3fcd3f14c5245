import { IncidentHit, IncidentRecord } from "../types/contracts.js";
import { RequestSession } from "../store/store.js";
import { ToolUnavailableError, errorMessage } from "../core/errors.js";
import { queryTerms } from "../core/normalize.js";

export const MAX_INCIDENT_HITS = 5;

export async function queryIncidents(query: string, session: RequestSession): Promise<IncidentHit[]> {
  const terms = queryTerms(query);
  if (!terms.length) return [];

  let rows: IncidentRecord[];
  try {
    rows = await session.searchIncidents(terms, MAX_INCIDENT_HITS);
  } catch (e) {
    throw new ToolUnavailableError("query_incidents", errorMessage(e), { cause: e });
  }

  return rows.map(r => ({
    id: r.id,
    title: r.title,
    ...(r.description ? { description: r.description } : {}),
    ...(r.severity ? { severity: r.severity } : {}),
    ...(r.resolution ? { resolution: r.resolution } : {})
  }));
}
