import { DocHit, IncidentHit } from "../types/contracts.js";
import { RequestSession } from "../store/store.js";
import { makeDocsSearch } from "./docs.js";
import { queryIncidents } from "./incidents.js";

/**
 * Retrieval capabilities a plan may invoke. Both return an empty list when
 * nothing matches and throw ToolUnavailableError when their backend fails.
 */
export interface Tools {
  searchDocs(query: string): Promise<DocHit[]>;
  queryIncidents(query: string, session: RequestSession): Promise<IncidentHit[]>;
}

export function makeTools(args: { docsDir: string }): Tools {
  return {
    searchDocs: makeDocsSearch(args.docsDir),
    queryIncidents
  };
}
