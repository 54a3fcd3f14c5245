import fs from "node:fs/promises";
import path from "node:path";
import { DocHit } from "../types/contracts.js";
import { ToolUnavailableError } from "../core/errors.js";
import { queryTerms } from "../core/normalize.js";

export const MAX_DOC_HITS = 5;

type ParsedDoc = DocHit & { body: string };

export function parseMarkdownDoc(filename: string, content: string): ParsedDoc {
  const lines = content.replace(/\r\n/g, "\n").split("\n");

  const heading = lines.find(l => /^#\s+\S/.test(l));
  const title = heading ? heading.replace(/^#\s+/, "").trim() : path.basename(filename, path.extname(filename));

  const keyPoints = lines
    .map(l => /^\s*[-*]\s+(.+)$/.exec(l)?.[1]?.trim())
    .filter((p): p is string => Boolean(p));

  // first run of plain prose lines
  const para: string[] = [];
  for (const raw of lines) {
    const l = raw.trim();
    const prose = l && !l.startsWith("#") && !/^[-*]\s+/.test(l) && !l.startsWith("```");
    if (prose) para.push(l);
    else if (para.length) break;
  }

  return {
    filename,
    title,
    snippet: para.join(" "),
    ...(keyPoints.length ? { key_points: keyPoints } : {}),
    body: content.toLowerCase()
  };
}

function occurrences(hay: string, term: string): number {
  return hay.split(term).length - 1;
}

/** Keyword search over the markdown files of one directory. */
export function makeDocsSearch(docsDir: string) {
  return async function searchDocs(query: string): Promise<DocHit[]> {
    const terms = queryTerms(query);
    if (!terms.length) return [];

    let entries: string[];
    try {
      entries = (await fs.readdir(docsDir)).filter(f => f.endsWith(".md")).sort();
    } catch (e) {
      throw new ToolUnavailableError("search_docs", `cannot read ${docsDir}`, { cause: e });
    }

    const scored: Array<{ doc: ParsedDoc; score: number }> = [];
    for (const filename of entries) {
      let content: string;
      try {
        content = await fs.readFile(path.join(docsDir, filename), "utf8");
      } catch (e) {
        throw new ToolUnavailableError("search_docs", `cannot read ${filename}`, { cause: e });
      }
      const doc = parseMarkdownDoc(filename, content);
      const score = terms.reduce((n, t) => n + occurrences(doc.body, t), 0);
      if (score > 0) scored.push({ doc, score });
    }

    scored.sort((a, b) => b.score - a.score || a.doc.filename.localeCompare(b.doc.filename));
    return scored.slice(0, MAX_DOC_HITS).map(({ doc: { body: _body, ...hit } }) => hit);
  };
}
