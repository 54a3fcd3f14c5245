export function normalizeText(input: string): string {
  return input
    .replace(/\r\n/g, "\n")
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim()
    .toLowerCase();
}

const STOPWORDS = new Set(["the", "and", "for", "with", "how", "what", "why", "when", "does", "our", "can", "you", "are", "was", "this", "that", "from", "have"]);

// Lowercased words of 3+ characters, stopwords dropped, first occurrence order.
export function queryTerms(query: string): string[] {
  const words = normalizeText(query).split(/[^a-z0-9_-]+/).filter(w => w.length >= 3 && !STOPWORDS.has(w));
  return Array.from(new Set(words));
}
