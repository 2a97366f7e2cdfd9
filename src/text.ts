// text.ts — Text normalization shared by the indexer and condition checks

/** Trim, collapse whitespace, case-fold. */
export function normalizeText(value: string): string {
  return value.normalize("NFKC").replace(/\s+/g, " ").trim().toLowerCase();
}

/** normalizeText plus punctuation stripped; used for fuzzy matching. */
export function foldText(value: string): string {
  return normalizeText(value.replace(/[^\p{L}\p{N}\s]/gu, " "));
}

export function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 1)}…` : value;
}

/** Escape a value for use inside a double-quoted selector attribute. */
export function quoteAttr(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}
