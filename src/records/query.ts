/**
 * Free-text matching for local sources.
 *
 * Tokens shorter than MIN_TOKEN_LENGTH are ignored; a query made only of
 * such tokens is trivial and matches nothing, so one stray keystroke never
 * lists a whole collection.
 */

export const MIN_TOKEN_LENGTH = 3;

export interface Matchable {
  readonly title: string;
  readonly authors: readonly string[];
}

export function significantTokens(text: string): string[] {
  return text
    .split(/\s+/)
    .filter((token) => token.length >= MIN_TOKEN_LENGTH)
    .map((token) => token.toLowerCase());
}

export function isTrivialQuery(text: string): boolean {
  return significantTokens(text).length === 0;
}

/**
 * Every token must occur in the title or in at least one author name.
 * `tokens` are expected lower-cased, as produced by `significantTokens`.
 */
export function matchesTokens(record: Matchable, tokens: readonly string[]): boolean {
  if (tokens.length === 0) return false;
  const title = record.title.toLowerCase();
  const authors = record.authors.map((author) => author.toLowerCase());
  for (const token of tokens) {
    if (title.includes(token)) continue;
    if (!authors.some((author) => author.includes(token))) return false;
  }
  return true;
}

export function matchesQuery(record: Matchable, text: string): boolean {
  return matchesTokens(record, significantTokens(text));
}
