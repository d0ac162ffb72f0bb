// Lexical tokenization shared by lexical retrieval and hash-bucket embeddings

const TOKEN_PATTERN = /[a-z0-9_]+/g;

/**
 * Minimum token length; shorter runs are mostly noise ("if", "id", "a")
 */
export const MIN_TOKEN_LENGTH = 3;

/**
 * All tokens of a text in order of appearance, repeats included
 */
export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(TOKEN_PATTERN) ?? []).filter(token => token.length >= MIN_TOKEN_LENGTH);
}

export function distinctTokens(text: string): Set<string> {
  return new Set(tokenize(text));
}

/**
 * Number of query tokens that also occur in the text
 */
export function overlapCount(queryTokens: ReadonlySet<string>, text: string): number {
  const tokens = distinctTokens(text);
  let count = 0;
  for (const token of queryTokens) {
    if (tokens.has(token)) count++;
  }
  return count;
}
