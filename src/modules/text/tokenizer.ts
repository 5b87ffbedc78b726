/**
 * Normalise free text into lowercase word tokens.
 * Punctuation separates tokens ("pro-life" → ["pro", "life"]), so lexicon
 * entries run through the same function line up with document tokens.
 */
export function tokenize(text: string): string[] {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
    .split(' ')
    .filter(t => t.length > 0);
}

/** Canonical key for a token sequence. */
export function termKey(tokens: readonly string[]): string {
  return tokens.join(' ');
}
