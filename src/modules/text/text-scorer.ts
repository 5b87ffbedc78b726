import { clip } from '../../utils/math.js';
import type { LexiconStore } from '../lexicon/lexicon-store.js';
import type { LegislativeDocument } from '../records/types.js';
import { termKey, tokenize } from './tokenizer.js';

export interface TextScore {
  /** Lean in [-1, 1] */
  score: number;
  /** matchedTokens / totalTokens, in [0, 1] */
  coverage: number;
  matchedTokens: number;
  totalTokens: number;
  matchedTerms: string[];
}

export const EMPTY_TEXT_SCORE: TextScore = Object.freeze({
  score: 0,
  coverage: 0,
  matchedTokens: 0,
  totalTokens: 0,
  matchedTerms: [],
});

/**
 * Score pre-tokenised text against one axis.
 *
 * Matching is greedy longest-first: at each position the longest lexicon
 * n-gram wins and its tokens are consumed, so "tax cut" never also counts
 * "tax". The weight sum is divided by √matchedTokens, which dampens long
 * documents without cancelling volume entirely.
 */
export function scoreTokens(tokens: readonly string[], axis: string, lexicon: LexiconStore): TextScore {
  const maxN = lexicon.maxNgram(axis);
  if (tokens.length === 0 || maxN === 0) {
    return { ...EMPTY_TEXT_SCORE, totalTokens: tokens.length, matchedTerms: [] };
  }

  const weights: number[] = [];
  const matchedTerms: string[] = [];
  let matchedTokens = 0;
  let i = 0;

  while (i < tokens.length) {
    let consumed = 0;
    for (let n = Math.min(maxN, tokens.length - i); n >= 1; n--) {
      const key = termKey(tokens.slice(i, i + n));
      const weight = lexicon.lookup(axis, key);
      if (weight !== undefined) {
        weights.push(weight);
        matchedTerms.push(key);
        matchedTokens += n;
        consumed = n;
        break;
      }
    }
    i += consumed > 0 ? consumed : 1;
  }

  if (matchedTokens === 0) {
    return { ...EMPTY_TEXT_SCORE, totalTokens: tokens.length, matchedTerms: [] };
  }

  // Summing in sorted order keeps the float result independent of token order
  const sum = weights.sort((a, b) => a - b).reduce((acc, w) => acc + w, 0);

  return {
    score: clip(sum / Math.sqrt(matchedTokens)),
    coverage: matchedTokens / tokens.length,
    matchedTokens,
    totalTokens: tokens.length,
    matchedTerms: matchedTerms.sort(),
  };
}

export function scoreText(text: string, axis: string, lexicon: LexiconStore): TextScore {
  return scoreTokens(tokenize(text), axis, lexicon);
}

export function scoreDocument(doc: LegislativeDocument, axis: string, lexicon: LexiconStore): TextScore {
  return scoreText(doc.text, axis, lexicon);
}
