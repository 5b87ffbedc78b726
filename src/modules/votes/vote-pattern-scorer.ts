import { safeDivide } from '../../utils/math.js';
import type { SignalScore } from '../aggregate/signal.js';
import type { Vote } from '../records/types.js';

export interface PoleDefinition {
  poleA: readonly string[];
  /** Omitted: pole B is everyone outside pole A who voted on the roll call */
  poleB?: readonly string[];
}

export interface VotePatternOptions {
  /** Members with fewer cast yea/nay votes than this get confidence 0 */
  minVotes?: number;
}

export const DEFAULT_MIN_VOTES = 5;

export interface VotePatternScore extends SignalScore {
  /** Share of roll calls agreeing with pole A, null when never comparable */
  agreementA: number | null;
  agreementB: number | null;
  /** Roll calls on which the member voted yea or nay */
  castVotes: number;
}

type Cast = 'yea' | 'nay';

interface RateCounter {
  agree: number;
  total: number;
}

/**
 * The pole's majority yea/nay on one roll call, leaving out `exclude` so a
 * pole member is never compared with their own ballot. Ties give no position.
 */
function polePosition(
  positions: Readonly<Record<string, string>>,
  pole: ReadonlySet<string> | null,
  poleA: ReadonlySet<string>,
  exclude: string,
): Cast | null {
  let yea = 0;
  let nay = 0;
  for (const [memberId, value] of Object.entries(positions)) {
    if (memberId === exclude) continue;
    const inPole = pole ? pole.has(memberId) : !poleA.has(memberId);
    if (!inPole) continue;
    if (value === 'yea') yea++;
    else if (value === 'nay') nay++;
  }
  if (yea === nay) return null;
  return yea > nay ? 'yea' : 'nay';
}

/**
 * Per member: (agreement rate with pole A) − (agreement rate with pole B).
 * Rates count only roll calls where the member cast yea or nay. Without any
 * pole membership there is no reference bloc, and every member gets 0 / 0.
 */
export function scoreVotePatterns(
  votes: readonly Vote[],
  poles: PoleDefinition,
  opts: VotePatternOptions = {},
): Map<string, VotePatternScore> {
  const minVotes = opts.minVotes ?? DEFAULT_MIN_VOTES;
  const poleA = new Set(poles.poleA);
  const poleB = poles.poleB ? new Set(poles.poleB) : null;
  // The complement of an empty pole A is the whole chamber, not a bloc
  const hasPoles = poleA.size > 0 || (poleB !== null && poleB.size > 0);

  const counters = new Map<string, { a: RateCounter; b: RateCounter; cast: number }>();
  const ordered = [...votes].sort((x, y) => (x.id < y.id ? -1 : x.id > y.id ? 1 : 0));

  for (const vote of ordered) {
    for (const memberId of Object.keys(vote.positions).sort()) {
      const value = vote.positions[memberId];
      let counter = counters.get(memberId);
      if (!counter) {
        counter = { a: { agree: 0, total: 0 }, b: { agree: 0, total: 0 }, cast: 0 };
        counters.set(memberId, counter);
      }
      if (value !== 'yea' && value !== 'nay') continue;

      counter.cast++;
      const positionA = polePosition(vote.positions, poleA, poleA, memberId);
      if (positionA) {
        counter.a.total++;
        if (positionA === value) counter.a.agree++;
      }
      const positionB = polePosition(vote.positions, poleB, poleA, memberId);
      if (positionB) {
        counter.b.total++;
        if (positionB === value) counter.b.agree++;
      }
    }
  }

  const scores = new Map<string, VotePatternScore>();
  for (const memberId of [...counters.keys()].sort()) {
    const counter = counters.get(memberId);
    if (!counter) continue;
    const agreementA = hasPoles && counter.a.total > 0 ? safeDivide(counter.a.agree, counter.a.total) : null;
    const agreementB = hasPoles && counter.b.total > 0 ? safeDivide(counter.b.agree, counter.b.total) : null;
    const value = (agreementA ?? 0) - (agreementB ?? 0);

    let confidence: number;
    if (counter.cast < minVotes || (agreementA === null && agreementB === null)) confidence = 0;
    else if (agreementA === null || agreementB === null) confidence = 0.5;
    else confidence = 1;

    scores.set(memberId, { value, confidence, agreementA, agreementB, castVotes: counter.cast });
  }
  return scores;
}
