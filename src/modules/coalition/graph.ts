import { getLogger } from '../../utils/logger.js';
import {
  activeDuring,
  inWindow,
  type LegislativeDocument,
  type Member,
  type TimeWindow,
  type Vote,
} from '../records/types.js';

const log = getLogger();

export interface CoalitionEdge {
  a: string;
  b: string;
  weight: number;
}

export interface Neighbor {
  index: number;
  weight: number;
}

/**
 * Undirected weighted graph over members. Members live in an arena indexed
 * by integer (sorted by id); each unordered pair is stored once under
 * (lower index, higher index).
 */
export class CoalitionGraph {
  private readonly ids: readonly string[];
  private readonly indexById: ReadonlyMap<string, number>;
  private readonly weights = new Map<number, Map<number, number>>();

  constructor(memberIds: Iterable<string>) {
    this.ids = [...new Set(memberIds)].sort();
    this.indexById = new Map(this.ids.map((id, i) => [id, i]));
  }

  get size(): number {
    return this.ids.length;
  }

  members(): readonly string[] {
    return this.ids;
  }

  indexOf(memberId: string): number | undefined {
    return this.indexById.get(memberId);
  }

  idAt(index: number): string {
    const id = this.ids[index];
    if (id === undefined) throw new RangeError(`No member at index ${index}`);
    return id;
  }

  has(memberId: string): boolean {
    return this.indexById.has(memberId);
  }

  /**
   * Accumulate weight on an unordered pair. Self-pairs, unknown members and
   * non-positive amounts are ignored. Returns whether weight was added.
   */
  addWeight(a: string, b: string, amount: number): boolean {
    if (a === b || !(amount > 0)) return false;
    const ia = this.indexById.get(a);
    const ib = this.indexById.get(b);
    if (ia === undefined || ib === undefined) return false;

    const [lo, hi] = ia < ib ? [ia, ib] : [ib, ia];
    let row = this.weights.get(lo);
    if (!row) {
      row = new Map();
      this.weights.set(lo, row);
    }
    row.set(hi, (row.get(hi) ?? 0) + amount);
    return true;
  }

  weight(a: string, b: string): number {
    const ia = this.indexById.get(a);
    const ib = this.indexById.get(b);
    if (ia === undefined || ib === undefined || ia === ib) return 0;
    const [lo, hi] = ia < ib ? [ia, ib] : [ib, ia];
    return this.weights.get(lo)?.get(hi) ?? 0;
  }

  /** Every edge with weight > 0, ordered by (a, b). */
  edges(): CoalitionEdge[] {
    const out: CoalitionEdge[] = [];
    for (const lo of [...this.weights.keys()].sort((x, y) => x - y)) {
      const row = this.weights.get(lo);
      if (!row) continue;
      for (const hi of [...row.keys()].sort((x, y) => x - y)) {
        const weight = row.get(hi) ?? 0;
        if (weight > 0) out.push({ a: this.idAt(lo), b: this.idAt(hi), weight });
      }
    }
    return out;
  }

  /**
   * Adjacency lists indexed by arena position, each sorted by neighbour index
   * so that downstream sums always run in the same order.
   */
  adjacency(): Neighbor[][] {
    const adj: Neighbor[][] = this.ids.map(() => []);
    for (const [lo, row] of this.weights) {
      for (const [hi, weight] of row) {
        if (weight <= 0) continue;
        adj[lo]?.push({ index: hi, weight });
        adj[hi]?.push({ index: lo, weight });
      }
    }
    for (const list of adj) list.sort((x, y) => x.index - y.index);
    return adj;
  }
}

export interface GraphBuildOptions {
  /** Weight added per matching yea/nay pair on a roll call */
  voteWeight?: number;
  /** When given, only members active during the window take part */
  roster?: readonly Member[];
}

export const DEFAULT_VOTE_WEIGHT = 1;

/** Participants of in-window records, filtered by roster when there is one. */
export function windowParticipants(
  documents: readonly LegislativeDocument[],
  votes: readonly Vote[],
  window: TimeWindow,
  roster?: readonly Member[],
): Set<string> {
  const ids = new Set<string>();
  for (const doc of documents) {
    if (!inWindow(doc.timestamp, window)) continue;
    ids.add(doc.sponsorId);
    for (const id of doc.cosponsorIds) ids.add(id);
  }
  for (const vote of votes) {
    if (!inWindow(vote.timestamp, window)) continue;
    for (const id of Object.keys(vote.positions)) ids.add(id);
  }

  if (!roster || roster.length === 0) return ids;

  const excluded = new Set(roster.filter(m => !activeDuring(m, window)).map(m => m.id));
  for (const id of excluded) ids.delete(id);
  return ids;
}

/**
 * Build the co-sponsorship / co-voting graph for one window.
 * Records outside [start, end) are ignored.
 */
export function buildCoalitionGraph(
  documents: readonly LegislativeDocument[],
  votes: readonly Vote[],
  window: TimeWindow,
  opts: GraphBuildOptions = {},
): CoalitionGraph {
  const voteWeight = opts.voteWeight ?? DEFAULT_VOTE_WEIGHT;
  const graph = new CoalitionGraph(windowParticipants(documents, votes, window, opts.roster));

  let sponsorships = 0;
  for (const doc of documents) {
    if (!inWindow(doc.timestamp, window)) continue;
    for (const cosponsor of new Set(doc.cosponsorIds)) {
      if (graph.addWeight(doc.sponsorId, cosponsor, 1)) sponsorships++;
    }
  }

  let rollCalls = 0;
  for (const vote of votes) {
    if (!inWindow(vote.timestamp, window)) continue;
    rollCalls++;
    const yea: string[] = [];
    const nay: string[] = [];
    for (const [memberId, value] of Object.entries(vote.positions)) {
      if (value === 'yea') yea.push(memberId);
      else if (value === 'nay') nay.push(memberId);
    }
    for (const group of [yea.sort(), nay.sort()]) {
      for (let i = 0; i < group.length; i++) {
        for (let j = i + 1; j < group.length; j++) {
          const a = group[i];
          const b = group[j];
          if (a !== undefined && b !== undefined) graph.addWeight(a, b, voteWeight);
        }
      }
    }
  }

  log.debug(
    { members: graph.size, sponsorships, rollCalls, edges: graph.edges().length },
    'Coalition graph built',
  );

  return graph;
}
