import { getLogger } from '../../utils/logger.js';
import { aggregateSignals, combineTextScores } from '../aggregate/score-aggregator.js';
import { NO_SIGNAL } from '../aggregate/signal.js';
import { breakdownByTopic, type TopicEvidence } from '../aggregate/topics.js';
import { scoreCoalition, type CoalitionResult } from '../coalition/coalition-scorer.js';
import { buildCoalitionGraph, type CoalitionGraph } from '../coalition/graph.js';
import type { LexiconStore } from '../lexicon/lexicon-store.js';
import { inWindow, windowKey, type LegislativeDocument, type RecordBatch, type TimeWindow, type Vote } from '../records/types.js';
import { validateBatch, type RejectedRecord } from '../records/validate.js';
import { scoreDocument } from '../text/text-scorer.js';
import { scoreVotePatterns } from '../votes/vote-pattern-scorer.js';
import type { AxisProfile, ScoringProfile } from './profile.js';
import type { AlignmentScore } from './types.js';

const log = getLogger();

export interface ScoreWindowOptions {
  window: TimeWindow;
  /** Restrict to these axes of the profile */
  axes?: readonly string[];
  /** Stamped on every record; never feeds the numbers */
  computedAt?: Date;
}

export interface AxisRunStats {
  axis: string;
  members: number;
  coalitionIterations: number;
  coalitionConverged: boolean;
}

export interface WindowRun {
  scores: AlignmentScore[];
  graph: CoalitionGraph;
  axes: AxisRunStats[];
  documents: number;
  votes: number;
  rejected: RejectedRecord[];
}

function byId<T extends { id: string }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/** Documents and votes inside the window, with positions limited to scored members. */
function sliceWindow(batch: RecordBatch, window: TimeWindow, members: ReadonlySet<string>) {
  const documents: LegislativeDocument[] = batch.documents
    .filter(d => inWindow(d.timestamp, window))
    .sort(byId);

  const votes: Vote[] = batch.votes
    .filter(v => inWindow(v.timestamp, window))
    .map(v => ({
      ...v,
      positions: Object.fromEntries(Object.entries(v.positions).filter(([id]) => members.has(id))),
    }))
    .sort(byId);

  return { documents, votes };
}

function textScoresByMember(
  documents: readonly LegislativeDocument[],
  axis: string,
  lexicon: LexiconStore,
  members: ReadonlySet<string>,
): Map<string, TopicEvidence[]> {
  const out = new Map<string, TopicEvidence[]>();
  for (const doc of documents) {
    const evidence: TopicEvidence = { topics: doc.topics, score: scoreDocument(doc, axis, lexicon) };
    for (const memberId of new Set([doc.sponsorId, ...doc.cosponsorIds])) {
      if (!members.has(memberId)) continue;
      const list = out.get(memberId);
      if (list) list.push(evidence);
      else out.set(memberId, [evidence]);
    }
  }
  return out;
}

function scoreAxis(
  axis: string,
  axisProfile: AxisProfile,
  profile: ScoringProfile,
  ctx: {
    memberIds: readonly string[];
    memberSet: ReadonlySet<string>;
    documents: readonly LegislativeDocument[];
    votes: readonly Vote[];
    graph: CoalitionGraph;
    lexicon: LexiconStore;
    window: TimeWindow;
    computedAt: Date;
  },
): { scores: AlignmentScore[]; coalition: CoalitionResult } {
  if (!ctx.lexicon.hasAxis(axis)) {
    log.warn({ axis }, 'Axis has no lexicon; text signal will be empty');
  }

  // The three signals read the same immutable inputs and never touch each other's
  const text = textScoresByMember(ctx.documents, axis, ctx.lexicon, ctx.memberSet);
  const coalition = scoreCoalition(ctx.graph, axisProfile.anchors, {
    tolerance: profile.engine.tolerance,
    maxIterations: profile.engine.maxIterations,
    nonConvergencePenalty: profile.engine.nonConvergencePenalty,
  });
  const votes = scoreVotePatterns(ctx.votes, axisProfile.poles, { minVotes: profile.engine.minVotes });

  const scores: AlignmentScore[] = ctx.memberIds.map(memberId => {
    const vote = votes.get(memberId);
    const evidence = text.get(memberId) ?? [];
    const aggregate = aggregateSignals(
      {
        text: combineTextScores(evidence.map(e => e.score)),
        coalition: coalition.scores.get(memberId) ?? { ...NO_SIGNAL },
        vote: vote ? { value: vote.value, confidence: vote.confidence } : { ...NO_SIGNAL },
      },
      axisProfile.weights,
    );
    return {
      memberId,
      axis,
      window: { start: ctx.window.start, end: ctx.window.end },
      value: aggregate.value,
      confidence: aggregate.confidence,
      components: aggregate.components,
      topics: breakdownByTopic(evidence),
      lexiconVersion: ctx.lexicon.version,
      computedAt: ctx.computedAt,
    };
  });

  return { scores, coalition };
}

/**
 * Score every member who appears in the window's records, on every axis of
 * the profile. Axes are scored independently. An empty window yields no
 * records.
 */
export function scoreWindow(
  batch: RecordBatch,
  profile: ScoringProfile,
  lexicon: LexiconStore,
  opts: ScoreWindowOptions,
): WindowRun {
  const { window } = opts;
  const computedAt = opts.computedAt ?? new Date();

  const graph = buildCoalitionGraph(batch.documents, batch.votes, window, {
    voteWeight: profile.engine.voteWeight,
    roster: batch.members,
  });
  const memberIds = graph.members();
  const memberSet = new Set(memberIds);
  const { documents, votes } = sliceWindow(batch, window, memberSet);

  const axes = Object.keys(profile.axes)
    .filter(axis => !opts.axes || opts.axes.includes(axis))
    .sort();

  const scores: AlignmentScore[] = [];
  const stats: AxisRunStats[] = [];

  for (const axis of axes) {
    const axisProfile = profile.axes[axis];
    if (!axisProfile) continue;
    const result = scoreAxis(axis, axisProfile, profile, {
      memberIds,
      memberSet,
      documents,
      votes,
      graph,
      lexicon,
      window,
      computedAt,
    });
    scores.push(...result.scores);
    stats.push({
      axis,
      members: result.scores.length,
      coalitionIterations: result.coalition.iterations,
      coalitionConverged: result.coalition.converged,
    });
  }

  scores.sort((a, b) =>
    a.memberId < b.memberId ? -1 : a.memberId > b.memberId ? 1 : a.axis < b.axis ? -1 : a.axis > b.axis ? 1 : 0,
  );

  log.info(
    { window: windowKey(window), members: memberIds.length, axes, documents: documents.length, votes: votes.length },
    'Window scored',
  );

  return { scores, graph, axes: stats, documents: documents.length, votes: votes.length, rejected: [] };
}

/** Validate raw records first; malformed ones are skipped and reported. */
export function scoreRawBatch(
  raw: unknown,
  profile: ScoringProfile,
  lexicon: LexiconStore,
  opts: ScoreWindowOptions,
): WindowRun {
  const { rejected, ...batch } = validateBatch(raw);
  return { ...scoreWindow(batch, profile, lexicon, opts), rejected };
}
