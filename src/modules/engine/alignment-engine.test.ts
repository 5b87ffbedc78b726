import { describe, expect, it } from 'vitest';
import { LexiconStore } from '../lexicon/lexicon-store.js';
import { emptyBatch, type RecordBatch, type TimeWindow } from '../records/types.js';
import { scoreRawBatch, scoreWindow } from './alignment-engine.js';
import { parseScoringProfile, type ScoringProfileInput } from './profile.js';

const window: TimeWindow = { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2025-01-01T00:00:00Z') };
const computedAt = new Date('2024-12-31T12:00:00Z');

const lexicon = LexiconStore.load({ version: 'lex-test', axes: { economic: { growth: 0.4 } } });

function profile(overrides: Partial<ScoringProfileInput> = {}) {
  return parseScoringProfile({
    axes: { economic: { anchors: { A: 0.5 }, poles: { poleA: ['A'] } } },
    ...overrides,
  });
}

function batch(): RecordBatch {
  return {
    members: [
      { id: 'A', name: 'Member A', party: 'Blue', jurisdiction: 'ST-1', activeFrom: new Date('2020-01-01'), activeTo: null },
      { id: 'B', name: 'Member B', party: 'Red', jurisdiction: 'ST-2', activeFrom: new Date('2020-01-01'), activeTo: null },
    ],
    documents: [
      {
        id: 'd1',
        kind: 'bill',
        sponsorId: 'A',
        cosponsorIds: ['B'],
        text: 'Growth plan',
        timestamp: new Date('2024-03-01T00:00:00Z'),
        topics: [],
      },
    ],
    votes: [{ id: 'rc1', timestamp: new Date('2024-04-01T00:00:00Z'), positions: { A: 'yea', B: 'yea' }, billId: 'd1' }],
  };
}

function withTopics(id: string, sponsorId: string, cosponsorIds: string[], text: string, topics: string[]) {
  return {
    id,
    kind: 'bill' as const,
    sponsorId,
    cosponsorIds,
    text,
    timestamp: new Date('2024-03-01T00:00:00Z'),
    topics,
  };
}

describe('scoreWindow', () => {
  it('produces nothing for an empty window', () => {
    const run = scoreWindow(emptyBatch(), profile(), lexicon, { window, computedAt });
    expect(run.scores).toEqual([]);
    expect(run.graph.size).toBe(0);
  });

  it('blends text and coalition evidence for a cosponsor', () => {
    const run = scoreWindow(batch(), profile(), lexicon, { window, computedAt });
    const b = run.scores.find(s => s.memberId === 'B');

    expect(run.scores.map(s => `${s.memberId}/${s.axis}`)).toEqual(['A/economic', 'B/economic']);
    expect(b?.components.text).toEqual({ value: 0.4, confidence: 0.5 });
    expect(b?.components.coalition).toEqual({ value: 0.5, confidence: 1 });
    // One cast vote is below the default minimum, so the vote signal drops out
    expect(b?.components.vote.confidence).toBe(0);
    expect(b?.value).toBeCloseTo(0.4 / 3 + (0.5 * 2) / 3, 12);
    expect(b?.value).toBeGreaterThan(0.4);
    expect(b?.value).toBeLessThan(0.5);
    expect(b?.confidence).toBeCloseTo(0.5, 12);
    expect(b?.lexiconVersion).toBe('lex-test');
    expect(b?.computedAt).toBe(computedAt);
    expect(b?.window).toEqual(window);
  });

  it('lets the vote signal in once the minimum is met', () => {
    const run = scoreWindow(batch(), profile({ engine: { minVotes: 1 } }), lexicon, { window, computedAt });
    const b = run.scores.find(s => s.memberId === 'B');

    expect(b?.components.vote).toEqual({ value: 1, confidence: 0.5 });
    expect(b?.value).toBeCloseTo(0.6, 12);
    expect(b?.confidence).toBeCloseTo(2 / 3, 12);
  });

  it('is reproducible and independent of record order', () => {
    const first = scoreWindow(batch(), profile(), lexicon, { window, computedAt });
    const again = scoreWindow(batch(), profile(), lexicon, { window, computedAt });

    expect(again.scores).toEqual(first.scores);

    const withExtra = batch();
    withExtra.documents.unshift({
      id: 'd0',
      kind: 'speech',
      sponsorId: 'B',
      cosponsorIds: [],
      text: 'No growth without growth',
      timestamp: new Date('2024-06-01T00:00:00Z'),
      topics: [],
    });
    const reversed: RecordBatch = {
      members: [...withExtra.members].reverse(),
      documents: [...withExtra.documents].reverse(),
      votes: [...withExtra.votes].reverse(),
    };
    const a = scoreWindow(withExtra, profile(), lexicon, { window, computedAt });
    const b = scoreWindow(reversed, profile(), lexicon, { window, computedAt });
    expect(b.scores).toEqual(a.scores);
  });

  it('ignores records outside the window', () => {
    const records = batch();
    records.votes.push({
      id: 'rc0',
      timestamp: new Date('2023-12-31T23:59:59Z'),
      positions: { A: 'nay', C: 'nay' },
      billId: null,
    });
    const run = scoreWindow(records, profile(), lexicon, { window, computedAt });

    expect(run.votes).toBe(1);
    expect(run.scores.map(s => s.memberId)).toEqual(['A', 'B']);
  });

  it('skips members who were not serving during the window', () => {
    const records = batch();
    records.members.push({
      id: 'C',
      name: 'Member C',
      party: null,
      jurisdiction: '',
      activeFrom: new Date('2010-01-01'),
      activeTo: new Date('2023-01-03'),
    });
    records.votes = [
      { id: 'rc1', timestamp: new Date('2024-04-01T00:00:00Z'), positions: { A: 'yea', B: 'yea', C: 'yea' }, billId: 'd1' },
    ];
    const run = scoreWindow(records, profile(), lexicon, { window, computedAt });

    expect(run.scores.map(s => s.memberId)).toEqual(['A', 'B']);
  });

  it('scores axes independently and can restrict to some of them', () => {
    const twoAxes = profile({
      axes: {
        economic: { anchors: { A: 0.5 } },
        social: { anchors: { B: -0.8 } },
      },
    });
    const run = scoreWindow(batch(), twoAxes, lexicon, { window, computedAt });
    const social = run.scores.filter(s => s.axis === 'social');

    expect(run.axes.map(a => a.axis)).toEqual(['economic', 'social']);
    expect(social.map(s => s.components.coalition.value)).toEqual([-0.8, -0.8]);
    // No social lexicon
    expect(social.every(s => s.components.text.confidence === 0)).toBe(true);

    const only = scoreWindow(batch(), twoAxes, lexicon, { window, computedAt, axes: ['social'] });
    expect(only.scores.map(s => s.axis)).toEqual(['social', 'social']);
  });

  it('breaks text evidence down by document topic', () => {
    const records = batch();
    records.documents = [
      withTopics('d1', 'A', ['B'], 'Growth plan', ['tax', 'jobs']),
      withTopics('d2', 'B', [], 'No growth without growth', ['tax', ' ']),
    ];
    const run = scoreWindow(records, profile(), lexicon, { window, computedAt });
    const a = run.scores.find(s => s.memberId === 'A');
    const b = run.scores.find(s => s.memberId === 'B');

    expect(a?.topics).toEqual([
      { topic: 'jobs', documents: 1, value: 0.4, confidence: 0.5 },
      { topic: 'tax', documents: 1, value: 0.4, confidence: 0.5 },
    ]);
    expect(b?.topics.map(t => [t.topic, t.documents])).toEqual([
      ['jobs', 1],
      ['tax', 2],
    ]);
    const tax = b?.topics.find(t => t.topic === 'tax');
    expect(tax?.value).toBeCloseTo((0.4 + 0.8 / Math.SQRT2) / 2, 12);
    expect(tax?.confidence).toBe(0.75);
  });

  it('adds no vote signal to an axis without poles', () => {
    const records = batch();
    records.members.push({
      id: 'C',
      name: 'Member C',
      party: null,
      jurisdiction: '',
      activeFrom: new Date('2020-01-01'),
      activeTo: null,
    });
    records.votes = ['rc1', 'rc2', 'rc3', 'rc4', 'rc5', 'rc6'].map(id => ({
      id,
      timestamp: new Date('2024-04-01T00:00:00Z'),
      positions: { A: 'yea' as const, B: 'yea' as const, C: 'yea' as const },
      billId: null,
    }));
    const noPoles = parseScoringProfile({ engine: { minVotes: 1 }, axes: { social: { anchors: {} } } });
    const run = scoreWindow(records, noPoles, lexicon, { window, computedAt });

    expect(run.scores.map(s => s.memberId)).toEqual(['A', 'B', 'C']);
    for (const s of run.scores) {
      expect(s.components.vote).toEqual({ value: 0, confidence: 0 });
      expect(s.value).toBe(0);
      expect(s.confidence).toBe(0);
    }
  });
});

describe('scoreRawBatch', () => {
  it('skips malformed records and reports them', () => {
    const run = scoreRawBatch(
      {
        members: [],
        documents: [{ id: 'd1', sponsorId: 'A', cosponsorIds: ['B'], text: 'Growth plan', timestamp: '2024-03-01' }],
        votes: [
          { id: 'rc1', timestamp: '2024-04-01', positions: { A: 'yea', B: 'yea' } },
          { id: 'rc2', timestamp: '2024-04-02', positions: { A: 'present' } },
        ],
      },
      profile(),
      lexicon,
      { window, computedAt },
    );

    expect(run.rejected.map(r => r.id)).toEqual(['rc2']);
    expect(run.votes).toBe(1);
    expect(run.scores).toHaveLength(2);
  });
});

describe('parseScoringProfile', () => {
  it('fills in engine and axis defaults', () => {
    const parsed = profile();
    expect(parsed.engine).toEqual({
      voteWeight: 1,
      tolerance: 1e-4,
      maxIterations: 100,
      nonConvergencePenalty: 0.5,
      minVotes: 5,
    });
    expect(parsed.axes.economic?.weights).toEqual({ text: 1 / 3, coalition: 1 / 3, vote: 1 / 3 });
    expect(parsed.axes.economic?.neutralBand).toBe(0.3);
  });

  it('rejects anchors outside [-1, 1]', () => {
    expect(() => parseScoringProfile({ axes: { economic: { anchors: { A: 1.5 } } } })).toThrow(
      /axes\.economic\.anchors\.A/,
    );
  });

  it('rejects overlapping poles', () => {
    expect(() =>
      parseScoringProfile({ axes: { economic: { poles: { poleA: ['A', 'B'], poleB: ['B'] } } } }),
    ).toThrow(/poleA and poleB must be disjoint/);
  });

  it('requires at least one axis', () => {
    expect(() => parseScoringProfile({ axes: {} })).toThrow(/At least one axis is required/);
  });
});
