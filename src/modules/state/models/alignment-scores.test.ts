import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AlignmentScore } from '../../engine/types.js';
import { openDb } from '../db.js';
import { createAlignmentScoreModel } from './alignment-scores.js';
import { createMemberModel } from './members.js';

const window = { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2025-01-01T00:00:00Z') };

function score(memberId: string, value: number, confidence: number, computedAt: string, axis = 'economic'): AlignmentScore {
  return {
    memberId,
    axis,
    window,
    value,
    confidence,
    components: {
      text: { value, confidence },
      coalition: { value: 0, confidence: 0 },
      vote: { value: 0, confidence: 0 },
    },
    topics: [{ topic: 'tax', documents: 2, value, confidence }],
    lexiconVersion: 'v1',
    computedAt: new Date(computedAt),
  };
}

describe('alignment score model', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDb(':memory:');
    const members = createMemberModel(db);
    for (const [id, party] of [['A', 'Blue'], ['B', 'Red'], ['C', 'Blue'], ['D', 'Blue']] as const) {
      members.upsert({ id, name: id, party, jurisdiction: '', activeFrom: new Date('2020-01-01'), activeTo: null });
    }
  });

  afterEach(() => {
    db.close();
  });

  it('keeps every version and serves the newest', () => {
    const model = createAlignmentScoreModel(db);
    model.insertMany([score('A', -1, 1, '2024-06-01T00:00:00Z')]);
    model.insertMany([score('A', 0.4, 1, '2024-12-01T00:00:00Z')]);

    expect(model.count()).toBe(2);
    expect(model.latest().map(s => s.value)).toEqual([0.4]);
    expect(model.history('A').map(s => s.value)).toEqual([0.4, -1]);
    expect(model.history('A', 'economic', 1)).toHaveLength(1);
  });

  it('round-trips components, topics and timestamps', () => {
    const model = createAlignmentScoreModel(db);
    const original = score('B', -0.25, 0.5, '2024-12-01T00:00:00Z', 'social');
    model.insertMany([original]);

    const [stored] = model.latest({ memberIds: ['B'], axis: 'social', window });
    expect(stored).toEqual({ ...original, id: 1 });
  });

  it('refuses to overwrite a version in place', () => {
    const model = createAlignmentScoreModel(db);
    model.insertMany([score('A', 0.1, 1, '2024-12-01T00:00:00Z')]);
    expect(() => model.insertMany([score('A', 0.9, 1, '2024-12-01T00:00:00Z')])).toThrow();
    expect(model.latest()[0]?.value).toBe(0.1);
  });

  it('filters by member and axis', () => {
    const model = createAlignmentScoreModel(db);
    model.insertMany([
      score('A', 0.1, 1, '2024-12-01T00:00:00Z'),
      score('A', 0.2, 1, '2024-12-01T00:00:00Z', 'social'),
      score('B', 0.3, 1, '2024-12-01T00:00:00Z'),
    ]);

    expect(model.latest({ memberIds: ['A'] }).map(s => s.axis)).toEqual(['economic', 'social']);
    expect(model.latest({ axis: 'economic' }).map(s => s.memberId)).toEqual(['A', 'B']);
  });

  it('averages each party over latest scores with confidence', () => {
    const model = createAlignmentScoreModel(db);
    model.insertMany([
      score('A', -1, 1, '2024-06-01T00:00:00Z'),
      score('A', 0.4, 1, '2024-12-01T00:00:00Z'),
      score('C', 0.2, 0.5, '2024-12-01T00:00:00Z'),
      score('D', 0.9, 0, '2024-12-01T00:00:00Z'),
      score('B', -0.6, 1, '2024-12-01T00:00:00Z'),
    ]);

    const summary = model.partySummary({ axis: 'economic' });
    expect(summary.map(s => [s.party, s.members])).toEqual([
      ['Blue', 2],
      ['Red', 1],
    ]);
    expect(summary[0]?.avgValue).toBeCloseTo(0.3, 12);
    expect(summary[0]?.avgConfidence).toBeCloseTo(0.75, 12);
    expect(summary[1]?.avgValue).toBe(-0.6);
  });
});
