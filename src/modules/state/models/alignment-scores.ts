import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { AlignmentScore } from '../../engine/types.js';
import type { TimeWindow } from '../../records/types.js';

export interface AlignmentScoreRow {
  id: number;
  member_id: string;
  axis: string;
  window_start: string;
  window_end: string;
  value: number;
  confidence: number;
  text_value: number;
  text_confidence: number;
  coalition_value: number;
  coalition_confidence: number;
  vote_value: number;
  vote_confidence: number;
  lexicon_version: string;
  computed_at: string;
  topics_json: string;
}

export interface StoredAlignmentScore extends AlignmentScore {
  id: number;
}

export interface ScoreFilter {
  memberIds?: readonly string[];
  axis?: string;
  window?: TimeWindow;
}

export interface PartySummary {
  party: string | null;
  axis: string;
  members: number;
  avgValue: number;
  avgConfidence: number;
}

const StoredTopicsSchema = z.array(
  z.object({ topic: z.string(), documents: z.number(), value: z.number(), confidence: z.number() }),
);

export function rowToScore(row: AlignmentScoreRow): StoredAlignmentScore {
  return {
    id: row.id,
    memberId: row.member_id,
    axis: row.axis,
    window: { start: new Date(row.window_start), end: new Date(row.window_end) },
    value: row.value,
    confidence: row.confidence,
    components: {
      text: { value: row.text_value, confidence: row.text_confidence },
      coalition: { value: row.coalition_value, confidence: row.coalition_confidence },
      vote: { value: row.vote_value, confidence: row.vote_confidence },
    },
    topics: StoredTopicsSchema.parse(JSON.parse(row.topics_json)),
    lexiconVersion: row.lexicon_version,
    computedAt: new Date(row.computed_at),
  };
}

// Newest version per (member, axis, window)
const LATEST = `
  SELECT s.* FROM alignment_scores s
  WHERE s.id = (
    SELECT s2.id FROM alignment_scores s2
    WHERE s2.member_id = s.member_id AND s2.axis = s.axis
      AND s2.window_start = s.window_start AND s2.window_end = s.window_end
    ORDER BY s2.computed_at DESC, s2.id DESC LIMIT 1
  )
`;

/**
 * Append-only score history. A rerun inserts new versions keyed by
 * computed_at; nothing is ever updated in place.
 */
export function createAlignmentScoreModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO alignment_scores (
      member_id, axis, window_start, window_end, value, confidence,
      text_value, text_confidence, coalition_value, coalition_confidence,
      vote_value, vote_confidence, topics_json, lexicon_version, computed_at
    ) VALUES (
      @member_id, @axis, @window_start, @window_end, @value, @confidence,
      @text_value, @text_confidence, @coalition_value, @coalition_confidence,
      @vote_value, @vote_confidence, @topics_json, @lexicon_version, @computed_at
    )
  `);

  const insertMany = db.transaction((scores: readonly AlignmentScore[]) => {
    for (const s of scores) {
      insert.run({
        member_id: s.memberId,
        axis: s.axis,
        window_start: s.window.start.toISOString(),
        window_end: s.window.end.toISOString(),
        value: s.value,
        confidence: s.confidence,
        text_value: s.components.text.value,
        text_confidence: s.components.text.confidence,
        coalition_value: s.components.coalition.value,
        coalition_confidence: s.components.coalition.confidence,
        vote_value: s.components.vote.value,
        vote_confidence: s.components.vote.confidence,
        topics_json: JSON.stringify(s.topics),
        lexicon_version: s.lexiconVersion,
        computed_at: s.computedAt.toISOString(),
      });
    }
  });

  function whereClause(filter: ScoreFilter, alias: string): { sql: string; params: string[] } {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.memberIds && filter.memberIds.length > 0) {
      clauses.push(`${alias}.member_id IN (${filter.memberIds.map(() => '?').join(', ')})`);
      params.push(...filter.memberIds);
    }
    if (filter.axis) {
      clauses.push(`${alias}.axis = ?`);
      params.push(filter.axis);
    }
    if (filter.window) {
      clauses.push(`${alias}.window_start = ? AND ${alias}.window_end = ?`);
      params.push(filter.window.start.toISOString(), filter.window.end.toISOString());
    }
    return { sql: clauses.length > 0 ? clauses.join(' AND ') : '1 = 1', params };
  }

  return {
    insertMany(scores: readonly AlignmentScore[]): number {
      insertMany(scores);
      return scores.length;
    },

    /** Newest version of each (member, axis, window) matching the filter. */
    latest(filter: ScoreFilter = {}): StoredAlignmentScore[] {
      const where = whereClause(filter, 's');
      const rows = db
        .prepare(`${LATEST} AND ${where.sql} ORDER BY s.member_id, s.axis, s.window_start`)
        .all(...where.params) as AlignmentScoreRow[];
      return rows.map(rowToScore);
    },

    /** Every version for one member, newest first. */
    history(memberId: string, axis?: string, limit = 50): StoredAlignmentScore[] {
      const where = whereClause({ memberIds: [memberId], axis }, 's');
      const rows = db
        .prepare(
          `SELECT s.* FROM alignment_scores s WHERE ${where.sql}
           ORDER BY s.computed_at DESC, s.id DESC LIMIT ?`,
        )
        .all(...where.params, limit) as AlignmentScoreRow[];
      return rows.map(rowToScore);
    },

    /**
     * Mean of each party's latest scores. Members whose latest score has
     * confidence 0 are left out of the averages.
     */
    partySummary(filter: ScoreFilter = {}): PartySummary[] {
      const where = whereClause(filter, 's');
      const rows = db
        .prepare(`
          SELECT m.party AS party, s.axis AS axis, COUNT(*) AS members,
                 AVG(s.value) AS avg_value, AVG(s.confidence) AS avg_confidence
          FROM (${LATEST} AND ${where.sql}) s
          JOIN members m ON m.id = s.member_id
          WHERE s.confidence > 0
          GROUP BY m.party, s.axis
          ORDER BY s.axis, m.party
        `)
        .all(...where.params) as Array<{
          party: string | null;
          axis: string;
          members: number;
          avg_value: number;
          avg_confidence: number;
        }>;
      return rows.map(r => ({
        party: r.party,
        axis: r.axis,
        members: r.members,
        avgValue: r.avg_value,
        avgConfidence: r.avg_confidence,
      }));
    },

    count(): number {
      const row = db.prepare('SELECT COUNT(*) as count FROM alignment_scores').get() as { count: number };
      return row.count;
    },
  };
}

export type AlignmentScoreModel = ReturnType<typeof createAlignmentScoreModel>;
