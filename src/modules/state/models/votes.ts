import type Database from 'better-sqlite3';
import type { TimeWindow, Vote, VoteValue } from '../../records/types.js';

interface VoteRow {
  id: string;
  timestamp: string;
  bill_id: string | null;
}

interface PositionRow {
  vote_id: string;
  member_id: string;
  position: VoteValue;
}

export function createVoteModel(db: Database.Database) {
  const upsertVote = db.prepare(`
    INSERT INTO votes (id, timestamp, bill_id) VALUES (@id, @timestamp, @bill_id)
    ON CONFLICT(id) DO UPDATE SET timestamp = excluded.timestamp, bill_id = excluded.bill_id
  `);
  const clearPositions = db.prepare('DELETE FROM vote_positions WHERE vote_id = ?');
  const insertPosition = db.prepare(
    'INSERT INTO vote_positions (vote_id, member_id, position) VALUES (?, ?, ?)',
  );

  const save = db.transaction((vote: Vote) => {
    upsertVote.run({ id: vote.id, timestamp: vote.timestamp.toISOString(), bill_id: vote.billId });
    clearPositions.run(vote.id);
    for (const [memberId, position] of Object.entries(vote.positions)) {
      insertPosition.run(vote.id, memberId, position);
    }
  });

  return {
    /** Insert or replace a roll call with all of its positions. */
    save(vote: Vote): void {
      save(vote);
    },

    inWindow(window: TimeWindow): Vote[] {
      const start = window.start.toISOString();
      const end = window.end.toISOString();
      const votes = db
        .prepare('SELECT * FROM votes WHERE timestamp >= ? AND timestamp < ? ORDER BY id')
        .all(start, end) as VoteRow[];
      const positions = db
        .prepare(`
          SELECT p.vote_id, p.member_id, p.position
          FROM vote_positions p JOIN votes v ON v.id = p.vote_id
          WHERE v.timestamp >= ? AND v.timestamp < ?
          ORDER BY p.vote_id, p.member_id
        `)
        .all(start, end) as PositionRow[];

      const byVote = new Map<string, Record<string, VoteValue>>();
      for (const p of positions) {
        const record = byVote.get(p.vote_id) ?? {};
        record[p.member_id] = p.position;
        byVote.set(p.vote_id, record);
      }

      return votes.map(v => ({
        id: v.id,
        timestamp: new Date(v.timestamp),
        billId: v.bill_id,
        positions: byVote.get(v.id) ?? {},
      }));
    },

    count(): number {
      const row = db.prepare('SELECT COUNT(*) as count FROM votes').get() as { count: number };
      return row.count;
    },
  };
}
