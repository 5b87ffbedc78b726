import type Database from 'better-sqlite3';
import { getLogger } from '../../../utils/logger.js';
import type { Member } from '../../records/types.js';

const log = getLogger();

export interface MemberRow {
  id: string;
  name: string;
  party: string | null;
  jurisdiction: string;
  active_from: string;
  active_to: string | null;
  ingested_at: string;
  updated_at: string;
}

export type MemberUpsertOutcome = 'inserted' | 'party-corrected' | 'unchanged';

export function rowToMember(row: MemberRow): Member {
  return {
    id: row.id,
    name: row.name,
    party: row.party,
    jurisdiction: row.jurisdiction,
    activeFrom: new Date(row.active_from),
    activeTo: row.active_to ? new Date(row.active_to) : null,
  };
}

export function createMemberModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO members (id, name, party, jurisdiction, active_from, active_to)
    VALUES (@id, @name, @party, @jurisdiction, @active_from, @active_to)
  `);
  const updateParty = db.prepare(
    "UPDATE members SET party = ?, updated_at = datetime('now') WHERE id = ?",
  );
  const selectById = db.prepare('SELECT * FROM members WHERE id = ?');

  return {
    /**
     * Members are immutable once ingested; re-ingesting one may only correct
     * its party label.
     */
    upsert(member: Member): MemberUpsertOutcome {
      const existing = selectById.get(member.id) as MemberRow | undefined;
      if (!existing) {
        insert.run({
          id: member.id,
          name: member.name,
          party: member.party,
          jurisdiction: member.jurisdiction,
          active_from: member.activeFrom.toISOString(),
          active_to: member.activeTo ? member.activeTo.toISOString() : null,
        });
        return 'inserted';
      }
      if (existing.party !== member.party) {
        updateParty.run(member.party, member.id);
        log.info({ id: member.id, from: existing.party, to: member.party }, 'Party label corrected');
        return 'party-corrected';
      }
      return 'unchanged';
    },

    getById(id: string): Member | undefined {
      const row = selectById.get(id) as MemberRow | undefined;
      return row ? rowToMember(row) : undefined;
    },

    getAll(): Member[] {
      const rows = db.prepare('SELECT * FROM members ORDER BY id').all() as MemberRow[];
      return rows.map(rowToMember);
    },

    count(): number {
      const row = db.prepare('SELECT COUNT(*) as count FROM members').get() as { count: number };
      return row.count;
    },
  };
}

export type MemberModel = ReturnType<typeof createMemberModel>;
