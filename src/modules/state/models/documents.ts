import type Database from 'better-sqlite3';
import type { DocumentKind, LegislativeDocument, TimeWindow } from '../../records/types.js';

interface DocumentRow {
  id: string;
  kind: DocumentKind;
  sponsor_id: string;
  text: string;
  timestamp: string;
  topics_json: string;
}

function parseTopics(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
}

export function createDocumentModel(db: Database.Database) {
  const upsertDoc = db.prepare(`
    INSERT INTO documents (id, kind, sponsor_id, text, timestamp, topics_json)
    VALUES (@id, @kind, @sponsor_id, @text, @timestamp, @topics_json)
    ON CONFLICT(id) DO UPDATE SET
      kind = excluded.kind,
      sponsor_id = excluded.sponsor_id,
      text = excluded.text,
      timestamp = excluded.timestamp,
      topics_json = excluded.topics_json
  `);
  const clearCosponsors = db.prepare('DELETE FROM document_cosponsors WHERE document_id = ?');
  const insertCosponsor = db.prepare(
    'INSERT OR IGNORE INTO document_cosponsors (document_id, member_id) VALUES (?, ?)',
  );
  const selectCosponsors = db.prepare(
    'SELECT member_id FROM document_cosponsors WHERE document_id = ? ORDER BY member_id',
  );

  const save = db.transaction((doc: LegislativeDocument) => {
    upsertDoc.run({
      id: doc.id,
      kind: doc.kind,
      sponsor_id: doc.sponsorId,
      text: doc.text,
      timestamp: doc.timestamp.toISOString(),
      topics_json: JSON.stringify(doc.topics),
    });
    clearCosponsors.run(doc.id);
    for (const memberId of doc.cosponsorIds) insertCosponsor.run(doc.id, memberId);
  });

  const toDocument = (row: DocumentRow): LegislativeDocument => ({
    id: row.id,
    kind: row.kind,
    sponsorId: row.sponsor_id,
    cosponsorIds: (selectCosponsors.all(row.id) as Array<{ member_id: string }>).map(r => r.member_id),
    text: row.text,
    timestamp: new Date(row.timestamp),
    topics: parseTopics(row.topics_json),
  });

  return {
    /** Insert or replace a document with its cosponsor list. */
    save(doc: LegislativeDocument): void {
      save(doc);
    },

    getById(id: string): LegislativeDocument | undefined {
      const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id) as DocumentRow | undefined;
      return row ? toDocument(row) : undefined;
    },

    inWindow(window: TimeWindow): LegislativeDocument[] {
      const rows = db
        .prepare('SELECT * FROM documents WHERE timestamp >= ? AND timestamp < ? ORDER BY id')
        .all(window.start.toISOString(), window.end.toISOString()) as DocumentRow[];
      return rows.map(toDocument);
    },

    count(): number {
      const row = db.prepare('SELECT COUNT(*) as count FROM documents').get() as { count: number };
      return row.count;
    },
  };
}
