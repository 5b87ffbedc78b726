import type Database from 'better-sqlite3';
import { getLogger } from '../../utils/logger.js';
import type { RecordBatch, TimeWindow } from '../records/types.js';
import { createDocumentModel } from './models/documents.js';
import { createMemberModel } from './models/members.js';
import { createVoteModel } from './models/votes.js';

const log = getLogger();

export interface SaveBatchResult {
  membersInserted: number;
  partyCorrections: number;
  documents: number;
  votes: number;
}

/** Persist a validated batch in one transaction. */
export function saveBatch(db: Database.Database, batch: RecordBatch): SaveBatchResult {
  const members = createMemberModel(db);
  const documents = createDocumentModel(db);
  const votes = createVoteModel(db);
  const result: SaveBatchResult = { membersInserted: 0, partyCorrections: 0, documents: 0, votes: 0 };

  db.transaction(() => {
    for (const member of batch.members) {
      const outcome = members.upsert(member);
      if (outcome === 'inserted') result.membersInserted++;
      else if (outcome === 'party-corrected') result.partyCorrections++;
    }
    for (const doc of batch.documents) {
      documents.save(doc);
      result.documents++;
    }
    for (const vote of batch.votes) {
      votes.save(vote);
      result.votes++;
    }
  })();

  log.info(result, 'Batch saved');
  return result;
}

/** Every member, plus the documents and votes inside [start, end). */
export function loadWindow(db: Database.Database, window: TimeWindow): RecordBatch {
  return {
    members: createMemberModel(db).getAll(),
    documents: createDocumentModel(db).inWindow(window),
    votes: createVoteModel(db).inWindow(window),
  };
}
