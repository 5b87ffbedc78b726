import type { z } from 'zod';
import { getLogger } from '../../utils/logger.js';
import { ValidationError, toValidationIssues, type ValidationIssue } from '../../utils/errors.js';
import { DocumentSchema, MemberSchema, RecordBatchEnvelopeSchema, VoteSchema } from './schemas.js';
import type { LegislativeDocument, Member, RecordBatch, Vote } from './types.js';

const log = getLogger();

export type RecordKind = 'member' | 'document' | 'vote';

export interface RejectedRecord {
  kind: RecordKind;
  index: number;
  /** The record's id when it had a readable one */
  id: string | null;
  issues: ValidationIssue[];
}

export interface ValidatedBatch extends RecordBatch {
  rejected: RejectedRecord[];
}

function readId(raw: unknown): string | null {
  if (raw && typeof raw === 'object' && 'id' in raw && typeof raw.id === 'string') return raw.id;
  return null;
}

function validateEach<T>(
  kind: RecordKind,
  items: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rejected: RejectedRecord[],
): T[] {
  const accepted: T[] = [];
  items.forEach((raw, index) => {
    const result = schema.safeParse(raw);
    if (result.success) {
      accepted.push(result.data);
      return;
    }
    const record: RejectedRecord = {
      kind,
      index,
      id: readId(raw),
      issues: toValidationIssues(result.error.issues),
    };
    log.warn({ kind, index, id: record.id, issues: record.issues }, `Skipping malformed ${kind}`);
    rejected.push(record);
  });
  return accepted;
}

/**
 * Validate a raw batch record by record. Malformed records are logged and
 * reported in `rejected`; the rest of the batch goes through untouched.
 * Only a batch whose envelope is not an object of arrays is rejected outright.
 */
export function validateBatch(raw: unknown): ValidatedBatch {
  const envelope = RecordBatchEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new ValidationError('Invalid record batch', toValidationIssues(envelope.error.issues));
  }

  const rejected: RejectedRecord[] = [];
  const members: Member[] = validateEach('member', envelope.data.members, MemberSchema, rejected);
  const documents: LegislativeDocument[] = validateEach(
    'document',
    envelope.data.documents,
    DocumentSchema,
    rejected,
  );
  const votes: Vote[] = validateEach('vote', envelope.data.votes, VoteSchema, rejected);

  const memberIds = new Set<string>();
  const uniqueMembers: Member[] = [];
  for (const member of members) {
    if (memberIds.has(member.id)) {
      log.warn({ id: member.id }, 'Duplicate member in batch, keeping the first');
      continue;
    }
    memberIds.add(member.id);
    uniqueMembers.push(member);
  }

  log.debug(
    { members: uniqueMembers.length, documents: documents.length, votes: votes.length, rejected: rejected.length },
    'Batch validated',
  );

  return { members: uniqueMembers, documents, votes, rejected };
}
