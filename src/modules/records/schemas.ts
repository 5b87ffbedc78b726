import { z } from 'zod';

// ─── Record Zod Schemas ─────────────────────────────────
// Raw JSON shapes as handed over by ingestion. Dates arrive as ISO strings.

const zId = z.string().trim().min(1, 'Identifier must not be empty');

/** ISO-8601 date or datetime, parsed to a Date */
export const zTimestamp = z
  .string()
  .refine(s => !Number.isNaN(Date.parse(s)), 'Invalid timestamp (expected ISO-8601)')
  .transform(s => new Date(s));

export const VoteValueSchema = z.enum(['yea', 'nay', 'abstain', 'absent']);

export const MemberSchema = z
  .object({
    id: zId,
    name: z.string().min(1),
    party: z.string().min(1).nullable().default(null),
    jurisdiction: z.string().default(''),
    activeFrom: zTimestamp,
    activeTo: zTimestamp.nullable().default(null),
  })
  .refine(m => m.activeTo === null || m.activeTo.getTime() > m.activeFrom.getTime(), {
    message: 'activeTo must be after activeFrom',
    path: ['activeTo'],
  });

export const DocumentSchema = z
  .object({
    id: zId,
    kind: z.enum(['bill', 'speech']).default('bill'),
    sponsorId: zId,
    cosponsorIds: z.array(zId).default([]),
    text: z.string(),
    timestamp: zTimestamp,
    topics: z.array(z.string()).default([]),
  })
  .transform(d => ({
    ...d,
    // A sponsor listed as their own cosponsor would create a self-edge
    cosponsorIds: [...new Set(d.cosponsorIds)].filter(id => id !== d.sponsorId),
  }));

export const VoteSchema = z.object({
  id: zId,
  timestamp: zTimestamp,
  positions: z.record(zId, VoteValueSchema),
  billId: zId.nullable().default(null),
});

/** Envelope only; individual records are validated one at a time so a bad one can be skipped. */
export const RecordBatchEnvelopeSchema = z.object({
  members: z.array(z.unknown()).default([]),
  documents: z.array(z.unknown()).default([]),
  votes: z.array(z.unknown()).default([]),
});

export type MemberInput = z.input<typeof MemberSchema>;
export type DocumentInput = z.input<typeof DocumentSchema>;
export type VoteInput = z.input<typeof VoteSchema>;
