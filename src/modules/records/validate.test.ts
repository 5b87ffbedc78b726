import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../utils/errors.js';
import { activeDuring, inWindow } from './types.js';
import { validateBatch } from './validate.js';

const member = { id: 'X000001', name: 'Member One', party: 'Blue', activeFrom: '2019-01-03' };

describe('validateBatch', () => {
  it('keeps good records and reports malformed ones', () => {
    const result = validateBatch({
      members: [member, { id: 'X000002', name: '' , activeFrom: '2019-01-03' }],
      documents: [
        {
          id: 'hr-1',
          sponsorId: 'X000001',
          text: 'A bill.',
          timestamp: '2024-02-01T12:00:00Z',
        },
      ],
      votes: [
        { id: 'rc-1', timestamp: '2024-02-02T00:00:00Z', positions: { X000001: 'yea' } },
        { id: 'rc-bad', timestamp: '2024-02-03T00:00:00Z', positions: { X000001: 'maybe' } },
        { id: 'rc-when', timestamp: 'last tuesday', positions: {} },
      ],
    });

    expect(result.members.map(m => m.id)).toEqual(['X000001']);
    expect(result.documents).toHaveLength(1);
    expect(result.votes.map(v => v.id)).toEqual(['rc-1']);
    expect(result.rejected.map(r => [r.kind, r.index, r.id])).toEqual([
      ['member', 1, 'X000002'],
      ['vote', 1, 'rc-bad'],
      ['vote', 2, 'rc-when'],
    ]);
    expect(result.rejected[2]?.issues).toEqual([
      { path: 'timestamp', message: 'Invalid timestamp (expected ISO-8601)' },
    ]);
  });

  it('fills defaults and parses timestamps', () => {
    const result = validateBatch({
      members: [member],
      documents: [{ id: 'sp-1', sponsorId: 'X000001', text: '', timestamp: '2024-02-01T12:00:00Z' }],
      votes: [{ id: 'rc-1', timestamp: '2024-02-02T00:00:00Z', positions: {} }],
    });

    expect(result.members[0]).toEqual({
      id: 'X000001',
      name: 'Member One',
      party: 'Blue',
      jurisdiction: '',
      activeFrom: new Date('2019-01-03'),
      activeTo: null,
    });
    expect(result.documents[0]?.kind).toBe('bill');
    expect(result.documents[0]?.cosponsorIds).toEqual([]);
    expect(result.documents[0]?.timestamp.toISOString()).toBe('2024-02-01T12:00:00.000Z');
    expect(result.votes[0]?.billId).toBeNull();
  });

  it('drops the sponsor and repeats from the cosponsor list', () => {
    const result = validateBatch({
      documents: [
        {
          id: 'hr-2',
          sponsorId: 'X000001',
          cosponsorIds: ['X000002', 'X000001', 'X000002', 'X000003'],
          text: 'A bill.',
          timestamp: '2024-02-01',
        },
      ],
    });
    expect(result.documents[0]?.cosponsorIds).toEqual(['X000002', 'X000003']);
  });

  it('rejects a member whose term ends before it starts', () => {
    const result = validateBatch({ members: [{ ...member, activeTo: '2018-01-01' }] });
    expect(result.members).toEqual([]);
    expect(result.rejected[0]?.issues).toEqual([{ path: 'activeTo', message: 'activeTo must be after activeFrom' }]);
  });

  it('keeps the first of duplicate members', () => {
    const result = validateBatch({ members: [member, { ...member, name: 'Someone Else' }] });
    expect(result.members).toHaveLength(1);
    expect(result.members[0]?.name).toBe('Member One');
  });

  it('throws when the envelope itself is wrong', () => {
    expect(() => validateBatch('not a batch')).toThrow(ValidationError);
    expect(() => validateBatch({ votes: 'rc-1' })).toThrow(/Invalid record batch/);
  });
});

describe('time windows', () => {
  const window = { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-07-01T00:00:00Z') };

  it('is half-open', () => {
    expect(inWindow(new Date('2024-01-01T00:00:00Z'), window)).toBe(true);
    expect(inWindow(new Date('2024-07-01T00:00:00Z'), window)).toBe(false);
  });

  it('treats a member as active if their term overlaps the window', () => {
    const base = { id: 'X', name: 'X', party: null, jurisdiction: '' };
    expect(activeDuring({ ...base, activeFrom: new Date('2020-01-01'), activeTo: null }, window)).toBe(true);
    expect(activeDuring({ ...base, activeFrom: new Date('2024-03-01'), activeTo: null }, window)).toBe(true);
    expect(activeDuring({ ...base, activeFrom: new Date('2024-07-01'), activeTo: null }, window)).toBe(false);
    expect(
      activeDuring({ ...base, activeFrom: new Date('2020-01-01'), activeTo: new Date('2024-01-01') }, window),
    ).toBe(false);
  });
});
