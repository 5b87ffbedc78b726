export type VoteValue = 'yea' | 'nay' | 'abstain' | 'absent';
export type DocumentKind = 'bill' | 'speech';

export interface Member {
  id: string;
  name: string;
  /** null for independents */
  party: string | null;
  jurisdiction: string;
  activeFrom: Date;
  /** null while still serving */
  activeTo: Date | null;
}

export interface LegislativeDocument {
  id: string;
  kind: DocumentKind;
  sponsorId: string;
  cosponsorIds: string[];
  text: string;
  timestamp: Date;
  topics: string[];
}

export interface Vote {
  id: string;
  timestamp: Date;
  positions: Record<string, VoteValue>;
  billId: string | null;
}

/** Half-open interval [start, end). */
export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface RecordBatch {
  members: Member[];
  documents: LegislativeDocument[];
  votes: Vote[];
}

export function inWindow(timestamp: Date, window: TimeWindow): boolean {
  const t = timestamp.getTime();
  return t >= window.start.getTime() && t < window.end.getTime();
}

/** Whether a member served at any point during the window. */
export function activeDuring(member: Member, window: TimeWindow): boolean {
  if (member.activeFrom.getTime() >= window.end.getTime()) return false;
  return member.activeTo === null || member.activeTo.getTime() > window.start.getTime();
}

export function windowKey(window: TimeWindow): string {
  return `${window.start.toISOString()}/${window.end.toISOString()}`;
}

export function emptyBatch(): RecordBatch {
  return { members: [], documents: [], votes: [] };
}
