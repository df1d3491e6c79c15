/**
 * Records returned by the sessions API. Only the fields the report reads are
 * named; every other field is carried through untouched. Nothing here is
 * validated beyond presence, so readers go through the accessors below.
 */
export interface TimelogEntry {
  start?: unknown;
  end?: unknown;
  [field: string]: unknown;
}

export interface ParticipantRecord {
  participantId?: unknown;
  name?: unknown;
  timelog?: unknown;
  [field: string]: unknown;
}

export interface SessionRecord {
  id?: unknown;
  roomId?: unknown;
  start?: unknown;
  end?: unknown;
  status?: unknown;
  participants?: unknown;
  [field: string]: unknown;
}

export interface SessionsPageInfo {
  currentPage: number;
  lastPage: number;
}

export interface SessionsPage {
  data: SessionRecord[];
  pageInfo: SessionsPageInfo;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Every entry of `participants`, malformed ones included, so that counts and
 * slot positions follow the upstream list.
 */
export function getParticipants(session: SessionRecord): unknown[] {
  return Array.isArray(session.participants) ? session.participants : [];
}

export function getTimelog(participant: ParticipantRecord): TimelogEntry[] {
  return Array.isArray(participant.timelog) ? participant.timelog.filter(isRecord) : [];
}
