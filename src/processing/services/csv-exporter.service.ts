import { Injectable } from '@nestjs/common';
import { createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { ParticipantColumns } from '../../domain/value-objects/participant-columns.vo';
import {
  getParticipants,
  getTimelog,
  isRecord,
  type ParticipantRecord,
  type SessionRecord,
} from '../../shared/interfaces/session-record.interface';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export const SESSION_COLUMNS = [
  'session_id',
  'room_id',
  'session_start_time',
  'session_end_time',
  'status',
  'number_of_participants',
] as const;

const PARTICIPANT_FIELDS = ['id', 'name', 'first_start', 'last_end'] as const;

const EMPTY_SLOT = PARTICIPANT_FIELDS.map(() => '');

const LINE_TERMINATOR = '\r\n';
const PROGRESS_EVERY_ROWS = 10;

export type RowProgressObserver = (
  rowsWritten: number,
  totalRows: number,
) => void | Promise<unknown>;

export interface CsvExportSummary {
  filePath: string;
  rows: number;
  participantColumns: number;
}

function toCell(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

// Numbers compare numerically, anything else by its text
function compareRaw(left: unknown, right: unknown): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const a = toCell(left);
  const b = toCell(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

function extreme(values: unknown[], pick: 'min' | 'max'): string {
  const present = values.filter(isPresent);
  if (present.length === 0) {
    return '';
  }
  const winner = present.reduce((best, value) => {
    const order = compareRaw(value, best);
    return (pick === 'min' ? order < 0 : order > 0) ? value : best;
  });
  return toCell(winner);
}

/**
 * Turns a month of sessions into the wide usage CSV: six session columns,
 * then four columns per participant slot.
 */
@Injectable()
export class CsvExporterService {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(CsvExporterService.name);
  }

  /**
   * `'auto'`, `0` or nothing: the largest participant count among the
   * sessions. Otherwise the requested count, which may truncate or pad.
   */
  resolveParticipantColumns(
    sessions: ReadonlyArray<SessionRecord>,
    desired?: ParticipantColumns,
  ): number {
    if (desired === undefined || desired === 'auto' || desired === 0) {
      return sessions.reduce(
        (max, session) => Math.max(max, getParticipants(session).length),
        0,
      );
    }
    return Math.max(Math.floor(desired), 0);
  }

  buildHeader(participantColumns: number): string[] {
    const header: string[] = [...SESSION_COLUMNS];
    for (let slot = 1; slot <= participantColumns; slot++) {
      header.push(...PARTICIPANT_FIELDS.map((field) => `participant${slot}_${field}`));
    }
    return header;
  }

  buildRow(session: SessionRecord, participantColumns: number): string[] {
    const participants = getParticipants(session);

    const row = [
      toCell(session.id),
      toCell(session.roomId),
      toCell(session.start),
      toCell(session.end),
      toCell(session.status),
      String(participants.length),
    ];

    for (let slot = 0; slot < participantColumns; slot++) {
      const participant: unknown = participants[slot];
      row.push(...(isRecord(participant) ? this.participantCells(participant) : EMPTY_SLOT));
    }

    return row;
  }

  /**
   * Writes header and one row per session, in input order, to `filePath`.
   * `onProgress` runs every 10 rows and after the last one.
   */
  async export(
    sessions: ReadonlyArray<SessionRecord>,
    desired: ParticipantColumns | undefined,
    filePath: string,
    onProgress?: RowProgressObserver,
  ): Promise<CsvExportSummary> {
    const participantColumns = this.resolveParticipantColumns(sessions, desired);
    const totalRows = sessions.length;

    const lines = async function* (this: CsvExporterService) {
      yield this.formatLine(this.buildHeader(participantColumns));

      for (let index = 0; index < totalRows; index++) {
        yield this.formatLine(this.buildRow(sessions[index], participantColumns));

        const rowsWritten = index + 1;
        if (onProgress && (rowsWritten % PROGRESS_EVERY_ROWS === 0 || rowsWritten === totalRows)) {
          await onProgress(rowsWritten, totalRows);
        }
      }
    };

    await pipeline(
      Readable.from(lines.call(this)),
      createWriteStream(filePath, { encoding: 'utf-8' }),
    );

    this.logger.info({ filePath, rows: totalRows, participantColumns }, 'CSV report written');

    return { filePath, rows: totalRows, participantColumns };
  }

  private participantCells(participant: ParticipantRecord): string[] {
    const timelog = getTimelog(participant);
    return [
      toCell(participant.participantId),
      toCell(participant.name),
      extreme(
        timelog.map((entry) => entry.start),
        'min',
      ),
      extreme(
        timelog.map((entry) => entry.end),
        'max',
      ),
    ];
  }

  private formatLine(cells: string[]): string {
    return cells.map(escapeCsv).join(',') + LINE_TERMINATOR;
  }
}
