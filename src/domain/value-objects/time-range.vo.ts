import { InvalidInputError } from '../errors/usage-report.errors';

const ONE_SECOND_MS = 1000;

/**
 * Time Range Value Object
 * Inclusive epoch-millisecond interval covering one UTC calendar month:
 * from day 1 00:00:00.000 to 23:59:59.000 of the last day.
 */
export class TimeRangeVO {
  private constructor(
    private readonly _year: number,
    private readonly _month: number,
    private readonly _startMs: number,
    private readonly _endMs: number,
  ) {}

  static forMonth(year: number, month: number): TimeRangeVO {
    if (!Number.isInteger(year) || year < 1000 || year > 9999) {
      throw new InvalidInputError(`Year must be a 4-digit integer, got ${year}`);
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new InvalidInputError(`Month must be an integer between 1 and 12, got ${month}`);
    }

    // Date.UTC rolls month 12 over into January of the following year
    const startMs = Date.UTC(year, month - 1, 1);
    const nextMonthStartMs = Date.UTC(year, month, 1);

    return new TimeRangeVO(year, month, startMs, nextMonthStartMs - ONE_SECOND_MS);
  }

  get year(): number {
    return this._year;
  }

  get month(): number {
    return this._month;
  }

  get startMs(): number {
    return this._startMs;
  }

  get endMs(): number {
    return this._endMs;
  }

  /** `usage_<year>_<month>.csv`, month not zero-padded. */
  get reportFilename(): string {
    return `usage_${this._year}_${this._month}.csv`;
  }

  toJSON() {
    return {
      year: this._year,
      month: this._month,
      startMs: this._startMs,
      endMs: this._endMs,
    };
  }
}

export function monthRange(year: number, month: number): TimeRangeVO {
  return TimeRangeVO.forMonth(year, month);
}
