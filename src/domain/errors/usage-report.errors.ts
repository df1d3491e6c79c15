/**
 * Errors raised by the usage report domain. Each carries a stable `code` and
 * the HTTP status the boundary layer answers with.
 */
export abstract class UsageReportError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  get details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toJSON(): Record<string, unknown> {
    return {
      statusCode: this.httpStatus,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Non-2xx answer from the sessions API. The upstream status and body are kept
 * verbatim.
 */
export class UpstreamError extends UsageReportError {
  readonly code = 'UPSTREAM_ERROR';
  readonly httpStatus: number;

  constructor(
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(`Sessions API returned status ${statusCode}: ${body}`);
    this.httpStatus = statusCode >= 400 && statusCode <= 599 ? statusCode : 502;
  }

  get details(): Record<string, unknown> {
    return { upstreamStatus: this.statusCode, body: this.body };
  }
}

export class NoDataError extends UsageReportError {
  readonly code = 'NO_DATA';
  readonly httpStatus = 404;

  constructor(message = 'No sessions found') {
    super(message);
  }
}

export class JobNotFoundError extends UsageReportError {
  readonly code = 'JOB_NOT_FOUND';
  readonly httpStatus = 404;

  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

export class JobNotReadyError extends UsageReportError {
  readonly code = 'JOB_NOT_READY';
  readonly httpStatus = 409;

  constructor(
    readonly jobId: string,
    readonly status: string,
  ) {
    super(`Job ${jobId} is ${status}, export is not available for download`);
  }
}

export class InvalidInputError extends UsageReportError {
  readonly code = 'INVALID_INPUT';
  readonly httpStatus = 400;

  constructor(
    message: string,
    readonly issues: ReadonlyArray<string> = [],
  ) {
    super(message);
  }

  get details(): Record<string, unknown> | undefined {
    return this.issues.length > 0 ? { issues: this.issues } : undefined;
  }
}
