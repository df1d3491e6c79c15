import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { UsageReportError } from '../../domain/errors/usage-report.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export interface ErrorResponseBody {
  statusCode: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Renders every error as `{ statusCode, code, message, details? }`.
 * Domain errors keep their own status (the upstream one for `UpstreamError`);
 * anything unrecognised becomes a 500 with a generic message.
 */
@Catch()
export class UsageReportExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly httpAdapterHost: HttpAdapterHost,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(UsageReportExceptionFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();

    const body = this.toResponseBody(exception);

    if (body.statusCode >= 500) {
      this.logger.error(
        {
          code: body.code,
          error: exception instanceof Error ? exception.message : String(exception),
          stack: exception instanceof Error ? exception.stack : undefined,
        },
        'Request failed',
      );
    } else {
      this.logger.debug({ statusCode: body.statusCode, code: body.code }, 'Request rejected');
    }

    httpAdapter.reply(ctx.getResponse(), body, body.statusCode);
  }

  toResponseBody(exception: unknown): ErrorResponseBody {
    if (exception instanceof UsageReportError) {
      return {
        statusCode: exception.httpStatus,
        code: exception.code,
        message: exception.message,
        ...(exception.details && { details: exception.details }),
      };
    }

    if (exception instanceof HttpException) {
      return {
        statusCode: exception.getStatus(),
        code: 'HTTP_ERROR',
        message: exception.message,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
  }
}
