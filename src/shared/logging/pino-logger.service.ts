import { Injectable, LoggerService, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger } from 'pino';
import type { AppConfig } from '../../config/configuration';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
type LogFields = Record<string, unknown>;

// Sessions API keys travel in request bodies, query strings and headers
const REDACTED_PATHS = [
  'apiKey',
  'api_key',
  'query.api_key',
  'headers.authorization',
  'headers.Authorization',
];

/**
 * pino-backed Nest logger. Transient so that every consumer's `setContext`
 * stays its own.
 *
 * Accepts both call shapes: Nest's `(message, context?)` and the structured
 * `(fields, message)` used throughout the service.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(configService: ConfigService<AppConfig>) {
    const nodeEnv = configService.get('nodeEnv', { infer: true });

    this.logger = pino({
      level: configService.get('logLevel', { infer: true }) ?? 'info',
      redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
      ...(nodeEnv === 'development' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'usage-report-service',
        env: nodeEnv,
      },
    });
  }

  setContext(context: string): void {
    this.context = context;
  }

  log(message: string, context?: string): void {
    this.write('info', message, undefined, context);
  }

  info(message: string): void;
  info(fields: LogFields, message: string): void;
  info(messageOrFields: string | LogFields, message?: string): void {
    this.write('info', messageOrFields, message);
  }

  error(messageOrFields: string | LogFields, traceOrMessage?: string, context?: string): void {
    if (typeof messageOrFields === 'string') {
      this.write('error', { trace: traceOrMessage }, messageOrFields, context);
    } else {
      this.write('error', messageOrFields, traceOrMessage);
    }
  }

  warn(messageOrFields: string | LogFields, messageOrContext?: string): void {
    this.writeEither('warn', messageOrFields, messageOrContext);
  }

  debug(messageOrFields: string | LogFields, messageOrContext?: string): void {
    this.writeEither('debug', messageOrFields, messageOrContext);
  }

  verbose(message: string, context?: string): void {
    this.write('trace', message, undefined, context);
  }

  /**
   * Logger sharing this instance's context with extra bindings on every line.
   */
  child(bindings: LogFields): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }

  withCorrelationId(correlationId: string): PinoLoggerService {
    return this.child({ correlationId });
  }

  withJobId(jobId: string): PinoLoggerService {
    return this.child({ jobId });
  }

  // A string first argument means the second one is a Nest context
  private writeEither(level: LogLevel, messageOrFields: string | LogFields, second?: string): void {
    if (typeof messageOrFields === 'string') {
      this.write(level, messageOrFields, undefined, second);
    } else {
      this.write(level, messageOrFields, second);
    }
  }

  private write(
    level: LogLevel,
    messageOrFields: string | LogFields,
    message?: string,
    context?: string,
  ): void {
    const fields = typeof messageOrFields === 'string' ? {} : messageOrFields;
    const msg = typeof messageOrFields === 'string' ? messageOrFields : (message ?? '');

    this.logger[level]({ ...fields, context: context ?? this.context }, msg);
  }
}
