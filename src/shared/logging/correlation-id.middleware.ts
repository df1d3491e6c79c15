import { Injectable, NestMiddleware } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { PinoLoggerService } from './pino-logger.service';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

type RawRequest = FastifyRequest['raw'] & { correlationId?: string };

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(CorrelationIdMiddleware.name);
  }

  use(req: RawRequest, res: FastifyReply['raw'], next: () => void): void {
    const header = req.headers[CORRELATION_ID_HEADER];
    const correlationId = (Array.isArray(header) ? header[0] : header) || uuidv4();

    req.correlationId = correlationId;
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    this.logger
      .withCorrelationId(correlationId)
      .debug({ method: req.method, url: req.url }, 'Incoming request');

    next();
  }
}
