import { Injectable } from '@nestjs/common';
import type { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import type { DomainEvent } from '../../../domain/events/base.event';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Logging Event Publisher Adapter
 * Implements EventPublisherPort by writing each domain event as one
 * structured log line.
 */
@Injectable()
export class LoggingEventPublisherAdapter implements EventPublisherPort {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(LoggingEventPublisherAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.info({ jobId: event.jobId, event: event.toJSON() }, event.eventName);
  }

  publishAsync(event: DomainEvent): void {
    this.publish(event).catch((error: unknown) => {
      this.logger.error(
        { eventName: event.eventName, error: error instanceof Error ? error.message : String(error) },
        'Failed to publish event',
      );
    });
  }
}
