import { Module } from '@nestjs/common';
import { HttpModule } from '../shared/http/http.module';
import { LoggingModule } from '../shared/logging/logging.module';
import {
  EVENT_PUBLISHER_PORT,
  JOB_REGISTRY_PORT,
  REPORT_STORAGE_PORT,
  SESSIONS_API_PORT,
} from '../application/ports/output/tokens';

// Adapters (implementations)
import { SessionsApiAdapter } from './adapters/http/sessions-api.adapter';
import { InMemoryJobRegistryAdapter } from './adapters/persistence/in-memory-job-registry.adapter';
import { TempFileStorageAdapter } from './adapters/storage/temp-file-storage.adapter';
import { LoggingEventPublisherAdapter } from './adapters/events/logging-event-publisher.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * The registry is bound with `useExisting` so the health check and the use
 * cases share the one instance holding the jobs.
 */
@Module({
  imports: [LoggingModule, HttpModule],
  providers: [
    // Upstream sessions API
    {
      provide: SESSIONS_API_PORT,
      useClass: SessionsApiAdapter,
    },

    // Job registry
    InMemoryJobRegistryAdapter,
    {
      provide: JOB_REGISTRY_PORT,
      useExisting: InMemoryJobRegistryAdapter,
    },

    // Report storage
    {
      provide: REPORT_STORAGE_PORT,
      useClass: TempFileStorageAdapter,
    },

    // Event publisher
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LoggingEventPublisherAdapter,
    },
  ],
  exports: [SESSIONS_API_PORT, JOB_REGISTRY_PORT, REPORT_STORAGE_PORT, EVENT_PUBLISHER_PORT],
})
export class InfrastructureModule {}
