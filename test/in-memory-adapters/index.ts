// Export all in-memory adapters for easy import
export { InMemorySessionsApiAdapter, type RecordedSessionsRequest } from './in-memory-sessions-api.adapter';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
