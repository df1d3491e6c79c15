// Injection tokens for the driven ports
export const SESSIONS_API_PORT = 'SessionsApiPort';
export const JOB_REGISTRY_PORT = 'JobRegistryPort';
export const REPORT_STORAGE_PORT = 'ReportStoragePort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
