import type { ReportFile } from './download-export.port';

export interface GenerateReportCommand {
  apiKey: string;
  year: number;
  month: number;
  participantColumns?: string | number;
}

/**
 * Generate Report Port (Driving Port / Use Case Interface)
 * Synchronous fetch and CSV export in one request
 */
export interface GenerateReportPort {
  execute(command: GenerateReportCommand): Promise<ReportFile>;
}
