export interface DownloadExportCommand {
  jobId: string;
}

export interface ReportFile {
  filename: string;
  content: Buffer;
}

/**
 * Download Export Port (Driving Port / Use Case Interface)
 * Hands out the CSV of a completed export once, then forgets the job
 */
export interface DownloadExportPort {
  execute(command: DownloadExportCommand): Promise<ReportFile>;
}
