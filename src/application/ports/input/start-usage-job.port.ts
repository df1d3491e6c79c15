/**
 * Start Fetch Job Command
 */
export interface StartFetchJobCommand {
  apiKey: string;
  year: number;
  month: number;
}

/**
 * Start Export Job Command
 * `participantColumns` is raw user input: `auto`, empty, or an integer.
 */
export interface StartExportJobCommand extends StartFetchJobCommand {
  participantColumns?: string | number;
}

export interface StartUsageJobResult {
  jobId: string;
}

/**
 * Start Fetch Job Port (Driving Port / Use Case Interface)
 * Registers a background fetch of one month of sessions and returns at once
 */
export interface StartFetchJobPort {
  execute(command: StartFetchJobCommand): Promise<StartUsageJobResult>;
}

/**
 * Start Export Job Port (Driving Port / Use Case Interface)
 * Registers a background fetch followed by a CSV export and returns at once
 */
export interface StartExportJobPort {
  execute(command: StartExportJobCommand): Promise<StartUsageJobResult>;
}
