/**
 * Report Storage Port (Driven Port)
 * Scratch space for generated CSV files that live until they are downloaded
 */
export interface ReportStoragePort {
  /**
   * Reserve a unique, writable path ending in `filename`.
   */
  allocate(filename: string): Promise<string>;

  read(filePath: string): Promise<Buffer>;

  /**
   * Remove a file allocated by this storage. Missing files are ignored.
   */
  remove(filePath: string): Promise<void>;
}
