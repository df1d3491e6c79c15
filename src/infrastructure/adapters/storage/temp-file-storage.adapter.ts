import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, mkdtemp, readFile, rm } from 'fs/promises';
import * as path from 'path';
import type { ReportStoragePort } from '../../../application/ports/output/report-storage.port';
import type { AppConfig } from '../../../config/configuration';

/**
 * Temp File Storage Adapter
 * Implements ReportStoragePort on the local disk. Each report gets its own
 * directory under `REPORT_TEMP_DIR`, so two exports of the same month never
 * share a path.
 */
@Injectable()
export class TempFileStorageAdapter implements ReportStoragePort {
  private readonly logger = new Logger(TempFileStorageAdapter.name);
  private readonly baseDir: string;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    this.baseDir = path.resolve(this.configService.getOrThrow('reports', { infer: true }).tempDir);
  }

  async allocate(filename: string): Promise<string> {
    await mkdir(this.baseDir, { recursive: true });
    const dir = await mkdtemp(path.join(this.baseDir, 'report-'));
    const filePath = path.join(dir, path.basename(filename));

    this.logger.debug(`Allocated ${filePath}`);
    return filePath;
  }

  async read(filePath: string): Promise<Buffer> {
    return readFile(this.ownedPath(filePath));
  }

  async remove(filePath: string): Promise<void> {
    const dir = path.dirname(this.ownedPath(filePath));
    await rm(dir, { recursive: true, force: true });
    this.logger.debug(`Removed ${dir}`);
  }

  private ownedPath(filePath: string): string {
    const resolved = path.resolve(filePath);
    const relative = path.relative(this.baseDir, path.dirname(resolved));
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`${filePath} is not a report allocated under ${this.baseDir}`);
    }
    return resolved;
  }
}
