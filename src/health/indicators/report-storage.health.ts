import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { promises as fs } from 'fs';
import type { AppConfig } from '../../config/configuration';

@Injectable()
export class ReportStorageHealthIndicator extends HealthIndicator {
  private readonly tempDir: string;
  private readonly minFreeSpacePercent = 10;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    super();
    this.tempDir = this.configService.getOrThrow('reports', { infer: true }).tempDir;
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    let details: Record<string, unknown>;
    let freePercent: number;

    try {
      await fs.mkdir(this.tempDir, { recursive: true });
      await fs.access(this.tempDir, fs.constants.W_OK);

      const stats = await fs.statfs(this.tempDir);
      const totalBytes = stats.blocks * stats.bsize;
      const freeBytes = stats.bavail * stats.bsize;
      freePercent = totalBytes > 0 ? (freeBytes / totalBytes) * 100 : 100;

      details = {
        path: this.tempDir,
        totalBytes,
        freeBytes,
        freePercent: Number(freePercent.toFixed(1)),
      };
    } catch (error) {
      throw new HealthCheckError(
        'Report directory is not usable',
        this.getStatus(key, false, {
          path: this.tempDir,
          error: error instanceof Error ? error.message : String(error),
        }),
      );
    }

    if (freePercent < this.minFreeSpacePercent) {
      throw new HealthCheckError(
        `Low disk space: ${freePercent.toFixed(1)}% free`,
        this.getStatus(key, false, details),
      );
    }

    return this.getStatus(key, true, details);
  }
}
