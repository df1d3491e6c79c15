import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  MessageEvent,
  Param,
  Post,
  Query,
  Sse,
  StreamableFile,
} from '@nestjs/common';
import { Observable, map } from 'rxjs';
import type { ReportFile } from '../application/ports/input/download-export.port';
import type { FetchSessionsResult } from '../application/ports/input/fetch-sessions.port';
import type { StartUsageJobResult } from '../application/ports/input/start-usage-job.port';
import type { UsageJobEvent } from '../application/ports/input/stream-usage-job.port';
import {
  DownloadExportUseCase,
  FetchSessionsUseCase,
  GenerateReportUseCase,
  GetExportJobStatusUseCase,
  GetFetchJobStatusUseCase,
  StartExportJobUseCase,
  StartFetchJobUseCase,
  StreamUsageJobUseCase,
} from '../application/use-cases';
import type { UsageJobKind, UsageJobSnapshot } from '../domain/entities/usage-job.entity';
import {
  fetchSessionsQuerySchema,
  parseRequest,
  startExportJobBodySchema,
  startFetchJobBodySchema,
  usageReportQuerySchema,
} from './dto/usage-request.dto';

function csvFile(report: ReportFile): StreamableFile {
  return new StreamableFile(report.content, {
    type: 'text/csv; charset=utf-8',
    disposition: `attachment; filename="${report.filename}"`,
    length: report.content.length,
  });
}

function toMessageEvent(event: UsageJobEvent): MessageEvent {
  return { type: event.type, data: event };
}

@Controller()
export class UsageController {
  constructor(
    private readonly fetchSessionsUseCase: FetchSessionsUseCase,
    private readonly generateReportUseCase: GenerateReportUseCase,
    private readonly startFetchJobUseCase: StartFetchJobUseCase,
    private readonly startExportJobUseCase: StartExportJobUseCase,
    private readonly getFetchJobStatusUseCase: GetFetchJobStatusUseCase,
    private readonly getExportJobStatusUseCase: GetExportJobStatusUseCase,
    private readonly downloadExportUseCase: DownloadExportUseCase,
    private readonly streamUsageJobUseCase: StreamUsageJobUseCase,
  ) {}

  @Get('fetch')
  fetchSessions(@Query() query: unknown): Promise<FetchSessionsResult> {
    const { api_key, year, month } = parseRequest(fetchSessionsQuerySchema, query);
    return this.fetchSessionsUseCase.execute({ apiKey: api_key, year, month });
  }

  @Get('generate-csv')
  async generateCsv(@Query() query: unknown): Promise<StreamableFile> {
    const request = parseRequest(usageReportQuerySchema, query);
    const report = await this.generateReportUseCase.execute({
      apiKey: request.api_key,
      year: request.year,
      month: request.month,
      participantColumns: request.participant_columns,
    });
    return csvFile(report);
  }

  // Stream routes are static, so they win over the `:jobId` routes below
  @Sse('jobs/fetch/stream')
  streamFetchJob(@Query() query: unknown): Observable<MessageEvent> {
    return this.stream('fetch', query);
  }

  @Sse('jobs/export/stream')
  streamExportJob(@Query() query: unknown): Observable<MessageEvent> {
    return this.stream('export', query);
  }

  @Post('jobs/fetch')
  @HttpCode(HttpStatus.ACCEPTED)
  startFetchJob(@Body() body: unknown): Promise<StartUsageJobResult> {
    return this.startFetchJobUseCase.execute(parseRequest(startFetchJobBodySchema, body));
  }

  @Get('jobs/fetch/:jobId')
  getFetchJobStatus(@Param('jobId') jobId: string): Promise<UsageJobSnapshot> {
    return this.getFetchJobStatusUseCase.execute({ jobId });
  }

  @Post('jobs/export')
  @HttpCode(HttpStatus.ACCEPTED)
  startExportJob(@Body() body: unknown): Promise<StartUsageJobResult> {
    return this.startExportJobUseCase.execute(parseRequest(startExportJobBodySchema, body));
  }

  @Get('jobs/export/:jobId')
  getExportJobStatus(@Param('jobId') jobId: string): Promise<UsageJobSnapshot> {
    return this.getExportJobStatusUseCase.execute({ jobId });
  }

  @Get('jobs/export/:jobId/download')
  async downloadExport(@Param('jobId') jobId: string): Promise<StreamableFile> {
    return csvFile(await this.downloadExportUseCase.execute({ jobId }));
  }

  private stream(kind: UsageJobKind, query: unknown): Observable<MessageEvent> {
    const request = parseRequest(usageReportQuerySchema, query);
    return this.streamUsageJobUseCase
      .execute({
        kind,
        apiKey: request.api_key,
        year: request.year,
        month: request.month,
        participantColumns: request.participant_columns,
      })
      .pipe(map(toMessageEvent));
  }
}
