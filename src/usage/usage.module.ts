import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ApplicationModule } from '../application/application.module';
import { UsageController } from './usage.controller';
import { UsageReportExceptionFilter } from './filters/usage-report-exception.filter';

@Module({
  imports: [ApplicationModule],
  controllers: [UsageController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: UsageReportExceptionFilter,
    },
  ],
})
export class UsageModule {}
