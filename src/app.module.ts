import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { CorrelationIdMiddleware } from './shared/logging/correlation-id.middleware';
import { HealthModule } from './health/health.module';
import { UsageModule } from './usage/usage.module';

/**
 * Application Module
 * HTTP service that fetches a month of session usage and exports it as CSV,
 * directly or through background jobs
 */
@Module({
  imports: [ConfigModule, SharedModule, HealthModule, UsageModule],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
