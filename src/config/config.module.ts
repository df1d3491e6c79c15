import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

/**
 * Loads `.env` (when present) and the validated {@link AppConfig} once,
 * globally, so every module can inject `ConfigService<AppConfig>`.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [configuration],
      cache: true,
    }),
  ],
  exports: [NestConfigModule],
})
export class ConfigModule {}
