import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '../../config/config.module';
import { PinoLoggerService } from './pino-logger.service';
import { CorrelationIdMiddleware } from './correlation-id.middleware';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [PinoLoggerService, CorrelationIdMiddleware],
  exports: [PinoLoggerService, CorrelationIdMiddleware],
})
export class LoggingModule {}
