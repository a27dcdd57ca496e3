import { Global, Module } from '@nestjs/common';
import { JsonLogger } from './json-logger.service';

// One logger instance for the whole app, so setLogLevels() in bootstrap applies everywhere.
@Global()
@Module({
  providers: [JsonLogger],
  exports: [JsonLogger]
})
export class LoggingModule {}
