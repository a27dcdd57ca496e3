import { Injectable } from '@nestjs/common';
import { JsonLogger } from './logging/json-logger.service';

export const SERVICE_NAME = 'product-api';

@Injectable()
export class AppService {
  constructor(private readonly logger: JsonLogger) {}

  health() {
    this.logger.debug('health probe served');
    return { status: 'ok', service: SERVICE_NAME, timestamp: new Date().toISOString() };
  }
}
