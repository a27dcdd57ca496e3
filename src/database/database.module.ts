import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database.service';

/**
 * Single pool for the whole app. Repositories inject DatabaseService and borrow
 * connections per call.
 */
@Global()
@Module({
  providers: [DatabaseService],
  exports: [DatabaseService]
})
export class DatabaseModule {}
