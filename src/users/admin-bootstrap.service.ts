import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '../database/database.service';
import { JsonLogger } from '../logging/json-logger.service';
import { UsersService } from './users.service';

// Creates ADMIN_USERNAME as an admin on startup when both credentials are configured.
@Injectable()
export class AdminBootstrapService implements OnApplicationBootstrap {
  constructor(
    private readonly usersService: UsersService,
    private readonly db: DatabaseService,
    private readonly config: ConfigService,
    private readonly logger: JsonLogger
  ) {}

  async onApplicationBootstrap() {
    const username = this.config.get<string>('ADMIN_USERNAME');
    const password = this.config.get<string>('ADMIN_PASSWORD');

    if (!username || !password) {
      return;
    }

    if (!this.db.isReady) {
      this.logger.warn('Skipping admin bootstrap: database not configured', { username });
      return;
    }

    const created = await this.usersService.ensureAdmin(username, password);
    this.logger.log(created ? 'Bootstrap admin created' : 'Bootstrap admin already present', { username });
  }
}
