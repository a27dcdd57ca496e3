import { Module } from '@nestjs/common';
import { AdminBootstrapService } from './admin-bootstrap.service';
import { MysqlUsersRepository } from './mysql-users.repository';
import { UsersController } from './users.controller';
import { UsersRepository } from './users.repository';
import { UsersService } from './users.service';

@Module({
  controllers: [UsersController],
  providers: [UsersService, AdminBootstrapService, { provide: UsersRepository, useClass: MysqlUsersRepository }],
  exports: [UsersService]
})
export class UsersModule {}
