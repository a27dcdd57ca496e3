import { Global, Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { JwtAuthGuard } from './jwt-auth.guard';
import { PasswordHasherService } from './password-hasher.service';
import { RolesGuard } from './roles.guard';
import { TokenService } from './token.service';

/**
 * Token issue/verify, password hashing and the two global guards.
 * Guard order matters: JwtAuthGuard fills request.user before RolesGuard reads it.
 */
@Global()
@Module({
  imports: [UsersModule],
  controllers: [AuthController],
  providers: [
    TokenService,
    PasswordHasherService,
    AuthService,
    { provide: APP_GUARD, useClass: JwtAuthGuard },
    { provide: APP_GUARD, useClass: RolesGuard }
  ],
  exports: [TokenService, PasswordHasherService]
})
export class AuthModule {}
