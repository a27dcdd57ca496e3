import { Injectable } from '@nestjs/common';
import { JsonLogger } from '../logging/json-logger.service';
import type { User } from '../users/user.entity';
import { UsersService } from '../users/users.service';
import { InvalidCredentialsException } from './auth.errors';
import { Role } from './enums/role.enum';
import type { LoginResponseDto } from './auth.dto';
import { TokenService } from './token.service';

@Injectable()
export class AuthService {
  constructor(
    private readonly usersService: UsersService,
    private readonly tokens: TokenService,
    private readonly logger: JsonLogger
  ) {}

  // Self-service signup always yields the `user` role; admins are created via POST /users.
  register(username: string, password: string): Promise<User> {
    return this.usersService.register(username, password, Role.USER);
  }

  async login(username: string, password: string): Promise<LoginResponseDto> {
    let user: User;
    try {
      user = await this.usersService.authenticate(username, password);
    } catch (error) {
      if (error instanceof InvalidCredentialsException) {
        this.logger.warn('Login failed', { username, reason: error.reason });
      }
      throw error;
    }

    const issued = await this.tokens.issue(user.username, user.role);
    this.logger.log('Login succeeded', { username: user.username, role: user.role });

    return { token: issued.token, tokenType: 'Bearer', expiresIn: issued.expiresIn };
  }
}
