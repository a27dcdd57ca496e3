import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InvalidCredentialsException } from '../auth/auth.errors';
import { Role } from '../auth/enums/role.enum';
import { PasswordHasherService } from '../auth/password-hasher.service';
import { DuplicateKeyError } from '../database/database.service';
import { JsonLogger } from '../logging/json-logger.service';
import type { User } from './user.entity';
import { UsersRepository } from './users.repository';

@Injectable()
export class UsersService {
  constructor(
    private readonly users: UsersRepository,
    private readonly hasher: PasswordHasherService,
    private readonly logger: JsonLogger
  ) {}

  /**
   * Stores a new user with an argon2id hash of `password`.
   * The up-front lookup gives the common case a clean 409; the unique index
   * still catches two concurrent registrations of the same name.
   */
  async register(username: string, password: string, role: Role = Role.USER): Promise<User> {
    if (await this.users.findByUsername(username)) {
      throw new ConflictException('Username already registered');
    }

    const passwordHash = await this.hasher.hash(password);

    try {
      const user = await this.users.insert({ username, password_hash: passwordHash, role });
      this.logger.log('User registered', { userId: user.id, username, role });
      return user;
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw new ConflictException('Username already registered');
      }
      throw error;
    }
  }

  async authenticate(username: string, password: string): Promise<User> {
    const user = await this.users.findByUsername(username);
    if (!user) {
      throw new InvalidCredentialsException('UNKNOWN_USER');
    }

    if (!(await this.hasher.verify(user.password_hash, password))) {
      throw new InvalidCredentialsException('WRONG_PASSWORD');
    }

    return user;
  }

  async findByUsername(username: string): Promise<User> {
    const user = await this.users.findByUsername(username);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return user;
  }

  async changePassword(username: string, currentPassword: string, newPassword: string): Promise<void> {
    await this.authenticate(username, currentPassword);

    const updated = await this.users.updatePassword(username, await this.hasher.hash(newPassword));
    if (!updated) {
      throw new NotFoundException('User not found');
    }

    this.logger.log('Password changed', { username });
  }

  /** Creates `username` as admin unless it already exists. Resolves to true when created. */
  async ensureAdmin(username: string, password: string): Promise<boolean> {
    const existing = await this.users.findByUsername(username);
    if (existing) {
      if (existing.role !== Role.ADMIN) {
        this.logger.warn('Bootstrap admin exists without admin role', { username });
      }
      return false;
    }

    await this.register(username, password, Role.ADMIN);
    return true;
  }
}
