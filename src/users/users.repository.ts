import type { Role } from '../auth/enums/role.enum';
import type { User } from './user.entity';

export interface NewUser {
  username: string;
  password_hash: string;
  role: Role;
}

/**
 * Credential store. `insert` rejects with DuplicateKeyError when the username is taken.
 * Bound to MysqlUsersRepository in UsersModule; tests swap in an in-memory store.
 */
export abstract class UsersRepository {
  abstract findByUsername(username: string): Promise<User | null>;
  abstract insert(user: NewUser): Promise<User>;
  /** Resolves to false when no such user exists. */
  abstract updatePassword(username: string, passwordHash: string): Promise<boolean>;
}
