import { Injectable } from '@nestjs/common';
import type { ResultSetHeader, RowDataPacket } from 'mysql2';
import { DatabaseService } from '../database/database.service';
import type { User } from './user.entity';
import { NewUser, UsersRepository } from './users.repository';

interface UserRow extends RowDataPacket, User {}

@Injectable()
export class MysqlUsersRepository extends UsersRepository {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  async findByUsername(username: string): Promise<User | null> {
    const rows = await this.db.sql<UserRow[]>`SELECT * FROM users WHERE username = ${username} LIMIT 1`;
    return rows[0] ?? null;
  }

  insert(user: NewUser): Promise<User> {
    return this.db.transaction(async (tx) => {
      const result = await tx.sql<ResultSetHeader>`
        INSERT INTO users (username, password_hash, role)
        VALUES (${user.username}, ${user.password_hash}, ${user.role})
      `;
      const rows = await tx.sql<UserRow[]>`SELECT * FROM users WHERE id = ${result.insertId}`;
      if (rows.length === 0) {
        throw new Error(`Inserted user ${result.insertId} could not be read back`);
      }
      return rows[0];
    });
  }

  async updatePassword(username: string, passwordHash: string): Promise<boolean> {
    const affected = await this.db.updateByKey('users', 'username', username, { password_hash: passwordHash }, [
      'password_hash'
    ]);
    return affected > 0;
  }
}
