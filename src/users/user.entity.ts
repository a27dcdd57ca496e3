import { ApiProperty } from '@nestjs/swagger';
import { Role } from '../auth/enums/role.enum';

export interface User {
  id: number;
  username: string;
  password_hash: string;
  role: Role;
  created_at: Date;
  updated_at: Date;
}

export type PublicUser = Omit<User, 'password_hash'>;

// Swagger schema representation. password_hash is never serialised.
export class UserResponseDto implements PublicUser {
  @ApiProperty({ description: 'User id', example: 1 })
  id!: number;

  @ApiProperty({ description: 'Unique username', example: 'alice' })
  username!: string;

  @ApiProperty({ description: 'Role', enum: Role, example: Role.USER })
  role!: Role;

  @ApiProperty({ description: 'Creation timestamp', example: '2026-01-19T00:00:00.000Z', format: 'date-time' })
  created_at!: Date;

  @ApiProperty({ description: 'Last update timestamp', example: '2026-01-19T00:00:00.000Z', format: 'date-time' })
  updated_at!: Date;
}

export function toUserResponse(user: User): PublicUser {
  const { password_hash: _passwordHash, ...rest } = user;
  return rest;
}
