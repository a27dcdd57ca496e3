import { Injectable } from '@nestjs/common';
import { argon2id, hash, verify } from 'argon2';

// argon2 encodes these in every stored hash, so verify() needs no options.
export const ARGON2_OPTIONS = {
  type: argon2id,
  memoryCost: 65536,
  timeCost: 3,
  parallelism: 4
} as const;

@Injectable()
export class PasswordHasherService {
  hash(password: string): Promise<string> {
    return hash(password, ARGON2_OPTIONS);
  }

  verify(passwordHash: string, password: string): Promise<boolean> {
    return verify(passwordHash, password);
  }
}
