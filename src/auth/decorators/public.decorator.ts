import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'auth:isPublic';

// Mark endpoints that skip JWT auth entirely (health, login, register).
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
