import type { ExecutionContext } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';
import type { AuthenticatedRequest } from '../../src/auth/interfaces/authenticated-request';
import type { JsonLogger } from '../../src/logging/json-logger.service';

export function makeContext(request: AuthenticatedRequest): ExecutionContext {
  return {
    switchToHttp: () => ({
      getRequest: () => request
    }),
    getHandler: () => ({}),
    getClass: () => (class Test {})
  } as unknown as ExecutionContext;
}

export function makeRequest(authorization?: string): AuthenticatedRequest {
  return { headers: authorization === undefined ? {} : { authorization } } as unknown as AuthenticatedRequest;
}

export function makeConfig(values: Record<string, unknown>): ConfigService {
  return { get: jest.fn((key: string) => values[key]) } as unknown as ConfigService;
}

export function makeLogger(): JsonLogger {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() } as unknown as JsonLogger;
}
