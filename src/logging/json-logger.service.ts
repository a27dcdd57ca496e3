import { ConsoleLogger, Injectable, LogLevel, Optional } from '@nestjs/common';

/**
 * JSON-lines logger. Writes `{ts, level, context, msg, ...meta}` to stdout/stderr.
 */
@Injectable()
export class JsonLogger extends ConsoleLogger {
  constructor(@Optional() context?: string) {
    super(context ?? 'product-api');
  }

  private nowIso() {
    return new Date().toISOString();
  }

  private normalizeError(error: unknown) {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    if (typeof error === 'object' && error !== null) {
      try {
        return JSON.parse(JSON.stringify(error)) as Record<string, unknown>;
      } catch {
        return { value: String(error) };
      }
    }

    return { value: String(error) };
  }

  private normalizeMessage(message: unknown) {
    if (message instanceof Error) {
      return { msg: message.message, error: this.normalizeError(message) };
    }
    return { msg: message };
  }

  private line(level: string, message: unknown, context: string | undefined, meta?: Record<string, unknown>) {
    return JSON.stringify({ ts: this.nowIso(), level, context, ...this.normalizeMessage(message), ...(meta ?? {}) });
  }

  log(message: unknown, context?: string): void;
  log(message: unknown, meta?: Record<string, unknown>): void;
  log(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? undefined : metaOrContext;
    super.log(this.line('info', message, context, meta));
  }

  warn(message: unknown, context?: string): void;
  warn(message: unknown, meta?: Record<string, unknown>): void;
  warn(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? undefined : metaOrContext;
    super.warn(this.line('warn', message, context, meta));
  }

  error(message: unknown, stack?: string, context?: string): void;
  error(message: unknown, meta?: Record<string, unknown>): void;
  error(message: unknown, stackOrMeta?: string | Record<string, unknown>, maybeContext?: string) {
    const stack = typeof stackOrMeta === 'string' ? stackOrMeta : undefined;
    const context = maybeContext ?? this.context;
    const meta = typeof stackOrMeta === 'string' ? {} : (stackOrMeta ?? {});
    super.error(this.line('error', message, context, { ...(stack ? { stack } : {}), ...meta }));
  }

  debug(message: unknown, context?: string): void;
  debug(message: unknown, meta?: Record<string, unknown>): void;
  debug(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? undefined : metaOrContext;
    super.debug(this.line('debug', message, context, meta));
  }

  /** Log levels for a NODE_ENV value: quiet in production and under test. */
  static levelsFor(env: string): LogLevel[] {
    if (env === 'test') return ['error'];
    if (env === 'production') return ['log', 'warn', 'error'];
    return ['log', 'warn', 'error', 'debug', 'verbose'];
  }
}
