import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createPool, Pool, PoolConnection, ResultSetHeader } from 'mysql2/promise';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { JsonLogger } from '../logging/json-logger.service';

export type SortDirection = 'asc' | 'desc';

export interface OrderBy {
  column: string;
  direction: SortDirection;
}

/** Query surface shared by the pool-backed service and an open transaction. */
export interface SqlExecutor {
  sql<T = unknown>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T>;
  selectAll<T = unknown>(table: string, orderBy: OrderBy | undefined, allowedOrderColumns: readonly string[]): Promise<T>;
  updateByKey(
    table: string,
    keyColumn: string,
    keyValue: unknown,
    updates: Record<string, unknown>,
    allowedColumns: readonly string[]
  ): Promise<number>;
}

/** Thrown when an INSERT/UPDATE trips a UNIQUE index. */
export class DuplicateKeyError extends Error {
  constructor(message = 'Duplicate key') {
    super(message);
    this.name = 'DuplicateKeyError';
  }
}

function isDuplicateEntry(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ER_DUP_ENTRY';
}

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_]+$/;

function toBacktickedIdentifier(identifier: string): string {
  if (!IDENTIFIER_PATTERN.test(identifier)) {
    throw new Error(`Unsafe SQL identifier: ${identifier}`);
  }
  return `\`${identifier}\``;
}

export function templateToSql(strings: TemplateStringsArray, valueCount: number): string {
  let sql = '';
  for (let i = 0; i < strings.length; i++) {
    sql += strings[i];
    if (i < valueCount) {
      sql += '?';
    }
  }
  return sql;
}

/** Executes statements on one borrowed connection. Does not release it. */
class ConnectionExecutor implements SqlExecutor {
  constructor(private readonly connection: PoolConnection) {}

  private async run<T>(sql: string, params: unknown[]): Promise<T> {
    try {
      // Values are always sent as prepared-statement parameters.
      const [rows] = await this.connection.query(sql, params);
      return rows as T;
    } catch (error) {
      if (isDuplicateEntry(error)) {
        throw new DuplicateKeyError(error instanceof Error ? error.message : undefined);
      }
      throw error;
    }
  }

  sql<T = unknown>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T> {
    return this.run<T>(templateToSql(strings, params.length), params);
  }

  // SELECT * with an optional ORDER BY on a whitelisted column.
  selectAll<T = unknown>(table: string, orderBy: OrderBy | undefined, allowedOrderColumns: readonly string[]): Promise<T> {
    let sql = `SELECT * FROM ${toBacktickedIdentifier(table)}`;

    if (orderBy) {
      if (!allowedOrderColumns.includes(orderBy.column)) {
        throw new Error(`Disallowed sort column: ${orderBy.column}`);
      }
      const direction = orderBy.direction === 'desc' ? 'DESC' : 'ASC';
      sql += ` ORDER BY ${toBacktickedIdentifier(orderBy.column)} ${direction}`;
    }

    return this.run<T>(sql, []);
  }

  /**
   * Safe UPDATE builder: identifiers are validated and values parameterized.
   * Undefined values are skipped. Resolves to affectedRows, or 0 when there is nothing to set.
   */
  async updateByKey(
    table: string,
    keyColumn: string,
    keyValue: unknown,
    updates: Record<string, unknown>,
    allowedColumns: readonly string[]
  ): Promise<number> {
    const updateEntries = Object.entries(updates).filter(([, v]) => v !== undefined);
    if (updateEntries.length === 0) {
      return 0;
    }

    const allowed = new Set(allowedColumns);
    const setClauses: string[] = [];
    const params: unknown[] = [];

    for (const [column, value] of updateEntries) {
      if (!allowed.has(column)) {
        throw new Error(`Disallowed update column: ${column}`);
      }
      setClauses.push(`${toBacktickedIdentifier(column)} = ?`);
      params.push(value);
    }

    params.push(keyValue);

    const sql = `UPDATE ${toBacktickedIdentifier(table)} SET ${setClauses.join(', ')} WHERE ${toBacktickedIdentifier(
      keyColumn
    )} = ?`;

    const result = await this.run<ResultSetHeader>(sql, params);
    return result.affectedRows;
  }
}

/**
 * DatabaseService owns the mysql2 pool. Every call checks a connection out of the pool and
 * releases it in `finally`.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy, SqlExecutor {
  private pool?: Pool;

  constructor(private readonly config: ConfigService, private readonly logger: JsonLogger) {}

  async onModuleInit() {
    const host = this.config.get<string>('DB_HOST');
    const user = this.config.get<string>('DB_USER');
    const database = this.config.get<string>('DB_NAME');

    if (!host || !user || !database) {
      this.logger.warn('Database configuration missing; pool not created');
      return;
    }

    const port = Number(this.config.get<number>('DB_PORT') ?? 3306);
    const password = this.config.get<string>('DB_PASSWORD');
    const ssl = this.config.get<boolean>('DB_SSL') === true;

    this.pool = createPool({
      host,
      port,
      user,
      password,
      database,
      // DECIMAL columns (price) come back as numbers instead of strings.
      decimalNumbers: true,
      ...(ssl ? { ssl: { rejectUnauthorized: true } } : {})
    });

    this.logger.log('Database pool initialized', { host, port, database, ssl });

    if (this.config.get<boolean>('DB_AUTO_MIGRATE') === true) {
      await this.applySchema(this.config.get<string>('DB_SCHEMA_PATH') ?? 'sql/schema.sql');
    }
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
    }
  }

  /** False when the DB_* settings were missing at startup. */
  get isReady(): boolean {
    return this.pool !== undefined;
  }

  async getConnection(): Promise<PoolConnection> {
    if (!this.pool) {
      throw new Error('Database pool is not initialized');
    }
    return this.pool.getConnection();
  }

  /** Runs each `;`-terminated statement of a schema file. Statements must be idempotent. */
  async applySchema(schemaPath: string): Promise<void> {
    const file = resolve(process.cwd(), schemaPath);
    const text = await readFile(file, 'utf8');
    const statements = text
      .split(';')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const connection = await this.getConnection();
    try {
      for (const statement of statements) {
        await connection.query(statement);
      }
    } finally {
      connection.release();
    }

    this.logger.log('Database schema applied', { file, statements: statements.length });
  }

  /** Runs `work` on one pooled connection that is released on every exit path. */
  async withConnection<T>(work: (executor: SqlExecutor) => Promise<T>): Promise<T> {
    const connection = await this.getConnection();
    try {
      return await work(new ConnectionExecutor(connection));
    } finally {
      connection.release();
    }
  }

  /**
   * Runs `work` inside a transaction on a single connection. Commits on success,
   * rolls back on any error, releases the connection either way.
   */
  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const connection = await this.getConnection();
    try {
      await connection.beginTransaction();
      const result = await work(new ConnectionExecutor(connection));
      await connection.commit();
      return result;
    } catch (error) {
      try {
        await connection.rollback();
      } catch (rollbackError) {
        // The caller sees the error that aborted the work, not the rollback failure.
        this.logger.error('Transaction rollback failed', {
          errorMessage: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
          cause: error instanceof Error ? error.message : String(error)
        });
      }
      throw error;
    } finally {
      connection.release();
    }
  }

  // Tagged-template SQL helper. Interpolations become prepared-statement parameters.
  // Usage: await db.sql`SELECT * FROM products WHERE id = ${id}`
  async sql<T = unknown>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T> {
    return this.withConnection((executor) => executor.sql<T>(strings, ...params));
  }

  async selectAll<T = unknown>(
    table: string,
    orderBy: OrderBy | undefined,
    allowedOrderColumns: readonly string[]
  ): Promise<T> {
    return this.withConnection((executor) => executor.selectAll<T>(table, orderBy, allowedOrderColumns));
  }

  async updateByKey(
    table: string,
    keyColumn: string,
    keyValue: unknown,
    updates: Record<string, unknown>,
    allowedColumns: readonly string[]
  ): Promise<number> {
    return this.withConnection((executor) =>
      executor.updateByKey(table, keyColumn, keyValue, updates, allowedColumns)
    );
  }
}
