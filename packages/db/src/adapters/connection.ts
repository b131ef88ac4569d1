import { Pool } from 'pg';
import type { PoolConfig } from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase, NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { ExtractTablesWithRelations } from 'drizzle-orm';
import type { PgDatabase, PgTransactionConfig } from 'drizzle-orm/pg-core';

type EmptySchema = Record<string, never>;

type TransactionCallback<TSchema extends Record<string, unknown>> = Parameters<
  NodePgDatabase<TSchema>['transaction']
>[0];

export type DrizzleDatabase<TSchema extends Record<string, unknown> = EmptySchema> = NodePgDatabase<TSchema>;

export type DrizzleTransaction<TSchema extends Record<string, unknown> = EmptySchema> = Parameters<
  TransactionCallback<TSchema>
>[0];

/** Anything that can run a query: the pool-level database or an open transaction. */
export type DrizzleExecutor<TSchema extends Record<string, unknown> = EmptySchema> = PgDatabase<
  NodePgQueryResultHKT,
  TSchema,
  ExtractTablesWithRelations<TSchema>
>;

export interface DatabasePoolOptions<TSchema extends Record<string, unknown> = EmptySchema> {
  connectionString: string;
  schema?: TSchema;
  pool?: Pick<PoolConfig, 'max' | 'min' | 'idleTimeoutMillis' | 'connectionTimeoutMillis' | 'statement_timeout'>;
  logger?: boolean;
}

export interface DatabasePool<TSchema extends Record<string, unknown> = EmptySchema> {
  readonly pool: Pool;
  readonly db: DrizzleDatabase<TSchema>;
  withTransaction<TResult>(
    runner: (tx: DrizzleTransaction<TSchema>) => Promise<TResult>,
    config?: PgTransactionConfig
  ): Promise<TResult>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

const READ_COMMITTED: PgTransactionConfig['isolationLevel'] = 'read committed';

export function createDatabasePool<TSchema extends Record<string, unknown> = EmptySchema>(
  options: DatabasePoolOptions<TSchema>
): DatabasePool<TSchema> {
  const { connectionString, pool: poolOptions, schema, logger } = options;

  if (!connectionString) {
    throw new Error('Database connection string must be provided.');
  }

  const pgPool = new Pool({
    connectionString,
    max: poolOptions?.max,
    min: poolOptions?.min,
    idleTimeoutMillis: poolOptions?.idleTimeoutMillis,
    connectionTimeoutMillis: poolOptions?.connectionTimeoutMillis,
    statement_timeout: poolOptions?.statement_timeout
  });

  return wrapPool(pgPool, { schema, logger });
}

/** Builds the drizzle facade over an existing pool. The pool is closed with the facade. */
export function wrapPool<TSchema extends Record<string, unknown> = EmptySchema>(
  pgPool: Pool,
  options: Pick<DatabasePoolOptions<TSchema>, 'schema' | 'logger'> = {}
): DatabasePool<TSchema> {
  const db = drizzle(pgPool, { schema: options.schema, logger: options.logger });

  async function withTransaction<TResult>(
    runner: (tx: DrizzleTransaction<TSchema>) => Promise<TResult>,
    config?: PgTransactionConfig
  ): Promise<TResult> {
    return db.transaction(runner, {
      ...config,
      isolationLevel: config?.isolationLevel ?? READ_COMMITTED
    });
  }

  async function ping(): Promise<void> {
    await pgPool.query('SELECT 1');
  }

  async function close(): Promise<void> {
    await pgPool.end();
  }

  return {
    pool: pgPool,
    db,
    withTransaction,
    ping,
    close
  };
}
