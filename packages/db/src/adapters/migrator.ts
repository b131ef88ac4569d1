import { sql, type SQL } from 'drizzle-orm';
import { DbError, DbErrorCode } from '../instrumentation/metrics.js';

export interface MigrationExecutor {
  execute(query: SQL): PromiseLike<{ rows: Record<string, unknown>[] }>;
}

export interface MigrationHost {
  withTransaction<TResult>(runner: (tx: MigrationExecutor) => Promise<TResult>): Promise<TResult>;
}

export interface Migration {
  readonly id: string;
  up(db: MigrationExecutor): Promise<void>;
  down(db: MigrationExecutor): Promise<void>;
}

export interface MigrationLogger {
  info(payload: Record<string, unknown>, message: string): void;
}

const LEDGER_TABLE = sql.identifier('reward_schema_migrations');

const ensureLedger = sql`
  CREATE TABLE IF NOT EXISTS ${LEDGER_TABLE} (
    id text PRIMARY KEY,
    applied_at timestamptz NOT NULL DEFAULT now()
  );
`;

const readAppliedIds = async (tx: MigrationExecutor): Promise<Set<string>> => {
  const result = await tx.execute(sql`SELECT id FROM ${LEDGER_TABLE} ORDER BY id`);
  return new Set(result.rows.flatMap((row) => (typeof row.id === 'string' ? [row.id] : [])));
};

const assertOrdered = (migrations: readonly Migration[]): void => {
  migrations.forEach((migration, index) => {
    const previous = migrations[index - 1];
    if (previous && previous.id >= migration.id) {
      throw new DbError(DbErrorCode.INPUT_INVALID, `Migration ${migration.id} is out of order`, {
        detail: { reason: 'constraint_violation', context: { previous: previous.id, current: migration.id } }
      });
    }
  });
};

/**
 * Applies pending migrations in id order, each in its own transaction
 * together with its ledger row. Returns the ids applied by this call.
 */
export async function runMigrations(
  host: MigrationHost,
  migrations: readonly Migration[],
  logger?: MigrationLogger
): Promise<string[]> {
  assertOrdered(migrations);

  const applied = await host.withTransaction(async (tx) => {
    await tx.execute(ensureLedger);
    return readAppliedIds(tx);
  });

  const executed: string[] = [];
  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    await host.withTransaction(async (tx) => {
      await migration.up(tx);
      await tx.execute(sql`INSERT INTO ${LEDGER_TABLE} (id) VALUES (${migration.id})`);
    });
    logger?.info({ migration: migration.id }, 'migration applied');
    executed.push(migration.id);
  }

  return executed;
}

/** Reverts the most recently applied migration, if any. */
export async function rollbackLastMigration(
  host: MigrationHost,
  migrations: readonly Migration[]
): Promise<string | null> {
  return host.withTransaction(async (tx) => {
    await tx.execute(ensureLedger);
    const applied = await readAppliedIds(tx);
    const last = [...migrations].reverse().find((migration) => applied.has(migration.id));
    if (!last) {
      return null;
    }

    await last.down(tx);
    await tx.execute(sql`DELETE FROM ${LEDGER_TABLE} WHERE id = ${last.id}`);
    return last.id;
  });
}
