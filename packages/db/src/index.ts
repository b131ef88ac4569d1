import { createDatabasePool, type DatabasePool, type DatabasePoolOptions } from './adapters/connection.js';
import { rollbackLastMigration, runMigrations, type MigrationLogger } from './adapters/migrator.js';
import { DbError, DbErrorCode, registerMetricsHook, type MetricsHook } from './instrumentation/metrics.js';
import { dbSchema, type DbSchema } from './schema/index.js';
import { createDrizzleRewardStore } from './store/drizzleRewardStore.js';
import type { RewardStore } from './store/rewardStore.js';
import { rewardMigrations } from '../migrations/index.js';

let pool: DatabasePool<DbSchema> | null = null;
let store: RewardStore | null = null;

export interface DbInitOptions {
  databaseUrl: string;
  pool?: DatabasePoolOptions['pool'];
  logger?: boolean;
  metricsHook?: MetricsHook | null;
}

export const init = async (options: DbInitOptions): Promise<void> => {
  if (pool) {
    throw new DbError(DbErrorCode.INTERNAL_ERROR, 'Reward database has already been initialised');
  }

  pool = createDatabasePool({
    connectionString: options.databaseUrl,
    pool: options.pool,
    logger: options.logger ?? false,
    schema: dbSchema
  });
  store = createDrizzleRewardStore(pool);
  registerMetricsHook(options.metricsHook ?? null);
};

export const shutdown = async (): Promise<void> => {
  if (!pool) {
    return;
  }

  const closing = pool;
  pool = null;
  store = null;
  registerMetricsHook(null);
  await closing.close();
};

export const isInitialised = (): boolean => pool !== null;

export const getRewardStore = (): RewardStore => {
  ensurePool();
  if (!store) {
    throw new DbError(DbErrorCode.INTERNAL_ERROR, 'Reward database has not been initialised');
  }
  return store;
};

export const migrate = async (logger?: MigrationLogger): Promise<string[]> =>
  runMigrations(ensurePool(), rewardMigrations, logger);

const ensurePool = (): DatabasePool<DbSchema> => {
  if (!pool) {
    throw new DbError(DbErrorCode.INTERNAL_ERROR, 'Reward database has not been initialised');
  }
  return pool;
};

export { createDatabasePool, createDrizzleRewardStore, rewardMigrations, runMigrations, rollbackLastMigration };
export type { DatabasePool, DatabasePoolOptions, DrizzleDatabase, DrizzleExecutor, DrizzleTransaction } from './adapters/connection.js';
export type { Migration, MigrationExecutor, MigrationHost, MigrationLogger } from './adapters/migrator.js';
export {
  DbError,
  DbErrorCode,
  ensureDbError,
  getMetricsHook,
  isUniqueViolation,
  registerMetricsHook,
  withMetrics
} from './instrumentation/metrics.js';
export type { DbErrorDetail, DbErrorReason, MetricsEvent, MetricsHook, WithMetricsOptions } from './instrumentation/metrics.js';
export type { RewardReader, RewardStore, RewardWriteSession } from './store/rewardStore.js';
export type { MarkRewardsDistributedParams, RankingEntry } from './repositories/tournamentRepository.js';
export type { ParticipationWrite, PlacementHistoryRow } from './repositories/participationRepository.js';
export type { SkillRewardSourceParams, SkillRewardWrite } from './repositories/skillRewardRepository.js';
export type { BadgeWrite } from './repositories/badgeRepository.js';
export * from './schema/index.js';
