import type { Logger } from 'pino';
import {
  getRewardStore,
  init as initDatabase,
  isInitialised as isDatabaseInitialised,
  migrate,
  shutdown as shutdownDatabase,
  type MetricsHook,
  type RewardStore
} from '@podium/db';
import { getConfig, type RewardsApiConfig } from './config.js';
import { getLogger } from '../telemetry/logger.js';

export class DatabaseBootstrapError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DatabaseBootstrapError';
  }
}

export interface DatabaseInitOptions {
  config?: RewardsApiConfig;
  logger?: Logger;
  metricsHook?: MetricsHook | null;
}

let ready = false;

export const bootstrapDatabase = async (options: DatabaseInitOptions = {}): Promise<RewardStore> => {
  if (ready || isDatabaseInitialised()) {
    ready = true;
    return getRewardStore();
  }

  const config = options.config ?? getConfig();
  const logger = options.logger ?? getLogger();

  try {
    await initDatabase({
      databaseUrl: config.database.url,
      pool: { max: config.database.poolMax },
      logger: false,
      metricsHook: options.metricsHook ?? null
    });

    if (config.database.runMigrations) {
      const applied = await migrate(logger);
      logger.info({ applied }, 'reward schema migrations checked');
    }

    const store = getRewardStore();
    await store.ping();
    ready = true;
    logger.info({ database: maskConnectionString(config.database.url) }, 'database connection initialised');
    return store;
  } catch (error) {
    ready = false;
    logger.error({ err: serialiseError(error) }, 'failed to initialise database connection');
    await shutdownDatabase();
    throw new DatabaseBootstrapError('Failed to bootstrap database connection', error);
  }
};

export const shutdownDatabaseConnection = async (logger: Logger = getLogger()): Promise<void> => {
  if (!ready && !isDatabaseInitialised()) {
    return;
  }

  await shutdownDatabase();
  ready = false;
  logger.info('database connection closed');
};

export const isDatabaseReady = (): boolean => ready && isDatabaseInitialised();

const maskConnectionString = (connectionString: string): string => {
  try {
    const url = new URL(connectionString);
    if (url.username) {
      url.username = '***';
    }
    if (url.password) {
      url.password = '***';
    }
    return url.toString();
  } catch {
    return '<unparseable connection string>';
  }
};

const serialiseError = (error: unknown): Record<string, unknown> => {
  if (error instanceof DatabaseBootstrapError && error.cause instanceof Error) {
    return serialiseError(error.cause);
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack
    };
  }

  return { message: String(error) };
};
