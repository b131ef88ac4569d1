import type { Logger } from 'pino';
import type { MetricsEvent as DbMetricsEvent, MetricsHook as DbMetricsHook, RewardStore } from '@podium/db';
import { loadConfig, type RewardsApiConfig } from './config.js';
import { bootstrapDatabase, isDatabaseReady, shutdownDatabaseConnection } from './database.js';
import { createHttpServer, type HttpServer } from '../http/server.js';
import { registerDistributionRoutes } from '../http/routes/distributionRoutes.js';
import { registerUserRewardRoutes } from '../http/routes/userRewardRoutes.js';
import { createRewardOrchestrator } from '../services/rewardOrchestrator.js';
import { createRewardPreviewService } from '../services/rewardPreview.js';
import { createRewardQueries } from '../services/rewardQueries.js';
import { getLogger } from '../telemetry/logger.js';
import { createRewardMetrics, recordDbOperation, type RewardMetrics } from '../telemetry/metrics.js';

export interface AppBootstrapOptions {
  config?: RewardsApiConfig;
  configOverrides?: Record<string, string | undefined>;
  logger?: Logger;
  metrics?: RewardMetrics;
  /** Supplied by tests; otherwise the PostgreSQL store is opened on start. */
  store?: RewardStore;
  clock?: () => Date;
}

export interface RewardsApplication {
  readonly config: RewardsApiConfig;
  readonly logger: Logger;
  readonly metrics: RewardMetrics;
  readonly http: HttpServer;
  /** Registers the routes without listening; used by `start` and by tests that inject requests. */
  ready: () => Promise<void>;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  isRunning: () => boolean;
}

export const createApp = (options: AppBootstrapOptions = {}): RewardsApplication => {
  const config = options.config ?? loadConfig(options.configOverrides ?? {});
  const logger = options.logger ?? getLogger();
  const metrics = options.metrics ?? createRewardMetrics({ defaultLabels: { service: 'rewards-api' } });
  const databaseLogger = logger.child({ component: 'database' });
  const databaseMetricsHook = createDatabaseMetricsHook(metrics, databaseLogger);

  let store: RewardStore | null = options.store ?? null;

  const requireStore = (): RewardStore => {
    if (!store) {
      throw new Error('Reward store is not available before the application starts');
    }
    return store;
  };

  const http = createHttpServer({
    config,
    logger,
    metrics,
    checkReadiness: () => requireStore().ping()
  });

  let routesRegistered = false;

  const ready = async (): Promise<void> => {
    if (routesRegistered) {
      return;
    }

    const activeStore = store ?? (await bootstrapDatabase({ config, logger: databaseLogger, metricsHook: databaseMetricsHook }));
    store = activeStore;

    const orchestrator = createRewardOrchestrator({
      store: activeStore,
      logger: logger.child({ component: 'reward-orchestrator' }),
      metrics,
      clock: options.clock
    });
    const preview = createRewardPreviewService({
      reader: activeStore,
      logger: logger.child({ component: 'reward-preview' })
    });
    const queries = createRewardQueries({
      reader: activeStore,
      logger: logger.child({ component: 'reward-queries' })
    });

    await registerDistributionRoutes(http.instance, {
      distributeRewards: orchestrator.distributeRewards,
      previewRewards: preview.previewRewards
    });
    await registerUserRewardRoutes(http.instance, queries);

    routesRegistered = true;
  };

  let started = false;

  const application: RewardsApplication = {
    config,
    logger,
    metrics,
    http,
    ready,
    start: async (): Promise<void> => {
      if (started) {
        return;
      }

      await ready();
      await http.start();

      started = true;
      logger.info('rewards api started');
    },
    stop: async (): Promise<void> => {
      if (!started) {
        return;
      }

      await http.stop();
      if (!options.store) {
        await shutdownDatabaseConnection(databaseLogger);
      }

      started = false;
      logger.info('rewards api stopped');
    },
    isRunning: (): boolean => started && http.isStarted() && (options.store !== undefined || isDatabaseReady())
  };

  return application;
};

export const createDatabaseMetricsHook = (metrics: RewardMetrics, logger: Logger): DbMetricsHook => {
  return (event: DbMetricsEvent): void => {
    const outcome = event.outcome === 'success' ? 'success' : 'failure';
    recordDbOperation(metrics, event.operation, outcome, event.durationMs / 1000);

    if (event.outcome === 'error') {
      logger.error(
        {
          operation: event.operation,
          durationMs: event.durationMs,
          errorCode: event.errorCode
        },
        'database operation failed'
      );
      return;
    }

    logger.debug(
      {
        operation: event.operation,
        durationMs: event.durationMs
      },
      'database operation completed'
    );
  };
};
