import type { RewardsApplication } from './app.js';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

/** The part of `process` the service lifecycle needs; tests hand in an emitter. */
export interface ServiceHost {
  once(event: ShutdownSignal, listener: () => void): unknown;
  on(event: 'uncaughtException', listener: (error: Error) => void): unknown;
  on(event: 'unhandledRejection', listener: (reason: unknown) => void): unknown;
  exit(code: number): void;
}

/**
 * Stops the application at most once, exiting 0 once it has drained and 1
 * when stopping fails or outlasts the configured grace period.
 */
export const createShutdown = (app: RewardsApplication, host: ServiceHost): ((signal: string) => Promise<void>) => {
  let stopping: Promise<void> | null = null;

  const drain = async (signal: string): Promise<void> => {
    const timeoutMs = app.config.timeouts.gracefulShutdownMs;
    app.logger.info({ signal, timeoutMs }, 'stopping rewards api');

    const timer = setTimeout(() => {
      app.logger.error({ timeoutMs }, 'rewards api did not stop within the grace period');
      host.exit(1);
    }, timeoutMs);
    timer.unref();

    try {
      await app.stop();
      host.exit(0);
    } catch (error) {
      app.logger.error({ err: error }, 'rewards api failed to stop cleanly');
      host.exit(1);
    } finally {
      clearTimeout(timer);
    }
  };

  return (signal) => {
    if (!stopping) {
      stopping = drain(signal);
    }
    return stopping;
  };
};

/** Starts the service and ties its shutdown to the host's signals. Resolves once it listens or has exited. */
export const runRewardsService = async (app: RewardsApplication, host: ServiceHost): Promise<void> => {
  host.on('uncaughtException', (error) => {
    app.logger.error({ err: error, origin: 'uncaughtException' }, 'unhandled exception');
  });
  host.on('unhandledRejection', (reason) => {
    app.logger.error({ err: reason, origin: 'unhandledRejection' }, 'unhandled rejection');
  });

  const shutdown = createShutdown(app, host);
  for (const signal of SHUTDOWN_SIGNALS) {
    host.once(signal, () => {
      void shutdown(signal);
    });
  }

  try {
    await app.start();
  } catch (error) {
    app.logger.fatal({ err: error }, 'rewards api failed to start');
    host.exit(1);
  }
};
