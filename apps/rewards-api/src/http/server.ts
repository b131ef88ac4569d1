import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { getConfig, type RewardsApiConfig } from '../bootstrap/config.js';
import { getLogger } from '../telemetry/logger.js';
import { createRewardMetrics, serializeRewardMetrics, type RewardMetrics } from '../telemetry/metrics.js';

export interface HttpServerOptions {
  config?: RewardsApiConfig;
  logger?: Logger;
  metrics?: RewardMetrics;
  /** Reports whether the backing store answers; `/healthz` returns 503 when it throws. */
  checkReadiness?: () => Promise<void>;
}

export interface HttpServer {
  readonly instance: FastifyInstance;
  readonly metrics: RewardMetrics;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  isStarted: () => boolean;
}

const requestStartTimes = new WeakMap<object, bigint>();

export const createHttpServer = (options: HttpServerOptions = {}): HttpServer => {
  const config = options.config ?? getConfig();
  const baseLogger = options.logger ?? getLogger();
  const metrics = options.metrics ?? createRewardMetrics({ defaultLabels: { service: 'rewards-api' } });

  const fastifyLogger = baseLogger.child({ component: 'http' }) as unknown as FastifyBaseLogger;

  const app: FastifyInstance = Fastify({
    logger: fastifyLogger,
    disableRequestLogging: true,
    trustProxy: true
  });

  app.addHook('onRequest', async (request, reply) => {
    requestStartTimes.set(request, process.hrtime.bigint());
    void reply.header('X-Request-Id', request.id);
    request.log.debug({ url: request.url, method: request.method }, 'incoming request');
  });

  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    if (startTime) {
      const duration = Number(process.hrtime.bigint() - startTime) / 1_000_000;
      request.log.debug({ statusCode: reply.statusCode, durationMs: duration }, 'request completed');
    }
  });

  app.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      void reply.status(400).send({ error: 'validation_error', message: error.message });
      return;
    }

    request.log.error({ err: serialiseError(error) }, 'unhandled error in http server');
    if (!reply.sent) {
      void reply.status(500).send({ status: 'error', message: 'Internal Server Error' });
    }
  });

  app.get('/healthz', async (request, reply) => {
    try {
      if (options.checkReadiness) {
        await options.checkReadiness();
      }
      return { status: 'ok', timestamp: new Date().toISOString() };
    } catch (error) {
      request.log.warn({ err: serialiseError(error) }, 'readiness check failed');
      return reply.status(503).send({ status: 'unavailable', timestamp: new Date().toISOString() });
    }
  });

  app.get('/metrics', async (request, reply) => {
    const body = await serializeRewardMetrics(metrics);
    void reply.header('Content-Type', metrics.registry.contentType);
    return reply.send(body);
  });

  let started = false;

  const start = async (): Promise<void> => {
    if (started) {
      return;
    }

    await app.listen({ port: config.http.port, host: config.http.host });
    started = true;
    baseLogger.info({ port: config.http.port }, 'http server listening');
  };

  const stop = async (): Promise<void> => {
    if (!started) {
      return;
    }

    await app.close();
    started = false;
    baseLogger.info('http server stopped');
  };

  return {
    instance: app,
    metrics,
    start,
    stop,
    isStarted: () => started
  };
};

const serialiseError = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack
    };
  }

  return { message: String(error) };
};
