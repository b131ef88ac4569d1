import pino, { type Logger, type LoggerOptions } from 'pino';
import { getConfig } from '../bootstrap/config.js';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const REDACTED_PATHS = [
  'headers.authorization',
  'headers.cookie',
  'config.database.url',
  'databaseUrl',
  'credentials',
  '*.password',
  '*.secret',
  '*.token'
];

let loggerInstance: Logger | null = null;

const toLogLevel = (value: string): LogLevel => LOG_LEVELS.find((level) => level === value) ?? 'info';

const buildLogger = (): Logger => {
  const config = getConfig();

  const options: LoggerOptions = {
    level: toLogLevel(config.logging.level),
    base: {
      service: 'rewards-api',
      environment: config.env
    },
    redact: {
      paths: REDACTED_PATHS,
      remove: true
    }
  };

  if (config.logging.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        singleLine: true,
        translateTime: 'SYS:standard'
      }
    };
  }

  return pino(options);
};

export const getLogger = (): Logger => {
  if (!loggerInstance) {
    loggerInstance = buildLogger();
  }

  return loggerInstance;
};

export interface DistributionLogContext {
  tournamentId: string;
  actorId?: string | null;
  forced?: boolean;
}

export const getDistributionLogger = (base: Logger, context: DistributionLogContext): Logger =>
  base.child({
    tournamentId: context.tournamentId,
    actorId: context.actorId ?? undefined,
    forced: context.forced
  });

export const resetLogger = (): void => {
  loggerInstance = null;
};
