import fs from 'node:fs';
import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.string().optional(),
  REWARDS_API_LOG_LEVEL: z.string().optional(),
  REWARDS_API_PRETTY_LOGS: booleanFlag.optional(),
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).trim().min(1, 'DATABASE_URL is required'),
  REWARDS_API_PORT: z.coerce
    .number({ invalid_type_error: 'REWARDS_API_PORT must be a number' })
    .int()
    .min(0)
    .max(65535)
    .default(3050),
  REWARDS_API_HOST: z.string().default('0.0.0.0'),
  REWARDS_API_DB_POOL_MAX: z.coerce
    .number({ invalid_type_error: 'REWARDS_API_DB_POOL_MAX must be a number' })
    .int()
    .min(1)
    .default(10),
  REWARDS_API_RUN_MIGRATIONS: booleanFlag.default('false'),
  REWARDS_API_SHUTDOWN_TIMEOUT_MS: z.coerce
    .number({ invalid_type_error: 'REWARDS_API_SHUTDOWN_TIMEOUT_MS must be a number' })
    .int()
    .min(1_000)
    .default(30_000)
});

const configSchema = envSchema.transform((env) => {
  const level = env.REWARDS_API_LOG_LEVEL ?? env.LOG_LEVEL ?? 'info';
  const pretty = env.REWARDS_API_PRETTY_LOGS ?? env.NODE_ENV === 'development';

  return {
    env: env.NODE_ENV,
    logging: {
      level,
      pretty
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.REWARDS_API_DB_POOL_MAX,
      runMigrations: env.REWARDS_API_RUN_MIGRATIONS
    },
    http: {
      host: env.REWARDS_API_HOST,
      port: env.REWARDS_API_PORT
    },
    timeouts: {
      gracefulShutdownMs: env.REWARDS_API_SHUTDOWN_TIMEOUT_MS
    }
  } as const;
});

export type RewardsApiConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

let cachedConfig: RewardsApiConfig | null = null;
let environmentPrimed = false;

/** Loads `.env` files once; variables already set in the process win. */
const primeEnvironment = (): void => {
  if (environmentPrimed) {
    return;
  }

  [path.resolve(process.cwd(), '.env'), path.resolve(process.cwd(), 'apps/rewards-api/.env')]
    .filter((envPath) => fs.existsSync(envPath))
    .forEach((envPath) => {
      loadEnv({ path: envPath, override: false });
    });
  environmentPrimed = true;
};

const coerceEnv = (overrides: Record<string, string | undefined> = {}): Record<string, string> => {
  const merged: Record<string, string | undefined> = { ...process.env, ...overrides };
  return Object.entries(merged).reduce<Record<string, string>>((acc, [key, value]) => {
    if (typeof value === 'string') {
      acc[key] = value;
    }
    return acc;
  }, {});
};

export const loadConfig = (overrides: Record<string, string | undefined> = {}): RewardsApiConfig => {
  primeEnvironment();

  const parsed = configSchema.safeParse(coerceEnv(overrides));
  if (!parsed.success) {
    const formatted = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid environment configuration:\n${formatted}`, parsed.error);
  }

  cachedConfig = Object.freeze(parsed.data);
  return cachedConfig;
};

export const getConfig = (): RewardsApiConfig => {
  if (!cachedConfig) {
    return loadConfig();
  }

  return cachedConfig;
};

export const resetConfig = (): void => {
  cachedConfig = null;
};
