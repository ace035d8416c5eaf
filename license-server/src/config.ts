import { config as dotenvConfig } from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';

dotenvConfig();

export type RateAction = 'activate' | 'validate' | 'deactivate' | 'update_check' | 'download';

export interface RatePolicy {
  limit: number;
  windowSeconds: number;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

// "<limit>/<window seconds>", e.g. 10/300
const ratePolicy = (fallback: string) =>
  z
    .string()
    .regex(/^\d+\/\d+$/, 'expected <limit>/<windowSeconds>')
    .default(fallback)
    .transform((v): RatePolicy => {
      const [limit, windowSeconds] = v.split('/').map(Number);
      return { limit, windowSeconds };
    })
    .refine((p) => p.limit > 0 && p.windowSeconds > 0, 'limit and window must be positive');

const secret = z.string().min(32).optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().default(3100),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  ALLOWED_ORIGINS: z.string().default('*'),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3100'),

  DB_PATH: z.string().default('./data/licenses.db'),
  SECRETS_PATH: z.string().default('./data/secrets.json'),
  RELEASES_DIR: z.string().default('./data/releases'),
  LOGS_DIR: z.string().default('./logs'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  LICENSE_HASH_SALT: secret,
  LICENSE_KEY_SECRET: secret,
  SIGNING_SECRET: secret,
  IP_HASH_SALT: secret,
  JWT_SECRET: secret,

  GRACE_PERIOD_DAYS: z.coerce.number().int().min(0).max(90).default(7),
  EXEMPT_DOMAINS: z.string().default(''),
  EXEMPT_BYPASSES_EXPIRY: booleanFlag,
  KEY_GENERATION_ATTEMPTS: z.coerce.number().int().min(1).max(100).default(10),

  SIGNED_URL_TTL: z.coerce.number().int().min(60).max(3600).default(300),

  RATE_LIMIT_BLOCK_SECONDS: z.coerce.number().int().min(1).default(900),
  RATE_LIMIT_ACTIVATE: ratePolicy('10/300'),
  RATE_LIMIT_VALIDATE: ratePolicy('60/300'),
  RATE_LIMIT_DEACTIVATE: ratePolicy('10/300'),
  RATE_LIMIT_UPDATE_CHECK: ratePolicy('60/300'),
  RATE_LIMIT_DOWNLOAD: ratePolicy('10/3600'),
  RATE_LIMIT_DEFAULT: ratePolicy('60/300'),

  STORAGE_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

  ADMIN_USERNAME: z.string().min(1).default('admin'),
  ADMIN_PASSWORD: z.string().min(1).default('changeme'),
  ADMIN_RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(60),
  ADMIN_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60000),
});

const loggingSchema = envSchema.pick({ NODE_ENV: true, LOGS_DIR: true, LOG_LEVEL: true });

export interface LoggingConfig {
  env: 'development' | 'production' | 'test';
  level: NonNullable<z.infer<typeof loggingSchema>['LOG_LEVEL']>;
  logsDir: string;
}

function toLoggingConfig(e: z.infer<typeof loggingSchema>): LoggingConfig {
  return {
    env: e.NODE_ENV,
    level: e.LOG_LEVEL ?? (e.NODE_ENV === 'development' ? 'debug' : 'info'),
    logsDir: path.resolve(e.LOGS_DIR),
  };
}

/**
 * Logging settings alone, for the root logger built at import time.
 * Invalid values fall back to defaults; `loadConfig` reports them.
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const parsed = loggingSchema.safeParse(env);
  return toLoggingConfig(parsed.success ? parsed.data : loggingSchema.parse({}));
}

/**
 * Builds the configuration struct every component receives at construction.
 * Pure over `env`, so tests can pass literal maps.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment variables', {
      fields: parsed.error.flatten().fieldErrors,
    });
  }

  const e = parsed.data;

  const policies: Record<RateAction, RatePolicy> = {
    activate: e.RATE_LIMIT_ACTIVATE,
    validate: e.RATE_LIMIT_VALIDATE,
    deactivate: e.RATE_LIMIT_DEACTIVATE,
    update_check: e.RATE_LIMIT_UPDATE_CHECK,
    download: e.RATE_LIMIT_DOWNLOAD,
  };

  return {
    port: e.PORT,
    host: e.HOST,
    env: e.NODE_ENV,
    isDev: e.NODE_ENV === 'development',
    isProd: e.NODE_ENV === 'production',
    allowedOrigins: e.ALLOWED_ORIGINS.split(',').map((s) => s.trim()).filter(Boolean),
    publicBaseUrl: e.PUBLIC_BASE_URL.replace(/\/+$/, ''),

    paths: {
      db: e.DB_PATH === ':memory:' ? e.DB_PATH : path.resolve(e.DB_PATH),
      secrets: path.resolve(e.SECRETS_PATH),
      releases: path.resolve(e.RELEASES_DIR),
    },

    logging: toLoggingConfig(e),

    secrets: {
      hashSalt: e.LICENSE_HASH_SALT,
      keySecret: e.LICENSE_KEY_SECRET,
      signingSecret: e.SIGNING_SECRET,
      ipSalt: e.IP_HASH_SALT,
      jwtSecret: e.JWT_SECRET,
    },

    licensing: {
      gracePeriodDays: e.GRACE_PERIOD_DAYS,
      exemptDomains: e.EXEMPT_DOMAINS,
      exemptBypassesExpiry: e.EXEMPT_BYPASSES_EXPIRY,
      keyGenerationAttempts: e.KEY_GENERATION_ATTEMPTS,
    },

    signedUrls: {
      ttlSeconds: e.SIGNED_URL_TTL,
    },

    rateLimit: {
      blockSeconds: e.RATE_LIMIT_BLOCK_SECONDS,
      fallback: e.RATE_LIMIT_DEFAULT,
      policies,
    },

    storage: {
      timeoutMs: e.STORAGE_TIMEOUT_MS,
    },

    admin: {
      username: e.ADMIN_USERNAME,
      password: e.ADMIN_PASSWORD,
      rateLimitMax: e.ADMIN_RATE_LIMIT_MAX,
      rateLimitWindowMs: e.ADMIN_RATE_LIMIT_WINDOW_MS,
    },

    version: readVersion(),
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

/** Validates process.env, which already holds `.env` from module load. */
export function loadConfigFromEnvironment(): Config {
  return loadConfig(process.env);
}

function readVersion(): string {
  for (const candidate of [path.resolve(__dirname, '..', 'package.json'), path.resolve(__dirname, '..', '..', 'package.json')]) {
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return '1.0.0';
}
