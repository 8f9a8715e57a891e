import { z } from 'zod';
import { InvalidConfigError } from './errors';

const booleanString = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v ?? String(fallback)).toLowerCase())
    .pipe(z.enum(['true', 'false']))
    .transform((v) => v === 'true');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  CACHE_ENABLED: booleanString(true),
  CACHE_MAX_SIZE: z.coerce.number().int().positive().default(1000),
  CACHE_TTL: z.coerce.number().int().positive().default(3600),
  CACHE_POPULAR_THRESHOLD: z.coerce.number().int().min(0).default(10),
  RATE_LIMIT_ENABLED: booleanString(true),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),
  MAINTENANCE_INTERVAL: z.coerce.number().int().positive().default(300),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  port: number;
  logLevel: Env['LOG_LEVEL'];
  cache: {
    enabled: boolean;
    maxSize: number;
    defaultTtlSeconds: number;
    popularityThreshold: number;
  };
  rateLimit: {
    enabled: boolean;
    requestsPerWindow: number;
    windowSeconds: number;
  };
  maintenanceIntervalSeconds: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.'));
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ');
    throw new InvalidConfigError(fields.join(','), `invalid environment (${msg})`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    cache: {
      enabled: e.CACHE_ENABLED,
      maxSize: e.CACHE_MAX_SIZE,
      defaultTtlSeconds: e.CACHE_TTL,
      popularityThreshold: e.CACHE_POPULAR_THRESHOLD,
    },
    rateLimit: {
      enabled: e.RATE_LIMIT_ENABLED,
      requestsPerWindow: e.RATE_LIMIT_REQUESTS,
      windowSeconds: e.RATE_LIMIT_WINDOW,
    },
    maintenanceIntervalSeconds: e.MAINTENANCE_INTERVAL,
  };
}
