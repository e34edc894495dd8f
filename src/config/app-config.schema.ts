import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

import { WaterReminderStrategy } from '../modules/notifications/entities/reminder.interfaces';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    // Fallback is handled below.
  }

  return '0.0.0';
};

const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_PORT = 3000;
const DEFAULT_INVALID_TIMEZONE_WARN_COOLDOWN_SEC = 3600;
const DEFAULT_DATABASE_POOL_MAX = 10;

export const envSchema = z.object({
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DATABASE_URL: z.url(),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(DEFAULT_DATABASE_POOL_MAX),
  DATABASE_MIGRATIONS_ON_BOOT: booleanSchema.default(true),
  REMINDER_SCHEDULER_ENABLED: booleanSchema.default(true),
  WATER_REMINDER_STRATEGY: z.enum(WaterReminderStrategy).default(WaterReminderStrategy.FIXED_TIME),
  INVALID_TIMEZONE_WARN_COOLDOWN_SEC: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_INVALID_TIMEZONE_WARN_COOLDOWN_SEC),
  METRICS_ENABLED: booleanSchema.default(true),
  CORS_ALLOWED_ORIGINS: z.string().trim().optional(),
});

export type ParsedEnv = z.infer<typeof envSchema>;
